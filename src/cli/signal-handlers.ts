import type { EventEmitter } from "node:events";

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

export type StopSignalOptions = {
  // First SIGINT/SIGTERM: cancel outstanding work and let the run summarize.
  onSignal?: (signal: NodeJS.Signals) => void;
  // Second signal: give up waiting.
  onForce?: (signal: NodeJS.Signals) => void;
  exit?: (code: number) => void;
  source?: Pick<EventEmitter, "on" | "off">;
};

const FORCED_EXIT_CODE = 130;

export function createStopSignalHandler(opts: StopSignalOptions = {}): StopSignalHandler {
  const controller = new AbortController();
  const source = opts.source ?? process;
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    source.off("SIGINT", onSigint);
    source.off("SIGTERM", onSigterm);
  };

  const handleSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      opts.onForce?.(signal);
      cleanup();
      exit(FORCED_EXIT_CODE);
      return;
    }

    try {
      opts.onSignal?.(signal);
    } finally {
      controller.abort(signal);
    }
  };

  const onSigint = (): void => handleSignal("SIGINT");
  const onSigterm = (): void => handleSignal("SIGTERM");

  source.on("SIGINT", onSigint);
  source.on("SIGTERM", onSigterm);

  return {
    signal: controller.signal,
    cleanup,
    isStopped: () => controller.signal.aborted,
  };
}
