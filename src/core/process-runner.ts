/**
 * Subprocess adapter for external tools (schema exporter, client generators, installers).
 * Purpose: give the pipeline one injectable seam over execa so tests can fake tool runs.
 * Assumptions: commands are invoked without a shell; placeholders are expanded beforehand.
 * Usage: const runner = createExecaProcessRunner(); await runner.run({ command, args, timeoutMs, signal }).
 */

import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessRequest = {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type ProcessOutcome = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
  // Set when the child was terminated by a signal; exitCode is then -1.
  signal?: string;
};

export interface ProcessRunner {
  run(request: ProcessRequest): Promise<ProcessOutcome>;
}

// =============================================================================
// EXECA RUNNER
// =============================================================================

const SPAWN_FAILURE_EXIT_CODE = -1;

export function createExecaProcessRunner(): ProcessRunner {
  return {
    async run(request: ProcessRequest): Promise<ProcessOutcome> {
      const res = await execa(request.command, request.args, {
        cwd: request.cwd,
        env: request.env,
        reject: false,
        stdio: "pipe",
        timeout: request.timeoutMs,
        signal: request.signal,
      });

      const exitCode = res.exitCode ?? SPAWN_FAILURE_EXIT_CODE;
      return {
        exitCode: res.failed && exitCode === 0 ? SPAWN_FAILURE_EXIT_CODE : exitCode,
        stdout: res.stdout ?? "",
        stderr: res.stderr ?? "",
        timedOut: res.timedOut,
        cancelled: res.isCanceled,
        ...(res.signal ? { signal: res.signal } : {}),
      };
    },
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export type Placeholders = Record<string, string>;

export function expandPlaceholders(args: string[], values: Placeholders): string[] {
  return args.map((arg) =>
    arg.replace(/\{([a-z_]+)\}/g, (match, key: string) => values[key] ?? match),
  );
}

export function describeProcessFailure(outcome: ProcessOutcome, timeoutMs?: number): string {
  if (outcome.cancelled) {
    return "Cancelled before completion.";
  }
  if (outcome.timedOut) {
    const seconds = timeoutMs !== undefined ? ` after ${Math.round(timeoutMs / 1000)}s` : "";
    return `Timed out${seconds}.`;
  }
  if (outcome.signal) {
    return `Killed by ${outcome.signal}.`;
  }
  return `Exited with code ${outcome.exitCode}.`;
}

export function isProcessSuccess(outcome: ProcessOutcome): boolean {
  return outcome.exitCode === 0 && !outcome.timedOut && !outcome.cancelled;
}
