/**
 * Pipeline ports.
 * Purpose: the injectable seams between the generation pipeline and the outside world.
 * Assumptions: every side effect that tests need to control goes through one of these.
 * Usage: buildRunContext({ config, options, ports: { processRunner: fake } }).
 */

import type { EventLogger } from "../core/logger.js";
import type { ProcessRunner } from "../core/process-runner.js";
import type { HostRegistry } from "../routes/route-table.js";

export type Clock = {
  now: () => Date;
};

export type RunLogger = EventLogger & {
  readonly filePath?: string;
  close(): void;
};

export type LogSink = {
  createRunLogger: (logPath: string, runId: string, now: () => Date) => RunLogger;
};

export type HostRegistrySource = {
  load: (manifestPath: string) => Promise<HostRegistry>;
};

export type PipelinePorts = {
  processRunner: ProcessRunner;
  clock: Clock;
  logSink: LogSink;
  hostRegistry: HostRegistrySource;
};
