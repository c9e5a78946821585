/**
 * RunContext + composition root for generation runs.
 * Purpose: centralize run-scoped config and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: const ctx = buildRunContext({ config, options }); const outcome = await runPipeline(ctx);
 */

import type { ProjectConfig } from "../core/config.js";
import { JsonlLogger, type EventLogger } from "../core/logger.js";
import { createExecaProcessRunner } from "../core/process-runner.js";
import { loadHostRegistry } from "../routes/route-table.js";

import type { PipelinePorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineOptions = {
  // Zone names or glob patterns; empty means every zone.
  zones?: string[];
  languages?: string[];
  maxWorkers?: number;
  archive?: boolean;
  installDeps?: boolean;
  checkDeps?: boolean;
  timeoutSeconds?: number;
  runId?: string;
  signal?: AbortSignal;
  // Receives every run event in addition to the JSONL log (console progress).
  reporter?: EventLogger;
};

export type RunContext = {
  config: ProjectConfig;
  options: PipelineOptions;
  ports: PipelinePorts;
  cwd: string;
};

export type BuildRunContextInput = {
  config: ProjectConfig;
  options?: PipelineOptions;
  ports?: Partial<PipelinePorts>;
  cwd?: string;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(): PipelinePorts {
  return {
    processRunner: createExecaProcessRunner(),
    clock: {
      now: () => new Date(),
    },
    logSink: {
      createRunLogger: (logPath, runId, now) => new JsonlLogger(logPath, { runId, now }),
    },
    hostRegistry: {
      load: loadHostRegistry,
    },
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  return {
    config: input.config,
    options: input.options ?? {},
    ports: {
      ...createDefaultPorts(),
      ...input.ports,
    },
    cwd: input.cwd ?? process.cwd(),
  };
}
