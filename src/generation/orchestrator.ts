/**
 * GenerationOrchestrator: runs (zone x language) client generator tasks.
 * Purpose: fan generator subprocesses out over a bounded pool and capture every outcome as a result.
 * Assumptions: each task owns clients/<language>/<zone>; results come back in submission order.
 * Usage: const results = await orchestrator.run(tasks, config.max_workers);
 */

import fse from "fs-extra";

import { NULL_LOGGER, type EventLogger } from "../core/logger.js";
import {
  describeProcessFailure,
  expandPlaceholders,
  type ProcessOutcome,
  type ProcessRunner,
} from "../core/process-runner.js";
import { listFilesRecursive, truncateText } from "../core/utils.js";

import { WorkerPool } from "./worker-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type GenerationTask = {
  zone: string;
  language: string;
  schemaPath: string;
  outputDir: string;
};

export type TaskState = "pending" | "running" | "succeeded" | "failed";

export type GenerationFailureKind =
  | "exit_code"
  | "timeout"
  | "spawn"
  | "killed"
  | "no_output"
  | "cancelled"
  | "unconfigured"
  | "exception";

export type GenerationFailure = {
  kind: GenerationFailureKind;
  message: string;
  exitCode?: number;
  stderr?: string;
};

export type GenerationResult = {
  zone: string;
  language: string;
  status: Extract<TaskState, "succeeded" | "failed">;
  files: string[];
  outputDir: string;
  error?: GenerationFailure;
  durationMs: number;
  bytes: number;
};

export type GeneratorTool = {
  command: string;
  args: string[];
  timeoutMs: number;
};

export type GenerationOrchestratorOptions = {
  runner: ProcessRunner;
  generators: ReadonlyMap<string, GeneratorTool>;
  cwd?: string;
  logger?: EventLogger;
  signal?: AbortSignal;
  clock?: () => number;
};

const STDERR_LIMIT = 4_000;
const SPAWN_FAILURE_EXIT_CODE = -1;

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class GenerationOrchestrator {
  private readonly logger: EventLogger;
  private readonly clock: () => number;

  constructor(private readonly opts: GenerationOrchestratorOptions) {
    this.logger = opts.logger ?? NULL_LOGGER;
    this.clock = opts.clock ?? (() => Date.now());
  }

  async run(tasks: GenerationTask[], maxWorkers: number): Promise<GenerationResult[]> {
    const pool = new WorkerPool(maxWorkers);
    return Promise.all(tasks.map((task) => this.submit(pool, task)));
  }

  // Never rejects: every failure is captured into the task's result.
  submit(pool: WorkerPool, task: GenerationTask): Promise<GenerationResult> {
    this.logTask("generate.queued", task);
    return pool.submit(() => this.execute(task));
  }

  private async execute(task: GenerationTask): Promise<GenerationResult> {
    const startedAt = this.clock();
    const finish = (fields: Pick<GenerationResult, "status" | "files" | "bytes" | "error">) => {
      const result: GenerationResult = {
        zone: task.zone,
        language: task.language,
        outputDir: task.outputDir,
        durationMs: Math.max(0, this.clock() - startedAt),
        ...fields,
      };
      this.logResult(result);
      return result;
    };
    const failed = (error: GenerationFailure) => finish({ status: "failed", files: [], bytes: 0, error });

    if (this.opts.signal?.aborted) {
      return failed({ kind: "cancelled", message: "Cancelled before the generator started." });
    }

    const generator = this.opts.generators.get(task.language);
    if (!generator) {
      return failed({
        kind: "unconfigured",
        message: `No generator is configured for language "${task.language}".`,
      });
    }

    this.logTask("generate.start", task, { command: generator.command });

    try {
      await fse.emptyDir(task.outputDir);

      const args = expandPlaceholders(generator.args, {
        schema: task.schemaPath,
        output: task.outputDir,
        zone: task.zone,
        language: task.language,
      });

      let outcome: ProcessOutcome;
      try {
        outcome = await this.opts.runner.run({
          command: generator.command,
          args,
          cwd: this.opts.cwd,
          timeoutMs: generator.timeoutMs,
          signal: this.opts.signal,
        });
      } catch (err) {
        return failed({
          kind: "spawn",
          message: `Failed to start ${generator.command}: ${errorMessage(err)}`,
        });
      }

      const failure = classifyOutcome(outcome, generator);
      if (failure) {
        return failed(failure);
      }

      const files = await listFilesRecursive(task.outputDir);
      if (files.length === 0) {
        return failed({
          kind: "no_output",
          message: `${generator.command} exited successfully but wrote no files.`,
          ...stderrField(outcome),
        });
      }

      return finish({
        status: "succeeded",
        files: files.map((file) => file.path),
        bytes: files.reduce((total, file) => total + file.bytes, 0),
      });
    } catch (err) {
      return failed({ kind: "exception", message: errorMessage(err) });
    }
  }

  // ===========================================================================
  // LOGGING
  // ===========================================================================

  private logTask(type: string, task: GenerationTask, extra: { command?: string } = {}): void {
    this.logger.log({
      type,
      zone: task.zone,
      language: task.language,
      payload: { output_dir: task.outputDir, ...extra },
    });
  }

  private logResult(result: GenerationResult): void {
    if (result.status === "succeeded") {
      this.logger.log({
        type: "generate.complete",
        zone: result.zone,
        language: result.language,
        payload: { files: result.files.length, bytes: result.bytes, duration_ms: result.durationMs },
      });
      return;
    }

    this.logger.log({
      type: "generate.fail",
      zone: result.zone,
      language: result.language,
      payload: {
        kind: result.error?.kind ?? "exception",
        message: result.error?.message ?? "",
        duration_ms: result.durationMs,
      },
    });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function classifyOutcome(
  outcome: ProcessOutcome,
  generator: GeneratorTool,
): GenerationFailure | null {
  const message = `${generator.command}: ${describeProcessFailure(outcome, generator.timeoutMs)}`;

  if (outcome.cancelled) {
    return { kind: "cancelled", message, ...stderrField(outcome) };
  }
  if (outcome.timedOut) {
    return { kind: "timeout", message, ...stderrField(outcome) };
  }
  if (outcome.signal) {
    return { kind: "killed", message, ...stderrField(outcome) };
  }
  if (outcome.exitCode === SPAWN_FAILURE_EXIT_CODE) {
    return { kind: "spawn", message: `Failed to start ${generator.command}.`, ...stderrField(outcome) };
  }
  if (outcome.exitCode !== 0) {
    return { kind: "exit_code", message, exitCode: outcome.exitCode, ...stderrField(outcome) };
  }
  return null;
}

function stderrField(outcome: ProcessOutcome): { stderr?: string } {
  const stderr = outcome.stderr.trim();
  return stderr.length > 0 ? { stderr: truncateText(stderr, STDERR_LIMIT).text } : {};
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
