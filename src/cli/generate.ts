import { InvalidArgumentError, type Command } from "commander";

import { defaultRunId } from "../core/utils.js";
import { runPipeline, type PipelineOutcome } from "../pipeline/pipeline.js";
import { buildRunContext } from "../pipeline/run-context.js";

import { splitList } from "./config.js";
import { loadCommandConfig, resolveFormatter, type CliContext } from "./context.js";
import { createConsoleReporter, printOutcome } from "./report.js";
import { createStopSignalHandler } from "./signal-handlers.js";

export type GenerateOptions = {
  zones?: string;
  languages?: string;
  workers?: string;
  output?: string;
  timeout?: number;
  runId?: string;
  archive: boolean;
  depsCheck: boolean;
  installDeps?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerGenerateCommand(program: Command, ctx: CliContext): void {
  program
    .command("generate")
    .description("Extract a schema per zone and generate a client per (zone, language)")
    .option("--zones <names>", "Comma-separated zone names or glob patterns (default: all)")
    .option("--languages <names>", "Comma-separated target languages (default: all enabled)")
    .option("--workers <n>", "Maximum concurrent tool processes")
    .option("--output <dir>", "Output root (overrides output_dir)")
    .option("--timeout <seconds>", "Cancel outstanding work after this many seconds", parsePositiveSeconds)
    .option("--run-id <id>", "Run id used for the log file name")
    .option("--no-archive", "Skip archiving the generated clients")
    .option("--no-deps-check", "Skip probing generator tools before the run")
    .option("--install-deps", "Install missing generator tools before the run")
    .action(async (opts: GenerateOptions, command: Command) => {
      await generateCommand(ctx, opts, command);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function generateCommand(
  ctx: CliContext,
  opts: GenerateOptions,
  command: Command,
): Promise<PipelineOutcome> {
  const { config } = loadCommandConfig(ctx, command, { output: opts.output, workers: opts.workers });
  const format = resolveFormatter(ctx);
  const runId = opts.runId ?? defaultRunId();

  const stopHandler = createStopSignalHandler({
    onSignal: (signal) => {
      console.log(`Received ${signal}. Cancelling run ${runId}; finished clients are kept.`);
    },
    onForce: (signal) => {
      console.log(`Received ${signal} again. Exiting without waiting for tools to stop.`);
    },
  });

  try {
    const runCtx = buildRunContext({
      config,
      cwd: ctx.cwd,
      ports: ctx.ports,
      options: {
        runId,
        zones: splitList(opts.zones),
        languages: splitList(opts.languages),
        timeoutSeconds: opts.timeout,
        signal: stopHandler.signal,
        reporter: createConsoleReporter({ format }),
        checkDeps: opts.depsCheck,
        ...(opts.archive ? {} : { archive: false }),
        ...(opts.installDeps ? { installDeps: true } : {}),
      },
    });

    const outcome = await runPipeline(runCtx);
    console.log("");
    printOutcome(outcome, format);
    if (!outcome.ok) {
      process.exitCode = 1;
    }
    return outcome;
  } finally {
    stopHandler.cleanup();
  }
}

function parsePositiveSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Expected a positive number of seconds.");
  }
  return seconds;
}
