/**
 * Zone-isolated generation pipeline.
 * Purpose: validate zones, isolate routes, extract schemas, generate clients, then archive.
 * Assumptions: configuration problems are fatal before any subprocess starts; runtime failures are per task.
 * Usage: const outcome = await runPipeline(buildRunContext({ config, options })); process.exitCode = outcome.ok ? 0 : 1;
 */

import { ArchiveManager, type ArchiveRecord, type PruneOutcome } from "../archive/archive-manager.js";
import { enabledTargets, type ProjectConfig, type TargetConfig } from "../core/config.js";
import { ArchiveError, ConfigError, ValidationError, type ExtractionError } from "../core/errors.js";
import { createTeeLogger, type EventLogger } from "../core/logger.js";
import {
  clientOutputDir,
  createOutputLayout,
  languageClientsDir,
  runLogPath,
  type OutputLayout,
} from "../core/paths.js";
import { fail, succeed, type Result } from "../core/result.js";
import { defaultRunId } from "../core/utils.js";
import { ensureDependencies } from "../deps/dependencies.js";
import { writeClientIndex } from "../generation/client-index.js";
import {
  GenerationOrchestrator,
  type GenerationResult,
  type GenerationTask,
  type GeneratorTool,
} from "../generation/orchestrator.js";
import { WorkerPool } from "../generation/worker-pool.js";
import { syncToMonorepo, type MonorepoSyncOutcome } from "../monorepo/sync.js";
import { isolate, zoneBasePath } from "../routes/isolator.js";
import type { HostRegistry } from "../routes/route-table.js";
import { SchemaExtractor, type SchemaDocument } from "../schema/extractor.js";
import { ZoneRegistry } from "../zones/registry.js";
import type { Zone } from "../zones/zone.js";

import type { HostRegistrySource } from "./ports.js";
import type { RunContext } from "./run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type ZoneExtraction =
  | { zone: string; status: "succeeded"; schema: SchemaDocument }
  | { zone: string; status: "failed"; message: string; diagnostic?: string };

export type ArchiveStage =
  | { status: "archived"; record: ArchiveRecord; pruned?: PruneOutcome }
  | { status: "failed"; message: string }
  | { status: "skipped"; reason: string };

// Failures of the steps after generation; they fail the run without dropping its results.
export type StageFailure = {
  stage: "index" | "prune" | "monorepo";
  message: string;
  language?: string;
};

export type PipelineOutcome = {
  runId: string;
  logPath: string;
  outputDir: string;
  zones: string[];
  languages: string[];
  extractions: ZoneExtraction[];
  results: GenerationResult[];
  clientIndexes: string[];
  archive: ArchiveStage;
  monorepo?: MonorepoSyncOutcome;
  stageFailures: StageFailure[];
  cancelled: boolean;
  ok: boolean;
};

export type ZonePartition = {
  registry: ZoneRegistry;
  host: HostRegistry;
};

type ZoneRun = {
  extraction: ZoneExtraction;
  results: GenerationResult[];
};

// =============================================================================
// ZONE PARTITION
// =============================================================================

// Loads zones and the host registry; every validation issue is fatal.
export async function loadZonePartition(
  config: ProjectConfig,
  hostRegistry: HostRegistrySource,
): Promise<ZonePartition> {
  const loaded = ZoneRegistry.load(config.zones);
  if (!loaded.ok) throw loaded.error;

  const host = await hostRegistry.load(config.routes_manifest);
  const validated = loaded.value.validate(host.snapshot);
  if (!validated.ok) throw new ValidationError(validated.error);

  return { registry: loaded.value, host };
}

export function selectTargets(
  config: ProjectConfig,
  languages: string[] = [],
): Result<Array<[string, TargetConfig]>, ConfigError> {
  const enabled = enabledTargets(config);
  const wanted = languages.map((language) => language.trim()).filter((language) => language.length > 0);

  if (wanted.length === 0) {
    return enabled.length > 0
      ? succeed(enabled)
      : fail(new ConfigError("No enabled targets.", ["targets: Enable at least one generator target"]));
  }

  const known = new Map(enabled);
  const unknown = wanted.filter((language) => !known.has(language));
  if (unknown.length > 0) {
    return fail(
      new ConfigError(`Unknown or disabled language(s): ${unknown.join(", ")}.`, [
        `Enabled targets: ${enabled.map(([language]) => language).join(", ") || "(none)"}`,
      ]),
    );
  }

  return succeed(enabled.filter(([language]) => wanted.includes(language)));
}

// =============================================================================
// PIPELINE
// =============================================================================

export async function runPipeline(ctx: RunContext): Promise<PipelineOutcome> {
  const { config, options, ports } = ctx;
  const runId = options.runId ?? defaultRunId(ports.clock.now());
  const layout = createOutputLayout(config.output_dir);
  const logPath = runLogPath(layout, runId);
  const runLogger = ports.logSink.createRunLogger(logPath, runId, ports.clock.now);
  const logger: EventLogger = options.reporter ? createTeeLogger(runLogger, options.reporter) : runLogger;

  try {
    logger.log({ type: "run.start", payload: { output_dir: layout.root, config_zones: Object.keys(config.zones) } });

    const { registry, host } = await loadZonePartition(config, ports.hostRegistry);
    const selectedZones = registry.select(options.zones ?? []);
    if (!selectedZones.ok) throw selectedZones.error;
    const selectedTargets = selectTargets(config, options.languages);
    if (!selectedTargets.ok) throw selectedTargets.error;

    const zones = selectedZones.value;
    const targets = selectedTargets.value;
    logger.log({
      type: "zones.validated",
      payload: { zones: zones.map((zone) => zone.name), languages: targets.map(([language]) => language) },
    });

    if (options.checkDeps ?? true) {
      const deps = await ensureDependencies(targets, {
        runner: ports.processRunner,
        cwd: ctx.cwd,
        logger,
        install: options.installDeps ?? config.auto_install_deps,
      });
      if (!deps.ok) throw deps.error;
    }

    const cancellation = linkCancellation(options.signal, options.timeoutSeconds ?? config.timeouts.run_seconds);
    let zoneRuns: ZoneRun[];
    try {
      zoneRuns = await runZones({
        ctx,
        layout,
        logger,
        zones,
        host,
        targets,
        signal: cancellation.signal,
      });
    } finally {
      cancellation.dispose();
    }

    const cancelled = cancellation.signal.aborted;
    if (cancelled) {
      logger.log({ type: "run.cancelled", payload: { reason: cancellation.reason() } });
    }

    const extractions = zoneRuns.map((run) => run.extraction);
    const results = zoneRuns.flatMap((run) => run.results);

    const stageFailures: StageFailure[] = [];
    const attempt: AttemptStage = (failure, work) => attemptStage(failure, work, { logger, failures: stageFailures });

    const clientIndexes = await writeClientIndexes({ config, layout, zones, targets, results, logger, attempt });
    const archive = await archiveResults({ ctx, layout, results, cancelled, logger, attempt });

    let monorepo: MonorepoSyncOutcome | undefined;
    if (config.monorepo.enabled && !cancelled && results.some((result) => result.status === "succeeded")) {
      monorepo = await attempt({ stage: "monorepo" }, () =>
        syncToMonorepo({
          monorepoPath: config.monorepo.path,
          packageDir: config.monorepo.package_dir,
          clientsDir: layout.clientsDir,
          results,
          logger,
        }),
      );
    }

    const ok =
      !cancelled &&
      extractions.every((extraction) => extraction.status === "succeeded") &&
      results.every((result) => result.status === "succeeded") &&
      archive.status !== "failed" &&
      stageFailures.length === 0;

    logger.log({
      type: "run.complete",
      payload: {
        ok,
        succeeded: results.filter((result) => result.status === "succeeded").length,
        failed: results.filter((result) => result.status === "failed").length,
        extraction_failures: extractions.filter((extraction) => extraction.status === "failed").length,
        archive: archive.status,
        stage_failures: stageFailures.length,
      },
    });

    return {
      runId,
      logPath,
      outputDir: layout.root,
      zones: zones.map((zone) => zone.name),
      languages: targets.map(([language]) => language),
      extractions,
      results,
      clientIndexes,
      archive,
      ...(monorepo ? { monorepo } : {}),
      stageFailures,
      cancelled,
      ok,
    };
  } catch (err) {
    logger.log({
      type: "run.fail",
      payload: { name: err instanceof Error ? err.name : "Error", message: err instanceof Error ? err.message : String(err) },
    });
    throw err;
  } finally {
    runLogger.close();
  }
}

// =============================================================================
// STAGES
// =============================================================================

// One pool for extraction and generation; a zone's generators start only after its schema exists.
async function runZones(args: {
  ctx: RunContext;
  layout: OutputLayout;
  logger: EventLogger;
  zones: Zone[];
  host: HostRegistry;
  targets: Array<[string, TargetConfig]>;
  signal: AbortSignal;
}): Promise<ZoneRun[]> {
  const { ctx, layout, logger, host, targets, signal } = args;
  const { config, options, ports } = ctx;

  const pool = new WorkerPool(options.maxWorkers ?? config.max_workers);
  const extractor = new SchemaExtractor({
    runner: ports.processRunner,
    layout,
    tool: config.schema_tool,
    timeoutMs: config.timeouts.schema_seconds * 1000,
    cwd: ctx.cwd,
    logger,
    signal,
  });
  const orchestrator = new GenerationOrchestrator({
    runner: ports.processRunner,
    generators: buildGenerators(config, targets),
    cwd: ctx.cwd,
    logger,
    signal,
  });

  const runZone = async (zone: Zone): Promise<ZoneRun> => {
    const isolated = isolate(zone, host.table, { apiPrefix: config.api_prefix });

    let extracted: Result<SchemaDocument, ExtractionError>;
    try {
      extracted = await pool.submit(() => extractor.extract(zone, isolated));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.log({ type: "extract.fail", zone: zone.name, payload: { message } });
      return { extraction: { zone: zone.name, status: "failed", message }, results: [] };
    }

    if (!extracted.ok) {
      return {
        extraction: {
          zone: zone.name,
          status: "failed",
          message: extracted.error.message,
          ...(extracted.error.diagnostic ? { diagnostic: extracted.error.diagnostic } : {}),
        },
        results: [],
      };
    }

    const tasks: GenerationTask[] = targets.map(([language]) => ({
      zone: zone.name,
      language,
      schemaPath: extracted.value.path,
      outputDir: clientOutputDir(layout, language, zone.name),
    }));
    const results = await Promise.all(tasks.map((task) => orchestrator.submit(pool, task)));

    return { extraction: { zone: zone.name, status: "succeeded", schema: extracted.value }, results };
  };

  return Promise.all(args.zones.map(runZone));
}

export function buildGenerators(
  config: ProjectConfig,
  targets: Array<[string, TargetConfig]>,
): Map<string, GeneratorTool> {
  return new Map(
    targets.map(([language, target]) => [
      language,
      {
        command: target.command,
        args: target.args,
        timeoutMs: (target.timeout_seconds ?? config.timeouts.generator_seconds) * 1000,
      },
    ]),
  );
}

type AttemptStage = <T>(failure: Omit<StageFailure, "message">, work: () => Promise<T>) => Promise<T | undefined>;

// Runs one post-generation step; a throw becomes a StageFailure and yields undefined.
async function attemptStage<T>(
  failure: Omit<StageFailure, "message">,
  work: () => Promise<T>,
  sink: { logger: EventLogger; failures: StageFailure[] },
): Promise<T | undefined> {
  try {
    return await work();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    sink.failures.push({ ...failure, message });
    sink.logger.log({
      type: `${failure.stage}.fail`,
      ...(failure.language ? { language: failure.language } : {}),
      payload: { message },
    });
    return undefined;
  }
}

async function writeClientIndexes(args: {
  config: ProjectConfig;
  layout: OutputLayout;
  zones: Zone[];
  targets: Array<[string, TargetConfig]>;
  results: GenerationResult[];
  logger: EventLogger;
  attempt: AttemptStage;
}): Promise<string[]> {
  const written: string[] = [];

  for (const [language, target] of args.targets) {
    if (!target.index) continue;

    const succeededZones = new Set(
      args.results
        .filter((result) => result.language === language && result.status === "succeeded")
        .map((result) => result.zone),
    );
    const zones = args.zones.filter((zone) => succeededZones.has(zone.name));
    if (zones.length === 0) continue;

    const indexPath = await args.attempt({ stage: "index", language }, () =>
      writeClientIndex({
        language,
        languageDir: languageClientsDir(args.layout, language),
        zones: zones.map((zone) => ({
          zone: zone.name,
          title: zone.title,
          basePath: zoneBasePath(zone, args.config.api_prefix),
        })),
      }),
    );
    if (indexPath === undefined) continue;
    args.logger.log({ type: "index.write", language, payload: { path: indexPath, zones: zones.length } });
    written.push(indexPath);
  }

  return written;
}

async function archiveResults(args: {
  ctx: RunContext;
  layout: OutputLayout;
  results: GenerationResult[];
  cancelled: boolean;
  logger: EventLogger;
  attempt: AttemptStage;
}): Promise<ArchiveStage> {
  const { config, options, ports } = args.ctx;

  if (!(options.archive ?? config.archive.enabled)) {
    return { status: "skipped", reason: "Archiving is disabled." };
  }
  if (args.cancelled) {
    return { status: "skipped", reason: "Run was cancelled." };
  }
  if (!args.results.some((result) => result.status === "succeeded")) {
    return { status: "skipped", reason: "No client was generated successfully." };
  }

  const archives = new ArchiveManager({
    archiveDir: args.layout.archiveDir,
    now: ports.clock.now,
    logger: args.logger,
  });
  let archived: Result<ArchiveRecord, ArchiveError>;
  try {
    archived = await archives.archive(args.results);
  } catch (err) {
    archived = fail(new ArchiveError(err instanceof Error ? err.message : String(err), err));
  }
  if (!archived.ok) {
    return { status: "failed", message: archived.error.message };
  }

  const keepDays = config.archive.keep_days;
  if (keepDays === undefined) {
    return { status: "archived", record: archived.value };
  }
  const pruned = await args.attempt({ stage: "prune" }, () => archives.prune({ keepDays }));
  return { status: "archived", record: archived.value, ...(pruned ? { pruned } : {}) };
}

// =============================================================================
// CANCELLATION
// =============================================================================

type Cancellation = {
  signal: AbortSignal;
  reason: () => string;
  dispose: () => void;
};

// Aborts on the caller's signal (SIGINT/SIGTERM) or once the global run timeout elapses.
function linkCancellation(parent: AbortSignal | undefined, timeoutSeconds: number | undefined): Cancellation {
  const controller = new AbortController();
  let reason = "";

  const abort = (why: string) => {
    if (controller.signal.aborted) return;
    reason = why;
    controller.abort();
  };

  const onParentAbort = () => abort("interrupted");
  if (parent?.aborted) {
    abort("interrupted");
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer =
    timeoutSeconds !== undefined
      ? setTimeout(() => abort(`run timed out after ${timeoutSeconds}s`), timeoutSeconds * 1000)
      : undefined;

  return {
    signal: controller.signal,
    reason: () => reason,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
