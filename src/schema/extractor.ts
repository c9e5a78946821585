/**
 * SchemaExtractor: runs the schema tool once per zone.
 * Purpose: turn an isolated route table into schemas/<zone>.<ext> and report it as a SchemaDocument.
 * Assumptions: each zone owns its work dir and schema file; concurrent zones never share paths.
 * Usage: const doc = await extractor.extract(zone, isolated); if (!doc.ok) report(doc.error).
 */

import path from "node:path";

import fse from "fs-extra";
import { parse as parseYaml } from "yaml";

import type { SchemaToolConfig } from "../core/config.js";
import { ExtractionError } from "../core/errors.js";
import { NULL_LOGGER, type EventLogger } from "../core/logger.js";
import { schemaPath, zoneWorkDir, type OutputLayout } from "../core/paths.js";
import {
  describeProcessFailure,
  expandPlaceholders,
  isProcessSuccess,
  type ProcessOutcome,
  type ProcessRunner,
} from "../core/process-runner.js";
import { fail, succeed, type Result } from "../core/result.js";
import { sha256, truncateText, writeJsonFile } from "../core/utils.js";
import { toSchemaToolInput, type IsolatedRouteTable } from "../routes/isolator.js";
import type { Zone } from "../zones/zone.js";

// =============================================================================
// TYPES
// =============================================================================

export type SchemaFormat = SchemaToolConfig["format"];

export type SchemaDocument = {
  zone: string;
  path: string;
  format: SchemaFormat;
  operationCount: number;
  sha256: string;
};

export type SchemaExtractorOptions = {
  runner: ProcessRunner;
  layout: OutputLayout;
  tool: SchemaToolConfig;
  timeoutMs: number;
  cwd?: string;
  logger?: EventLogger;
  signal?: AbortSignal;
};

const DIAGNOSTIC_LIMIT = 4_000;

const HTTP_METHODS = new Set(["get", "put", "post", "delete", "options", "head", "patch", "trace"]);

// =============================================================================
// EXTRACTOR
// =============================================================================

export class SchemaExtractor {
  private readonly logger: EventLogger;

  constructor(private readonly opts: SchemaExtractorOptions) {
    this.logger = opts.logger ?? NULL_LOGGER;
  }

  async extract(
    zone: Zone,
    isolated: IsolatedRouteTable,
  ): Promise<Result<SchemaDocument, ExtractionError>> {
    const failWith = (message: string, diagnostic?: string, cause?: unknown) => {
      this.logger.log({
        type: "extract.fail",
        zone: zone.name,
        payload: { message, ...(diagnostic ? { diagnostic } : {}) },
      });
      return fail(new ExtractionError(zone.name, message, diagnostic, cause));
    };

    if (this.opts.signal?.aborted) {
      return failWith(`Extraction for zone "${zone.name}" was cancelled before it started.`);
    }

    const workDir = zoneWorkDir(this.opts.layout, zone.name);
    const routesPath = path.join(workDir, "routes.json");
    const outputPath = schemaPath(this.opts.layout, zone.name, this.opts.tool.format);

    await writeJsonFile(routesPath, toSchemaToolInput(zone, isolated));
    await fse.ensureDir(path.dirname(outputPath));
    await fse.remove(outputPath);

    const args = expandPlaceholders(this.opts.tool.args, {
      routes: routesPath,
      output: outputPath,
      zone: zone.name,
      version: zone.version,
      title: zone.title,
    });

    this.logger.log({
      type: "extract.start",
      zone: zone.name,
      payload: { command: this.opts.tool.command, args, routes: isolated.routes.length },
    });

    let outcome: ProcessOutcome;
    try {
      outcome = await this.opts.runner.run({
        command: this.opts.tool.command,
        args,
        cwd: this.opts.cwd,
        timeoutMs: this.opts.timeoutMs,
        signal: this.opts.signal,
      });
    } catch (err) {
      return failWith(
        `Failed to start schema tool for zone "${zone.name}".`,
        err instanceof Error ? err.message : String(err),
        err,
      );
    }

    if (!isProcessSuccess(outcome)) {
      return failWith(
        `Schema tool failed for zone "${zone.name}": ${describeProcessFailure(outcome, this.opts.timeoutMs)}`,
        diagnosticFrom(outcome),
      );
    }

    if (!(await fse.pathExists(outputPath))) {
      return failWith(
        `Schema tool produced no output for zone "${zone.name}" at ${outputPath}.`,
        diagnosticFrom(outcome),
      );
    }

    const raw = await fse.readFile(outputPath, "utf8");
    let document: unknown;
    try {
      document = parseYaml(raw);
    } catch (err) {
      return failWith(
        `Schema document for zone "${zone.name}" could not be parsed.`,
        err instanceof Error ? err.message : String(err),
        err,
      );
    }

    if (!isRecord(document)) {
      return failWith(`Schema document for zone "${zone.name}" is not a mapping.`);
    }

    const schema: SchemaDocument = {
      zone: zone.name,
      path: outputPath,
      format: this.opts.tool.format,
      operationCount: countOperations(document),
      sha256: sha256(raw),
    };

    this.logger.log({
      type: "extract.complete",
      zone: zone.name,
      payload: { path: schema.path, operations: schema.operationCount, sha256: schema.sha256 },
    });

    return succeed(schema);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function countOperations(document: Record<string, unknown>): number {
  const paths = document.paths;
  if (!isRecord(paths)) return 0;

  let count = 0;
  for (const item of Object.values(paths)) {
    if (!isRecord(item)) continue;
    count += Object.keys(item).filter((key) => HTTP_METHODS.has(key.toLowerCase())).length;
  }
  return count;
}

function diagnosticFrom(outcome: ProcessOutcome): string | undefined {
  const text = outcome.stderr.trim() || outcome.stdout.trim();
  if (text.length === 0) return undefined;
  return truncateText(text, DIAGNOSTIC_LIMIT).text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
