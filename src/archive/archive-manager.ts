/**
 * ArchiveManager: timestamped client archives plus a `latest` pointer.
 * Purpose: snapshot successful generation output and keep an atomic pointer to the newest snapshot.
 * Assumptions: this class is the only writer of the archive directory; calls are serialised internally.
 * Usage: const record = await archives.archive(results); const current = await archives.latest();
 */

import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { ArchiveError } from "../core/errors.js";
import { NULL_LOGGER, type EventLogger } from "../core/logger.js";
import { fail, succeed, type Result } from "../core/result.js";
import { writeJsonFile } from "../core/utils.js";
import type { GenerationResult } from "../generation/orchestrator.js";
import { WorkerPool } from "../generation/worker-pool.js";

import { compareArchiveIds, isArchiveId, nextArchiveId } from "./archive-id.js";

// =============================================================================
// MANIFEST SCHEMA
// =============================================================================

const ArchiveEntrySchema = z
  .object({
    zone: z.string(),
    language: z.string(),
    files: z.array(z.string()),
    bytes: z.number().int().nonnegative(),
  })
  .strict();

const SkippedResultSchema = z
  .object({
    zone: z.string(),
    language: z.string(),
    kind: z.string(),
    reason: z.string(),
  })
  .strict();

const ArchiveManifestSchema = z
  .object({
    id: z.string(),
    created_at: z.string(),
    entries: z.array(ArchiveEntrySchema),
    skipped: z.array(SkippedResultSchema),
    total_bytes: z.number().int().nonnegative(),
  })
  .strict();

export type ArchiveEntry = z.infer<typeof ArchiveEntrySchema>;
export type SkippedResult = z.infer<typeof SkippedResultSchema>;
export type ArchiveManifest = z.infer<typeof ArchiveManifestSchema>;

// =============================================================================
// TYPES
// =============================================================================

export type ArchiveRecord = {
  id: string;
  createdAt: string;
  path: string;
  entries: ArchiveEntry[];
  skipped: SkippedResult[];
  totalBytes: number;
  isLatest: boolean;
};

export type PruneOptions = {
  keepDays?: number;
  keepLast?: number;
};

export type PruneOutcome = {
  removed: string[];
  kept: string[];
};

export type ArchiveManagerOptions = {
  archiveDir: string;
  now?: () => Date;
  logger?: EventLogger;
};

export const MANIFEST_FILE = "manifest.json";
export const LATEST_POINTER = "latest";

const STAGING_PREFIX = ".staging-";
const TEMP_POINTER_PREFIX = ".latest-";
const DAY_MS = 24 * 60 * 60 * 1000;

// =============================================================================
// ARCHIVE MANAGER
// =============================================================================

export class ArchiveManager {
  private readonly archiveDir: string;
  private readonly now: () => Date;
  private readonly logger: EventLogger;
  private readonly lock = new WorkerPool(1);

  constructor(opts: ArchiveManagerOptions) {
    this.archiveDir = path.resolve(opts.archiveDir);
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? NULL_LOGGER;
  }

  archive(results: readonly GenerationResult[]): Promise<Result<ArchiveRecord, ArchiveError>> {
    return this.lock.submit(() => this.archiveNow(results));
  }

  async list(): Promise<ArchiveRecord[]> {
    const latestId = await this.readLatestId();
    const records: ArchiveRecord[] = [];
    for (const id of await this.listIds()) {
      const manifest = await this.readManifest(id);
      if (manifest) {
        records.push(toRecord(manifest, path.join(this.archiveDir, id), id === latestId));
      }
    }
    return records;
  }

  async latest(): Promise<ArchiveRecord | undefined> {
    const latestId = await this.readLatestId();
    if (!latestId) return undefined;

    const manifest = await this.readManifest(latestId);
    return manifest ? toRecord(manifest, path.join(this.archiveDir, latestId), true) : undefined;
  }

  // Removes archives older than keepDays and/or beyond the newest keepLast. Never removes latest.
  prune(opts: PruneOptions): Promise<PruneOutcome> {
    return this.lock.submit(() => this.pruneNow(opts));
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async archiveNow(
    results: readonly GenerationResult[],
  ): Promise<Result<ArchiveRecord, ArchiveError>> {
    const succeeded = results.filter((result) => result.status === "succeeded");
    const skipped: SkippedResult[] = results
      .filter((result) => result.status === "failed")
      .map((result) => ({
        zone: result.zone,
        language: result.language,
        kind: result.error?.kind ?? "unknown",
        reason: result.error?.message ?? "Generation failed.",
      }));

    if (succeeded.length === 0) {
      return this.failWith(new ArchiveError("No successful generation results to archive."));
    }

    const createdAt = this.now();
    let id: string;
    try {
      id = nextArchiveId(createdAt, await this.listIds());
    } catch (err) {
      return this.failWith(new ArchiveError(`Failed to read archive directory ${this.archiveDir}: ${describe(err)}`, err));
    }
    const stagingDir = path.join(this.archiveDir, `${STAGING_PREFIX}${id}`);
    const finalDir = path.join(this.archiveDir, id);

    this.logger.log({ type: "archive.start", payload: { id, results: results.length } });

    try {
      const entries: ArchiveEntry[] = [];
      for (const result of succeeded) {
        const targetDir = path.join(stagingDir, result.language, result.zone);
        await fse.ensureDir(targetDir);
        for (const file of result.files) {
          await fse.copy(path.join(result.outputDir, file), path.join(targetDir, file));
        }
        entries.push({
          zone: result.zone,
          language: result.language,
          files: [...result.files],
          bytes: result.bytes,
        });
      }

      const manifest: ArchiveManifest = {
        id,
        created_at: createdAt.toISOString(),
        entries,
        skipped,
        total_bytes: entries.reduce((total, entry) => total + entry.bytes, 0),
      };
      await writeJsonFile(path.join(stagingDir, MANIFEST_FILE), manifest);

      await fse.rename(stagingDir, finalDir);
      await this.swapLatest(id);

      this.logger.log({
        type: "archive.complete",
        payload: { id, entries: entries.length, skipped: skipped.length, total_bytes: manifest.total_bytes },
      });
      return succeed(toRecord(manifest, finalDir, true));
    } catch (err) {
      await this.discard(stagingDir, finalDir);
      return this.failWith(new ArchiveError(`Failed to write archive ${id}: ${describe(err)}`, err));
    }
  }

  // A temp symlink renamed over `latest` replaces the pointer in one step.
  private async swapLatest(id: string): Promise<void> {
    const tempPointer = path.join(this.archiveDir, `${TEMP_POINTER_PREFIX}${id}`);
    await fs.symlink(id, tempPointer, "dir");
    await fse.rename(tempPointer, path.join(this.archiveDir, LATEST_POINTER));
  }

  private async pruneNow(opts: PruneOptions): Promise<PruneOutcome> {
    try {
      return await this.removeExpired(opts);
    } catch (err) {
      if (err instanceof ArchiveError) throw err;
      throw new ArchiveError(`Failed to prune archives in ${this.archiveDir}: ${describe(err)}`, err);
    }
  }

  private async removeExpired(opts: PruneOptions): Promise<PruneOutcome> {
    const latestId = await this.readLatestId();
    const ids = await this.listIds();
    const cutoff = opts.keepDays !== undefined ? this.now().getTime() - opts.keepDays * DAY_MS : undefined;
    const beyondKeepLast = new Set(
      opts.keepLast !== undefined ? ids.slice(0, Math.max(0, ids.length - opts.keepLast)) : [],
    );

    const removed: string[] = [];
    const kept: string[] = [];
    for (const id of ids) {
      if (id === latestId) {
        kept.push(id);
        continue;
      }

      const manifest = await this.readManifest(id);
      const createdAt = manifest ? Date.parse(manifest.created_at) : Number.NaN;
      const tooOld = cutoff !== undefined && (Number.isNaN(createdAt) || createdAt < cutoff);

      if (tooOld || beyondKeepLast.has(id)) {
        await fse.remove(path.join(this.archiveDir, id));
        removed.push(id);
      } else {
        kept.push(id);
      }
    }

    await this.sweepLeftovers();
    this.logger.log({ type: "archive.prune", payload: { removed, kept: kept.length } });
    return { removed, kept };
  }

  // Staging dirs and temp pointers left behind by an interrupted run.
  private async sweepLeftovers(): Promise<void> {
    if (!(await fse.pathExists(this.archiveDir))) return;
    for (const name of await fse.readdir(this.archiveDir)) {
      if (name.startsWith(STAGING_PREFIX) || name.startsWith(TEMP_POINTER_PREFIX)) {
        await fse.remove(path.join(this.archiveDir, name));
      }
    }
  }

  private async discard(...dirs: string[]): Promise<void> {
    for (const dir of dirs) {
      try {
        await fse.remove(dir);
      } catch (err) {
        this.logger.log({
          type: "archive.cleanup.fail",
          payload: { path: dir, message: describe(err) },
        });
      }
    }
  }

  private failWith(error: ArchiveError): Result<ArchiveRecord, ArchiveError> {
    this.logger.log({ type: "archive.fail", payload: { message: error.message } });
    return fail(error);
  }

  private async listIds(): Promise<string[]> {
    if (!(await fse.pathExists(this.archiveDir))) return [];
    const names = await fse.readdir(this.archiveDir);
    return names.filter(isArchiveId).sort(compareArchiveIds);
  }

  private async readLatestId(): Promise<string | undefined> {
    let target: string;
    try {
      target = await fs.readlink(path.join(this.archiveDir, LATEST_POINTER));
    } catch (err) {
      if (isMissingPointer(err)) return undefined;
      throw new ArchiveError("Failed to read the latest archive pointer.", err);
    }

    const id = path.basename(target);
    return (await fse.pathExists(path.join(this.archiveDir, id))) ? id : undefined;
  }

  private async readManifest(id: string): Promise<ArchiveManifest | undefined> {
    const manifestPath = path.join(this.archiveDir, id, MANIFEST_FILE);
    if (!(await fse.pathExists(manifestPath))) return undefined;

    let raw: unknown;
    try {
      raw = await fse.readJson(manifestPath);
    } catch (err) {
      this.logger.log({
        type: "archive.manifest.invalid",
        payload: { id, message: describe(err) },
      });
      return undefined;
    }

    const parsed = ArchiveManifestSchema.safeParse(raw);
    return parsed.success && parsed.data.id === id ? parsed.data : undefined;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function toRecord(manifest: ArchiveManifest, dir: string, isLatest: boolean): ArchiveRecord {
  return {
    id: manifest.id,
    createdAt: manifest.created_at,
    path: dir,
    entries: manifest.entries,
    skipped: manifest.skipped,
    totalBytes: manifest.total_bytes,
    isLatest,
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isMissingPointer(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "EINVAL";
}
