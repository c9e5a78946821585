/*
Purpose: copy successful zone clients into a monorepo package directory.
Assumptions: the monorepo checkout already exists; each (language, zone) target dir is replaced wholesale.
Usage: const outcome = await syncToMonorepo({ monorepoPath, packageDir, clientsDir, results });
*/

import path from "node:path";

import fse from "fs-extra";

import { NULL_LOGGER, type EventLogger } from "../core/logger.js";
import type { GenerationResult } from "../generation/orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

export type MonorepoSyncOptions = {
  monorepoPath: string;
  packageDir: string;
  clientsDir: string;
  results: readonly GenerationResult[];
  logger?: EventLogger;
};

export type SyncedClient = {
  zone: string;
  language: string;
  target: string;
};

export type MonorepoSyncOutcome = {
  status: "synced" | "missing_monorepo";
  packageRoot: string;
  synced: SyncedClient[];
  indexFiles: string[];
};

export type MonorepoStatus = {
  monorepoPath: string;
  exists: boolean;
  packageRoot: string;
  packageRootExists: boolean;
  hasPackageJson: boolean;
};

// Generator scaffolding that the monorepo package already owns.
const EXCLUDED_NAMES = new Set(["package.json", "node_modules"]);

// =============================================================================
// SYNC
// =============================================================================

export async function syncToMonorepo(opts: MonorepoSyncOptions): Promise<MonorepoSyncOutcome> {
  const logger = opts.logger ?? NULL_LOGGER;
  const packageRoot = path.join(opts.monorepoPath, opts.packageDir);

  if (!(await fse.pathExists(opts.monorepoPath))) {
    logger.log({ type: "monorepo.missing", payload: { path: opts.monorepoPath } });
    return { status: "missing_monorepo", packageRoot, synced: [], indexFiles: [] };
  }

  const synced: SyncedClient[] = [];
  const languages = new Set<string>();
  for (const result of opts.results) {
    if (result.status !== "succeeded") continue;

    const target = path.join(packageRoot, result.language, result.zone);
    await fse.remove(target);
    await fse.copy(result.outputDir, target, {
      filter: (src) => !EXCLUDED_NAMES.has(path.basename(src)),
    });
    synced.push({ zone: result.zone, language: result.language, target });
    languages.add(result.language);
    logger.log({
      type: "monorepo.sync",
      zone: result.zone,
      language: result.language,
      payload: { target },
    });
  }

  const indexFiles: string[] = [];
  for (const language of [...languages].sort()) {
    const consolidated = path.join(opts.clientsDir, language, "index.ts");
    if (!(await fse.pathExists(consolidated))) continue;

    const target = path.join(packageRoot, language, "index.ts");
    await fse.copy(consolidated, target);
    indexFiles.push(target);
  }

  logger.log({
    type: "monorepo.complete",
    payload: { package_root: packageRoot, clients: synced.length, index_files: indexFiles.length },
  });
  return { status: "synced", packageRoot, synced, indexFiles };
}

export async function monorepoStatus(monorepoPath: string, packageDir: string): Promise<MonorepoStatus> {
  const packageRoot = path.join(monorepoPath, packageDir);
  return {
    monorepoPath,
    exists: await fse.pathExists(monorepoPath),
    packageRoot,
    packageRootExists: await fse.pathExists(packageRoot),
    hasPackageJson: await fse.pathExists(path.join(packageRoot, "package.json")),
  };
}
