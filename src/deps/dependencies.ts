/*
Purpose: precondition checks for the external generator tools, plus an opt-in install step.
Assumptions: probes and installers are plain subprocesses; nothing here mutates process.env.
Usage: const checked = await checkDependencies(enabledTargets(config), { runner }); if (!checked.ok) throw checked.error;
*/

import type { TargetConfig, ToolCommand } from "../core/config.js";
import { MissingDependencyError, type MissingDependency } from "../core/errors.js";
import { NULL_LOGGER, type EventLogger } from "../core/logger.js";
import {
  describeProcessFailure,
  isProcessSuccess,
  type ProcessRunner,
} from "../core/process-runner.js";
import { fail, succeed, type Result } from "../core/result.js";

// =============================================================================
// TYPES
// =============================================================================

export type DependencyStatus = {
  language: string;
  tool: string;
  available: boolean;
  detail: string;
};

export type InstallStatus = "installed" | "failed" | "skipped";

export type InstallOutcome = {
  language: string;
  tool: string;
  status: InstallStatus;
  detail: string;
};

export type DependencyOptions = {
  runner: ProcessRunner;
  cwd?: string;
  timeoutMs?: number;
  logger?: EventLogger;
  signal?: AbortSignal;
};

const DEFAULT_PROBE_TIMEOUT_MS = 30_000;
const DEFAULT_INSTALL_TIMEOUT_MS = 300_000;

// =============================================================================
// CHECK
// =============================================================================

export async function checkDependencies(
  targets: Array<[string, TargetConfig]>,
  opts: DependencyOptions,
): Promise<Result<DependencyStatus[], MissingDependencyError>> {
  const statuses = await probeDependencies(targets, opts);
  const missing: MissingDependency[] = statuses
    .filter((status) => !status.available)
    .map((status) => ({ language: status.language, tool: status.tool, detail: status.detail }));

  return missing.length > 0 ? fail(new MissingDependencyError(missing)) : succeed(statuses);
}

// Probes every target, available or not.
export async function probeDependencies(
  targets: Array<[string, TargetConfig]>,
  opts: DependencyOptions,
): Promise<DependencyStatus[]> {
  const logger = opts.logger ?? NULL_LOGGER;
  const statuses: DependencyStatus[] = [];

  for (const [language, target] of targets) {
    const probe = probeCommand(target);
    const status = await runTool(probe, opts, opts.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS);
    statuses.push({ language, tool: target.command, available: status.ok, detail: status.detail });
    logger.log({
      type: status.ok ? "deps.available" : "deps.missing",
      language,
      payload: { tool: target.command, detail: status.detail },
    });
  }

  return statuses;
}

// Without an explicit `check`, `<command> --version` is the probe.
export function probeCommand(target: TargetConfig): ToolCommand {
  return target.check ?? { command: target.command, args: ["--version"] };
}

// =============================================================================
// INSTALL
// =============================================================================

export async function installDependencies(
  targets: Array<[string, TargetConfig]>,
  opts: DependencyOptions,
): Promise<InstallOutcome[]> {
  const logger = opts.logger ?? NULL_LOGGER;
  const outcomes: InstallOutcome[] = [];

  for (const [language, target] of targets) {
    if (!target.install) {
      outcomes.push({
        language,
        tool: target.command,
        status: "skipped",
        detail: "No install command configured.",
      });
      continue;
    }

    logger.log({ type: "deps.install.start", language, payload: { command: target.install.command } });
    const status = await runTool(target.install, opts, opts.timeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS);
    outcomes.push({
      language,
      tool: target.command,
      status: status.ok ? "installed" : "failed",
      detail: status.detail,
    });
    logger.log({
      type: status.ok ? "deps.install.complete" : "deps.install.fail",
      language,
      payload: { detail: status.detail },
    });
  }

  return outcomes;
}

// Checks, installs whatever is missing when allowed, then checks again.
export async function ensureDependencies(
  targets: Array<[string, TargetConfig]>,
  opts: DependencyOptions & { install: boolean },
): Promise<Result<DependencyStatus[], MissingDependencyError>> {
  const first = await checkDependencies(targets, opts);
  if (first.ok || !opts.install) return first;

  const missingLanguages = new Set(first.error.missing.map((dep) => dep.language));
  const toInstall = targets.filter(([language]) => missingLanguages.has(language));
  await installDependencies(toInstall, opts);

  return checkDependencies(targets, opts);
}

// =============================================================================
// HELPERS
// =============================================================================

async function runTool(
  tool: ToolCommand,
  opts: DependencyOptions,
  timeoutMs: number,
): Promise<{ ok: boolean; detail: string }> {
  try {
    const outcome = await opts.runner.run({
      command: tool.command,
      args: tool.args,
      cwd: opts.cwd,
      timeoutMs,
      signal: opts.signal,
    });
    if (isProcessSuccess(outcome)) {
      return { ok: true, detail: firstLine(outcome.stdout) || "ok" };
    }
    const reason = firstLine(outcome.stderr);
    const failure = describeProcessFailure(outcome, timeoutMs);
    return { ok: false, detail: reason ? `${failure} ${reason}` : failure };
  } catch (err) {
    return { ok: false, detail: err instanceof Error ? err.message : String(err) };
  }
}

function firstLine(text: string): string {
  return text.trim().split(/\r?\n/)[0].trim();
}
