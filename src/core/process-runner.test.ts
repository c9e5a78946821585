import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  createExecaProcessRunner,
  describeProcessFailure,
  expandPlaceholders,
  isProcessSuccess,
  type ProcessOutcome,
} from "./process-runner.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

afterEach(() => {
  execaMock.mockReset();
});

function outcome(overrides: Partial<ProcessOutcome> = {}): ProcessOutcome {
  return { exitCode: 0, stdout: "", stderr: "", timedOut: false, cancelled: false, ...overrides };
}

// =============================================================================
// TESTS
// =============================================================================

describe("createExecaProcessRunner", () => {
  it("runs without rejecting and forwards timeout, signal and cwd", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "ok",
      stderr: "",
      exitCode: 0,
      failed: false,
      timedOut: false,
      isCanceled: false,
    } as Awaited<ReturnType<typeof execa>>);
    const controller = new AbortController();

    const result = await createExecaProcessRunner().run({
      command: "openapi-ts",
      args: ["--input", "schema.yaml"],
      cwd: "/work",
      timeoutMs: 5000,
      signal: controller.signal,
    });

    expect(result).toEqual(outcome({ stdout: "ok" }));
    expect(execaMock).toHaveBeenCalledWith("openapi-ts", ["--input", "schema.yaml"], {
      cwd: "/work",
      env: undefined,
      reject: false,
      stdio: "pipe",
      timeout: 5000,
      signal: controller.signal,
    });
  });

  it("reports a failed spawn as a non-zero exit", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "",
      stderr: "spawn openapi-ts ENOENT",
      exitCode: 0,
      failed: true,
      timedOut: false,
      isCanceled: false,
    } as Awaited<ReturnType<typeof execa>>);

    const result = await createExecaProcessRunner().run({ command: "openapi-ts", args: [] });

    expect(result.exitCode).toBe(-1);
    expect(isProcessSuccess(result)).toBe(false);
  });

  it("keeps the signal of a child killed from outside", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "",
      stderr: "",
      signal: "SIGKILL",
      failed: true,
      timedOut: false,
      isCanceled: false,
    } as Awaited<ReturnType<typeof execa>>);

    const result = await createExecaProcessRunner().run({ command: "openapi-ts", args: [] });

    expect(result).toEqual(outcome({ exitCode: -1, signal: "SIGKILL" }));
    expect(describeProcessFailure(result)).toBe("Killed by SIGKILL.");
  });
});

describe("expandPlaceholders", () => {
  it("replaces known placeholders and keeps unknown ones", () => {
    expect(
      expandPlaceholders(["--input", "{schema}", "--out={output}/models", "{unknown}"], {
        schema: "/s/public.yaml",
        output: "/c/python/public",
      }),
    ).toEqual(["--input", "/s/public.yaml", "--out=/c/python/public/models", "{unknown}"]);
  });
});

describe("describeProcessFailure", () => {
  it("names cancellation, timeouts and exit codes", () => {
    expect(describeProcessFailure(outcome({ exitCode: -1, cancelled: true }))).toBe("Cancelled before completion.");
    expect(describeProcessFailure(outcome({ exitCode: -1, timedOut: true }), 120_000)).toBe("Timed out after 120s.");
    expect(describeProcessFailure(outcome({ exitCode: 2 }))).toBe("Exited with code 2.");
    expect(describeProcessFailure(outcome({ exitCode: -1, timedOut: true, signal: "SIGTERM" }), 1000)).toBe(
      "Timed out after 1s.",
    );
  });
});
