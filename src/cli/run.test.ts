import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { LaunchResult, LaunchSpec } from "../host/launcher.js";

import { runCommand } from "./run.js";

const launchMock = vi.hoisted(() =>
  vi.fn<[LaunchSpec], Promise<LaunchResult>>(async () => ({ exitCode: 0 })),
);

vi.mock("../host/launcher.js", () => ({
  ExecaLauncher: class {
    launch(spec: LaunchSpec): Promise<LaunchResult> {
      return launchMock(spec);
    }
  },
}));

vi.mock("./signal-handlers.js", () => ({
  createStepStopSignalHandler: () => {
    const controller = new AbortController();
    return {
      signal: controller.signal,
      cleanup: () => undefined,
      isStopped: () => false,
    };
  },
}));

const tempDirs: string[] = [];
const originalExitCode = process.exitCode;

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;

  process.exitCode = originalExitCode;
  launchMock.mockReset();
  launchMock.mockImplementation(async () => ({ exitCode: 0 }));
  vi.restoreAllMocks();
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function setupWorkspace(files: Record<string, string> = {}): { workspace: string; home: string } {
  const workspace = makeTempDir("ant-step-ws-");
  const home = makeTempDir("ant-step-home-");
  for (const [name, contents] of Object.entries(files)) {
    fs.writeFileSync(path.join(workspace, name), contents, "utf8");
  }
  return { workspace, home };
}

function readLogTypes(logPath: string): string[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => String((JSON.parse(line) as { type: unknown }).type));
}

// =============================================================================
// TESTS
// =============================================================================

describe("runCommand", () => {
  it("runs Ant in the workspace and reports success", async () => {
    const { workspace, home } = setupWorkspace({ "build.xml": "<project/>" });
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const result = await runCommand(["clean", "dist"], {
      workspace,
      home,
      runId: "run-1",
      define: ["version=1.0"],
      color: false,
    });

    expect(result).toEqual({
      runId: "run-1",
      success: true,
      logPath: path.join(home, "logs", "run-run-1.jsonl"),
    });
    expect(launchMock).toHaveBeenCalledTimes(1);
    const [spec] = launchMock.mock.calls[0] ?? [];
    expect(spec?.args).toEqual(["ant", "-Dversion=1.0", "clean", "dist"]);
    expect(spec?.cwd).toBe(workspace);
    expect(logSpy).toHaveBeenCalledWith("Finished: SUCCESS");
    expect(readLogTypes(result.logPath)).toEqual([
      "step.start",
      "step.installation",
      "step.build_file",
      "step.command",
      "step.launch",
      "step.complete",
    ]);
  });

  it("falls back to the targets and variables of ant-step.yaml", async () => {
    const { workspace, home } = setupWorkspace({
      "build.xml": "<project/>",
      "ant-step.yaml": "targets: jar\nvariables:\n  channel: beta\n",
    });
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runCommand([], { workspace, home, runId: "run-2", color: false });

    const [spec] = launchMock.mock.calls[0] ?? [];
    expect(spec?.args).toEqual(["ant", "-Dchannel=beta", "jar"]);
  });

  it("marks the process as failed when Ant exits non-zero", async () => {
    const { workspace, home } = setupWorkspace({ "build.xml": "<project/>" });
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    launchMock.mockImplementation(async () => ({ exitCode: 1 }));

    const result = await runCommand([], { workspace, home, runId: "run-3", color: false });

    expect(result.success).toBe(false);
    expect(process.exitCode).toBe(1);
    expect(logSpy).toHaveBeenCalledWith("Finished: FAILURE");
  });

  it("turns a missing build file into a user-facing step error", async () => {
    const { workspace, home } = setupWorkspace();

    let caught: unknown;
    try {
      await runCommand([], { workspace, home, runId: "run-4", color: false });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UserFacingError);
    const error = caught instanceof UserFacingError ? caught : null;
    expect(error?.code).toBe(USER_FACING_ERROR_CODES.step);
    expect(error?.title).toBe("Ant build step aborted.");
    expect(error?.message).toBe(`Unable to find build script at ${path.join(workspace, "build.xml")}`);
    expect(launchMock).not.toHaveBeenCalled();
    expect(readLogTypes(path.join(home, "logs", "run-run-4.jsonl"))).toEqual([
      "step.start",
      "step.installation",
      "step.abort",
    ]);
  });

  it("rejects a malformed --define", async () => {
    const { workspace, home } = setupWorkspace({ "build.xml": "<project/>" });

    await expect(
      runCommand([], { workspace, home, runId: "run-5", define: ["novalue"], color: false }),
    ).rejects.toThrow('Expected key=value but got "novalue".');
  });

  it("reports an explicit config path that does not exist", async () => {
    const { workspace, home } = setupWorkspace();
    const missing = path.join(workspace, "missing.yaml");

    await expect(
      runCommand([], { workspace, home, config: missing, color: false }),
    ).rejects.toThrow(`Step config not found at ${missing}.`);
  });
});
