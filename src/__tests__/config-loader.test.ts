import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadStepConfig } from "../core/config-loader.js";
import { ConfigError, UserFacingError } from "../core/errors.js";

const tempDirs: string[] = [];

function writeConfig(filename: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);

  const configPath = path.join(dir, filename);
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("loadStepConfig", () => {
  it("keeps macros verbatim and resolves module_root against the config directory", () => {
    const configPath = writeConfig(
      "ant-step.yaml",
      `
targets: clean dist
ant_name: ant-1.10
ant_opts: -Xmx\${HEAP}
build_file: build/main.xml
properties: |
  out=\${WORKSPACE}/dist
variables:
  version: 1.0
  release: true
sensitive_variables: [deploy_token]
module_root: ./module
node:
  name: linux-1
  tool_locations:
    ant-1.10: /opt/ant
`,
    );

    const config = loadStepConfig(configPath);

    expect(config.targets).toBe("clean dist");
    expect(config.ant_name).toBe("ant-1.10");
    expect(config.ant_opts).toBe("-Xmx${HEAP}");
    expect(config.build_file).toBe("build/main.xml");
    expect(config.properties).toBe("out=${WORKSPACE}/dist\n");
    expect(config.variables).toEqual({ version: "1", release: "true" });
    expect(config.sensitive_variables).toEqual(["deploy_token"]);
    expect(config.module_root).toBe(path.resolve(path.dirname(configPath), "module"));
    expect(config.node).toEqual({ name: "linux-1", tool_locations: { "ant-1.10": "/opt/ant" } });
  });

  it("applies defaults to an empty file", () => {
    const configPath = writeConfig("ant-step.yaml", "");

    const config = loadStepConfig(configPath);

    expect(config.targets).toBe("");
    expect(config.ant_name).toBeUndefined();
    expect(config.variables).toEqual({});
    expect(config.sensitive_variables).toEqual([]);
    expect(config.module_root).toBeUndefined();
    expect(config.node).toEqual({ name: "built-in", tool_locations: {} });
  });

  it("reports a missing file as a user-facing error", () => {
    const missing = path.join(os.tmpdir(), "ant-step-missing", "ant-step.yaml");

    expect(() => loadStepConfig(missing)).toThrowError(UserFacingError);
    expect(() => loadStepConfig(missing)).toThrow(`Step config not found at ${missing}.`);
  });

  it("rejects unknown keys", () => {
    const configPath = writeConfig("ant-step.yaml", "targets: dist\nant_home: /opt/ant\n");

    let caught: unknown;
    try {
      loadStepConfig(configPath);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UserFacingError);
    const cause = caught instanceof UserFacingError ? caught.cause : undefined;
    expect(cause).toBeInstanceOf(ConfigError);
    expect(cause instanceof Error ? cause.message : "").toContain(
      "<root>: Unrecognized keys: ant_home",
    );
  });

  it("includes the YAML error location", () => {
    const configPath = writeConfig("ant-step.yaml", "targets: [unclosed\n");

    let caught: unknown;
    try {
      loadStepConfig(configPath);
    } catch (err) {
      caught = err;
    }

    const cause = caught instanceof UserFacingError ? caught.cause : undefined;
    expect(cause instanceof Error ? cause.message : "").toMatch(/\(line \d+, column \d+\)/);
  });
});
