import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ConfigError } from "../core/errors.js";

import { AntInstallation } from "./installation.js";
import {
  InstallationRegistry,
  YamlInstallationPersistence,
  type InstallationPersistence,
} from "./installation-registry.js";

const tempDirs: string[] = [];

function installationsFile(contents?: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "installations-"));
  tempDirs.push(dir);

  const filePath = path.join(dir, "state", "installations.yaml");
  if (contents !== undefined) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents, "utf8");
  }
  return filePath;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("InstallationRegistry", () => {
  it("persists installations and loads them back", async () => {
    const filePath = installationsFile();
    const registry = await InstallationRegistry.load(new YamlInstallationPersistence(filePath));

    await registry.setInstallations([
      new AntInstallation({
        name: "ant-1.10",
        home: "/opt/ant-1.10/",
        properties: [{ key: "label", value: "linux" }],
      }),
      new AntInstallation({ name: "ant-1.9", home: "/opt/ant-1.9" }),
    ]);

    const reloaded = await InstallationRegistry.load(new YamlInstallationPersistence(filePath));
    expect(reloaded.getInstallations().map((installation) => installation.toJSON())).toEqual([
      { name: "ant-1.10", home: "/opt/ant-1.10", properties: [{ key: "label", value: "linux" }] },
      { name: "ant-1.9", home: "/opt/ant-1.9", properties: [] },
    ]);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["installations.yaml"]);
  });

  it("starts empty when no file exists", async () => {
    const registry = await InstallationRegistry.load(
      new YamlInstallationPersistence(installationsFile()),
    );

    expect(registry.getInstallations()).toEqual([]);
  });

  it("finds installations by exact name", async () => {
    const registry = new InstallationRegistry();
    await registry.setInstallations([new AntInstallation({ name: "ant", home: "/opt/ant" })]);

    expect(registry.find("ant")?.home).toBe("/opt/ant");
    expect(registry.find("Ant")).toBeUndefined();
    expect(registry.find(undefined)).toBeUndefined();
  });

  it("leaves earlier snapshots untouched when the list is replaced", async () => {
    const registry = new InstallationRegistry();
    const before = registry.getInstallations();

    await registry.setInstallations([new AntInstallation({ name: "ant", home: "/opt/ant" })]);

    expect(before).toEqual([]);
    expect(Object.isFrozen(registry.getInstallations())).toBe(true);
    expect(registry.getInstallations()).toHaveLength(1);
  });

  it("rejects duplicate names and keeps the previous list", async () => {
    const registry = new InstallationRegistry();
    await registry.setInstallations([new AntInstallation({ name: "a", home: "/a" })]);

    await expect(
      registry.setInstallations([
        new AntInstallation({ name: "b", home: "/b" }),
        new AntInstallation({ name: "b", home: "/c" }),
      ]),
    ).rejects.toThrowError(new ConfigError('Duplicate Ant installation name "b".'));
    expect(registry.getInstallations().map((installation) => installation.name)).toEqual(["a"]);
  });
});

describe("InstallationRegistry writes", () => {
  it("applies overlapping updates in call order", async () => {
    const saved: string[][] = [];
    let releaseFirst: () => void = () => undefined;
    const firstSaveHeld = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });
    const persistence: InstallationPersistence = {
      load: async () => [],
      save: async (installations) => {
        if (saved.length === 0) {
          saved.push([]);
          await firstSaveHeld;
          saved[0] = installations.map((installation) => installation.name);
          return;
        }
        saved.push(installations.map((installation) => installation.name));
      },
    };
    const registry = new InstallationRegistry(persistence);

    const first = registry.setInstallations([new AntInstallation({ name: "a", home: "/a" })]);
    const second = registry.setInstallations([new AntInstallation({ name: "b", home: "/b" })]);
    releaseFirst();
    await Promise.all([first, second]);

    expect(saved).toEqual([["a"], ["b"]]);
    expect(registry.getInstallations().map((installation) => installation.name)).toEqual(["b"]);
  });

  it("keeps accepting writes after a failed save", async () => {
    let fail = true;
    const registry = new InstallationRegistry({
      load: async () => [],
      save: async () => {
        if (fail) {
          fail = false;
          throw new Error("disk full");
        }
      },
    });

    await expect(
      registry.setInstallations([new AntInstallation({ name: "a", home: "/a" })]),
    ).rejects.toThrow("disk full");
    expect(registry.getInstallations()).toEqual([]);

    await registry.setInstallations([new AntInstallation({ name: "b", home: "/b" })]);
    expect(registry.getInstallations().map((installation) => installation.name)).toEqual(["b"]);
  });
});

describe("YamlInstallationPersistence", () => {
  it("removes its temp file when the save fails", async () => {
    const filePath = installationsFile();
    fs.mkdirSync(filePath, { recursive: true });
    fs.writeFileSync(path.join(filePath, "keep"), "", "utf8");

    await expect(
      new YamlInstallationPersistence(filePath).save([
        new AntInstallation({ name: "ant", home: "/opt/ant" }),
      ]),
    ).rejects.toThrow();
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["installations.yaml"]);
  });

  it("reports malformed YAML", async () => {
    const filePath = installationsFile("installations: [\n");

    await expect(new YamlInstallationPersistence(filePath).load()).rejects.toThrow(
      `Failed to parse installations file ${filePath}`,
    );
  });

  it("reports entries that fail validation", async () => {
    const filePath = installationsFile("installations:\n  - home: /opt/ant\n");

    await expect(new YamlInstallationPersistence(filePath).load()).rejects.toThrow(
      "installations.0.name: Expected string, received undefined",
    );
  });
});
