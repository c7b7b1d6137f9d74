/**
 * InstallationRegistry holds the process-wide list of Ant installations.
 * Purpose: give every build step a consistent, immutable snapshot to read from.
 * Assumptions: writers replace the whole list; elements are never edited in place.
 * Usage: const registry = await InstallationRegistry.load(new YamlInstallationPersistence(path))
 */

import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

import { ConfigError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { formatIssues } from "../core/config-loader.js";

import { AntInstallation } from "./installation.js";

// =============================================================================
// TYPES
// =============================================================================

export interface InstallationPersistence {
  load(): Promise<AntInstallation[]>;
  save(installations: readonly AntInstallation[]): Promise<void>;
}

export interface InstallationStore {
  getInstallations(): readonly AntInstallation[];
  find(name: string | undefined): AntInstallation | undefined;
  setInstallations(installations: readonly AntInstallation[]): Promise<void>;
}

const ToolPropertySchema = z.object({
  key: z.string().min(1),
  value: z.string(),
});

const InstallationSchema = z.object({
  name: z.string().min(1),
  home: z.string(),
  properties: z.array(ToolPropertySchema).default([]),
});

export const InstallationsFileSchema = z.object({
  installations: z.array(InstallationSchema).default([]),
});

// =============================================================================
// REGISTRY
// =============================================================================

export class InstallationRegistry implements InstallationStore {
  private snapshot: readonly AntInstallation[] = Object.freeze([]);
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly persistence?: InstallationPersistence) {}

  static async load(persistence: InstallationPersistence): Promise<InstallationRegistry> {
    const registry = new InstallationRegistry(persistence);
    const loaded = await persistence.load();
    assertUniqueNames(loaded);
    registry.snapshot = Object.freeze([...loaded]);
    return registry;
  }

  getInstallations(): readonly AntInstallation[] {
    return this.snapshot;
  }

  find(name: string | undefined): AntInstallation | undefined {
    if (name === undefined) return undefined;
    return this.snapshot.find((installation) => installation.name === name);
  }

  /**
   * Writers are serialized: each save and snapshot swap finishes before the next one starts,
   * so the persisted list always matches the last snapshot.
   */
  async setInstallations(installations: readonly AntInstallation[]): Promise<void> {
    assertUniqueNames(installations);
    const next = Object.freeze([...installations]);

    const write = this.writes.then(async () => {
      await this.persistence?.save(next);
      this.snapshot = next;
    });
    // A failed write rejects its own caller only.
    this.writes = write.catch(() => undefined);
    return write;
  }
}

function assertUniqueNames(installations: readonly AntInstallation[]): void {
  const seen = new Set<string>();
  for (const installation of installations) {
    if (installation.name.trim().length === 0) {
      throw new ConfigError("Ant installation name is required.");
    }
    if (seen.has(installation.name)) {
      throw new ConfigError(`Duplicate Ant installation name "${installation.name}".`);
    }
    seen.add(installation.name);
  }
}

// =============================================================================
// YAML PERSISTENCE
// =============================================================================

export class YamlInstallationPersistence implements InstallationPersistence {
  constructor(public readonly filePath: string) {}

  async load(): Promise<AntInstallation[]> {
    if (!(await fse.pathExists(this.filePath))) {
      return [];
    }

    let doc: unknown;
    try {
      doc = yaml.load(await fse.readFile(this.filePath, "utf8"));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse installations file ${this.filePath}: ${formatErrorMessage(err)}`,
        err,
      );
    }

    const parsed = InstallationsFileSchema.safeParse(doc ?? {});
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid installations file ${this.filePath}:\n${formatIssues(parsed.error.issues)}`,
        parsed.error,
      );
    }

    return parsed.data.installations.map((entry) => new AntInstallation(entry));
  }

  async save(installations: readonly AntInstallation[]): Promise<void> {
    const doc = { installations: installations.map((installation) => installation.toJSON()) };
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;

    await fse.ensureDir(path.dirname(this.filePath));
    try {
      await fse.writeFile(tempPath, yaml.dump(doc), "utf8");
      await fs.rename(tempPath, this.filePath);
    } catch (err) {
      await fse.remove(tempPath).catch(() => undefined);
      throw err;
    }
  }
}
