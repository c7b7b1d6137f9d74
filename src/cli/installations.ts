import { Command } from "commander";

import {
  AntInstallation,
  checkAntHome,
  checkInstallationName,
  type FormValidation,
  type ToolProperty,
} from "../ant/installation.js";
import {
  InstallationRegistry,
  YamlInstallationPersistence,
  type InstallationStore,
} from "../ant/installation-registry.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { createPathsContext, installationsPath } from "../core/paths.js";

import { collect, parseKeyValueFlags } from "./flags.js";

// =============================================================================
// TYPES
// =============================================================================

export type AddInstallationInput = {
  name: string;
  home: string;
  properties?: readonly ToolProperty[];
  replace?: boolean;
};

type InstallationsGlobals = {
  home?: string;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerInstallationsCommand(program: Command): void {
  const installations = program
    .command("installations")
    .description("Manage the named Ant installations build steps can choose from");

  installations
    .command("list")
    .description("Print configured installations")
    .action(async (_opts: unknown, command: Command) => {
      const registry = await loadRegistry(command);
      for (const line of formatInstallationList(registry)) {
        console.log(line);
      }
    });

  installations
    .command("add")
    .description("Register an Ant installation")
    .argument("<name>", "Installation name referenced by --ant")
    .argument("<home>", "ANT_HOME of the installation")
    .option("--property <key=value>", "Tool property (repeatable)", collect, [])
    .option("--replace", "Replace an installation with the same name", false)
    .action(
      async (
        name: string,
        home: string,
        opts: { property: string[]; replace: boolean },
        command: Command,
      ) => {
        const registry = await loadRegistry(command);
        const properties = Object.entries(parseKeyValueFlags(opts.property, "--property")).map(
          ([key, value]) => ({ key, value }),
        );
        const added = await addInstallation(registry, {
          name,
          home,
          properties,
          replace: opts.replace,
        });
        console.log(`Added Ant installation "${added.name}" at ${added.home}`);
      },
    );

  installations
    .command("remove")
    .description("Remove an Ant installation")
    .argument("<name>", "Installation name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      const registry = await loadRegistry(command);
      await removeInstallation(registry, name);
      console.log(`Removed Ant installation "${name}"`);
    });

  installations
    .command("check")
    .description("Check that a directory looks like an Ant home")
    .argument("<home>", "Directory to check")
    .action(async (home: string) => {
      const result = await checkAntHome(home);
      if (result.kind === "error") {
        throw invalidInstallationError(result.message);
      }
      console.log(`${home} looks like an Ant directory`);
    });
}

// =============================================================================
// OPERATIONS
// =============================================================================

export function formatInstallationList(store: InstallationStore): string[] {
  const installations = store.getInstallations();
  if (installations.length === 0) {
    return ["No Ant installations configured."];
  }

  return installations.map((installation) => {
    const props = installation.properties.map((p) => `${p.key}=${p.value}`).join(", ");
    return props.length > 0
      ? `${installation.name}\t${installation.home}\t(${props})`
      : `${installation.name}\t${installation.home}`;
  });
}

export async function addInstallation(
  store: InstallationStore,
  input: AddInstallationInput,
): Promise<AntInstallation> {
  assertValid(checkInstallationName(input.name));
  assertValid(await checkAntHome(input.home));

  const existing = store.getInstallations();
  if (!input.replace && existing.some((installation) => installation.name === input.name)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.installation,
      title: "Ant installation already exists.",
      message: `An installation named "${input.name}" is already configured.`,
      hint: "Pass --replace to overwrite it.",
    });
  }

  const installation = new AntInstallation({
    name: input.name,
    home: input.home,
    properties: input.properties,
  });
  const next = existing.filter((entry) => entry.name !== input.name);
  await store.setInstallations([...next, installation]);
  return installation;
}

export async function removeInstallation(store: InstallationStore, name: string): Promise<void> {
  const existing = store.getInstallations();
  const next = existing.filter((installation) => installation.name !== name);
  if (next.length === existing.length) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.installation,
      title: "Ant installation not found.",
      message: `No installation named "${name}" is configured.`,
      next: "Run `ant-step installations list` to see configured names.",
    });
  }

  await store.setInstallations(next);
}

// =============================================================================
// HELPERS
// =============================================================================

async function loadRegistry(command: Command): Promise<InstallationRegistry> {
  const globals = command.optsWithGlobals<InstallationsGlobals>();
  const paths = createPathsContext({ antStepHome: globals.home });
  return InstallationRegistry.load(new YamlInstallationPersistence(installationsPath(paths)));
}

function assertValid(result: FormValidation): void {
  if (result.kind === "error") {
    throw invalidInstallationError(result.message);
  }
}

function invalidInstallationError(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.installation,
    title: "Invalid Ant installation.",
    message,
    hint: "An Ant home is a directory containing lib/ant.jar.",
  });
}
