import { Command } from "commander";

import { collect } from "./flags.js";
import { registerInstallationsCommand } from "./installations.js";
import { runCommand } from "./run.js";

type RunCommandFlags = {
  config?: string;
  ant?: string;
  antOpts?: string;
  buildFile?: string;
  properties?: string;
  define: string[];
  sensitive: string[];
  workspace?: string;
  moduleRoot?: string;
  runId?: string;
  color: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("ant-step")
    .description("Run Apache Ant as a CI build step")
    .version("0.1.0")
    .option("--home <path>", "Override the state directory (defaults to $ANT_STEP_HOME or ~/.ant-step)")
    .option("--debug", "Print error details and stack traces", false);

  registerInstallationsCommand(program);

  program
    .command("run")
    .description("Run Ant in a workspace")
    .argument("[targets...]", "Targets, options and properties passed to Ant")
    .option("--config <path>", "Step config path (defaults to <workspace>/ant-step.yaml)")
    .option("--ant <name>", "Name of a configured Ant installation")
    .option("--ant-opts <opts>", "ANT_OPTS for the Ant JVM")
    .option("--build-file <path>", "Build file, relative to the module root")
    .option("--properties <text>", "Extra -D properties in properties-file syntax")
    .option("-D, --define <key=value>", "Build variable (repeatable)", collect, [])
    .option("--sensitive <name>", "Build variable to mask in logs (repeatable)", collect, [])
    .option("--workspace <dir>", "Workspace directory (default: current directory)")
    .option("--module-root <dir>", "Module root (default: workspace)")
    .option("--run-id <id>", "Run ID (default: timestamp)")
    .option("--no-color", "Disable colored console notes")
    .action(async (targets: string[], opts: RunCommandFlags) => {
      const globals = program.opts<{ home?: string }>();
      await runCommand(targets, {
        config: opts.config,
        ant: opts.ant,
        antOpts: opts.antOpts,
        buildFile: opts.buildFile,
        properties: opts.properties,
        define: opts.define,
        sensitive: opts.sensitive,
        workspace: opts.workspace,
        moduleRoot: opts.moduleRoot,
        runId: opts.runId,
        home: globals.home,
        color: opts.color,
      });
    });

  return program;
}
