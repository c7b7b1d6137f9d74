export { ArgumentListBuilder, MASK_PLACEHOLDER, type Argument } from "./args/argument-list.js";
export {
  DEFAULT_SHELL_PREFIX_LENGTH,
  reescapeForWindows,
  selectWindowsStrategy,
  type WindowsEscapeStrategy,
} from "./args/windows-command.js";

export { AntStep, MESSAGES, type AntStepConfig, type AntStepOptions } from "./ant/ant-step.js";
export {
  chooseBuildFile,
  DEFAULT_BUILD_FILE,
  resolveBuildFile,
  type ChooseBuildFileInput,
  type ResolvedBuildFile,
} from "./ant/build-file.js";
export {
  AntConsoleAnnotator,
  type AntConsoleAnnotatorOptions,
  type AntNote,
} from "./ant/console-annotator.js";
export {
  ANT_HOME_VAR,
  ANT_OPTS_VAR,
  AntInstallation,
  checkAntHome,
  checkInstallationName,
  defaultAntCommand,
  executablePath,
  launderHome,
  type AntInstallationInit,
  type FormValidation,
  type ToolProperty,
} from "./ant/installation.js";
export {
  InstallationRegistry,
  YamlInstallationPersistence,
  type InstallationPersistence,
  type InstallationStore,
} from "./ant/installation-registry.js";

export type { BuildContext } from "./host/build-context.js";
export {
  ExecaLauncher,
  formatCommandLine,
  type LaunchResult,
  type LaunchSpec,
  type Launcher,
} from "./host/launcher.js";
export {
  LocalNode,
  pathApiFor,
  type ExecutionNode,
  type LocalNodeOptions,
  type NodePlatform,
  type NodeTask,
  type NodeTaskContext,
} from "./host/node.js";

export { EnvVars, replaceMacro, type EnvPlatform, type VariableResolver } from "./core/env-vars.js";
export {
  ConfigError,
  LaunchFailureError,
  StepCancelledError,
  StepConfigurationError,
  StepError,
  UserFacingError,
} from "./core/errors.js";
export { JsonlLogger, nullEventLogger, type StepEventLogger } from "./core/logger.js";
export { parseProperties, type PropertyEntry } from "./core/properties.js";
export { tokenize } from "./core/tokenize.js";
