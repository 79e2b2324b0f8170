export { main, run, planOutputs, formatDiagnostic, DEFAULT_OUT_DIR, type RunEnvironment, type OutputFile } from "./run.js";
export { parseArgs, usage, UsageError, type CliOptions } from "./args.js";
export {
  loadConfigFile,
  loadConfigFromPath,
  parseConfig,
  mergeConfigs,
  ConfigError,
  CONFIG_FILE_NAMES,
  type WirekitConfig,
  type LoadedConfig,
} from "./config.js";
export { createProgramFromTsconfig } from "./program.js";
export { createConsoleLogger, type ConsoleLoggerOptions } from "./logger.js";
