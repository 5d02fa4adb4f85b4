export { createCLI, parseArgs, toCliOptions } from "./cli.js"
export type { CliOptions } from "./cli.js"
export { runStrata } from "./run.js"
export type { RunEnvironment } from "./run.js"
export { loadConfig } from "./config/load-config.js"
export type { LoadConfigOptions, LoadedConfig } from "./config/load-config.js"
export { parseDuration, parseTimeout } from "./config/duration.js"
export { buildVariables, substituteVariables } from "./config/variables.js"
export { createConsoleReporter, formatDuration } from "./reporter.js"
export type {
  ConsoleReporter,
  ConsoleReporterOptions,
} from "./reporter.js"
