export { EXIT_ADAPTER, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, exitCodeFor, parseLabels, runCli } from "./cli.js";
export type { CliDeps, CollectFlags, TriageFlags, Write } from "./cli.js";
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
