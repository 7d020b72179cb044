export * from "./config/index.js";
export * from "./ingest/index.js";
export * from "./report/index.js";
export * from "./rules/index.js";
export * from "./source/index.js";
export { runLintCommand } from "./cli/lint-command.js";
export type { LintOptions, LintResult } from "./cli/lint-command.js";
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger, LoggerOptions } from "./utils/logger.js";
