export { applyOverrides, loadConfig, readConfigFile } from "./config-loader.js";
export { serializeConfig } from "./config-serializer.js";
export { validateConfig } from "./config-validator.js";
export { CONFIG_FILE_NAMES, DEFAULT_CONFIG, RULE_CATEGORIES } from "./defaults.js";
export { ConfigError } from "./errors.js";
export type { ConfigIssue, LintConfig, LoadedConfig } from "./types.js";
