import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError } from "./errors.js";
import { validateConfig } from "./config-validator.js";
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG } from "./defaults.js";
import type { LintConfig, LoadedConfig } from "./types.js";

export interface LoadConfigOptions {
  readonly configPath?: string;
  readonly cwd?: string;
}

export interface ConfigOverrides {
  readonly enabledRuleCategories?: readonly string[];
}

/**
 * Load the configuration from an explicit path, else from a config file in
 * the working directory, else fall back to the defaults.
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  if (options.configPath) {
    const configPath = path.resolve(cwd, options.configPath);
    if (!(await existsFile(configPath))) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return { config: await readConfigFile(configPath), source: configPath };
  }

  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(cwd, name);
    if (await existsFile(candidate)) {
      return { config: await readConfigFile(candidate), source: candidate };
    }
  }

  return { config: DEFAULT_CONFIG, source: null };
}

export async function readConfigFile(configPath: string): Promise<LintConfig> {
  const raw = await fs.readFile(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      [{ key: "(yaml)", message: `invalid YAML: ${reason}` }],
      configPath,
    );
  }
  return validateConfig(doc, configPath);
}

/**
 * Apply command-line overrides, re-validating the merged result.
 */
export function applyOverrides(
  config: LintConfig,
  overrides: ConfigOverrides,
): LintConfig {
  if (!overrides.enabledRuleCategories) {
    return config;
  }
  return validateConfig({
    ...config,
    enabledRuleCategories: overrides.enabledRuleCategories,
  });
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
