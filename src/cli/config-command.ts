import fs from "node:fs/promises";
import path from "node:path";
import { loadConfig, readConfigFile } from "../config/config-loader.js";
import { serializeConfig } from "../config/config-serializer.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";

export interface ConfigInitOptions {
  readonly out?: string;
  readonly force?: boolean;
}

/**
 * Render the default configuration, writing it to `out` when given. An
 * existing file is only replaced with `force`.
 */
export async function runConfigInit(
  options: ConfigInitOptions = {},
): Promise<string> {
  const output = serializeConfig(DEFAULT_CONFIG);
  if (options.out) {
    if (!options.force && (await exists(options.out))) {
      throw new Error(
        `Refusing to overwrite ${options.out}. Pass --force to replace it.`,
      );
    }
    await fs.mkdir(path.dirname(path.resolve(options.out)), { recursive: true });
    await fs.writeFile(options.out, output, "utf8");
  }
  return output;
}

/**
 * Validate a config file; throws `ConfigError` listing every problem.
 */
export async function runConfigValidate(configPath: string): Promise<string> {
  const resolved = path.resolve(configPath);
  if (!(await exists(resolved))) {
    throw new Error(`Config file not found: ${resolved}`);
  }
  await readConfigFile(resolved);
  return `Configuration is valid: ${configPath}`;
}

export interface ConfigShowOptions {
  readonly configPath?: string;
  readonly cwd?: string;
}

export async function runConfigShow(
  options: ConfigShowOptions = {},
): Promise<string> {
  const loaded = await loadConfig(options);
  const header = `# source: ${loaded.source ?? "defaults"}`;
  return `${header}\n${serializeConfig(loaded.config)}`;
}

async function exists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}
