import fs from "node:fs/promises";
import path from "node:path";
import type { FileDiscoveryOptions } from "./types.js";

const DEFAULT_MAX_FILE_SIZE_BYTES = 1_000_000;
const DEFAULT_IGNORE_FILES = [".gitignore", ".purs-styleignore"] as const;
const DEFAULT_EXTENSIONS = [".purs"] as const;

/** Never linted: VCS metadata, dependencies and compiler output. */
const BUILTIN_IGNORES = [".git/", "node_modules/", "output/", ".spago/"];

const GLOB_TOKEN = /\*\*\/|\*\*|\*|\?|[.+^${}()|[\]\\]/g;

export interface IgnoreRule {
  /** Where the pattern came from: an ignore file name, `config` or `builtin`. */
  readonly origin: string;
  readonly pattern: string;
  readonly negated: boolean;
  readonly directoryOnly: boolean;
  readonly matcher: RegExp;
}

/**
 * Decides which paths under a root get linted. Paths are POSIX and relative
 * to the root. The last matching ignore rule wins, so `!pattern` re-includes.
 */
export interface PathFilter {
  readonly rules: readonly IgnoreRule[];
  skipsDirectory(relativePath: string): boolean;
  acceptsFile(relativePath: string, sizeBytes: number): boolean;
}

export async function createPathFilter(
  rootPath: string,
  options: FileDiscoveryOptions = {},
): Promise<PathFilter> {
  const rules = compileIgnoreRules(BUILTIN_IGNORES, "builtin");
  for (const fileName of options.ignoreFileNames ?? DEFAULT_IGNORE_FILES) {
    const contents = await readIgnoreFile(path.join(rootPath, fileName));
    if (contents !== null) {
      rules.push(...compileIgnoreRules(contents.split(/\r?\n/), fileName));
    }
  }
  rules.push(...compileIgnoreRules(options.ignorePatterns ?? [], "config"));

  const extensions = new Set<string>(options.extensions ?? DEFAULT_EXTENSIONS);
  const maxFileSize = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;

  const ignored = (relativePath: string, isDirectory: boolean): boolean => {
    let result = false;
    for (const rule of rules) {
      if (rule.directoryOnly && !isDirectory) {
        continue;
      }
      if (rule.matcher.test(relativePath)) {
        result = !rule.negated;
      }
    }
    return result;
  };

  return {
    rules,
    skipsDirectory: (relativePath) => ignored(relativePath, true),
    acceptsFile: (relativePath, sizeBytes) =>
      sizeBytes <= maxFileSize &&
      extensions.has(path.posix.extname(relativePath)) &&
      !ignored(relativePath, false),
  };
}

/**
 * Compile gitignore-style lines. Blank lines and `#` comments are dropped.
 * A pattern holding a slash is anchored to the root; one without matches
 * the last path segment at any depth.
 */
export function compileIgnoreRules(
  lines: readonly string[],
  origin: string,
): IgnoreRule[] {
  const rules: IgnoreRule[] = [];
  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) {
      continue;
    }
    const negated = line.startsWith("!");
    let pattern = negated ? line.slice(1) : line;
    const directoryOnly = pattern.endsWith("/");
    if (directoryOnly) {
      pattern = pattern.replace(/\/+$/, "");
    }
    const anchored = pattern.includes("/");
    pattern = pattern.replace(/^\/+/, "");
    if (pattern === "") {
      continue;
    }
    rules.push({
      origin,
      pattern: line,
      negated,
      directoryOnly,
      matcher: new RegExp(`${anchored ? "^" : "(?:^|/)"}${globToRegex(pattern)}$`),
    });
  }
  return rules;
}

function globToRegex(glob: string): string {
  return glob.replace(GLOB_TOKEN, (token) => {
    switch (token) {
      case "**/":
        return "(?:.*/)?";
      case "**":
        return ".*";
      case "*":
        return "[^/]*";
      case "?":
        return "[^/]";
      default:
        return `\\${token}`;
    }
  });
}

async function readIgnoreFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}
