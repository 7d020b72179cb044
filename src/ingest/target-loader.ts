import fs from "node:fs/promises";
import path from "node:path";
import { discoverFiles } from "./file-discovery.js";
import type { FileDiagnostic } from "../rules/types.js";
import type { FileEntry, LoadedTargets, TargetLoadOptions } from "./types.js";

/**
 * Resolve file and directory targets into a deduplicated, sorted list of
 * files. Directories are walked for `.purs` files; files are taken as given.
 * A target that cannot be read becomes an `io-error` diagnostic.
 */
export async function loadTargets(
  targets: readonly string[],
  options: TargetLoadOptions = {},
): Promise<LoadedTargets> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const byPath = new Map<string, FileEntry>();
  const diagnostics: FileDiagnostic[] = [];

  for (const target of targets) {
    const resolvedPath = path.resolve(cwd, target);
    const displayPath = toDisplayPath(cwd, resolvedPath);

    let stats: Awaited<ReturnType<typeof fs.stat>>;
    try {
      stats = await fs.stat(resolvedPath);
    } catch {
      diagnostics.push({
        kind: "io-error",
        path: displayPath,
        message: `Target path does not exist: ${displayPath}`,
      });
      continue;
    }

    if (stats.isFile()) {
      byPath.set(displayPath, {
        absolutePath: resolvedPath,
        relativePath: displayPath,
        sizeBytes: stats.size,
      });
      continue;
    }

    if (!stats.isDirectory()) {
      diagnostics.push({
        kind: "io-error",
        path: displayPath,
        message: `Target is neither a file nor a directory: ${displayPath}`,
      });
      continue;
    }

    const discovered = await discoverFiles(resolvedPath, {
      ignorePatterns: options.ignore ?? [],
    });
    for (const entry of discovered) {
      const relativePath = toDisplayPath(
        cwd,
        path.join(resolvedPath, entry.relativePath),
      );
      byPath.set(relativePath, { ...entry, relativePath });
    }
  }

  const files = [...byPath.values()].sort((a, b) =>
    a.relativePath.localeCompare(b.relativePath),
  );
  diagnostics.sort((a, b) => a.path.localeCompare(b.path));
  return { files, diagnostics };
}

function toDisplayPath(cwd: string, absolutePath: string): string {
  const relative = path.relative(cwd, absolutePath);
  const display = relative === "" ? path.basename(absolutePath) : relative;
  return display.split(path.sep).join(path.posix.sep);
}
