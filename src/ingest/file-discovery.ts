import fs from "node:fs/promises";
import path from "node:path";
import { createPathFilter } from "./path-filter.js";
import type { FileDiscoveryOptions, FileEntry } from "./types.js";

/**
 * Collect the PureScript sources under `rootPath`, sorted by relative path.
 * Symlinks are followed only when they resolve inside the root; each real
 * directory is read once.
 */
export async function discoverFiles(
  rootPath: string,
  options: FileDiscoveryOptions = {},
): Promise<FileEntry[]> {
  const root = await fs.realpath(rootPath);
  const filter = await createPathFilter(root, options);
  const found = new Map<string, FileEntry>();
  const visited = new Set<string>();
  const pending = [root];

  while (pending.length > 0) {
    const directory = pending.pop();
    if (directory === undefined || visited.has(directory)) {
      continue;
    }
    visited.add(directory);

    for (const dirent of await fs.readdir(directory, { withFileTypes: true })) {
      const linkPath = path.join(directory, dirent.name);
      const target = dirent.isSymbolicLink()
        ? await resolveInside(root, linkPath)
        : linkPath;
      if (target === null) {
        continue;
      }

      const stats = await fs.stat(target);
      const relativePath = toPosix(path.relative(root, target));
      if (stats.isDirectory()) {
        if (!filter.skipsDirectory(relativePath)) {
          pending.push(target);
        }
      } else if (stats.isFile() && filter.acceptsFile(relativePath, stats.size)) {
        found.set(relativePath, {
          absolutePath: target,
          relativePath,
          sizeBytes: stats.size,
        });
      }
    }
  }

  return [...found.values()].sort((a, b) =>
    a.relativePath.localeCompare(b.relativePath),
  );
}

async function resolveInside(root: string, linkPath: string): Promise<string | null> {
  let resolved: string;
  try {
    resolved = await fs.realpath(linkPath);
  } catch (error) {
    // dangling link
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
  const relative = path.relative(root, resolved);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join(path.posix.sep);
}
