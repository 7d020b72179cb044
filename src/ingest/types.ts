import type { FileDiagnostic } from "../rules/types.js";

export interface FileEntry {
  readonly absolutePath: string;
  /** POSIX path relative to the working directory; used in reports. */
  readonly relativePath: string;
  readonly sizeBytes: number;
}

export interface FileDiscoveryOptions {
  readonly maxFileSizeBytes?: number;
  readonly ignoreFileNames?: readonly string[];
  /** Extra gitignore-style patterns, e.g. from the config `ignore` list. */
  readonly ignorePatterns?: readonly string[];
  readonly extensions?: readonly string[];
}

export interface TargetLoadOptions {
  readonly cwd?: string;
  readonly ignore?: readonly string[];
}

export interface LoadedTargets {
  readonly files: readonly FileEntry[];
  readonly diagnostics: readonly FileDiagnostic[];
}
