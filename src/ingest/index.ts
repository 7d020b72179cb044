export { discoverFiles } from "./file-discovery.js";
export { loadTargets } from "./target-loader.js";
export { compileIgnoreRules, createPathFilter } from "./path-filter.js";
export type { IgnoreRule, PathFilter } from "./path-filter.js";
export type {
  FileDiscoveryOptions,
  FileEntry,
  LoadedTargets,
  TargetLoadOptions,
} from "./types.js";
