import yaml from "js-yaml";
import type { LintConfig } from "./types.js";

export function serializeConfig(config: LintConfig): string {
  return yaml.dump(config, { lineWidth: 120, noRefs: true });
}
