import type { RuleCategory } from "../rules/types.js";

export interface LintConfig {
  readonly maxLineLength: number;
  readonly indentSize: number;
  readonly nestedIndentSize: number;
  readonly maxArrowIndentThreshold: number;
  readonly maxMatcherBodyLines: number;
  readonly enabledRuleCategories: readonly RuleCategory[];
  readonly disabledRules: readonly string[];
  readonly localModulePrefixes: readonly string[];
  readonly ignore: readonly string[];
}

export interface LoadedConfig {
  readonly config: LintConfig;
  /** Absolute path of the file the config came from, `null` for defaults. */
  readonly source: string | null;
}

export interface ConfigIssue {
  readonly key: string;
  readonly message: string;
}
