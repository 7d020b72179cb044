import { RuleCategory } from "../rules/types.js";
import type { LintConfig } from "./types.js";

export const RULE_CATEGORIES: readonly RuleCategory[] = [
  RuleCategory.Formatting,
  RuleCategory.Naming,
  RuleCategory.Imports,
  RuleCategory.Exports,
  RuleCategory.CaseStatements,
];

export const CONFIG_FILE_NAMES = [".purs-style.yaml", ".purs-style.yml"] as const;

export const DEFAULT_CONFIG: LintConfig = Object.freeze({
  maxLineLength: 80,
  indentSize: 2,
  nestedIndentSize: 4,
  maxArrowIndentThreshold: 10,
  maxMatcherBodyLines: 3,
  enabledRuleCategories: RULE_CATEGORIES,
  disabledRules: [],
  localModulePrefixes: [],
  ignore: [],
});
