import { RULE_IDS } from "../rules/rule-table.js";
import type { RuleCategory } from "../rules/types.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_CONFIG, RULE_CATEGORIES } from "./defaults.js";
import type { ConfigIssue, LintConfig } from "./types.js";

interface NumericRange {
  readonly min: number;
  readonly max: number;
}

type NumericKey =
  | "maxLineLength"
  | "indentSize"
  | "nestedIndentSize"
  | "maxArrowIndentThreshold"
  | "maxMatcherBodyLines";

const NUMERIC_RANGES: Readonly<Record<NumericKey, NumericRange>> = {
  maxLineLength: { min: 1, max: 1000 },
  indentSize: { min: 1, max: 16 },
  nestedIndentSize: { min: 1, max: 16 },
  maxArrowIndentThreshold: { min: 0, max: 200 },
  maxMatcherBodyLines: { min: 1, max: 1000 },
};

const CONFIG_KEYS = new Set<string>([
  ...Object.keys(NUMERIC_RANGES),
  "enabledRuleCategories",
  "disabledRules",
  "localModulePrefixes",
  "ignore",
]);

const CATEGORY_NAMES = new Set<string>(RULE_CATEGORIES);

/**
 * Validate a raw configuration document and fill in defaults. A missing
 * document (empty file) yields the defaults.
 */
export function validateConfig(input: unknown, source?: string): LintConfig {
  if (input === undefined || input === null) {
    return DEFAULT_CONFIG;
  }

  const issues: ConfigIssue[] = [];
  if (!isRecord(input)) {
    throw new ConfigError(
      [{ key: "(root)", message: "configuration must be a mapping" }],
      source,
    );
  }

  for (const key of Object.keys(input)) {
    if (!CONFIG_KEYS.has(key)) {
      issues.push({ key, message: `unknown option '${key}'` });
    }
  }

  const config: LintConfig = {
    maxLineLength: parseInteger(input, "maxLineLength", issues),
    indentSize: parseInteger(input, "indentSize", issues),
    nestedIndentSize: parseInteger(input, "nestedIndentSize", issues),
    maxArrowIndentThreshold: parseInteger(
      input,
      "maxArrowIndentThreshold",
      issues,
    ),
    maxMatcherBodyLines: parseInteger(input, "maxMatcherBodyLines", issues),
    enabledRuleCategories: parseCategories(input.enabledRuleCategories, issues),
    disabledRules: parseRuleIds(input.disabledRules, issues),
    localModulePrefixes: parseStringArray(
      input.localModulePrefixes,
      "localModulePrefixes",
      DEFAULT_CONFIG.localModulePrefixes,
      issues,
    ),
    ignore: parseStringArray(
      input.ignore,
      "ignore",
      DEFAULT_CONFIG.ignore,
      issues,
    ),
  };

  if (issues.length > 0) {
    throw new ConfigError(issues, source);
  }
  return config;
}

function parseInteger(
  input: Record<string, unknown>,
  key: NumericKey,
  issues: ConfigIssue[],
): number {
  const value = input[key];
  const { min, max } = NUMERIC_RANGES[key];
  if (value === undefined) {
    return DEFAULT_CONFIG[key];
  }
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    issues.push({
      key,
      message: `${key} must be an integer between ${min} and ${max}`,
    });
    return DEFAULT_CONFIG[key];
  }
  return value;
}

function parseCategories(
  input: unknown,
  issues: ConfigIssue[],
): readonly RuleCategory[] {
  if (input === undefined) {
    return DEFAULT_CONFIG.enabledRuleCategories;
  }
  const values = parseStringArray(
    input,
    "enabledRuleCategories",
    [],
    issues,
  );
  const selected = new Set<string>();
  for (const value of values) {
    if (!CATEGORY_NAMES.has(value)) {
      issues.push({
        key: "enabledRuleCategories",
        message: `enabledRuleCategories includes unknown category '${value}'`,
      });
      continue;
    }
    selected.add(value);
  }
  return RULE_CATEGORIES.filter((category) => selected.has(category));
}

function parseRuleIds(input: unknown, issues: ConfigIssue[]): string[] {
  if (input === undefined) {
    return [...DEFAULT_CONFIG.disabledRules];
  }
  const values = parseStringArray(input, "disabledRules", [], issues);
  return values.filter((value) => {
    if (!RULE_IDS.has(value)) {
      issues.push({
        key: "disabledRules",
        message: `disabledRules includes unknown rule '${value}'`,
      });
      return false;
    }
    return true;
  });
}

function parseStringArray(
  input: unknown,
  key: string,
  fallback: readonly string[],
  issues: ConfigIssue[],
): string[] {
  if (input === undefined) {
    return [...fallback];
  }
  if (!Array.isArray(input)) {
    issues.push({ key, message: `${key} must be an array` });
    return [...fallback];
  }
  const values: string[] = [];
  input.forEach((entry: unknown, index) => {
    if (typeof entry !== "string") {
      issues.push({ key, message: `${key}[${index}] must be a string` });
      return;
    }
    values.push(entry);
  });
  return values;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
