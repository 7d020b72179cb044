import type { LintConfig } from "../config/types.js";
import {
  caseArrowAlignmentRule,
  caseBranchIndentRule,
  caseBranchLengthRule,
} from "./case-statements.js";
import { exportConstructorsRule, exportOrderRule } from "./exports.js";
import {
  indentStepRule,
  maxLineLengthRule,
  nestedLiteralIndentRule,
  noTabsRule,
  noTrailingWhitespaceRule,
} from "./formatting.js";
import {
  importConstructorsRule,
  importGroupsRule,
  importOrderRule,
} from "./imports.js";
import {
  acronymCaseRule,
  moduleNamePluralRule,
  typeNameCaseRule,
  valueNameCaseRule,
} from "./naming.js";
import type { Rule, RuleCategory } from "./types.js";

export const RULE_TABLE: readonly Rule[] = Object.freeze(
  [
    maxLineLengthRule,
    noTabsRule,
    noTrailingWhitespaceRule,
    indentStepRule,
    nestedLiteralIndentRule,
    valueNameCaseRule,
    typeNameCaseRule,
    acronymCaseRule,
    moduleNamePluralRule,
    importOrderRule,
    importConstructorsRule,
    importGroupsRule,
    exportOrderRule,
    exportConstructorsRule,
    caseBranchIndentRule,
    caseArrowAlignmentRule,
    caseBranchLengthRule,
  ].map((rule) => Object.freeze(rule)),
);

export const RULE_IDS: ReadonlySet<string> = new Set(
  RULE_TABLE.map((rule) => rule.id),
);

/**
 * Rules enabled by the configuration, grouped by category in the given
 * order (the configured category order by default).
 */
export function selectRules(
  config: LintConfig,
  categoryOrder: readonly RuleCategory[] = config.enabledRuleCategories,
): Rule[] {
  const enabled = new Set<string>(config.enabledRuleCategories);
  const disabled = new Set(config.disabledRules);
  return categoryOrder
    .filter((category) => enabled.has(category))
    .flatMap((category) =>
      RULE_TABLE.filter(
        (rule) => rule.category === category && !disabled.has(rule.id),
      ),
    );
}
