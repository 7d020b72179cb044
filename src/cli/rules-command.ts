import { RULE_TABLE } from "../rules/rule-table.js";
import { renderAsciiTable } from "../report/report-utils.js";

export type RulesFormat = "text" | "json";

export function runRulesCommand(format: RulesFormat = "text"): string {
  if (format === "json") {
    return JSON.stringify(
      RULE_TABLE.map((rule) => ({
        id: rule.id,
        category: rule.category,
        severity: rule.severity,
        scope: rule.scope,
        description: rule.description,
      })),
      null,
      2,
    );
  }
  return renderAsciiTable(
    RULE_TABLE.map((rule) => [
      rule.id,
      rule.category,
      rule.severity,
      rule.description,
    ]),
    ["Rule", "Category", "Severity", "Description"],
  );
}
