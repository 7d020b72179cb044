import crypto from "node:crypto";
import type { Rule, RuleHit, Violation } from "./types.js";

export function createViolation(
  rule: Rule,
  path: string,
  hit: RuleHit,
  lineText = "",
): Violation {
  return {
    id: createViolationId(rule.id, path, hit.line, hit.message),
    rule_id: rule.id,
    category: rule.category,
    severity: rule.severity,
    path,
    line: hit.line,
    column: hit.column,
    message: hit.message,
    fingerprint: createFingerprint(rule.id, hit.message, lineText),
  };
}

export function createViolationId(
  ruleId: string,
  relativePath: string,
  line: number | undefined,
  message: string,
): string {
  const input = `${ruleId}:${relativePath}:${line ?? "-"}:${message}`;
  return hash(input).slice(0, 12);
}

/**
 * Identity of a violation independent of its path and line number, so the
 * same finding on a shifted line still matches.
 */
export function createFingerprint(
  ruleId: string,
  message: string,
  lineText: string,
): string {
  return hash(`${ruleId}:${message}:${lineText.trim()}`).slice(0, 16);
}

function hash(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}
