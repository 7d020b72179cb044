export {
  evaluateRules,
  ioDiagnostic,
  lintFile,
  lintFiles,
  lintSource,
  sortViolations,
} from "./rule-engine.js";
export type { EvaluateOptions, LintFilesOptions } from "./rule-engine.js";
export { RULE_IDS, RULE_TABLE, selectRules } from "./rule-table.js";
export {
  createFingerprint,
  createViolation,
  createViolationId,
} from "./violation-factory.js";
export { classifyImport } from "./imports.js";
export type { ImportGroup } from "./imports.js";
export { RuleCategory, Severity } from "./types.js";
export type {
  DiagnosticKind,
  FileDiagnostic,
  FileResult,
  FileRule,
  LineRule,
  Rule,
  RuleContext,
  RuleHit,
  Violation,
} from "./types.js";
