import type { LintConfig } from "../config/types.js";
import type { ParsedSource, SourceLine } from "../source/types.js";

export const enum Severity {
  Error = "error",
  Advisory = "advisory",
}

export const enum RuleCategory {
  Formatting = "formatting",
  Naming = "naming",
  Imports = "imports",
  Exports = "exports",
  CaseStatements = "case-statements",
}

export interface RuleContext {
  readonly file: ParsedSource;
  readonly config: LintConfig;
}

/**
 * Location and message produced by a check; the engine turns hits into
 * violations.
 */
export interface RuleHit {
  readonly line?: number;
  readonly column?: number;
  readonly message: string;
}

interface RuleInfo {
  readonly id: string;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly description: string;
}

export interface LineRule extends RuleInfo {
  readonly scope: "line";
  readonly check: (line: SourceLine, context: RuleContext) => readonly RuleHit[];
}

export interface FileRule extends RuleInfo {
  readonly scope: "file";
  readonly check: (file: ParsedSource, context: RuleContext) => readonly RuleHit[];
}

export type Rule = LineRule | FileRule;

export interface Violation {
  readonly id: string;
  readonly rule_id: string;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly path: string;
  /** Zero-based; absent for file-scoped violations. */
  readonly line?: number;
  readonly column?: number;
  readonly message: string;
  /** Identity that survives line shifts, used to compare against a base. */
  readonly fingerprint: string;
}

export type DiagnosticKind = "parse-error" | "io-error" | "internal-error";

export interface FileDiagnostic {
  readonly kind: DiagnosticKind;
  readonly path: string;
  readonly message: string;
  readonly line?: number;
  readonly column?: number;
}

export interface FileResult {
  readonly path: string;
  readonly violations: readonly Violation[];
  readonly diagnostics: readonly FileDiagnostic[];
}
