import type {
  DiagnosticKind,
  RuleCategory,
  Severity,
} from "../rules/types.js";

export interface ToolInfo {
  readonly name: "purs-style";
  readonly version: string;
}

export interface SummaryInfo {
  readonly files_checked: number;
  readonly files_with_violations: number;
  readonly errors: number;
  readonly advisories: number;
  readonly diagnostics: number;
}

/** A violation as reported: lines and columns are 1-based. */
export interface ReportedViolation {
  readonly id: string;
  readonly rule_id: string;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly line?: number;
  readonly column?: number;
  readonly message: string;
  readonly fingerprint: string;
}

export interface ReportedDiagnostic {
  readonly kind: DiagnosticKind;
  readonly message: string;
  readonly line?: number;
  readonly column?: number;
}

export interface FileReport {
  readonly path: string;
  readonly violations: readonly ReportedViolation[];
  readonly diagnostics: readonly ReportedDiagnostic[];
}

export interface LintMetadata {
  readonly config_source: string | null;
  readonly rules_enabled: readonly string[];
  readonly diff_base?: string;
  readonly advisories_hidden?: number;
}

export interface LintReport {
  readonly tool: ToolInfo;
  readonly summary: SummaryInfo;
  readonly files: readonly FileReport[];
  readonly metadata: LintMetadata;
}

export type ReportFormat = "text" | "json" | "sarif";
