import { Severity } from "../rules/types.js";
import type {
  FileDiagnostic,
  FileResult,
  Violation,
} from "../rules/types.js";
import type {
  FileReport,
  LintMetadata,
  LintReport,
  ReportedDiagnostic,
  ReportedViolation,
  SummaryInfo,
} from "./types.js";

export interface ReportInput {
  readonly toolVersion: string;
  readonly files: readonly FileResult[];
  readonly metadata: LintMetadata;
  /** Drop advisory violations from the report; the count goes to metadata. */
  readonly hideAdvisory?: boolean;
}

export function buildLintReport(input: ReportInput): LintReport {
  let hidden = 0;
  const files = input.files.map((file): FileReport => {
    const kept = input.hideAdvisory
      ? file.violations.filter((violation) => violation.severity !== Severity.Advisory)
      : file.violations;
    hidden += file.violations.length - kept.length;
    return {
      path: file.path,
      violations: kept.map(toReportedViolation),
      diagnostics: file.diagnostics.map(toReportedDiagnostic),
    };
  });

  return {
    tool: { name: "purs-style", version: input.toolVersion },
    summary: summarize(files),
    files,
    metadata: input.hideAdvisory
      ? { ...input.metadata, advisories_hidden: hidden }
      : input.metadata,
  };
}

export function renderJsonReport(report: LintReport): string {
  return JSON.stringify(report, null, 2);
}

function summarize(files: readonly FileReport[]): SummaryInfo {
  const summary = {
    files_checked: files.length,
    files_with_violations: 0,
    errors: 0,
    advisories: 0,
    diagnostics: 0,
  };

  for (const file of files) {
    if (file.violations.length > 0) {
      summary.files_with_violations += 1;
    }
    summary.diagnostics += file.diagnostics.length;
    for (const violation of file.violations) {
      switch (violation.severity) {
        case Severity.Error:
          summary.errors += 1;
          break;
        case Severity.Advisory:
          summary.advisories += 1;
          break;
        default:
          break;
      }
    }
  }

  return summary;
}

function toReportedViolation(violation: Violation): ReportedViolation {
  return {
    id: violation.id,
    rule_id: violation.rule_id,
    category: violation.category,
    severity: violation.severity,
    line: oneBased(violation.line),
    column: oneBased(violation.column),
    message: violation.message,
    fingerprint: violation.fingerprint,
  };
}

function toReportedDiagnostic(diagnostic: FileDiagnostic): ReportedDiagnostic {
  return {
    kind: diagnostic.kind,
    message: diagnostic.message,
    line: oneBased(diagnostic.line),
    column: oneBased(diagnostic.column),
  };
}

function oneBased(value: number | undefined): number | undefined {
  return value === undefined ? undefined : value + 1;
}
