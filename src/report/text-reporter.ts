import type { FileReport, LintReport } from "./types.js";
import { renderAsciiBox, renderAsciiTable, truncateText } from "./report-utils.js";

export interface TextRenderOptions {
  readonly showSummary?: boolean;
  /** Cap on violation rows across all files; 0 or absent shows all. */
  readonly maxViolations?: number;
  readonly messageWidth?: number;
}

export function renderTextReport(
  report: LintReport,
  options: TextRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const messageWidth = options.messageWidth ?? 100;
  const lines: string[] = [];

  if (showSummary) {
    lines.push(renderSummaryBlock(report));
  }

  const total = report.files.reduce(
    (sum, file) => sum + file.violations.length,
    0,
  );
  const diagnostics = report.summary.diagnostics;
  if (total === 0 && diagnostics === 0) {
    pushSection(lines, "No violations found.");
    return lines.join("\n");
  }

  let remaining =
    options.maxViolations && options.maxViolations > 0
      ? options.maxViolations
      : Number.POSITIVE_INFINITY;
  let shown = 0;

  for (const file of report.files) {
    const rows = buildRows(file, remaining, messageWidth);
    if (rows.table.length === 0) {
      continue;
    }
    remaining -= rows.violations;
    shown += rows.violations;
    pushSection(
      lines,
      `${file.path}\n${renderAsciiTable(rows.table, [
        "Location",
        "Severity",
        "Rule",
        "Message",
      ])}`,
    );
  }

  if (total > shown) {
    pushSection(
      lines,
      `Showing ${shown} of ${total} violations. Use --max-violations to adjust.`,
    );
  }

  return lines.join("\n");
}

function renderSummaryBlock(report: LintReport): string {
  const { summary } = report;
  const content = [
    `purs-style ${report.tool.version}`,
    `Files checked: ${summary.files_checked}`,
    `Files with violations: ${summary.files_with_violations}`,
    `Errors: ${summary.errors}`,
    `Advisories: ${summary.advisories}`,
    `Diagnostics: ${summary.diagnostics}`,
  ];
  if (report.metadata.diff_base) {
    content.push(`Diff base: ${report.metadata.diff_base}`);
  }
  if (report.metadata.advisories_hidden) {
    content.push(`Advisories hidden: ${report.metadata.advisories_hidden}`);
  }
  return renderAsciiBox(content);
}

function buildRows(
  file: FileReport,
  limit: number,
  messageWidth: number,
): { readonly table: string[][]; readonly violations: number } {
  const table: string[][] = file.diagnostics.map((diagnostic) => [
    formatLocation(diagnostic.line, diagnostic.column),
    "error",
    diagnostic.kind,
    truncateText(diagnostic.message, messageWidth),
  ]);
  const violations = file.violations.slice(0, Math.max(0, limit));
  for (const violation of violations) {
    table.push([
      formatLocation(violation.line, violation.column),
      violation.severity,
      violation.rule_id,
      truncateText(violation.message, messageWidth),
    ]);
  }
  return { table, violations: violations.length };
}

function formatLocation(
  line: number | undefined,
  column: number | undefined,
): string {
  if (line === undefined) {
    return "-";
  }
  return column === undefined ? `${line}` : `${line}:${column}`;
}

function pushSection(lines: string[], section: string): void {
  if (lines.length > 0) {
    lines.push("");
  }
  lines.push(section);
}
