import type { LintReport } from "./types.js";

export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const top = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => {
    const padding = " ".repeat(width - line.length);
    return `| ${line}${padding} |`;
  });
  return [top, ...body, top].join("\n");
}

export function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}

export function truncateText(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}

/**
 * True when the report holds an error-severity violation or any file
 * diagnostic, i.e. the run should exit with status 1.
 */
export function hasBlockingResults(report: LintReport): boolean {
  return report.summary.errors > 0 || report.summary.diagnostics > 0;
}
