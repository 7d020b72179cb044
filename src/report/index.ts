export { buildLintReport, renderJsonReport } from "./json-reporter.js";
export type { ReportInput } from "./json-reporter.js";
export { renderTextReport } from "./text-reporter.js";
export type { TextRenderOptions } from "./text-reporter.js";
export { renderSarifReport } from "./sarif-reporter.js";
export {
  hasBlockingResults,
  renderAsciiBox,
  renderAsciiTable,
  truncateText,
} from "./report-utils.js";
export type {
  FileReport,
  LintMetadata,
  LintReport,
  ReportedDiagnostic,
  ReportedViolation,
  ReportFormat,
  SummaryInfo,
  ToolInfo,
} from "./types.js";
