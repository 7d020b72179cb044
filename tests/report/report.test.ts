import { describe, expect, it } from "vitest";
import {
  buildLintReport,
  renderJsonReport,
} from "../../src/report/json-reporter.js";
import { hasBlockingResults } from "../../src/report/report-utils.js";
import { renderSarifReport } from "../../src/report/sarif-reporter.js";
import { renderTextReport } from "../../src/report/text-reporter.js";
import type { LintMetadata } from "../../src/report/types.js";
import { noTrailingWhitespaceRule } from "../../src/rules/formatting.js";
import { moduleNamePluralRule } from "../../src/rules/naming.js";
import type { FileResult } from "../../src/rules/types.js";
import { createViolation } from "../../src/rules/violation-factory.js";

const metadata: LintMetadata = {
  config_source: null,
  rules_enabled: ["no-trailing-whitespace", "module-name-plural"],
};

const trailing = createViolation(
  noTrailingWhitespaceRule,
  "src/Main.purs",
  { line: 2, column: 4, message: "Trailing whitespace" },
  "x = 1 ",
);

const plural = createViolation(moduleNamePluralRule, "src/Data/Strings.purs", {
  message: 'Module name segment "Strings" looks plural; prefer a singular noun',
});

const mainFile: FileResult = {
  path: "src/Main.purs",
  violations: [trailing],
  diagnostics: [],
};

const pluralFile: FileResult = {
  path: "src/Data/Strings.purs",
  violations: [plural],
  diagnostics: [],
};

const brokenFile: FileResult = {
  path: "src/Broken.purs",
  violations: [],
  diagnostics: [
    {
      kind: "parse-error",
      path: "src/Broken.purs",
      message: "Module header is missing 'where'",
      line: 0,
      column: 11,
    },
  ],
};

const TABLE_BORDER =
  "+----------+----------+------------------------+---------------------+";
const TABLE_HEADER =
  "| Location | Severity | Rule                   | Message             |";

describe("json report", () => {
  it("reports 1-based locations and a summary", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [pluralFile, mainFile],
      metadata,
    });

    expect(report.tool).toEqual({ name: "purs-style", version: "1.2.3" });
    expect(report.summary).toEqual({
      files_checked: 2,
      files_with_violations: 2,
      errors: 1,
      advisories: 1,
      diagnostics: 0,
    });
    expect(report.files[1]?.violations[0]).toEqual({
      id: trailing.id,
      rule_id: "no-trailing-whitespace",
      category: "formatting",
      severity: "error",
      line: 3,
      column: 5,
      message: "Trailing whitespace",
      fingerprint: trailing.fingerprint,
    });
    expect(report.metadata).toBe(metadata);
  });

  it("omits locations of file-scoped violations", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [pluralFile],
      metadata,
    });

    const json = renderJsonReport(report);

    expect(json).not.toContain('"line"');
    expect(json).toContain('"rule_id": "module-name-plural"');
  });

  it("hides advisories and counts them", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [pluralFile, mainFile],
      metadata,
      hideAdvisory: true,
    });

    expect(report.files[0]?.violations).toEqual([]);
    expect(report.summary.advisories).toBe(0);
    expect(report.summary.files_with_violations).toBe(1);
    expect(report.metadata.advisories_hidden).toBe(1);
  });

  it("blocks on errors and diagnostics but not advisories", () => {
    const advisoryOnly = buildLintReport({
      toolVersion: "1.2.3",
      files: [pluralFile],
      metadata,
    });
    const broken = buildLintReport({
      toolVersion: "1.2.3",
      files: [brokenFile],
      metadata,
    });
    const withError = buildLintReport({
      toolVersion: "1.2.3",
      files: [mainFile],
      metadata,
    });

    expect(hasBlockingResults(advisoryOnly)).toBe(false);
    expect(hasBlockingResults(broken)).toBe(true);
    expect(hasBlockingResults(withError)).toBe(true);
  });
});

describe("text report", () => {
  it("renders a summary box and a table per file", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [mainFile],
      metadata,
    });

    expect(renderTextReport(report).split("\n")).toEqual([
      "+--------------------------+",
      "| purs-style 1.2.3         |",
      "| Files checked: 1         |",
      "| Files with violations: 1 |",
      "| Errors: 1                |",
      "| Advisories: 0            |",
      "| Diagnostics: 0           |",
      "+--------------------------+",
      "",
      "src/Main.purs",
      TABLE_BORDER,
      TABLE_HEADER,
      TABLE_BORDER,
      "| 3:5      | error    | no-trailing-whitespace | Trailing whitespace |",
      TABLE_BORDER,
    ]);
  });

  it("says so when there is nothing to report", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [{ path: "src/Main.purs", violations: [], diagnostics: [] }],
      metadata,
    });

    expect(renderTextReport(report, { showSummary: false })).toBe(
      "No violations found.",
    );
  });

  it("lists diagnostics as error rows", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [brokenFile],
      metadata,
    });

    const lines = renderTextReport(report, { showSummary: false }).split("\n");

    expect(lines[0]).toBe("src/Broken.purs");
    expect(lines[4]).toBe(
      "| 1:12     | error    | parse-error | Module header is missing 'where' |",
    );
  });

  it("caps the number of violation rows", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [pluralFile, mainFile],
      metadata,
    });

    const output = renderTextReport(report, {
      showSummary: false,
      maxViolations: 1,
    });
    const lines = output.split("\n");

    expect(lines[0]).toBe("src/Data/Strings.purs");
    expect(output).not.toContain("src/Main.purs");
    expect(lines[lines.length - 1]).toBe(
      "Showing 1 of 2 violations. Use --max-violations to adjust.",
    );
  });

  it("mentions the diff base and hidden advisories", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [pluralFile],
      metadata: { ...metadata, diff_base: "origin/main" },
      hideAdvisory: true,
    });

    const output = renderTextReport(report);

    expect(output).toContain("| Diff base: origin/main ");
    expect(output).toContain("| Advisories hidden: 1 ");
    expect(output.endsWith("No violations found.")).toBe(true);
  });
});

describe("sarif report", () => {
  it("maps severities to levels and keeps fingerprints", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [pluralFile, mainFile],
      metadata,
    });

    const sarif: unknown = JSON.parse(renderSarifReport(report));

    expect(sarif).toMatchObject({
      version: "2.1.0",
      runs: [
        {
          tool: {
            driver: {
              name: "purs-style",
              version: "1.2.3",
              rules: [
                {
                  id: "no-trailing-whitespace",
                  defaultConfiguration: { level: "error" },
                },
                {
                  id: "module-name-plural",
                  defaultConfiguration: { level: "note" },
                },
              ],
            },
          },
          results: [
            {
              ruleId: "module-name-plural",
              level: "note",
              locations: [
                {
                  physicalLocation: {
                    artifactLocation: { uri: "src/Data/Strings.purs" },
                  },
                },
              ],
            },
            {
              ruleId: "no-trailing-whitespace",
              level: "error",
              locations: [
                {
                  physicalLocation: {
                    artifactLocation: { uri: "src/Main.purs" },
                    region: { startLine: 3, startColumn: 5 },
                  },
                },
              ],
              partialFingerprints: { "pursStyle/v1": trailing.fingerprint },
              properties: { id: trailing.id, category: "formatting" },
            },
          ],
        },
      ],
    });
  });

  it("reports diagnostics as error results", () => {
    const report = buildLintReport({
      toolVersion: "1.2.3",
      files: [brokenFile],
      metadata,
    });

    const sarif: unknown = JSON.parse(renderSarifReport(report));

    expect(sarif).toMatchObject({
      runs: [
        {
          tool: { driver: { rules: [{ id: "parse-error" }] } },
          results: [
            {
              ruleId: "parse-error",
              level: "error",
              message: { text: "Module header is missing 'where'" },
              locations: [
                {
                  physicalLocation: {
                    region: { startLine: 1, startColumn: 12 },
                  },
                },
              ],
            },
          ],
        },
      ],
    });
  });
});
