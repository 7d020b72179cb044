import { describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  RULE_TABLE,
  buildLintReport,
  lintSource,
  renderTextReport,
} from "../../src/index.js";

describe("public api", () => {
  it("lints a source string end to end", () => {
    const result = lintSource(
      "Main.purs",
      "module Main where\n\nx = 1 \n",
      DEFAULT_CONFIG,
    );

    expect(result.violations.map((violation) => violation.rule_id)).toEqual([
      "no-trailing-whitespace",
    ]);

    const report = buildLintReport({
      toolVersion: "0.1.0",
      files: [result],
      metadata: {
        config_source: null,
        rules_enabled: RULE_TABLE.map((rule) => rule.id),
      },
    });
    expect(renderTextReport(report, { showSummary: false }).split("\n")[4]).toBe(
      "| 3:6      | error    | no-trailing-whitespace | Trailing whitespace |",
    );
  });
});
