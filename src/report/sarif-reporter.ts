import { RULE_TABLE } from "../rules/rule-table.js";
import { Severity } from "../rules/types.js";
import type { Rule } from "../rules/types.js";
import type {
  LintReport,
  ReportedDiagnostic,
  ReportedViolation,
} from "./types.js";

type SarifLevel = "error" | "warning" | "note";

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
  readonly defaultConfiguration: { readonly level: SarifLevel };
  readonly properties?: Record<string, string>;
}

interface SarifRegion {
  readonly startLine: number;
  readonly startColumn?: number;
}

interface SarifResult {
  readonly ruleId: string;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly physicalLocation: {
      readonly artifactLocation: { readonly uri: string };
      readonly region?: SarifRegion;
    };
  }[];
  readonly partialFingerprints?: Record<string, string>;
  readonly properties?: Record<string, string>;
}

interface SarifLog {
  readonly version: "2.1.0";
  readonly $schema: string;
  readonly runs: readonly {
    readonly tool: {
      readonly driver: {
        readonly name: string;
        readonly version: string;
        readonly rules: readonly SarifRule[];
      };
    };
    readonly results: readonly SarifResult[];
  }[];
}

const DIAGNOSTIC_RULES: readonly SarifRule[] = [
  {
    id: "parse-error",
    name: "parse-error",
    shortDescription: { text: "The file could not be parsed" },
    defaultConfiguration: { level: "error" },
  },
  {
    id: "io-error",
    name: "io-error",
    shortDescription: { text: "The file could not be read" },
    defaultConfiguration: { level: "error" },
  },
  {
    id: "internal-error",
    name: "internal-error",
    shortDescription: { text: "Checking the file failed unexpectedly" },
    defaultConfiguration: { level: "error" },
  },
];

export function renderSarifReport(report: LintReport): string {
  const results: SarifResult[] = [];
  const usedRules = new Set<string>();

  for (const file of report.files) {
    for (const diagnostic of file.diagnostics) {
      usedRules.add(diagnostic.kind);
      results.push(buildDiagnosticResult(file.path, diagnostic));
    }
    for (const violation of file.violations) {
      usedRules.add(violation.rule_id);
      results.push(buildViolationResult(file.path, violation));
    }
  }

  const rules = [...RULE_TABLE.map(buildRule), ...DIAGNOSTIC_RULES].filter(
    (rule) => usedRules.has(rule.id),
  );

  const sarif: SarifLog = {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: {
          driver: {
            name: report.tool.name,
            version: report.tool.version,
            rules,
          },
        },
        results,
      },
    ],
  };
  return JSON.stringify(sarif, null, 2);
}

function buildRule(rule: Rule): SarifRule {
  return {
    id: rule.id,
    name: rule.id,
    shortDescription: { text: rule.description },
    defaultConfiguration: { level: toSarifLevel(rule.severity) },
    properties: {
      category: rule.category,
      severity: rule.severity,
    },
  };
}

function buildViolationResult(
  path: string,
  violation: ReportedViolation,
): SarifResult {
  return {
    ruleId: violation.rule_id,
    level: toSarifLevel(violation.severity),
    message: { text: violation.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: path },
          region: toRegion(violation.line, violation.column),
        },
      },
    ],
    partialFingerprints: { "pursStyle/v1": violation.fingerprint },
    properties: {
      id: violation.id,
      category: violation.category,
    },
  };
}

function buildDiagnosticResult(
  path: string,
  diagnostic: ReportedDiagnostic,
): SarifResult {
  return {
    ruleId: diagnostic.kind,
    level: "error",
    message: { text: diagnostic.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: path },
          region: toRegion(diagnostic.line, diagnostic.column),
        },
      },
    ],
  };
}

function toRegion(
  line: number | undefined,
  column: number | undefined,
): SarifRegion | undefined {
  if (line === undefined) {
    return undefined;
  }
  return { startLine: line, startColumn: column };
}

function toSarifLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case Severity.Error:
      return "error";
    case Severity.Advisory:
    default:
      return "note";
  }
}
