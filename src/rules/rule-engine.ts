import fs from "node:fs/promises";
import type { LintConfig } from "../config/types.js";
import type { FileEntry } from "../ingest/types.js";
import { SourceParseError } from "../source/errors.js";
import { parseSource } from "../source/source-parser.js";
import type { ParsedSource } from "../source/types.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import { selectRules } from "./rule-table.js";
import type {
  FileDiagnostic,
  FileResult,
  RuleCategory,
  RuleContext,
  Violation,
} from "./types.js";
import { createViolation } from "./violation-factory.js";

export interface EvaluateOptions {
  /** Order in which categories are evaluated; the result is sorted either way. */
  readonly categoryOrder?: readonly RuleCategory[];
}

export interface LintFilesOptions extends EvaluateOptions {
  readonly concurrency?: number;
}

const DEFAULT_CONCURRENCY = 8;

export function evaluateRules(
  file: ParsedSource,
  config: LintConfig,
  options: EvaluateOptions = {},
): Violation[] {
  const context: RuleContext = { file, config };
  const violations: Violation[] = [];

  for (const rule of selectRules(config, options.categoryOrder)) {
    if (rule.scope === "line") {
      for (const line of file.lines) {
        for (const hit of rule.check(line, context)) {
          violations.push(
            createViolation(
              rule,
              file.path,
              { ...hit, line: hit.line ?? line.number },
              line.text,
            ),
          );
        }
      }
      continue;
    }

    for (const hit of rule.check(file, context)) {
      const lineText =
        hit.line === undefined ? "" : (file.lines[hit.line]?.text ?? "");
      violations.push(createViolation(rule, file.path, hit, lineText));
    }
  }

  return sortViolations(violations);
}

export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(compareViolations);
}

function compareViolations(a: Violation, b: Violation): number {
  return (
    a.path.localeCompare(b.path) ||
    compareOptional(a.line, b.line) ||
    compareOptional(a.column, b.column) ||
    compareStrings(a.rule_id, b.rule_id) ||
    compareStrings(a.message, b.message)
  );
}

function compareOptional(a: number | undefined, b: number | undefined): number {
  if (a === b) {
    return 0;
  }
  if (a === undefined) {
    return -1;
  }
  if (b === undefined) {
    return 1;
  }
  return a - b;
}

function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Lint one file's content. A source that cannot be parsed yields a single
 * `parse-error` diagnostic and no violations.
 */
export function lintSource(
  path: string,
  content: string,
  config: LintConfig,
  options: EvaluateOptions = {},
): FileResult {
  let parsed: ParsedSource;
  try {
    parsed = parseSource(path, content);
  } catch (error) {
    if (!(error instanceof SourceParseError)) {
      throw error;
    }
    return {
      path,
      violations: [],
      diagnostics: [
        {
          kind: "parse-error",
          path,
          message: error.message,
          line: error.line,
          column: error.column,
        },
      ],
    };
  }

  return {
    path,
    violations: evaluateRules(parsed, config, options),
    diagnostics: [],
  };
}

export async function lintFile(
  entry: FileEntry,
  config: LintConfig,
  options: EvaluateOptions = {},
): Promise<FileResult> {
  let content: string;
  try {
    content = await fs.readFile(entry.absolutePath, "utf8");
  } catch (error) {
    return {
      path: entry.relativePath,
      violations: [],
      diagnostics: [ioDiagnostic(entry.relativePath, error)],
    };
  }
  return lintSource(entry.relativePath, content, config, options);
}

export async function lintFiles(
  entries: readonly FileEntry[],
  config: LintConfig,
  options: LintFilesOptions = {},
): Promise<FileResult[]> {
  const tasks = entries.map(
    (entry) => () => lintFile(entry, config, options),
  );
  const results = await runWithConcurrency(
    tasks,
    options.concurrency ?? DEFAULT_CONCURRENCY,
  );

  const files = entries.map((entry, index): FileResult => {
    const result = results[index];
    if (result === undefined || result instanceof Error) {
      return {
        path: entry.relativePath,
        violations: [],
        diagnostics: [
          {
            kind: "internal-error",
            path: entry.relativePath,
            message: result?.message ?? "File was not checked",
          },
        ],
      };
    }
    return result;
  });
  return files.sort((a, b) => a.path.localeCompare(b.path));
}

export function ioDiagnostic(path: string, error: unknown): FileDiagnostic {
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "io-error", path, message };
}
