import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import { applyOverrides, loadConfig } from "../config/config-loader.js";
import type { LintConfig } from "../config/types.js";
import { loadTargets } from "../ingest/target-loader.js";
import { lintFiles, lintSource } from "../rules/rule-engine.js";
import { selectRules } from "../rules/rule-table.js";
import type { FileResult, Violation } from "../rules/types.js";
import { buildLintReport, renderJsonReport } from "../report/json-reporter.js";
import { hasBlockingResults } from "../report/report-utils.js";
import { renderSarifReport } from "../report/sarif-reporter.js";
import { renderTextReport } from "../report/text-reporter.js";
import type { LintReport, ReportFormat } from "../report/types.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export interface LintOptions {
  readonly targets: readonly string[];
  readonly format: ReportFormat;
  readonly out?: string;
  readonly configPath?: string;
  readonly categories?: readonly string[];
  readonly diffBase?: string;
  readonly maxViolations?: number;
  readonly hideAdvisory?: boolean;
  readonly concurrency?: number;
  readonly cwd?: string;
  readonly logger?: Logger;
}

export interface LintResult {
  readonly report: LintReport;
  readonly output: string;
  /** 0 when clean, 1 when an error violation or diagnostic was reported. */
  readonly exitCode: 0 | 1;
}

export async function runLintCommand(
  options: LintOptions,
  toolVersion: string,
): Promise<LintResult> {
  const logger = options.logger ?? silentLogger;
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const loaded = await loadConfig({ configPath: options.configPath, cwd });
  const config = applyOverrides(loaded.config, {
    enabledRuleCategories: options.categories,
  });
  logger.debug(`Config: ${loaded.source ?? "defaults"}`);

  const targets = await loadTargets(options.targets, {
    cwd,
    ignore: config.ignore,
  });
  logger.debug(`Checking ${targets.files.length} file(s)`);

  const results = await lintFiles(targets.files, config, {
    concurrency: options.concurrency,
  });
  const headResults = [
    ...results,
    ...targets.diagnostics.map(
      (diagnostic): FileResult => ({
        path: diagnostic.path,
        violations: [],
        diagnostics: [diagnostic],
      }),
    ),
  ].sort((a, b) => a.path.localeCompare(b.path));

  const files = options.diffBase
    ? await filterAgainstDiffBase(
        headResults,
        targets.files,
        options.diffBase,
        config,
        cwd,
        logger,
      )
    : headResults;

  const report = buildLintReport({
    toolVersion,
    files,
    hideAdvisory: options.hideAdvisory,
    metadata: {
      config_source: loaded.source,
      rules_enabled: selectRules(config).map((rule) => rule.id),
      ...(options.diffBase ? { diff_base: options.diffBase } : {}),
    },
  });

  const output = buildOutput(report, options);
  if (options.out) {
    await fs.writeFile(options.out, `${output}\n`, "utf8");
    logger.success(`Report written to ${options.out}`);
  }

  return {
    report,
    output,
    exitCode: hasBlockingResults(report) ? 1 : 0,
  };
}

function buildOutput(report: LintReport, options: LintOptions): string {
  if (options.format === "json") {
    return renderJsonReport(report);
  }
  if (options.format === "sarif") {
    return renderSarifReport(report);
  }
  return renderTextReport(report, { maxViolations: options.maxViolations });
}

/**
 * Drop violations already present at the merge base of `diffBase` and HEAD.
 * Violations are matched per file by fingerprint, so a finding that only
 * moved to another line is still considered old.
 */
async function filterAgainstDiffBase(
  results: readonly FileResult[],
  entries: readonly { absolutePath: string; relativePath: string }[],
  diffBase: string,
  config: LintConfig,
  cwd: string,
  logger: Logger,
): Promise<FileResult[]> {
  const git = simpleGit({ baseDir: cwd });
  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new Error("diff-base requires a git repository working directory");
  }

  const mergeBase = await git.raw(["merge-base", diffBase, "HEAD"]);
  const baseRef = mergeBase.trim();
  if (!baseRef) {
    throw new Error(`Unable to resolve diff base: ${diffBase}`);
  }
  const repoRoot = (await git.revparse(["--show-toplevel"])).trim();
  logger.debug(`Comparing against merge base ${baseRef.slice(0, 12)}`);

  const absoluteByPath = new Map(
    entries.map((entry) => [entry.relativePath, entry.absolutePath]),
  );

  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "purs-style-base-"));
  try {
    const clonePath = path.join(tempDir, "repo");
    await simpleGit().clone(repoRoot, clonePath, ["--no-checkout"]);
    await simpleGit({ baseDir: clonePath }).checkout(baseRef);

    const filtered: FileResult[] = [];
    for (const result of results) {
      const absolutePath = absoluteByPath.get(result.path);
      if (!absolutePath || result.violations.length === 0) {
        filtered.push(result);
        continue;
      }
      const repoPath = path.relative(
        repoRoot,
        await fs.realpath(absolutePath),
      );
      const baseContent = await readOptional(path.join(clonePath, repoPath));
      if (baseContent === null) {
        filtered.push(result);
        continue;
      }
      const base = lintSource(result.path, baseContent, config);
      filtered.push({
        ...result,
        violations: dropKnown(result.violations, base.violations),
      });
    }
    return filtered;
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
}

function dropKnown(
  head: readonly Violation[],
  base: readonly Violation[],
): Violation[] {
  const remaining = new Map<string, number>();
  for (const violation of base) {
    remaining.set(
      violation.fingerprint,
      (remaining.get(violation.fingerprint) ?? 0) + 1,
    );
  }
  return head.filter((violation) => {
    const count = remaining.get(violation.fingerprint) ?? 0;
    if (count === 0) {
      return true;
    }
    remaining.set(violation.fingerprint, count - 1);
    return false;
  });
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}
