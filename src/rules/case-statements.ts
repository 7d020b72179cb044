import type { CaseBlock, CaseBranch } from "../source/types.js";
import { RuleCategory, Severity } from "./types.js";
import type { FileRule, RuleHit } from "./types.js";

export const caseBranchIndentRule: FileRule = {
  id: "case-branch-indent",
  scope: "file",
  category: RuleCategory.CaseStatements,
  severity: Severity.Error,
  description:
    "Case branches are indented one step deeper than the line holding `case`",
  check: (file, { config }) => {
    const hits: RuleHit[] = [];
    for (const block of file.caseBlocks) {
      const first = block.branches[0];
      if (!first || isSingleLine(block)) {
        continue;
      }
      const expected = block.lineIndent + config.indentSize;
      if (first.column === expected) {
        continue;
      }
      hits.push({
        line: first.startLine,
        column: first.column,
        message: `Case branches should be indented ${config.indentSize} spaces past the line holding "case" (expected ${expected} spaces, found ${first.column})`,
      });
    }
    return hits;
  },
};

/**
 * Aligned arrows are suggested while the padding they need stays within the
 * threshold, and discouraged beyond it.
 */
export const caseArrowAlignmentRule: FileRule = {
  id: "case-arrow-alignment",
  scope: "file",
  category: RuleCategory.CaseStatements,
  severity: Severity.Advisory,
  description:
    "Align case arrows only when the padding needed stays within the threshold",
  check: (file, { config }) => {
    const hits: RuleHit[] = [];
    for (const block of file.caseBlocks) {
      const arrows = block.branches.flatMap((branch) =>
        branch.arrowColumn !== null && branch.naturalArrowColumn !== null
          ? [{ actual: branch.arrowColumn, natural: branch.naturalArrowColumn }]
          : [],
      );
      if (arrows.length < 2) {
        continue;
      }

      const widest = Math.max(...arrows.map((arrow) => arrow.natural));
      const padding = Math.max(
        ...arrows.map((arrow) => widest - arrow.natural),
      );
      const firstActual = arrows[0]?.actual;
      const aligned = arrows.every((arrow) => arrow.actual === firstActual);
      const padded = arrows.some((arrow) => arrow.actual !== arrow.natural);
      const threshold = config.maxArrowIndentThreshold;

      if (padding > threshold && aligned && padded) {
        hits.push({
          line: block.line,
          column: block.column,
          message: `Aligning these case arrows takes up to ${padding} spaces of padding (threshold ${threshold}); leave them unaligned`,
        });
      } else if (padding <= threshold && !aligned) {
        hits.push({
          line: block.line,
          column: block.column,
          message: `Consider aligning the arrows in this case block (at most ${padding} spaces of padding needed)`,
        });
      }
    }
    return hits;
  },
};

export const caseBranchLengthRule: FileRule = {
  id: "case-branch-length",
  scope: "file",
  category: RuleCategory.CaseStatements,
  severity: Severity.Advisory,
  description:
    "Long case branch bodies are candidates for a named local helper",
  check: (file, { config }) => {
    const hits: RuleHit[] = [];
    for (const block of file.caseBlocks) {
      for (const branch of block.branches) {
        const length = bodyLength(branch);
        if (length <= config.maxMatcherBodyLines) {
          continue;
        }
        hits.push({
          line: branch.startLine,
          column: branch.column,
          message: `Case branch body spans ${length} lines (limit ${config.maxMatcherBodyLines}); consider extracting a named local helper`,
        });
      }
    }
    return hits;
  },
};

export function bodyLength(branch: CaseBranch): number {
  const countsFirstLine = branch.bodyOnArrowLine || branch.arrowColumn === null;
  return branch.endLine - branch.startLine + (countsFirstLine ? 1 : 0);
}

function isSingleLine(block: CaseBlock): boolean {
  return block.branches.every(
    (branch) =>
      branch.startLine === block.ofLine && branch.endLine === block.ofLine,
  );
}
