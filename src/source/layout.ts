import type { LayoutBlock } from "./types.js";

const LAYOUT_KEYWORDS = new Set(["let", "where", "do", "ado", "of"]);
const ANCHOR_OPERATORS = new Set(["=", "<-", "->"]);
const TOKEN_PATTERN = /[A-Za-z_][A-Za-z0-9_']*|[:!#$%&*+./<=>?@\\^|~-]+|\S/g;

interface MutableBlock {
  startLine: number;
  startColumn: number;
  endLine: number;
  headerLine: number;
  children: MutableBlock[];
}

/**
 * Build the indentation block tree from masked lines. Blank lines (including
 * comment-only lines) belong to no block boundary.
 */
export function buildLayout(masked: readonly string[]): LayoutBlock {
  const root: MutableBlock = {
    startLine: 0,
    startColumn: 0,
    endLine: 0,
    headerLine: -1,
    children: [],
  };
  const stack: MutableBlock[] = [root];
  let previousLine = -1;

  masked.forEach((text, lineIndex) => {
    const indent = indentOf(text);
    if (indent === null) {
      return;
    }

    let top = stack[stack.length - 1] ?? root;
    while (stack.length > 1 && top.startColumn > indent) {
      top.endLine = previousLine;
      stack.pop();
      top = stack[stack.length - 1] ?? root;
    }

    if (top.startColumn < indent) {
      const block: MutableBlock = {
        startLine: lineIndex,
        startColumn: indent,
        endLine: lineIndex,
        headerLine: previousLine,
        children: [],
      };
      top.children.push(block);
      stack.push(block);
    }
    previousLine = lineIndex;
  });

  for (const block of stack) {
    block.endLine = Math.max(previousLine, block.startLine);
  }
  return root;
}

/**
 * Columns on a header line that a continuation may legitimately align with:
 * the token following a layout keyword, an opening delimiter, `=`, `<-` or
 * `->`.
 */
export function alignmentAnchors(maskedLine: string): Set<number> {
  const anchors = new Set<number>();
  const tokens = Array.from(maskedLine.matchAll(TOKEN_PATTERN));
  tokens.forEach((token, index) => {
    const value = token[0];
    const isAnchor =
      LAYOUT_KEYWORDS.has(value) ||
      ANCHOR_OPERATORS.has(value) ||
      value === "(" ||
      value === "[" ||
      value === "{";
    if (!isAnchor) {
      return;
    }
    const following = tokens[index + 1];
    if (following?.index !== undefined) {
      anchors.add(following.index);
    }
  });
  return anchors;
}

export function walkBlocks(
  block: LayoutBlock,
  visit: (block: LayoutBlock, parent: LayoutBlock) => void,
): void {
  for (const child of block.children) {
    visit(child, block);
    walkBlocks(child, visit);
  }
}

export function indentOf(text: string): number | null {
  const match = /\S/.exec(text);
  return match ? match.index : null;
}
