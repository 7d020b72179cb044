import { alignmentAnchors, indentOf, walkBlocks } from "../source/layout.js";
import { literalAt } from "../source/tokenizer.js";
import { RuleCategory, Severity } from "./types.js";
import type { FileRule, LineRule, RuleHit } from "./types.js";

const URL_ONLY = /^[a-z][a-z0-9+.-]*:\/\/\S+$/i;

export const maxLineLengthRule: LineRule = {
  id: "max-line-length",
  scope: "line",
  category: RuleCategory.Formatting,
  severity: Severity.Error,
  description: "Lines must not exceed the configured maximum length",
  check: (line, { config }) => {
    if (line.visibleLength <= config.maxLineLength) {
      return [];
    }
    if (URL_ONLY.test(line.text.trim())) {
      return [];
    }
    return [
      {
        line: line.number,
        column: codeUnitOffset(line.text, config.maxLineLength),
        message: `Line is ${line.visibleLength} characters long; the limit is ${config.maxLineLength}`,
      },
    ];
  },
};

export const noTabsRule: LineRule = {
  id: "no-tabs",
  scope: "line",
  category: RuleCategory.Formatting,
  severity: Severity.Error,
  description: "Indent and separate code with spaces, never tabs",
  check: (line, { file }) => {
    for (let column = 0; column < line.text.length; column += 1) {
      if (line.text.charAt(column) !== "\t") {
        continue;
      }
      const literal = literalAt(file.tokens.spans, line.number, column);
      const flagged =
        column < line.indent ? literal !== "string" : literal === null;
      if (flagged) {
        return [
          {
            line: line.number,
            column,
            message: "Tab character; use spaces instead",
          },
        ];
      }
    }
    return [];
  },
};

export const noTrailingWhitespaceRule: LineRule = {
  id: "no-trailing-whitespace",
  scope: "line",
  category: RuleCategory.Formatting,
  severity: Severity.Error,
  description: "Lines must not end with spaces or tabs",
  check: (line) =>
    line.hasTrailingWhitespace
      ? [
          {
            line: line.number,
            column: line.contentEnd,
            message: "Trailing whitespace",
          },
        ]
      : [],
};

export const indentStepRule: FileRule = {
  id: "indent-step",
  scope: "file",
  category: RuleCategory.Formatting,
  severity: Severity.Error,
  description:
    "Each indentation step must be a multiple of the configured indent size",
  check: (file, { config }) => {
    const hits: RuleHit[] = [];
    walkBlocks(file.layout, (block, parent) => {
      const step = block.startColumn - parent.startColumn;
      if (step % config.indentSize === 0) {
        return;
      }
      const header = file.tokens.masked[block.headerLine];
      if (header !== undefined && alignmentAnchors(header).has(block.startColumn)) {
        return;
      }
      hits.push({
        line: block.startLine,
        column: block.startColumn,
        message: `Indented ${step} columns past the enclosing block; use multiples of ${config.indentSize}`,
      });
    });
    return hits;
  },
};

export const nestedLiteralIndentRule: FileRule = {
  id: "nested-literal-indent",
  scope: "file",
  category: RuleCategory.Formatting,
  severity: Severity.Error,
  description:
    "A record or array nested under a key is indented past the key's line by the nested indent size",
  check: (file, { config }) => {
    const masked = file.tokens.masked;
    const hits: RuleHit[] = [];
    masked.forEach((text, lineIndex) => {
      if (!endsWithRecordKey(text)) {
        return;
      }
      const next = nextCodeLine(masked, lineIndex + 1);
      if (next === null) {
        return;
      }
      const nextText = masked[next] ?? "";
      const opener = nextText.trimStart().charAt(0);
      if (opener !== "{" && opener !== "[") {
        return;
      }
      const keyIndent = indentOf(text) ?? 0;
      const actual = indentOf(nextText) ?? 0;
      const expected = keyIndent + config.nestedIndentSize;
      if (actual === expected) {
        return;
      }
      hits.push({
        line: next,
        column: actual,
        message: `Nested literal should be indented ${config.nestedIndentSize} spaces past its key's line (expected ${expected} spaces, found ${actual})`,
      });
    });
    return hits;
  },
};

/** Code-unit column of the character at index `characters`. */
function codeUnitOffset(text: string, characters: number): number {
  let offset = 0;
  let count = 0;
  for (const char of text) {
    if (count === characters) {
      break;
    }
    offset += char.length;
    count += 1;
  }
  return offset;
}

function endsWithRecordKey(maskedLine: string): boolean {
  const trimmed = maskedLine.trimEnd();
  if (!trimmed.endsWith(":") || trimmed.endsWith("::")) {
    return false;
  }
  return /[A-Za-z0-9_']$/.test(trimmed.slice(0, -1).trimEnd());
}

function nextCodeLine(masked: readonly string[], from: number): number | null {
  for (let line = from; line < masked.length; line += 1) {
    if (indentOf(masked[line] ?? "") !== null) {
      return line;
    }
  }
  return null;
}
