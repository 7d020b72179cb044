import { SourceParseError } from "./errors.js";
import type { LiteralKind, LiteralSpan, TokenizedSource } from "./types.js";

const SYMBOL_CHARS = new Set(":!#$%&*+./<=>?@\\^|-~".split(""));
const OPENERS: Readonly<Record<string, string>> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS = new Set([")", "]", "}"]);

type State =
  | { readonly mode: "code" }
  | { readonly mode: "comment"; depth: number }
  | { readonly mode: "string" }
  | { readonly mode: "gap" }
  | { readonly mode: "raw" };

interface OpenLiteral {
  readonly kind: LiteralKind;
  readonly line: number;
  readonly column: number;
}

interface OpenBracket {
  readonly char: string;
  readonly line: number;
  readonly column: number;
}

/**
 * Locate string and comment literals and produce a masked copy of each line.
 * Throws {@link SourceParseError} on unterminated literals or unbalanced
 * brackets.
 */
export function tokenize(lines: readonly string[]): TokenizedSource {
  const spans: LiteralSpan[] = [];
  const masked: string[] = [];
  const brackets: OpenBracket[] = [];
  let state: State = { mode: "code" };
  let open: OpenLiteral | null = null;

  const closeLiteral = (line: number, endColumn: number): void => {
    if (open) {
      spans.push({
        kind: open.kind,
        startLine: open.line,
        startColumn: open.column,
        endLine: line,
        endColumn,
      });
    }
    open = null;
  };

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex += 1) {
    const text = lines[lineIndex] ?? "";
    const out = text.split("");
    const stringMask = (column: number): void => {
      const onFirstLine = open !== null && open.line === lineIndex;
      out[column] = onFirstLine ? "_" : " ";
    };

    let col = 0;
    while (col < text.length) {
      const char = text.charAt(col);
      const next = text.charAt(col + 1);

      if (state.mode === "comment") {
        if (char === "{" && next === "-") {
          state.depth += 1;
          out[col] = " ";
          out[col + 1] = " ";
          col += 2;
          continue;
        }
        if (char === "-" && next === "}") {
          state.depth -= 1;
          out[col] = " ";
          out[col + 1] = " ";
          col += 2;
          if (state.depth === 0) {
            closeLiteral(lineIndex, col);
            state = { mode: "code" };
          }
          continue;
        }
        out[col] = " ";
        col += 1;
        continue;
      }

      if (state.mode === "raw") {
        if (text.startsWith('"""', col)) {
          stringMask(col);
          stringMask(col + 1);
          stringMask(col + 2);
          col += 3;
          closeLiteral(lineIndex, col);
          state = { mode: "code" };
          continue;
        }
        stringMask(col);
        col += 1;
        continue;
      }

      if (state.mode === "gap") {
        if (char === " " || char === "\t") {
          stringMask(col);
          col += 1;
          continue;
        }
        if (char === "\\") {
          stringMask(col);
          col += 1;
          state = { mode: "string" };
          continue;
        }
        throw new SourceParseError(
          "Invalid string gap: expected '\\' to resume the string",
          lineIndex,
          col,
        );
      }

      if (state.mode === "string") {
        if (char === "\\") {
          if (next === "" || next === " " || next === "\t") {
            stringMask(col);
            col += 1;
            state = { mode: "gap" };
            continue;
          }
          stringMask(col);
          stringMask(col + 1);
          col += 2;
          continue;
        }
        stringMask(col);
        col += 1;
        if (char === '"') {
          closeLiteral(lineIndex, col);
          state = { mode: "code" };
        }
        continue;
      }

      // code
      if (char === "{" && next === "-") {
        open = { kind: "comment", line: lineIndex, column: col };
        state = { mode: "comment", depth: 1 };
        out[col] = " ";
        out[col + 1] = " ";
        col += 2;
        continue;
      }

      if (SYMBOL_CHARS.has(char)) {
        let end = col;
        while (end < text.length && SYMBOL_CHARS.has(text.charAt(end))) {
          end += 1;
        }
        const run = text.slice(col, end);
        if (run.length >= 2 && /^-+$/.test(run)) {
          for (let i = col; i < text.length; i += 1) {
            out[i] = " ";
          }
          spans.push({
            kind: "comment",
            startLine: lineIndex,
            startColumn: col,
            endLine: lineIndex,
            endColumn: text.length,
          });
          col = text.length;
          continue;
        }
        col = end;
        continue;
      }

      if (text.startsWith('"""', col)) {
        open = { kind: "string", line: lineIndex, column: col };
        state = { mode: "raw" };
        stringMask(col);
        stringMask(col + 1);
        stringMask(col + 2);
        col += 3;
        continue;
      }

      if (char === '"') {
        open = { kind: "string", line: lineIndex, column: col };
        state = { mode: "string" };
        stringMask(col);
        col += 1;
        continue;
      }

      if (char === "'" && !isIdentifierChar(text.charAt(col - 1))) {
        const end = findCharLiteralEnd(text, col);
        if (end < 0) {
          throw new SourceParseError(
            "Unterminated character literal",
            lineIndex,
            col,
          );
        }
        for (let i = col; i < end; i += 1) {
          out[i] = "_";
        }
        spans.push({
          kind: "string",
          startLine: lineIndex,
          startColumn: col,
          endLine: lineIndex,
          endColumn: end,
        });
        col = end;
        continue;
      }

      if (isIdentifierChar(char)) {
        let end = col;
        while (end < text.length && isIdentifierChar(text.charAt(end))) {
          end += 1;
        }
        col = end;
        continue;
      }

      const closer = OPENERS[char];
      if (closer) {
        brackets.push({ char, line: lineIndex, column: col });
      } else if (CLOSERS.has(char)) {
        const top = brackets.pop();
        if (!top || OPENERS[top.char] !== char) {
          throw new SourceParseError(
            `Unbalanced '${char}'`,
            lineIndex,
            col,
          );
        }
      }
      col += 1;
    }

    if (state.mode === "string") {
      const start = open ?? { line: lineIndex, column: 0 };
      throw new SourceParseError(
        "Unterminated string literal",
        start.line,
        start.column,
      );
    }

    masked.push(out.join(""));
  }

  if (state.mode !== "code") {
    const start = open ?? { line: lines.length - 1, column: 0 };
    const what =
      state.mode === "comment" ? "block comment" : "string literal";
    throw new SourceParseError(`Unterminated ${what}`, start.line, start.column);
  }

  const unclosed = brackets.pop();
  if (unclosed) {
    throw new SourceParseError(
      `Unclosed '${unclosed.char}'`,
      unclosed.line,
      unclosed.column,
    );
  }

  return { spans, masked };
}

/**
 * Kind of the literal covering a position, or `null` when it is code.
 */
export function literalAt(
  spans: readonly LiteralSpan[],
  line: number,
  column: number,
): LiteralKind | null {
  for (const span of spans) {
    if (line < span.startLine || line > span.endLine) {
      continue;
    }
    if (line === span.startLine && column < span.startColumn) {
      continue;
    }
    if (line === span.endLine && column >= span.endColumn) {
      continue;
    }
    return span.kind;
  }
  return null;
}

export function isIdentifierChar(char: string): boolean {
  return /^[A-Za-z0-9_']$/.test(char);
}

function findCharLiteralEnd(text: string, start: number): number {
  if (text.charAt(start + 1) === "\\") {
    const close = text.indexOf("'", start + 3);
    return close < 0 ? -1 : close + 1;
  }
  const codePoint = text.codePointAt(start + 1);
  if (codePoint === undefined) {
    return -1;
  }
  // astral characters take two code units
  const close = start + 1 + String.fromCodePoint(codePoint).length;
  return text.charAt(close) === "'" ? close + 1 : -1;
}
