import type { SourceLine } from "./types.js";

const TRAILING_WHITESPACE = /[ \t]+$/;
const LEADING_WHITESPACE = /^[ \t]*/;

export function splitSourceLines(content: string): SourceLine[] {
  const rawLines = content.split(/\r?\n/);
  if (rawLines.length > 1 && rawLines[rawLines.length - 1] === "") {
    rawLines.pop();
  }
  return rawLines.map((text, index) => toSourceLine(index, text));
}

export function toSourceLine(number: number, text: string): SourceLine {
  const trailing = TRAILING_WHITESPACE.exec(text);
  const contentEnd = trailing ? trailing.index : text.length;
  const visibleLength = [...text.slice(0, contentEnd)].length;
  const leadingWhitespace = LEADING_WHITESPACE.exec(text)?.[0] ?? "";
  return {
    number,
    text,
    visibleLength,
    contentEnd,
    leadingWhitespace,
    indent: leadingWhitespace.length,
    hasTrailingWhitespace: trailing !== null,
    isBlank: visibleLength === 0,
  };
}
