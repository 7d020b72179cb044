export interface SourceLine {
  /** Zero-based line number. */
  readonly number: number;
  /** Raw text without the line terminator. */
  readonly text: string;
  /** Characters (code points) before any trailing whitespace. */
  readonly visibleLength: number;
  /** Column, in code units, where trailing whitespace starts. */
  readonly contentEnd: number;
  readonly leadingWhitespace: string;
  readonly indent: number;
  readonly hasTrailingWhitespace: boolean;
  readonly isBlank: boolean;
}

export type LiteralKind = "string" | "comment";

/**
 * A string or comment region. Columns are zero-based and `endColumn` is
 * exclusive on `endLine`.
 */
export interface LiteralSpan {
  readonly kind: LiteralKind;
  readonly startLine: number;
  readonly startColumn: number;
  readonly endLine: number;
  readonly endColumn: number;
}

export interface TokenizedSource {
  readonly spans: readonly LiteralSpan[];
  /**
   * One entry per line: comments blanked with spaces, string contents and
   * delimiters replaced with `_`. Column positions are preserved.
   */
  readonly masked: readonly string[];
}

export interface LayoutBlock {
  readonly startLine: number;
  readonly startColumn: number;
  readonly endLine: number;
  /** Line that introduced the block, -1 for the root. */
  readonly headerLine: number;
  readonly children: readonly LayoutBlock[];
}

export type ListItemKind =
  | "kind"
  | "class"
  | "effect"
  | "type"
  | "operator"
  | "function"
  | "module";

export interface ListItem {
  readonly kind: ListItemKind;
  /** Name used for ordering: operators without parentheses, no keyword. */
  readonly name: string;
  readonly text: string;
  /**
   * Constructor list of a type item: `null` when absent, `"all"` for `(..)`,
   * otherwise the listed names (empty for `()`).
   */
  readonly constructors: "all" | readonly string[] | null;
  readonly line: number;
  readonly column: number;
}

export interface ExportList {
  readonly items: readonly ListItem[];
  readonly line: number;
}

export interface ModuleHeader {
  readonly name: string;
  readonly line: number;
  readonly column: number;
  readonly exports: ExportList | null;
}

export interface ImportDeclaration {
  readonly moduleName: string;
  readonly line: number;
  readonly endLine: number;
  readonly items: readonly ListItem[] | null;
  readonly hiding: boolean;
  readonly alias: string | null;
}

export type DeclarationKind = "value" | "type" | "constructor";

export interface Declaration {
  readonly kind: DeclarationKind;
  readonly name: string;
  readonly line: number;
  readonly column: number;
}

export interface CaseBranch {
  readonly startLine: number;
  readonly endLine: number;
  readonly column: number;
  /** Column of the first top-level `->` on the branch's first line. */
  readonly arrowColumn: number | null;
  /** Column just after the pattern text, one space before a tight arrow. */
  readonly naturalArrowColumn: number | null;
  readonly bodyOnArrowLine: boolean;
}

export interface CaseBlock {
  readonly line: number;
  readonly column: number;
  /** Indent of the line holding the `case` keyword. */
  readonly lineIndent: number;
  readonly ofLine: number;
  readonly branches: readonly CaseBranch[];
}

export interface ParsedSource {
  readonly path: string;
  readonly lines: readonly SourceLine[];
  readonly tokens: TokenizedSource;
  readonly layout: LayoutBlock;
  readonly header: ModuleHeader | null;
  readonly imports: readonly ImportDeclaration[];
  readonly declarations: readonly Declaration[];
  readonly caseBlocks: readonly CaseBlock[];
}
