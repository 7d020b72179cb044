import { SourceParseError } from "./errors.js";
import { indentOf } from "./layout.js";
import type {
  CaseBlock,
  CaseBranch,
  Declaration,
  DeclarationKind,
  ImportDeclaration,
  ListItem,
  ListItemKind,
  ModuleHeader,
} from "./types.js";

const MODULE_NAME = /^[A-Z][A-Za-z0-9_']*(?:\.[A-Z][A-Za-z0-9_']*)*/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_']*/;
const TOKEN_PATTERN = /[A-Za-z_][A-Za-z0-9_']*|[:!#$%&*+./<=>?@\\^|~-]+|\S/g;
const KEYWORD_KINDS: ReadonlyMap<string, ListItemKind> = new Map<
  string,
  ListItemKind
>([
  ["kind", "kind"],
  ["class", "class"],
  ["effect", "effect"],
  ["type", "type"],
  ["module", "module"],
]);
const SKIPPED_DECLARATIONS = new Set(["infix", "infixl", "infixr", "else"]);

interface Chunk {
  readonly startLine: number;
  readonly endLine: number;
  readonly text: string;
  readonly lineOffsets: readonly number[];
}

interface Position {
  readonly line: number;
  readonly column: number;
}

interface Token {
  readonly value: string;
  readonly offset: number;
}

export interface ModuleFacts {
  readonly header: ModuleHeader | null;
  readonly imports: readonly ImportDeclaration[];
  readonly declarations: readonly Declaration[];
  readonly caseBlocks: readonly CaseBlock[];
}

export function parseModule(masked: readonly string[]): ModuleFacts {
  const chunks = splitChunks(masked);
  let header: ModuleHeader | null = null;
  const imports: ImportDeclaration[] = [];
  const declarations: Declaration[] = [];
  const seen = new Set<string>();

  for (const chunk of chunks) {
    const first = firstWord(chunk.text);
    if (first === "module" && header === null) {
      header = parseHeader(chunk);
      continue;
    }
    if (first === "import") {
      imports.push(parseImport(chunk));
      continue;
    }
    for (const declaration of parseDeclarations(chunk)) {
      const key = `${declaration.kind}:${declaration.name}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      declarations.push(declaration);
    }
  }

  return {
    header,
    imports,
    declarations,
    caseBlocks: findCaseBlocks(masked),
  };
}

function splitChunks(masked: readonly string[]): Chunk[] {
  const chunks: Chunk[] = [];
  let start = -1;
  let last = -1;

  const flush = (): void => {
    if (start < 0) {
      return;
    }
    const lineOffsets: number[] = [];
    let offset = 0;
    const parts: string[] = [];
    for (let line = start; line <= last; line += 1) {
      const text = masked[line] ?? "";
      lineOffsets.push(offset);
      parts.push(text);
      offset += text.length + 1;
    }
    chunks.push({
      startLine: start,
      endLine: last,
      text: parts.join("\n"),
      lineOffsets,
    });
  };

  masked.forEach((text, line) => {
    const indent = indentOf(text);
    if (indent === null) {
      return;
    }
    if (indent === 0) {
      flush();
      start = line;
    }
    if (start >= 0) {
      last = line;
    }
  });
  flush();
  return chunks;
}

function parseHeader(chunk: Chunk): ModuleHeader {
  let cursor = skipSpaces(chunk.text, "module".length);
  const name = MODULE_NAME.exec(chunk.text.slice(cursor))?.[0];
  if (!name) {
    const position = positionOf(chunk, cursor);
    throw new SourceParseError(
      "Malformed module header: expected a module name",
      position.line,
      position.column,
    );
  }
  const namePosition = positionOf(chunk, cursor);
  cursor = skipSpaces(chunk.text, cursor + name.length);

  let exports: ModuleHeader["exports"] = null;
  if (chunk.text.charAt(cursor) === "(") {
    const parsed = parseItemList(chunk, cursor);
    exports = {
      items: parsed.items,
      line: positionOf(chunk, cursor).line,
    };
    cursor = skipSpaces(chunk.text, parsed.end);
  }

  if (firstWord(chunk.text.slice(cursor)) !== "where") {
    const position = positionOf(chunk, Math.min(cursor, chunk.text.length));
    throw new SourceParseError(
      "Module header is missing 'where'",
      position.line,
      position.column,
    );
  }

  return {
    name,
    line: namePosition.line,
    column: namePosition.column,
    exports,
  };
}

function parseImport(chunk: Chunk): ImportDeclaration {
  let cursor = skipSpaces(chunk.text, "import".length);
  const moduleName = MODULE_NAME.exec(chunk.text.slice(cursor))?.[0];
  if (!moduleName) {
    const position = positionOf(chunk, cursor);
    throw new SourceParseError(
      "Import declaration is missing a module name",
      position.line,
      position.column,
    );
  }
  cursor = skipSpaces(chunk.text, cursor + moduleName.length);

  let hiding = false;
  if (firstWord(chunk.text.slice(cursor)) === "hiding") {
    hiding = true;
    cursor = skipSpaces(chunk.text, cursor + "hiding".length);
  }

  let items: ListItem[] | null = null;
  if (chunk.text.charAt(cursor) === "(") {
    const parsed = parseItemList(chunk, cursor);
    items = parsed.items;
    cursor = skipSpaces(chunk.text, parsed.end);
  }

  let alias: string | null = null;
  if (firstWord(chunk.text.slice(cursor)) === "as") {
    cursor = skipSpaces(chunk.text, cursor + "as".length);
    alias = MODULE_NAME.exec(chunk.text.slice(cursor))?.[0] ?? null;
  }

  return {
    moduleName,
    line: chunk.startLine,
    endLine: chunk.endLine,
    items,
    hiding,
    alias,
  };
}

function parseItemList(
  chunk: Chunk,
  openIndex: number,
): { items: ListItem[]; end: number } {
  const text = chunk.text;
  const items: ListItem[] = [];
  let depth = 0;
  let itemStart = openIndex + 1;

  for (let index = openIndex; index < text.length; index += 1) {
    const char = text.charAt(index);
    if (char === "(") {
      depth += 1;
      continue;
    }
    if (char === ")") {
      depth -= 1;
      if (depth === 0) {
        pushItem(chunk, itemStart, index, items);
        return { items, end: index + 1 };
      }
      continue;
    }
    if (char === "," && depth === 1) {
      pushItem(chunk, itemStart, index, items);
      itemStart = index + 1;
    }
  }

  const position = positionOf(chunk, openIndex);
  throw new SourceParseError("Unclosed '('", position.line, position.column);
}

function pushItem(
  chunk: Chunk,
  start: number,
  end: number,
  items: ListItem[],
): void {
  const raw = chunk.text.slice(start, end);
  const leading = raw.length - raw.trimStart().length;
  const text = raw.trim().replace(/\s+/g, " ");
  if (!text) {
    return;
  }
  const position = positionOf(chunk, start + leading);
  items.push(classifyItem(text, position));
}

/**
 * Classify one import or export entry by its syntax alone.
 */
export function classifyItem(text: string, position: Position): ListItem {
  const base = { text, line: position.line, column: position.column };
  const keyword = firstWord(text);
  const keywordKind = keyword ? KEYWORD_KINDS.get(keyword) : undefined;
  if (keyword && keywordKind && text.length > keyword.length) {
    const rest = text.slice(keyword.length).trim();
    return {
      ...base,
      kind: keywordKind,
      name: stripParens(rest),
      constructors: null,
    };
  }

  if (text.startsWith("(")) {
    return {
      ...base,
      kind: "operator",
      name: stripParens(text),
      constructors: null,
    };
  }

  if (/^[A-Z]/.test(text)) {
    const name = IDENTIFIER.exec(text)?.[0] ?? text;
    return {
      ...base,
      kind: "type",
      name,
      constructors: parseConstructors(text.slice(name.length)),
    };
  }

  return { ...base, kind: "function", name: text, constructors: null };
}

function parseConstructors(rest: string): ListItem["constructors"] {
  const trimmed = rest.trim();
  if (!trimmed.startsWith("(")) {
    return null;
  }
  const inner = stripParens(trimmed);
  if (inner === "..") {
    return "all";
  }
  return inner
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function parseDeclarations(chunk: Chunk): Declaration[] {
  const tokens = tokenizeChunk(chunk.text);
  const first = tokens[0];
  if (!first || SKIPPED_DECLARATIONS.has(first.value)) {
    return [];
  }

  switch (first.value) {
    case "data":
    case "newtype":
      return parseDataDeclaration(chunk, tokens);
    case "type":
      return parseTypeSynonym(chunk, tokens);
    case "class":
      return parseClassDeclaration(chunk, tokens);
    case "instance":
      return parseInstanceName(chunk, tokens, 1);
    case "derive":
      return parseInstanceName(
        chunk,
        tokens,
        tokens[1]?.value === "newtype" ? 3 : 2,
      );
    case "foreign":
      return parseForeignImport(chunk, tokens);
    default:
      break;
  }

  if (!/^[a-z_]/.test(first.value) || !IDENTIFIER.test(first.value)) {
    return [];
  }
  return [declarationAt(chunk, "value", first)];
}

function parseDataDeclaration(
  chunk: Chunk,
  tokens: readonly Token[],
): Declaration[] {
  const nameToken = tokens[1];
  if (!nameToken || !IDENTIFIER.test(nameToken.value)) {
    return [];
  }
  const declarations = [declarationAt(chunk, "type", nameToken)];

  const equalsIndex = findTopLevel(tokens, "=", 2);
  if (equalsIndex < 0) {
    return declarations;
  }

  let expectConstructor = true;
  let depth = 0;
  for (const token of tokens.slice(equalsIndex + 1)) {
    if (token.value === "(" || token.value === "[" || token.value === "{") {
      depth += 1;
    } else if (
      token.value === ")" ||
      token.value === "]" ||
      token.value === "}"
    ) {
      depth -= 1;
    }
    if (depth === 0 && token.value === "|") {
      expectConstructor = true;
      continue;
    }
    if (expectConstructor && IDENTIFIER.test(token.value)) {
      declarations.push(declarationAt(chunk, "constructor", token));
      expectConstructor = false;
    }
  }
  return declarations;
}

function parseTypeSynonym(
  chunk: Chunk,
  tokens: readonly Token[],
): Declaration[] {
  const nameToken = tokens[1];
  if (!nameToken || nameToken.value === "role") {
    return [];
  }
  if (!IDENTIFIER.test(nameToken.value)) {
    return [];
  }
  return [declarationAt(chunk, "type", nameToken)];
}

function parseClassDeclaration(
  chunk: Chunk,
  tokens: readonly Token[],
): Declaration[] {
  const whereIndex = tokens.findIndex((token) => token.value === "where");
  const head = whereIndex < 0 ? tokens : tokens.slice(0, whereIndex);
  let superclassEnd = -1;
  head.forEach((token, index) => {
    if (token.value === "<=") {
      superclassEnd = index;
    }
  });
  const nameToken = head
    .slice(superclassEnd < 0 ? 1 : superclassEnd + 1)
    .find((token) => IDENTIFIER.test(token.value));
  return nameToken ? [declarationAt(chunk, "type", nameToken)] : [];
}

function parseInstanceName(
  chunk: Chunk,
  tokens: readonly Token[],
  nameIndex: number,
): Declaration[] {
  const nameToken = tokens[nameIndex];
  const separator = tokens[nameIndex + 1];
  if (!nameToken || separator?.value !== "::") {
    return [];
  }
  if (!/^[a-z_]/.test(nameToken.value)) {
    return [];
  }
  return [declarationAt(chunk, "value", nameToken)];
}

function parseForeignImport(
  chunk: Chunk,
  tokens: readonly Token[],
): Declaration[] {
  if (tokens[1]?.value !== "import") {
    return [];
  }
  const isData = tokens[2]?.value === "data";
  const nameToken = tokens[isData ? 3 : 2];
  if (!nameToken || !IDENTIFIER.test(nameToken.value)) {
    return [];
  }
  return [declarationAt(chunk, isData ? "type" : "value", nameToken)];
}

function declarationAt(
  chunk: Chunk,
  kind: DeclarationKind,
  token: Token,
): Declaration {
  const position = positionOf(chunk, token.offset);
  return {
    kind,
    name: token.value,
    line: position.line,
    column: position.column,
  };
}

function findCaseBlocks(masked: readonly string[]): CaseBlock[] {
  const tokens: Array<Token & { readonly line: number }> = [];
  masked.forEach((text, line) => {
    for (const token of tokenizeChunk(text)) {
      tokens.push({ ...token, line });
    }
  });

  const blocks: CaseBlock[] = [];
  tokens.forEach((token, index) => {
    if (token.value !== "case") {
      return;
    }
    let depth = 0;
    let ofToken: (Token & { readonly line: number }) | undefined;
    for (const candidate of tokens.slice(index)) {
      if (candidate.value === "case") {
        depth += 1;
      } else if (candidate.value === "of") {
        depth -= 1;
        if (depth === 0) {
          ofToken = candidate;
          break;
        }
      }
    }
    if (!ofToken) {
      return;
    }

    const caseLine = masked[token.line] ?? "";
    blocks.push({
      line: token.line,
      column: token.offset,
      lineIndent: indentOf(caseLine) ?? 0,
      ofLine: ofToken.line,
      branches: collectBranches(masked, ofToken.line, ofToken.offset + 2),
    });
  });
  return blocks;
}

function collectBranches(
  masked: readonly string[],
  ofLine: number,
  afterOf: number,
): CaseBranch[] {
  const ofText = masked[ofLine] ?? "";
  const inline = indentOf(ofText.slice(afterOf));
  let branchColumn: number;
  let firstLine: number;

  if (inline !== null) {
    branchColumn = afterOf + inline;
    firstLine = ofLine;
  } else {
    let next = ofLine + 1;
    while (next < masked.length && indentOf(masked[next] ?? "") === null) {
      next += 1;
    }
    const indent = indentOf(masked[next] ?? "");
    if (indent === null) {
      return [];
    }
    branchColumn = indent;
    firstLine = next;
  }

  const ranges: Array<{ start: number; end: number }> = [
    { start: firstLine, end: firstLine },
  ];
  for (let line = firstLine + 1; line < masked.length; line += 1) {
    const indent = indentOf(masked[line] ?? "");
    if (indent === null) {
      continue;
    }
    if (
      indent < branchColumn ||
      (indent === branchColumn && startsWithWhere(masked[line] ?? "", indent))
    ) {
      break;
    }
    if (indent === branchColumn) {
      ranges.push({ start: line, end: line });
      continue;
    }
    const current = ranges[ranges.length - 1];
    if (current) {
      current.end = line;
    }
  }

  return ranges.map(({ start, end }) =>
    buildBranch(masked[start] ?? "", start, end, branchColumn),
  );
}

/** A `where` at or left of the branch column closes the case. */
function startsWithWhere(text: string, indent: number): boolean {
  return /^where(?![A-Za-z0-9_'])/.test(text.slice(indent));
}

function buildBranch(
  text: string,
  startLine: number,
  endLine: number,
  column: number,
): CaseBranch {
  let depth = 0;
  let arrowColumn: number | null = null;
  for (const token of tokenizeChunk(text.slice(column))) {
    if (token.value === "(" || token.value === "[" || token.value === "{") {
      depth += 1;
    } else if (
      token.value === ")" ||
      token.value === "]" ||
      token.value === "}"
    ) {
      depth -= 1;
    } else if (depth === 0 && token.value === "->") {
      arrowColumn = column + token.offset;
      break;
    }
  }

  if (arrowColumn === null) {
    return {
      startLine,
      endLine,
      column,
      arrowColumn: null,
      naturalArrowColumn: null,
      bodyOnArrowLine: false,
    };
  }

  const patternEnd = text.slice(0, arrowColumn).trimEnd().length;
  return {
    startLine,
    endLine,
    column,
    arrowColumn,
    naturalArrowColumn: patternEnd + 1,
    bodyOnArrowLine: text.slice(arrowColumn + 2).trim().length > 0,
  };
}

function tokenizeChunk(text: string): Token[] {
  return Array.from(text.matchAll(TOKEN_PATTERN), (match) => ({
    value: match[0],
    offset: match.index ?? 0,
  }));
}

function findTopLevel(
  tokens: readonly Token[],
  value: string,
  from: number,
): number {
  let depth = 0;
  for (let index = from; index < tokens.length; index += 1) {
    const token = tokens[index];
    if (!token) {
      continue;
    }
    if (token.value === "(" || token.value === "[" || token.value === "{") {
      depth += 1;
    } else if (
      token.value === ")" ||
      token.value === "]" ||
      token.value === "}"
    ) {
      depth -= 1;
    } else if (depth === 0 && token.value === value) {
      return index;
    }
  }
  return -1;
}

function positionOf(chunk: Chunk, offset: number): Position {
  let lineIndex = 0;
  chunk.lineOffsets.forEach((lineOffset, index) => {
    if (lineOffset <= offset) {
      lineIndex = index;
    }
  });
  const lineOffset = chunk.lineOffsets[lineIndex] ?? 0;
  return {
    line: chunk.startLine + lineIndex,
    column: offset - lineOffset,
  };
}

function firstWord(text: string): string | null {
  return IDENTIFIER.exec(text.trimStart())?.[0] ?? null;
}

function skipSpaces(text: string, from: number): number {
  let index = from;
  while (index < text.length && /\s/.test(text.charAt(index))) {
    index += 1;
  }
  return index;
}

function stripParens(text: string): string {
  const trimmed = text.trim();
  if (trimmed.startsWith("(") && trimmed.endsWith(")")) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}
