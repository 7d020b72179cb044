import { buildLayout } from "./layout.js";
import { parseModule } from "./module-parser.js";
import { splitSourceLines } from "./source-lines.js";
import { tokenize } from "./tokenizer.js";
import type { ParsedSource } from "./types.js";

/**
 * Extract every structural fact the rules need from one file's content.
 * Throws {@link SourceParseError} when the source cannot be tokenized or its
 * header and imports cannot be read.
 */
export function parseSource(path: string, content: string): ParsedSource {
  const lines = splitSourceLines(content);
  const tokens = tokenize(lines.map((line) => line.text));
  const layout = buildLayout(tokens.masked);
  const facts = parseModule(tokens.masked);
  return {
    path,
    lines,
    tokens,
    layout,
    header: facts.header,
    imports: facts.imports,
    declarations: facts.declarations,
    caseBlocks: facts.caseBlocks,
  };
}
