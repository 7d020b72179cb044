export { parseSource } from "./source-parser.js";
export { splitSourceLines, toSourceLine } from "./source-lines.js";
export { literalAt, tokenize } from "./tokenizer.js";
export { alignmentAnchors, buildLayout, walkBlocks } from "./layout.js";
export { classifyItem, parseModule } from "./module-parser.js";
export { SourceParseError } from "./errors.js";
export type {
  CaseBlock,
  CaseBranch,
  Declaration,
  ImportDeclaration,
  LayoutBlock,
  ListItem,
  ListItemKind,
  ModuleHeader,
  ParsedSource,
  SourceLine,
  TokenizedSource,
} from "./types.js";
