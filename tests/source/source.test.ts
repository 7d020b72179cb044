import { describe, expect, it } from "vitest";
import { SourceParseError } from "../../src/source/errors.js";
import { alignmentAnchors, buildLayout } from "../../src/source/layout.js";
import { parseSource } from "../../src/source/source-parser.js";
import { splitSourceLines } from "../../src/source/source-lines.js";
import { literalAt, tokenize } from "../../src/source/tokenizer.js";

const WIDGET_MODULE = [
  "module Data.Widget",
  "  ( Widget(..)",
  "  , makeWidget",
  "  , class Render",
  "  ) where",
  "",
  "import Prelude",
  "",
  "import Data.Maybe (Maybe(..), fromMaybe)",
  "import Data.Map as Map",
  "",
  "data Widget = Small | Large Int",
  "",
  "class Render a where",
  "  render :: a -> String",
  "",
  "makeWidget :: Int -> Widget",
  "makeWidget n = case n of",
  "  0 -> Small",
  "  _ -> Large n",
  "",
].join("\n");

describe("source lines", () => {
  it("computes whitespace facts per line", () => {
    const lines = splitSourceLines("a  \n\tb\n");

    expect(lines).toEqual([
      {
        number: 0,
        text: "a  ",
        visibleLength: 1,
        contentEnd: 1,
        leadingWhitespace: "",
        indent: 0,
        hasTrailingWhitespace: true,
        isBlank: false,
      },
      {
        number: 1,
        text: "\tb",
        visibleLength: 2,
        contentEnd: 2,
        leadingWhitespace: "\t",
        indent: 1,
        hasTrailingWhitespace: false,
        isBlank: false,
      },
    ]);
  });

  it("strips carriage returns", () => {
    const lines = splitSourceLines("x = 1\r\ny = 2\r\n");
    expect(lines.map((line) => line.text)).toEqual(["x = 1", "y = 2"]);
  });
});

describe("tokenizer", () => {
  it("masks strings and line comments", () => {
    const result = tokenize(['x = "a -- b" -- note']);

    expect(result.masked).toEqual([`x = ________${" ".repeat(8)}`]);
    expect(result.spans).toEqual([
      { kind: "string", startLine: 0, startColumn: 4, endLine: 0, endColumn: 12 },
      { kind: "comment", startLine: 0, startColumn: 13, endLine: 0, endColumn: 20 },
    ]);
    expect(literalAt(result.spans, 0, 5)).toBe("string");
    expect(literalAt(result.spans, 0, 13)).toBe("comment");
    expect(literalAt(result.spans, 0, 2)).toBeNull();
  });

  it("handles nested block comments", () => {
    const result = tokenize(["{- a {- b -} c -}x"]);

    expect(result.masked).toEqual([`${" ".repeat(17)}x`]);
    expect(result.spans).toEqual([
      { kind: "comment", startLine: 0, startColumn: 0, endLine: 0, endColumn: 17 },
    ]);
  });

  it("follows string gaps across lines", () => {
    const result = tokenize(['s = "ab\\', '   \\cd"']);

    expect(result.masked).toEqual(["s = ____", " ".repeat(7)]);
    expect(result.spans).toEqual([
      { kind: "string", startLine: 0, startColumn: 4, endLine: 1, endColumn: 7 },
    ]);
  });

  it("masks character literals but not primes", () => {
    expect(tokenize(["c = 'x'"]).masked).toEqual(["c = ___"]);
    expect(tokenize(["f' = 1"]).masked).toEqual(["f' = 1"]);
  });

  it("reads a character literal outside the basic plane", () => {
    const result = tokenize(["smile = '😀'"]);

    expect(result.masked).toEqual(["smile = ____"]);
    expect(result.spans).toEqual([
      { kind: "string", startLine: 0, startColumn: 8, endLine: 0, endColumn: 12 },
    ]);
    expect(() => tokenize(["c = 'ab'"])).toThrow("Unterminated character literal");
    expect(
      parseSource("Main.purs", "module Main where\n\nsmile = '😀'\n").declarations,
    ).toEqual([{ kind: "value", name: "smile", line: 2, column: 0 }]);
  });

  it("rejects unterminated literals and unbalanced brackets", () => {
    expect(() => tokenize(['x = "abc'])).toThrow("Unterminated string literal");
    expect(() => tokenize(["{- open"])).toThrow("Unterminated block comment");
    expect(() => tokenize(["f a)"])).toThrow("Unbalanced ')'");

    try {
      tokenize(["f (a"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SourceParseError);
      if (error instanceof SourceParseError) {
        expect(error.message).toBe("Unclosed '('");
        expect(error.line).toBe(0);
        expect(error.column).toBe(2);
      }
    }
  });
});

describe("layout", () => {
  it("builds nested indentation blocks", () => {
    const root = buildLayout([
      "main = do",
      "  log a",
      "  when b do",
      "    log c",
      "",
      "other = 1",
    ]);

    expect(root.endLine).toBe(5);
    expect(root.children).toEqual([
      {
        startLine: 1,
        startColumn: 2,
        endLine: 3,
        headerLine: 0,
        children: [
          {
            startLine: 3,
            startColumn: 4,
            endLine: 3,
            headerLine: 2,
            children: [],
          },
        ],
      },
    ]);
  });

  it("finds alignment anchors after operators and delimiters", () => {
    expect(
      [...alignmentAnchors("foo = bar (baz")].sort((a, b) => a - b),
    ).toEqual([6, 11]);
  });
});

describe("module parser", () => {
  const parsed = parseSource("src/Data/Widget.purs", WIDGET_MODULE);

  it("reads the module header and export list", () => {
    expect(parsed.header?.name).toBe("Data.Widget");
    expect(parsed.header?.line).toBe(0);
    expect(parsed.header?.column).toBe(7);
    expect(parsed.header?.exports?.line).toBe(1);
    expect(parsed.header?.exports?.items).toEqual([
      {
        text: "Widget(..)",
        line: 1,
        column: 4,
        kind: "type",
        name: "Widget",
        constructors: "all",
      },
      {
        text: "makeWidget",
        line: 2,
        column: 4,
        kind: "function",
        name: "makeWidget",
        constructors: null,
      },
      {
        text: "class Render",
        line: 3,
        column: 4,
        kind: "class",
        name: "Render",
        constructors: null,
      },
    ]);
  });

  it("reads import declarations", () => {
    expect(
      parsed.imports.map((declaration) => ({
        moduleName: declaration.moduleName,
        line: declaration.line,
        alias: declaration.alias,
        items: declaration.items?.map((item) => `${item.kind}:${item.name}`) ?? null,
      })),
    ).toEqual([
      { moduleName: "Prelude", line: 6, alias: null, items: null },
      {
        moduleName: "Data.Maybe",
        line: 8,
        alias: null,
        items: ["type:Maybe", "function:fromMaybe"],
      },
      { moduleName: "Data.Map", line: 9, alias: "Map", items: null },
    ]);
  });

  it("collects declarations once per name", () => {
    expect(parsed.declarations).toEqual([
      { kind: "type", name: "Widget", line: 11, column: 5 },
      { kind: "constructor", name: "Small", line: 11, column: 14 },
      { kind: "constructor", name: "Large", line: 11, column: 22 },
      { kind: "type", name: "Render", line: 13, column: 6 },
      { kind: "value", name: "makeWidget", line: 16, column: 0 },
    ]);
  });

  it("finds case blocks and their branches", () => {
    expect(parsed.caseBlocks).toEqual([
      {
        line: 17,
        column: 15,
        lineIndent: 0,
        ofLine: 17,
        branches: [
          {
            startLine: 18,
            endLine: 18,
            column: 2,
            arrowColumn: 4,
            naturalArrowColumn: 4,
            bodyOnArrowLine: true,
          },
          {
            startLine: 19,
            endLine: 19,
            column: 2,
            arrowColumn: 4,
            naturalArrowColumn: 4,
            bodyOnArrowLine: true,
          },
        ],
      },
    ]);
  });

  it("rejects a header without where", () => {
    expect(() => parseSource("Main.purs", "module Main\n\nx = 1\n")).toThrow(
      "Module header is missing 'where'",
    );
  });

  it("rejects an import without a module name", () => {
    expect(() => parseSource("Main.purs", "module Main where\nimport\n")).toThrow(
      "Import declaration is missing a module name",
    );
  });
});
