import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";
import { lintFiles } from "../../src/rules/rule-engine.js";

vi.mock("../../src/source/source-parser.js", async (importOriginal) => {
  const actual =
    await importOriginal<typeof import("../../src/source/source-parser.js")>();
  return {
    ...actual,
    parseSource: (filePath: string, content: string) => {
      if (filePath === "Crash.purs") {
        throw new TypeError("unexpected tokenizer state");
      }
      return actual.parseSource(filePath, content);
    },
  };
});

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "purs-style-failure-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("lintFiles failures", () => {
  it("keeps checking other files when one fails unexpectedly", async () => {
    const crash = path.join(tempDir, "Crash.purs");
    const main = path.join(tempDir, "Main.purs");
    await fs.writeFile(crash, "module Crash where\n", "utf8");
    await fs.writeFile(main, "module Main where\n\nx = 1 \n", "utf8");

    const results = await lintFiles(
      [
        { absolutePath: crash, relativePath: "Crash.purs", sizeBytes: 19 },
        { absolutePath: main, relativePath: "Main.purs", sizeBytes: 25 },
      ],
      DEFAULT_CONFIG,
    );

    expect(results[0]).toEqual({
      path: "Crash.purs",
      violations: [],
      diagnostics: [
        {
          kind: "internal-error",
          path: "Crash.purs",
          message: "unexpected tokenizer state",
        },
      ],
    });
    expect(results[1]?.violations.map((violation) => violation.rule_id)).toEqual([
      "no-trailing-whitespace",
    ]);
  });
});
