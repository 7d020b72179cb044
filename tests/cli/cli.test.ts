import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  runConfigInit,
  runConfigShow,
  runConfigValidate,
} from "../../src/cli/config-command.js";
import { runLintCommand } from "../../src/cli/lint-command.js";
import { runRulesCommand } from "../../src/cli/rules-command.js";
import { ConfigError } from "../../src/config/errors.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.realpath(
    await fs.mkdtemp(path.join(os.tmpdir(), "purs-style-cli-")),
  );
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

async function writeSource(relativePath: string, content: string): Promise<void> {
  const target = path.join(tempDir, relativePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, "utf8");
}

describe("check command", () => {
  it("reports violations as JSON with 1-based locations", async () => {
    await writeSource("src/Main.purs", "module Main where\n\nx = 1 \n");

    const result = await runLintCommand(
      { targets: ["src"], format: "json", cwd: tempDir },
      "0.1.0",
    );

    const parsed: unknown = JSON.parse(result.output);
    expect(parsed).toMatchObject({
      tool: { name: "purs-style", version: "0.1.0" },
      summary: { files_checked: 1, errors: 1 },
      files: [
        {
          path: "src/Main.purs",
          violations: [
            { rule_id: "no-trailing-whitespace", line: 3, column: 6 },
          ],
        },
      ],
      metadata: { config_source: null },
    });
    expect(result.exitCode).toBe(1);
  });

  it("exits cleanly when nothing is wrong", async () => {
    await writeSource("src/Main.purs", "module Main where\n\nx = 1\n");

    const result = await runLintCommand(
      { targets: ["src"], format: "text", cwd: tempDir },
      "0.1.0",
    );

    expect(result.exitCode).toBe(0);
    expect(result.output.endsWith("\n\nNo violations found.")).toBe(true);
  });

  it("does not fail on advisories alone", async () => {
    await writeSource("src/Data/Strings.purs", "module Data.Strings where\n");

    const result = await runLintCommand(
      { targets: ["src"], format: "json", cwd: tempDir },
      "0.1.0",
    );

    expect(result.report.summary.advisories).toBe(1);
    expect(result.exitCode).toBe(0);

    const hidden = await runLintCommand(
      { targets: ["src"], format: "json", cwd: tempDir, hideAdvisory: true },
      "0.1.0",
    );
    expect(hidden.report.summary.advisories).toBe(0);
    expect(hidden.report.metadata.advisories_hidden).toBe(1);
  });

  it("restricts rules to the requested categories", async () => {
    await writeSource("src/Main.purs", "module Main where\n\nbad_name = 1 \n");

    const result = await runLintCommand(
      {
        targets: ["src"],
        format: "json",
        cwd: tempDir,
        categories: ["naming"],
      },
      "0.1.0",
    );

    expect(
      result.report.files[0]?.violations.map((violation) => violation.rule_id),
    ).toEqual(["value-name-case"]);
    expect(result.report.metadata.rules_enabled).toEqual([
      "value-name-case",
      "type-name-case",
      "acronym-case",
      "module-name-plural",
    ]);
  });

  it("reports unparseable files and missing targets as diagnostics", async () => {
    await writeSource("src/Broken.purs", "module Broken\n");

    const result = await runLintCommand(
      { targets: ["src", "lib"], format: "json", cwd: tempDir },
      "0.1.0",
    );

    expect(result.exitCode).toBe(1);
    expect(result.report.summary.diagnostics).toBe(2);
    expect(
      result.report.files.map((file) => [
        file.path,
        file.diagnostics[0]?.kind,
      ]),
    ).toEqual([
      ["lib", "io-error"],
      ["src/Broken.purs", "parse-error"],
    ]);
  });

  it("writes the report to a file", async () => {
    await writeSource("src/Main.purs", "module Main where\n");
    const out = path.join(tempDir, "report.sarif");

    const result = await runLintCommand(
      { targets: ["src"], format: "sarif", cwd: tempDir, out },
      "0.1.0",
    );

    await expect(fs.readFile(out, "utf8")).resolves.toBe(`${result.output}\n`);
  });

  it("rejects an invalid configuration", async () => {
    await writeSource(".purs-style.yaml", "indentSize: 0\n");
    await writeSource("src/Main.purs", "module Main where\n");

    await expect(
      runLintCommand({ targets: ["src"], format: "json", cwd: tempDir }, "0.1.0"),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("shows only new violations with diff-base", async () => {
    const git = simpleGit({ baseDir: tempDir });
    await git.init();
    await git.addConfig("user.name", "Purs Style Test");
    await git.addConfig("user.email", "test@example.com");

    await writeSource("src/Main.purs", "module Main where\n\nx = 1 \n");
    await git.add(["."]);
    await git.commit("base");

    await writeSource(
      "src/Main.purs",
      "module Main where\n\n-- shifted\nx = 1 \n\nbad_name = 2\n",
    );
    await git.add(["."]);
    await git.commit("head");

    const result = await runLintCommand(
      { targets: ["src"], format: "json", cwd: tempDir, diffBase: "HEAD~1" },
      "0.1.0",
    );

    expect(
      result.report.files[0]?.violations.map((violation) => violation.rule_id),
    ).toEqual(["value-name-case"]);
    expect(result.report.metadata.diff_base).toBe("HEAD~1");
  });

  it("requires a repository for diff-base", async () => {
    await writeSource("src/Main.purs", "module Main where\n");

    await expect(
      runLintCommand(
        { targets: ["src"], format: "json", cwd: tempDir, diffBase: "main" },
        "0.1.0",
      ),
    ).rejects.toThrow("diff-base requires a git repository working directory");
  });
});

describe("rules command", () => {
  it("lists every rule as JSON", () => {
    const parsed: unknown = JSON.parse(runRulesCommand("json"));

    expect(parsed).toHaveLength(17);
    expect(parsed).toEqual(
      expect.arrayContaining([
        {
          id: "max-line-length",
          category: "formatting",
          severity: "error",
          scope: "line",
          description: "Lines must not exceed the configured maximum length",
        },
      ]),
    );
  });

  it("renders a text table", () => {
    const lines = runRulesCommand("text").split("\n");

    expect(lines[1]).toMatch(/^\| Rule +\| Category +\| Severity +\| Description +\|$/);
    expect(lines).toHaveLength(17 + 4);
  });
});

describe("config commands", () => {
  it("writes the default config and refuses to overwrite it", async () => {
    const out = path.join(tempDir, "conf", ".purs-style.yaml");

    const output = await runConfigInit({ out });

    await expect(fs.readFile(out, "utf8")).resolves.toBe(output);
    await expect(runConfigInit({ out })).rejects.toThrow(
      `Refusing to overwrite ${out}. Pass --force to replace it.`,
    );
    await expect(runConfigInit({ out, force: true })).resolves.toBe(output);
  });

  it("validates config files", async () => {
    const good = path.join(tempDir, "good.yaml");
    const bad = path.join(tempDir, "bad.yaml");
    await fs.writeFile(good, "maxLineLength: 100\n", "utf8");
    await fs.writeFile(bad, "maxLineLength: none\n", "utf8");

    await expect(runConfigValidate(good)).resolves.toBe(
      `Configuration is valid: ${good}`,
    );
    await expect(runConfigValidate(bad)).rejects.toThrow(
      `Invalid configuration in ${bad}: maxLineLength must be an integer between 1 and 1000`,
    );
    await expect(
      runConfigValidate(path.join(tempDir, "missing.yaml")),
    ).rejects.toThrow("Config file not found");
  });

  it("shows the effective config and its source", async () => {
    const defaults = await runConfigShow({ cwd: tempDir });
    expect(defaults.startsWith("# source: defaults\nmaxLineLength: 80\n")).toBe(
      true,
    );

    await writeSource(".purs-style.yaml", "maxLineLength: 120\n");
    const fromFile = await runConfigShow({ cwd: tempDir });
    expect(fromFile).toContain(
      `# source: ${path.join(tempDir, ".purs-style.yaml")}\n`,
    );
    expect(fromFile).toContain("maxLineLength: 120\n");
  });
});
