#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { ConfigError } from "../config/errors.js";
import type { ReportFormat } from "../report/types.js";
import { createLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import {
  runConfigInit,
  runConfigShow,
  runConfigValidate,
} from "./config-command.js";
import { runLintCommand } from "./lint-command.js";
import { runRulesCommand } from "./rules-command.js";
import type { RulesFormat } from "./rules-command.js";

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly color?: boolean;
}

interface CheckCliOptions {
  readonly format: ReportFormat;
  readonly out?: string;
  readonly config?: string;
  readonly categories?: string[];
  readonly diffBase?: string;
  readonly maxViolations?: number;
  readonly advisory: boolean;
  readonly concurrency: number;
}

const EXIT_FATAL = 2;

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("purs-style")
  .description("Style checker for PureScript source files")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Suppress non-essential output")
  .option("--no-color", "Disable colored output")
  .exitOverride();

program
  .command("check")
  .argument("<targets...>", "Files or directories to check")
  .option(
    "--format <format>",
    "Output format (text|json|sarif)",
    parseReportFormat,
    "text",
  )
  .option("--out <file>", "Write report to file")
  .option("--config <path>", "Config file (default: .purs-style.yaml)")
  .option(
    "--categories <list>",
    "Comma-separated rule categories to enable",
    parseList,
  )
  .option("--diff-base <gitref>", "Show only violations new since the merge base")
  .option(
    "--max-violations <number>",
    "Limit violations in text output",
    parsePositiveInteger,
  )
  .option("--no-advisory", "Hide advisory violations")
  .option(
    "--concurrency <number>",
    "Files checked in parallel",
    parsePositiveInteger,
    8,
  )
  .action(async (targets: string[], options: CheckCliOptions) => {
    const logger = createCliLogger();
    await runGuarded(logger, async () => {
      const result = await runLintCommand(
        {
          targets,
          format: options.format,
          out: options.out,
          configPath: options.config,
          categories: options.categories,
          diffBase: options.diffBase,
          maxViolations: options.maxViolations,
          hideAdvisory: !options.advisory,
          concurrency: options.concurrency,
          logger,
        },
        toolVersion,
      );
      if (!options.out) {
        await writeStdout(result.output + "\n");
      }
      const { summary } = result.report;
      logger.debug(
        `${summary.errors} error(s), ${summary.advisories} advisory, ${summary.diagnostics} diagnostic(s)`,
      );
      process.exitCode = result.exitCode;
    });
  });

program
  .command("rules")
  .description("List the rule table")
  .option("--format <format>", "Output format (text|json)", parseRulesFormat, "text")
  .action(async (options: { readonly format: RulesFormat }) => {
    const logger = createCliLogger();
    await runGuarded(logger, async () => {
      await writeStdout(runRulesCommand(options.format) + "\n");
    });
  });

const configCommand = program
  .command("config")
  .description("Create, validate or inspect configuration");

configCommand
  .command("init")
  .option("--out <file>", "Write the default config to file")
  .option("--force", "Overwrite an existing file")
  .action(async (options: { readonly out?: string; readonly force?: boolean }) => {
    const logger = createCliLogger();
    await runGuarded(logger, async () => {
      const output = await runConfigInit(options);
      if (options.out) {
        logger.success(`Config written to ${options.out}`);
      } else {
        await writeStdout(output);
      }
    });
  });

configCommand
  .command("validate")
  .argument("<path>", "Config file to validate")
  .action(async (configPath: string) => {
    const logger = createCliLogger();
    await runGuarded(logger, async () => {
      logger.success(await runConfigValidate(configPath));
    });
  });

configCommand
  .command("show")
  .option("--config <path>", "Config file (default: .purs-style.yaml)")
  .action(async (options: { readonly config?: string }) => {
    const logger = createCliLogger();
    await runGuarded(logger, async () => {
      await writeStdout(await runConfigShow({ configPath: options.config }));
    });
  });

function createCliLogger(): Logger {
  const globals = program.opts<GlobalOptions>();
  return createLogger({
    verbose: globals.verbose,
    quiet: globals.quiet,
    color: globals.color,
  });
}

async function runGuarded(
  logger: Logger,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    if (
      error instanceof Error &&
      !(error instanceof ConfigError) &&
      error.stack
    ) {
      logger.debug(error.stack);
    }
    process.exitCode = EXIT_FATAL;
  }
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (
    typeof json === "object" &&
    json !== null &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}

function parseReportFormat(value: string): ReportFormat {
  if (value === "text" || value === "json" || value === "sarif") {
    return value;
  }
  throw new InvalidArgumentError(`Unsupported format: ${value}`);
}

function parseRulesFormat(value: string): RulesFormat {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new InvalidArgumentError(`Unsupported format: ${value}`);
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

const argv = [...process.argv];
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

try {
  await program.parseAsync(argv);
} catch (error) {
  if (!(error instanceof CommanderError)) {
    throw error;
  }
  // help and version exit 0; usage errors are fatal
  process.exitCode = error.exitCode === 0 ? 0 : EXIT_FATAL;
}
