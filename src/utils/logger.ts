import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";

export interface LoggerOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly color?: boolean;
  /** Defaults to process.stderr; reports go to stdout, never here. */
  readonly write?: (line: string) => void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const icon = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  step: "●",
} as const;

export function createLogger(options: LoggerOptions = {}): Logger {
  const paint: ChalkInstance =
    options.color === false ? new Chalk({ level: 0 }) : chalk;
  const color = {
    secondary: paint.hex("#A1A1AA"),
    success: paint.hex("#10B981"),
    error: paint.hex("#EF4444"),
    warning: paint.hex("#F59E0B"),
  };
  const write =
    options.write ??
    ((line: string): void => {
      process.stderr.write(`${line}\n`);
    });
  const quiet = options.quiet ?? false;
  const verbose = (options.verbose ?? false) && !quiet;

  return {
    debug(message) {
      if (verbose) {
        write(color.secondary(`${icon.step} ${message}`));
      }
    },
    info(message) {
      if (!quiet) {
        write(message);
      }
    },
    success(message) {
      if (!quiet) {
        write(`${color.success(icon.success)} ${message}`);
      }
    },
    warn(message) {
      if (!quiet) {
        write(`${color.warning(icon.warning)} ${message}`);
      }
    },
    error(message) {
      write(`${color.error(icon.error)} ${message}`);
    },
  };
}

export const silentLogger: Logger = createLogger({ quiet: true, write: () => {} });
