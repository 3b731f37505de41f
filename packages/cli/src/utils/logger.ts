/**
 * CLI diagnostics
 *
 * Respects --verbose, --quiet, --no-color and --json. Verification reports
 * themselves are printed by the commands; this module carries status lines
 * and verifier diagnostics.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { VerificationLogger } from "@batchguard/core";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Show verifier debug lines */
  verbose?: boolean;
  /** Only errors */
  quiet?: boolean;
  noColor?: boolean;
  /** One JSON object per line on stdout */
  json?: boolean;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
}

let options: LoggerOptions = {
  verbose: false,
  quiet: false,
  noColor: false,
  json: false,
};

const plainChalk = new Chalk({ level: 0 });

export function getChalk(): ChalkInstance {
  return options.noColor ? plainChalk : chalk;
}

function shouldOutput(level: LogLevel): boolean {
  if (options.quiet) {
    return level === "error";
  }
  return level !== "debug" || options.verbose === true;
}

function formatTextMessage(level: LogLevel, message: string): string {
  const c = getChalk();

  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return `${c.green("✓")} ${message}`;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function outputLog(level: LogLevel, message: string): void {
  if (!shouldOutput(level)) {
    return;
  }

  if (options.json) {
    const entry: JsonLogEntry = { level, message, timestamp: new Date().toISOString() };
    process.stdout.write(`${JSON.stringify(entry)}\n`);
    return;
  }

  const line = `${formatTextMessage(level, message)}\n`;
  if (level === "error" || level === "warn") {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
}

export function debug(message: string): void {
  outputLog("debug", message);
}

export function warn(message: string): void {
  outputLog("warn", message);
}

export function error(message: string): void {
  outputLog("error", message);
}

/** Info line with a green check mark */
export function success(message: string): void {
  outputLog("info", message);
}

export function configureLogger(next: LoggerOptions): void {
  options = { ...options, ...next };
}

export function getLoggerOptions(): Readonly<LoggerOptions> {
  return { ...options };
}

/**
 * Routes verifier diagnostics through the CLI logger; debug lines appear
 * with --verbose only
 */
export function createVerificationLogger(): VerificationLogger {
  return { debug, warn };
}
