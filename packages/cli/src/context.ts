/**
 * Shared state for command handlers: global options, the resolved verifier
 * configuration and the loaded definition tables
 */
import type { Command } from "commander";
import {
  ConfigError,
  DefinitionError,
  loadDefinitionCatalog,
  resolveVerifierConfig,
  type DefinitionCatalog,
  type VerifierConfig,
} from "@batchguard/core";
import { RequestFileError } from "./errors.js";
import { configureLogger } from "./utils/logger.js";

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Configuration file path */
  config?: string;
  /** Disable color output */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  globalOptions: GlobalOptions;
  config: VerifierConfig;
  catalog: DefinitionCatalog;
}

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  VALIDATION_ERROR: 4,
  USER_INTERRUPT: 130,
} as const;

export function applyGlobalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();

  configureLogger({
    verbose: opts.verbose,
    quiet: opts.quiet,
    noColor: opts.color === false,
    json: opts.json,
  });

  return opts;
}

/**
 * Setup global options before command execution
 */
export async function setupGlobalOptions(command: Command): Promise<CommandContext> {
  const globalOptions = applyGlobalOptions(command);

  const config = await resolveVerifierConfig({ configPath: globalOptions.config });
  const catalog = await loadDefinitionCatalog(config.definitions);

  return { globalOptions, config, catalog };
}

/**
 * Exit code for an error that stopped a command
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof RequestFileError) {
    return EXIT_CODES.INVALID_ARGUMENT;
  }
  if (err instanceof ConfigError || err instanceof DefinitionError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  return EXIT_CODES.GENERAL_ERROR;
}

/**
 * Machine readable name for an error that stopped a command
 */
export function errorCodeFor(err: unknown): string {
  if (err instanceof RequestFileError) {
    return "REQUEST_FILE_ERROR";
  }
  if (err instanceof ConfigError) {
    return "CONFIG_ERROR";
  }
  if (err instanceof DefinitionError) {
    return "DEFINITION_ERROR";
  }
  return "INTERNAL_ERROR";
}
