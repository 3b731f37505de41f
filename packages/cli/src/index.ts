/**
 * batchguard CLI
 *
 * @packageDocumentation
 */

export { createProgram, run, CLI_NAME, CLI_VERSION } from "./cli.js";
export { EXIT_CODES, setupGlobalOptions, type CommandContext, type GlobalOptions } from "./context.js";
export { RequestFileError } from "./errors.js";
export * from "./commands/index.js";
export * from "./utils/index.js";
