/**
 * Main CLI setup using Commander.js
 *
 * Creates the main program with global options and registers all command modules
 */
import { Command, Option } from "commander";
import { applyGlobalOptions, EXIT_CODES, exitCodeFor } from "./context.js";
import { createCheckCommand } from "./commands/check.js";
import { createVerifyCommand } from "./commands/verify.js";

export { EXIT_CODES, setupGlobalOptions, type CommandContext, type GlobalOptions } from "./context.js";

/**
 * CLI version - should match package.json
 */
export const CLI_VERSION = "0.1.0";

/**
 * CLI name
 */
export const CLI_NAME = "batchguard";

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Verify batch job, queue and reservation attributes before submission")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ batchguard verify job.yaml              Verify a request document
  $ batchguard check job Hold_Types uo      Verify one attribute
  $ batchguard -c site.yaml verify job.yaml Use a site configuration`
    );

  // Global options
  program
    .addOption(
      new Option("-v, --verbose", "Enable verbose output").default(false)
    )
    .addOption(
      new Option("-q, --quiet", "Minimize output (only errors)").default(false)
    )
    .addOption(
      new Option("-c, --config <path>", "Configuration file path")
    )
    .addOption(
      new Option("--no-color", "Disable color output")
    )
    .addOption(
      new Option("--json", "Output in JSON format").default(false)
    );

  program.hook("preAction", (_program, actionCommand) => {
    applyGlobalOptions(actionCommand);
  });

  program.addCommand(createVerifyCommand());
  program.addCommand(createCheckCommand());

  return program;
}

/**
 * Run the CLI program
 */
export async function run(args?: string[]): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args ?? process.argv);
  } catch (err) {
    if (err instanceof Error) {
      const { error: logError } = await import("./utils/logger.js");
      logError(err.message);
      process.exitCode = exitCodeFor(err);
    } else {
      console.error("Unknown error:", err);
      process.exitCode = EXIT_CODES.GENERAL_ERROR;
    }
  }
}
