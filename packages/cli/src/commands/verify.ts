/**
 * batchguard verify command
 *
 * Verifies every attribute of a request document and reports each outcome.
 * Attributes are verified independently of one another.
 */

import { Command, Option } from "commander";
import ora from "ora";
import { createVerificationContext, verifyAttribute, type VerificationContext } from "@batchguard/core";
import type { AttributeValue } from "@batchguard/types";
import {
  EXIT_CODES,
  setupGlobalOptions,
  type CommandContext,
  type GlobalOptions,
} from "../context.js";
import { createVerificationLogger, error as logError, getChalk, success } from "../utils/logger.js";
import {
  formatReportLine,
  isOutputFormat,
  OUTPUT_FORMATS,
  reportFailure,
  toAttributeReport,
  type AttributeReport,
  type OutputFormat,
} from "../utils/report.js";
import { readRequestFile, type VerificationRequest } from "../utils/request-file.js";

/**
 * Verify command options
 */
export interface VerifyOptions {
  format: OutputFormat;
}

/**
 * Verify result structure
 */
export interface VerifyResult {
  valid: boolean;
  request: VerificationRequest["request"];
  object: VerificationRequest["object"];
  results: AttributeReport[];
}

export async function verifyRequest(
  request: VerificationRequest,
  context: CommandContext
): Promise<VerifyResult> {
  const verification: VerificationContext = createVerificationContext({
    request: request.request,
    object: request.object,
    command: request.command,
    catalog: context.catalog,
    config: context.config,
    logger: createVerificationLogger(),
  });

  const results: AttributeReport[] = [];
  for (const attribute of request.attributes) {
    results.push(await verifyOne(verification, attribute));
  }

  return {
    valid: results.every((result) => result.status === "accepted"),
    request: request.request,
    object: request.object,
    results,
  };
}

async function verifyOne(verification: VerificationContext, attribute: AttributeValue): Promise<AttributeReport> {
  const result = await verifyAttribute(verification, attribute);
  return toAttributeReport(attribute, result);
}

/**
 * Format output as text
 */
function formatTextOutput(result: VerifyResult, filePath: string): void {
  const c = getChalk();

  console.log();
  console.log(c.bold(`Verifying ${filePath} (${result.request} on ${result.object})`));
  console.log();

  for (const report of result.results) {
    console.log(`  ${formatReportLine(report)}`);
  }
  console.log();

  const failed = result.results.filter((report) => report.status !== "accepted").length;
  if (failed === 0) {
    success(`All ${result.results.length} attribute(s) accepted`);
  } else {
    logError(`${failed} of ${result.results.length} attribute(s) failed verification`);
  }
}

/**
 * Format output as JSON
 */
function formatJsonOutput(result: VerifyResult): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Execute the verify command
 */
async function executeVerifyCommand(filePath: string, options: VerifyOptions, command: Command): Promise<void> {
  const spinner = ora();

  try {
    const context = await setupGlobalOptions(command);
    const request = await readRequestFile(filePath);

    if (options.format === "text") {
      spinner.start(`Verifying ${request.attributes.length} attribute(s)...`);
    }

    const result = await verifyRequest(request, context);

    if (options.format === "text") {
      spinner.stop();
      formatTextOutput(result, filePath);
    } else {
      formatJsonOutput(result);
    }

    if (!result.valid) {
      process.exitCode = EXIT_CODES.VALIDATION_ERROR;
    }
  } catch (err) {
    if (spinner.isSpinning) {
      spinner.fail("Verification failed");
    }
    reportFailure(err, options.format);
  }
}

/**
 * Create the verify command
 *
 * @returns Commander command for 'batchguard verify'
 */
export function createVerifyCommand(): Command {
  const command = new Command("verify")
    .description("Verify the attributes of a batch request file")
    .addHelpText(
      "after",
      `
Examples:
  $ batchguard verify job.yaml                 Verify a job submission
  $ batchguard verify resv.yaml --format json  Output as JSON`
    )
    .argument("<file>", "Request document (YAML)")
    .addOption(
      new Option("--format <format>", "Output format")
        .choices(OUTPUT_FORMATS)
        .default("text")
    )
    .action(async (filePath: string, options: Record<string, unknown>, cmd: Command) => {
      const globals = cmd.optsWithGlobals<GlobalOptions>();
      const verifyOptions: VerifyOptions = {
        format: globals.json === true ? "json" : isOutputFormat(options.format) ? options.format : "text",
      };

      await executeVerifyCommand(filePath, verifyOptions, cmd);
    });

  return command;
}
