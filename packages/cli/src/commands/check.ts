/**
 * batchguard check command
 *
 * Verifies a single attribute given on the command line.
 */

import { Argument, Command, Option } from "commander";
import { createVerificationContext, verifyAttribute } from "@batchguard/core";
import {
  COMPARISON_OPERATORS,
  isComparisonOperator,
  isObjectKind,
  isRequestKind,
  OBJECT_KINDS,
  REQUEST_KINDS,
  type AttributeValue,
  type ObjectKind,
  type RequestKind,
} from "@batchguard/types";
import { EXIT_CODES, setupGlobalOptions, type GlobalOptions } from "../context.js";
import { createVerificationLogger } from "../utils/logger.js";
import {
  formatReportLine,
  isOutputFormat,
  OUTPUT_FORMATS,
  reportFailure,
  toAttributeReport,
  type OutputFormat,
} from "../utils/report.js";

/**
 * Check command options
 */
export interface CheckOptions {
  resource?: string;
  request?: RequestKind;
  operator: AttributeValue["operator"];
  format: OutputFormat;
}

/**
 * Request kind used when --request is not given
 */
export function defaultRequestFor(object: ObjectKind): RequestKind {
  switch (object) {
    case "job":
      return "queueJob";
    case "reservation":
      return "submitResv";
    case "queue":
    case "server":
      return "manager";
  }
}

async function executeCheckCommand(
  object: ObjectKind,
  attribute: AttributeValue,
  options: CheckOptions,
  command: Command
): Promise<void> {
  try {
    const context = await setupGlobalOptions(command);
    const verification = createVerificationContext({
      request: options.request ?? defaultRequestFor(object),
      object,
      catalog: context.catalog,
      config: context.config,
      logger: createVerificationLogger(),
    });

    const report = toAttributeReport(attribute, await verifyAttribute(verification, attribute));

    if (options.format === "json") {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(formatReportLine(report));
    }

    if (report.status !== "accepted") {
      process.exitCode = EXIT_CODES.VALIDATION_ERROR;
    }
  } catch (err) {
    reportFailure(err, options.format);
  }
}

/**
 * Create the check command
 *
 * @returns Commander command for 'batchguard check'
 */
export function createCheckCommand(): Command {
  const command = new Command("check")
    .description("Verify a single attribute value")
    .addHelpText(
      "after",
      `
Examples:
  $ batchguard check job Hold_Types uo
  $ batchguard check job Resource_List 2:ncpus=4 --resource select
  $ batchguard check job Priority 2000 --request selectJobs --operator gt`
    )
    .addArgument(new Argument("<object>", "Object the attribute belongs to").choices(OBJECT_KINDS))
    .argument("<attribute>", "Attribute name")
    .argument("[value]", "Attribute value; omit to check a missing value")
    .addOption(new Option("--resource <name>", "Resource name for resource-valued attributes"))
    .addOption(new Option("--request <kind>", "Request kind (defaults by object)").choices(REQUEST_KINDS))
    .addOption(
      new Option("--operator <op>", "Attribute operator")
        .choices(COMPARISON_OPERATORS)
        .default("set")
    )
    .addOption(
      new Option("--format <format>", "Output format")
        .choices(OUTPUT_FORMATS)
        .default("text")
    )
    .action(
      async (
        object: string,
        name: string,
        value: string | undefined,
        options: Record<string, unknown>,
        cmd: Command
      ) => {
        const globals = cmd.optsWithGlobals<GlobalOptions>();
        const checkOptions: CheckOptions = {
          resource: typeof options.resource === "string" ? options.resource : undefined,
          request: isRequestKind(options.request) ? options.request : undefined,
          operator: isComparisonOperator(options.operator) ? options.operator : "set",
          format: globals.json === true ? "json" : isOutputFormat(options.format) ? options.format : "text",
        };

        if (!isObjectKind(object)) {
          reportFailure(new Error(`Invalid argument: unknown object "${object}"`), checkOptions.format);
          process.exitCode = EXIT_CODES.INVALID_ARGUMENT;
          return;
        }

        const attribute: AttributeValue = { name, operator: checkOptions.operator };
        if (checkOptions.resource !== undefined) {
          attribute.resource = checkOptions.resource;
        }
        if (value !== undefined) {
          attribute.value = value;
        }

        await executeCheckCommand(object, attribute, checkOptions, cmd);
      }
    );

  return command;
}
