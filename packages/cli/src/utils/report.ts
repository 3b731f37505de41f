import {
  formatAttributeName,
  toStatusCode,
  type AttributeValue,
  type VerificationResult,
} from "@batchguard/types";
import { errorCodeFor, exitCodeFor } from "../context.js";
import { error as logError, getChalk } from "./logger.js";

/**
 * Output format types
 */
export type OutputFormat = "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === "text" || value === "json";
}

/**
 * Verification outcome of one attribute as printed by the CLI
 */
export interface AttributeReport {
  attribute: string;
  status: VerificationResult["status"];
  /** 0 accepted, the rejection code, or -1 for a local failure */
  code: number;
  message?: string;
  /** Rewritten value, when the verifier changed it */
  value?: string;
}

export function toAttributeReport(attribute: AttributeValue, result: VerificationResult): AttributeReport {
  const report: AttributeReport = {
    attribute: formatAttributeName(attribute),
    status: result.status,
    code: toStatusCode(result),
  };

  if (result.status === "accepted") {
    if (result.value !== undefined && result.value !== attribute.value) {
      report.value = result.value;
    }
  } else if (result.message !== undefined) {
    report.message = result.message;
  }

  return report;
}

/**
 * One line per attribute: `✓ Output_Path -> host:/path` or
 * `✗ Hold_Types: <message> (15014)`
 */
export function formatReportLine(report: AttributeReport): string {
  const c = getChalk();

  if (report.status === "accepted") {
    const rewrite = report.value === undefined ? "" : ` -> ${report.value}`;
    return `${c.green("✓")} ${report.attribute}${rewrite}`;
  }

  const message = report.message ?? report.status;
  const line = `${report.attribute}: ${message} (${report.code})`;
  return report.status === "fatal" ? `${c.red("!")} ${c.red(line)}` : `${c.red("✗")} ${c.red(line)}`;
}

/**
 * Reports an error that stopped a command and sets the exit code
 */
export function reportFailure(err: unknown, format: OutputFormat): void {
  const message = err instanceof Error ? err.message : String(err);

  if (format === "json") {
    console.log(JSON.stringify({ valid: false, error: { code: errorCodeFor(err), message } }, null, 2));
  } else {
    logError(message);
  }

  process.exitCode = exitCodeFor(err);
}
