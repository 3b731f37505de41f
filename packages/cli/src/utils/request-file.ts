/**
 * Request documents read by `batchguard verify`
 *
 * ```yaml
 * request: queueJob
 * object: job
 * attributes:
 *   - name: Resource_List
 *     resource: select
 *     value: "2:ncpus=4:mem=8gb"
 * ```
 */
import { readFile } from "node:fs/promises";
import { parseDocument } from "yaml";
import {
  isComparisonOperator,
  isManagerCommand,
  isObjectKind,
  isPlainObject,
  isRequestKind,
  type AttributeValue,
  type ManagerCommand,
  type ObjectKind,
  type RequestKind,
} from "@batchguard/types";
import { RequestFileError } from "../errors.js";

export interface VerificationRequest {
  request: RequestKind;
  object: ObjectKind;
  command: ManagerCommand;
  attributes: AttributeValue[];
}

/**
 * Scalars YAML may have typed for us (`Priority: 10`) are read back as text
 */
function readValue(value: unknown, path: string, source: string | undefined): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  throw new RequestFileError(`${path} must be a scalar`, { source, path });
}

function readAttribute(raw: unknown, index: number, source: string | undefined): AttributeValue {
  const path = `attributes[${index}]`;
  if (!isPlainObject(raw)) {
    throw new RequestFileError(`${path} must be a mapping`, { source, path });
  }

  if (typeof raw.name !== "string" || raw.name.length === 0) {
    throw new RequestFileError(`${path}.name is required`, { source, path: `${path}.name` });
  }

  const attribute: AttributeValue = { name: raw.name, operator: "set" };

  if (raw.resource !== undefined) {
    if (typeof raw.resource !== "string") {
      throw new RequestFileError(`${path}.resource must be a string`, { source, path: `${path}.resource` });
    }
    attribute.resource = raw.resource;
  }

  const value = readValue(raw.value, `${path}.value`, source);
  if (value !== undefined) {
    attribute.value = value;
  }

  if (raw.operator !== undefined) {
    if (!isComparisonOperator(raw.operator)) {
      throw new RequestFileError(`${path}.operator "${String(raw.operator)}" is not a known operator`, {
        source,
        path: `${path}.operator`,
      });
    }
    attribute.operator = raw.operator;
  }

  return attribute;
}

export function parseRequestDocument(content: string, source?: string): VerificationRequest {
  const doc = parseDocument(content);
  const firstError = doc.errors[0];
  if (firstError) {
    throw new RequestFileError(firstError.message, { source, cause: firstError });
  }

  const parsed: unknown = doc.toJS();
  if (!isPlainObject(parsed)) {
    throw new RequestFileError("Request document must be a mapping", { source });
  }

  if (!isRequestKind(parsed.request)) {
    throw new RequestFileError(`Unknown request kind "${String(parsed.request)}"`, { source, path: "request" });
  }
  if (!isObjectKind(parsed.object)) {
    throw new RequestFileError(`Unknown object kind "${String(parsed.object)}"`, { source, path: "object" });
  }

  const command = parsed.command ?? "none";
  if (!isManagerCommand(command)) {
    throw new RequestFileError(`Unknown manager command "${String(command)}"`, { source, path: "command" });
  }

  if (!Array.isArray(parsed.attributes)) {
    throw new RequestFileError("attributes must be a list", { source, path: "attributes" });
  }

  const attributes: AttributeValue[] = [];
  for (const [index, raw] of parsed.attributes.entries()) {
    attributes.push(readAttribute(raw, index, source));
  }

  return {
    request: parsed.request,
    object: parsed.object,
    command,
    attributes,
  };
}

export async function readRequestFile(filePath: string): Promise<VerificationRequest> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new RequestFileError(`Cannot read request file: ${filePath}`, { source: filePath, cause: err });
  }

  return parseRequestDocument(content, filePath);
}
