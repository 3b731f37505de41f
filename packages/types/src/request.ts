import { isOneOf } from "./guards.js";

/**
 * Batch request being admitted. Verifier policy differs between submit,
 * modify and query style requests.
 */
export const REQUEST_KINDS = [
  "queueJob",
  "modifyJob",
  "selectJobs",
  "statusJob",
  "submitResv",
  "modifyResv",
  "manager",
  "statusQueue",
  "statusServer",
  "statusResv",
] as const;

export type RequestKind = (typeof REQUEST_KINDS)[number];

/** Entity the attribute belongs to. */
export const OBJECT_KINDS = ["job", "queue", "reservation", "server"] as const;

export type ObjectKind = (typeof OBJECT_KINDS)[number];

/** Manager sub-command carried by a `manager` request. */
export const MANAGER_COMMANDS = [
  "none",
  "create",
  "delete",
  "set",
  "unset",
  "list",
  "print",
  "active",
  "import",
  "export",
] as const;

export type ManagerCommand = (typeof MANAGER_COMMANDS)[number];

/**
 * Operator attached to an attribute. Only query requests (`selectJobs`)
 * use the comparison forms.
 */
export const COMPARISON_OPERATORS = [
  "set",
  "unset",
  "incr",
  "decr",
  "eq",
  "ne",
  "ge",
  "gt",
  "le",
  "lt",
  "default",
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export function isRequestKind(value: unknown): value is RequestKind {
  return isOneOf(REQUEST_KINDS, value);
}

export function isObjectKind(value: unknown): value is ObjectKind {
  return isOneOf(OBJECT_KINDS, value);
}

export function isManagerCommand(value: unknown): value is ManagerCommand {
  return isOneOf(MANAGER_COMMANDS, value);
}

export function isComparisonOperator(value: unknown): value is ComparisonOperator {
  return isOneOf(COMPARISON_OPERATORS, value);
}
