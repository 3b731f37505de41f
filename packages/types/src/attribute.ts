import { isPlainObject } from "./guards.js";
import type { ComparisonOperator } from "./request.js";
import { isComparisonOperator } from "./request.js";

export interface AttributeValue {
  /** Attribute name, e.g. `Resource_List` or `Hold_Types` */
  name: string;
  /** Resource name for resource-valued attributes (`Resource_List.ncpus`) */
  resource?: string;
  /** Raw value as decoded from the request; absent when the request omitted it */
  value?: string;
  operator: ComparisonOperator;
}

export function isAttributeValue(value: unknown): value is AttributeValue {
  if (!isPlainObject(value)) {
    return false;
  }

  if (typeof value.name !== "string" || value.name.length === 0) {
    return false;
  }

  if (value.resource !== undefined && typeof value.resource !== "string") {
    return false;
  }

  if (value.value !== undefined && typeof value.value !== "string") {
    return false;
  }

  return isComparisonOperator(value.operator);
}

/**
 * `Resource_List.ncpus` for resource attributes, the bare name otherwise.
 */
export function formatAttributeName(attribute: Pick<AttributeValue, "name" | "resource">): string {
  if (attribute.resource === undefined || attribute.resource.length === 0) {
    return attribute.name;
  }

  return `${attribute.name}.${attribute.resource}`;
}
