import type { AttributeValue } from "./attribute.js";
import type { RejectionCode } from "./errors.js";
import { ErrorCodes, isErrorCode } from "./errors.js";
import { isPlainObject } from "./guards.js";

export interface AcceptedResult {
  status: "accepted";
  /** Replacement value when the verifier expanded or normalised the input */
  value?: string;
}

export interface RejectedResult {
  status: "rejected";
  code: RejectionCode;
  message?: string;
}

export interface FatalResult {
  status: "fatal";
  code: typeof ErrorCodes.system;
  message?: string;
  cause?: unknown;
}

export type VerificationResult = AcceptedResult | RejectedResult | FatalResult;

export function isVerificationResult(value: unknown): value is VerificationResult {
  if (!isPlainObject(value)) {
    return false;
  }

  if (value.message !== undefined && typeof value.message !== "string") {
    return false;
  }

  switch (value.status) {
    case "accepted":
      return value.value === undefined || typeof value.value === "string";
    case "rejected":
      return isErrorCode(value.code) && value.code !== ErrorCodes.none && value.code !== ErrorCodes.system;
    case "fatal":
      return value.code === ErrorCodes.system;
    default:
      return false;
  }
}

/**
 * Integer form of a result: 0 accepted, the rejection code, or -1 for a
 * local failure.
 */
export function toStatusCode(result: VerificationResult): number {
  switch (result.status) {
    case "accepted":
      return ErrorCodes.none;
    case "rejected":
      return result.code;
    case "fatal":
      return -1;
  }
}

/**
 * Returns the attribute the caller should forward: the original on
 * rejection, or a copy carrying the rewritten value on acceptance.
 */
export function applyVerification(attribute: AttributeValue, result: VerificationResult): AttributeValue {
  if (result.status !== "accepted" || result.value === undefined || result.value === attribute.value) {
    return attribute;
  }

  return { ...attribute, value: result.value };
}
