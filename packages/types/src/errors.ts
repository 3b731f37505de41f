/**
 * Error codes returned by verifiers. `none` means accepted; every other code
 * is a rejection, except `system` which marks a local failure.
 */
export const ErrorCodes = {
  none: 0,
  badHost: 15008,
  system: 15010,
  internal: 15011,
  badAttributeValue: 15014,
  valueOutOfRange: 15052,
  jobNameTooLong: 15093,
  licenseMinBadValue: 15126,
  licenseMaxBadValue: 15127,
  licenseLingerBadValue: 15128,
} as const;

export type ErrorCodeName = keyof typeof ErrorCodes;

export type ErrorCode = (typeof ErrorCodes)[ErrorCodeName];

/** Codes a verifier may reject with. */
export type RejectionCode = Exclude<ErrorCode, typeof ErrorCodes.none | typeof ErrorCodes.system>;

export type ErrorKind = "badValue" | "badHost" | "rangeSpecific" | "systemFailure";

const ERROR_TEXTS: Readonly<Record<ErrorCode, string>> = {
  [ErrorCodes.none]: "No error",
  [ErrorCodes.badHost]: "Access from host not allowed, or unknown host",
  [ErrorCodes.system]: "System error occurred",
  [ErrorCodes.internal]: "Internal server error occurred",
  [ErrorCodes.badAttributeValue]: "Illegal attribute or resource value",
  [ErrorCodes.valueOutOfRange]: "Attribute value out of range",
  [ErrorCodes.jobNameTooLong]: "Job name is too long",
  [ErrorCodes.licenseMinBadValue]: "pbs_license_min is < 0, or > pbs_license_max",
  [ErrorCodes.licenseMaxBadValue]: "pbs_license_max is < 0, or < pbs_license_min",
  [ErrorCodes.licenseLingerBadValue]: "pbs_license_linger_time is <= 0",
};

export function isErrorCode(value: unknown): value is ErrorCode {
  if (typeof value !== "number") {
    return false;
  }

  return Object.values(ErrorCodes).some((code) => code === value);
}

export function errorText(code: number): string | undefined {
  if (!isErrorCode(code)) {
    return undefined;
  }

  return ERROR_TEXTS[code];
}

export function errorCodeName(code: ErrorCode): ErrorCodeName {
  for (const [name, value] of Object.entries(ErrorCodes)) {
    if (value === code && isErrorCodeName(name)) {
      return name;
    }
  }

  return "internal";
}

function isErrorCodeName(value: string): value is ErrorCodeName {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, value);
}

export function errorKindOf(code: ErrorCode): ErrorKind | undefined {
  switch (code) {
    case ErrorCodes.none:
      return undefined;
    case ErrorCodes.badHost:
      return "badHost";
    case ErrorCodes.system:
    case ErrorCodes.internal:
      return "systemFailure";
    case ErrorCodes.valueOutOfRange:
    case ErrorCodes.jobNameTooLong:
    case ErrorCodes.licenseMinBadValue:
    case ErrorCodes.licenseMaxBadValue:
    case ErrorCodes.licenseLingerBadValue:
      return "rangeSpecific";
    case ErrorCodes.badAttributeValue:
      return "badValue";
  }
}
