import { ErrorCodes } from '@batchguard/types';

import type { DatatypeKind } from './kinds.js';

export type DatatypeCheck = typeof ErrorCodes.none | typeof ErrorCodes.badAttributeValue;

const LONG_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
const SIZE_PATTERN = /^\d+(?:[kmgtp]?[bw]?)$/i;
const SECONDS_PATTERN = /^\d+(?:\.\d+)?$/;
const CLOCK_PATTERN = /^(\d+):(\d{1,2})(?::(\d{1,2}))?(?:\.\d+)?$/;
const BOOLEAN_VALUES = new Set(['true', 'false', 't', 'f', 'yes', 'no', 'y', 'n', '1', '0']);

function isTime(value: string): boolean {
  if (SECONDS_PATTERN.test(value)) {
    return true;
  }

  const match = CLOCK_PATTERN.exec(value);
  if (match === null) {
    return false;
  }

  // the leading field is unbounded, every later one is a sexagesimal digit pair
  const trailing = match[3] === undefined ? [match[2]] : [match[2], match[3]];
  return trailing.every((field) => field !== undefined && Number.parseInt(field, 10) < 60);
}

function passes(kind: DatatypeKind, value: string): boolean {
  switch (kind) {
    case 'none':
      return true;
    case 'long':
      return LONG_PATTERN.test(value) && Number.isSafeInteger(Number(value));
    case 'float':
      return FLOAT_PATTERN.test(value);
    case 'size':
      return SIZE_PATTERN.test(value);
    case 'time':
      return isTime(value);
    case 'boolean':
      return BOOLEAN_VALUES.has(value.toLowerCase());
    case 'string':
      return value.length > 0;
  }
}

/**
 * Checks that `value` is well-formed for `kind`. Runs before any value
 * verifier so those may assume a well-typed input.
 */
export function checkDatatype(kind: DatatypeKind, value: string | undefined): DatatypeCheck {
  if (kind === 'none') {
    return ErrorCodes.none;
  }
  if (value === undefined || value.length === 0) {
    return ErrorCodes.badAttributeValue;
  }

  return passes(kind, value) ? ErrorCodes.none : ErrorCodes.badAttributeValue;
}
