/**
 * Verifiers for single-valued attributes: numeric bounds, fixed alphabets
 * and enumerations.
 */

import { ErrorCodes, type AttributeValue, type RejectionCode, type VerificationResult } from '@batchguard/types';

import type { VerificationContext } from './context.js';
import { accepted, badValue, hasValue, rejected } from './results.js';

export const PRIORITY_MIN = -1024;
export const PRIORITY_MAX = 1023;

const CHECKPOINT_FLAGS = 'nscwu';
const CHECKPOINT_INTERVAL_PATTERN = /^[cw]=\d+$/;
const HOLD_FLAGS = 'uospn';
const MAIL_POINT_FLAGS = 'abe';
const RESV_MAIL_POINT_FLAGS = 'abec';
const JOB_STATE_FLAGS = 'EHQRTWSUBXFM';

const JOIN_PATH_VALUES = ['oe', 'eo', 'n'];
const KEEP_FILES_VALUES = ['o', 'e', 'oe', 'eo', 'n'];
const SANDBOX_VALUES = ['HOME', 'O_WORKDIR', 'PRIVATE'];
const CREDENTIAL_NAMES = ['DCE/KRB5', 'KRB5', 'Globus', 'PBS/AES'];
const QUEUE_TYPES = ['execution', 'route'];

/**
 * Leading-integer parse: optional sign then digits, anything after is
 * ignored and text with no digits reads as 0.
 */
export function parseLeadingInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function onlyFlags(value: string, flags: string): boolean {
  for (const ch of value) {
    if (!flags.includes(ch)) {
      return false;
    }
  }
  return true;
}

export function verifyPriority(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  const priority = parseLeadingInteger(attribute.value);
  if (priority >= PRIORITY_MIN && priority <= PRIORITY_MAX) {
    return accepted();
  }

  // queries may compare against any number
  return context.request === 'selectJobs' ? accepted() : badValue();
}

function checkInteger(
  attribute: AttributeValue,
  valid: (value: number) => boolean,
  code: RejectionCode = ErrorCodes.badAttributeValue
): VerificationResult {
  if (!hasValue(attribute.value)) {
    return rejected(code);
  }

  return valid(parseLeadingInteger(attribute.value)) ? accepted() : rejected(code);
}

export function verifyZeroOrPositive(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return checkInteger(attribute, (value) => value >= 0);
}

export function verifyNonZeroPositive(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return checkInteger(attribute, (value) => value > 0);
}

export function verifyMinLicenses(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const max = context.config.maxLicenses;
  return checkInteger(attribute, (value) => value >= 0 && value <= max, ErrorCodes.licenseMinBadValue);
}

export function verifyMaxLicenses(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const max = context.config.maxLicenses;
  return checkInteger(attribute, (value) => value >= 0 && value <= max, ErrorCodes.licenseMaxBadValue);
}

export function verifyLicenseLinger(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return checkInteger(attribute, (value) => value > 0, ErrorCodes.licenseLingerBadValue);
}

/**
 * A single flag among `n s c w u`, or an interval `c=<minutes>` /
 * `w=<minutes>`. Queries may only test for `u` with `eq` or `ne`.
 */
export function verifyCheckpoint(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const value = attribute.value;
  if (!hasValue(value)) {
    return badValue();
  }

  if (value.length === 1) {
    if (!CHECKPOINT_FLAGS.includes(value)) {
      return badValue();
    }
    if (
      value === 'u' &&
      context.request === 'selectJobs' &&
      attribute.operator !== 'eq' &&
      attribute.operator !== 'ne'
    ) {
      return badValue();
    }
    return accepted();
  }

  return CHECKPOINT_INTERVAL_PATTERN.test(value) ? accepted() : badValue();
}

/**
 * Hold types `u o s p n`. `n` stands alone; `p` excludes `u o s n`.
 */
export function verifyHold(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const value = attribute.value;
  if (!hasValue(value) || !onlyFlags(value, HOLD_FLAGS)) {
    return badValue();
  }

  if (value.includes('n') && value.length > 1) {
    return badValue();
  }
  if (value.includes('p') && /[uosn]/.test(value)) {
    return badValue();
  }

  return accepted();
}

/**
 * `n`, or any of `a b e` (`a b e c` for reservations). Leading whitespace
 * is dropped and the trimmed value handed back.
 */
export function verifyMailPoints(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (attribute.value === undefined) {
    return badValue();
  }

  const value = attribute.value.trimStart();
  if (value.length === 0) {
    return badValue();
  }

  const flags = context.request === 'submitResv' ? RESV_MAIL_POINT_FLAGS : MAIL_POINT_FLAGS;
  if (value !== 'n' && !onlyFlags(value, flags)) {
    return badValue();
  }

  return value === attribute.value ? accepted() : accepted(value);
}

function oneOf(values: readonly string[], attribute: AttributeValue, caseInsensitive = false): VerificationResult {
  const value = attribute.value;
  if (!hasValue(value)) {
    return badValue();
  }

  const matches = caseInsensitive
    ? values.some((candidate) => candidate.toLowerCase() === value.toLowerCase())
    : values.includes(value);
  return matches ? accepted() : badValue();
}

export function verifyJoinPath(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return oneOf(JOIN_PATH_VALUES, attribute);
}

export function verifyKeepFiles(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return oneOf(KEEP_FILES_VALUES, attribute);
}

export function verifySandbox(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return oneOf(SANDBOX_VALUES, attribute, true);
}

export function verifyCredentialName(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return oneOf(CREDENTIAL_NAMES, attribute);
}

/** Any case-insensitive prefix of `Execution` or `Route` */
export function verifyQueueType(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const value = attribute.value;
  if (!hasValue(value)) {
    return badValue();
  }

  const lowered = value.toLowerCase();
  return QUEUE_TYPES.some((type) => type.startsWith(lowered)) ? accepted() : badValue();
}

export function verifyState(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const value = attribute.value;
  if (value === undefined) {
    return badValue();
  }
  if (value.length === 0) {
    return context.request === 'statusJob' ? accepted() : badValue();
  }

  return onlyFlags(value, JOB_STATE_FLAGS) ? accepted() : badValue();
}
