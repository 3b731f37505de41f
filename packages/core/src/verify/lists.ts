/**
 * Verifiers backed by the grammar parsers: user and host lists, paths,
 * dependencies, staging, ranges and names. `dependList` and `path` hand
 * back the expanded value.
 */

import { ErrorCodes, type AttributeValue, type RequestKind, type VerificationResult } from '@batchguard/types';

import { parseAtList, type AtListOptions } from '../grammar/at-list.js';
import { parseDependList } from '../grammar/depend.js';
import { checkJobName, checkQueueName } from '../grammar/names.js';
import { normalizePath } from '../grammar/path.js';
import { checkRange } from '../grammar/range.js';
import { parseStageList } from '../grammar/stage.js';
import type { VerificationContext } from './context.js';
import { accepted, badValue, hasValue, rejected } from './results.js';

const NUMERIC_LEAD_REQUESTS: readonly RequestKind[] = ['queueJob', 'modifyJob', 'submitResv', 'selectJobs'];
const EMPTY_NAME_REQUESTS: readonly RequestKind[] = ['statusJob', 'selectJobs'];

function atList(attribute: AttributeValue, options: AtListOptions): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  return parseAtList(attribute.value, options).ok ? accepted() : badValue();
}

/** `user[@host]` list; queries may name a host more than once */
export function verifyUserList(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return atList(attribute, { uniqueHosts: context.request !== 'selectJobs', absolutePath: false });
}

export function verifyAuthorizedUsers(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return atList(attribute, { uniqueHosts: false, absolutePath: false });
}

export function verifyMailUsers(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return atList(attribute, { uniqueHosts: false, absolutePath: false });
}

export function verifyShellPathList(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  return atList(attribute, { uniqueHosts: true, absolutePath: true });
}

export function verifyStageList(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  return parseStageList(attribute.value).ok ? accepted() : badValue();
}

export function verifyDependList(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  const outcome = parseDependList(attribute.value, { defaultServer: context.config.defaultServer });
  if (!outcome.ok) {
    context.logger.debug(`depend rejected: ${outcome.reason}`);
    return badValue();
  }

  return accepted(outcome.value);
}

export function verifyPath(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  const outcome = normalizePath(attribute.value, {
    host: context.config.submitHost,
    workingDirectory: context.config.workingDirectory,
  });
  if (!outcome.ok) {
    context.logger.debug(`${attribute.name} rejected: ${outcome.reason}`);
    return badValue();
  }

  return accepted(outcome.value);
}

export function verifyArrayRange(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  switch (checkRange(attribute.value)) {
    case 'ok':
      return accepted();
    case 'malformed':
      return badValue();
    case 'outOfRange':
      return rejected(ErrorCodes.valueOutOfRange);
  }
}

/**
 * Job and reservation names. Status and select requests may pass an empty
 * name; submit, modify and select requests may start one with a digit.
 */
export function verifyJobName(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const value = attribute.value;
  if (value === undefined) {
    return badValue();
  }
  if (value.length === 0) {
    return EMPTY_NAME_REQUESTS.includes(context.request) ? accepted() : badValue();
  }

  const check = checkJobName(value, { allowNumericLead: NUMERIC_LEAD_REQUESTS.includes(context.request) });
  switch (check) {
    case 'ok':
      return accepted();
    case 'malformed':
      return badValue();
    case 'tooLong':
      return rejected(ErrorCodes.jobNameTooLong);
  }
}

export function verifyQueueName(_context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  return checkQueueName(attribute.value) === 'ok' ? accepted() : badValue();
}
