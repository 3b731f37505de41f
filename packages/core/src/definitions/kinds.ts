export const DATATYPE_KINDS = ['none', 'long', 'float', 'size', 'time', 'boolean', 'string'] as const;

export type DatatypeKind = (typeof DATATYPE_KINDS)[number];

/**
 * Synchronous value verifiers. These may be named by resource definitions
 * as well as attribute definitions.
 */
export const VALUE_VERIFIER_KINDS = [
  'resource',
  'userList',
  'authorizedUsers',
  'dependList',
  'path',
  'arrayRange',
  'jobName',
  'checkpoint',
  'hold',
  'joinPath',
  'keepFiles',
  'mailPoints',
  'mailUsers',
  'shellPathList',
  'priority',
  'sandbox',
  'stageList',
  'credentialName',
  'zeroOrPositive',
  'nonZeroPositive',
  'minLicenses',
  'maxLicenses',
  'licenseLinger',
  'queueType',
  'state',
  'queueName',
  'select',
  'preemptTargets',
] as const;

export type ValueVerifierKind = (typeof VALUE_VERIFIER_KINDS)[number];

/** Verifiers that resolve host names and therefore run asynchronously */
export const ASYNC_VERIFIER_KINDS = ['managerAcl'] as const;

export type AsyncVerifierKind = (typeof ASYNC_VERIFIER_KINDS)[number];

export type AttributeVerifierKind = ValueVerifierKind | AsyncVerifierKind;

export function isDatatypeKind(value: unknown): value is DatatypeKind {
  return DATATYPE_KINDS.some((kind) => kind === value);
}

export function isValueVerifierKind(value: unknown): value is ValueVerifierKind {
  return VALUE_VERIFIER_KINDS.some((kind) => kind === value);
}

export function isAttributeVerifierKind(value: unknown): value is AttributeVerifierKind {
  return isValueVerifierKind(value) || ASYNC_VERIFIER_KINDS.some((kind) => kind === value);
}
