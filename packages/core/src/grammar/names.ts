export type NameCheck = 'ok' | 'malformed' | 'tooLong';

export const MAX_JOB_NAME_LENGTH = 236;

export const MAX_QUEUE_NAME_LENGTH = 15;

export interface JobNameOptions {
  /** Permit a leading digit */
  allowNumericLead: boolean;
}

/**
 * Job and reservation names: visible ASCII only, no whitespace, and an
 * alphabetic first character unless numeric leads are allowed.
 */
export function checkJobName(value: string, options: JobNameOptions): NameCheck {
  if (value.length === 0) {
    return 'malformed';
  }

  const first = value.charAt(0);
  if (!options.allowNumericLead && !/[A-Za-z]/.test(first)) {
    return 'malformed';
  }
  if (!/^[\x21-\x7e]+$/.test(value)) {
    return 'malformed';
  }
  if (value.length > MAX_JOB_NAME_LENGTH) {
    return 'tooLong';
  }

  return 'ok';
}

export function checkQueueName(value: string): NameCheck {
  if (!/^[A-Za-z][A-Za-z0-9_-]*$/.test(value)) {
    return 'malformed';
  }
  if (value.length > MAX_QUEUE_NAME_LENGTH) {
    return 'tooLong';
  }

  return 'ok';
}
