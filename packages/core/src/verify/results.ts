import { ErrorCodes, errorText, type AcceptedResult, type FatalResult, type RejectedResult, type RejectionCode } from '@batchguard/types';

export function accepted(value?: string): AcceptedResult {
  return value === undefined ? { status: 'accepted' } : { status: 'accepted', value };
}

export function rejected(code: RejectionCode, message?: string): RejectedResult {
  return message === undefined ? { status: 'rejected', code } : { status: 'rejected', code, message };
}

export function badValue(): RejectedResult {
  return rejected(ErrorCodes.badAttributeValue);
}

export function fatal(cause: unknown): FatalResult {
  return {
    status: 'fatal',
    code: ErrorCodes.system,
    message: errorText(ErrorCodes.system),
    cause,
  };
}

export function hasValue(value: string | undefined): value is string {
  return value !== undefined && value.length > 0;
}
