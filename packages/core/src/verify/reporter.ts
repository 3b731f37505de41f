import { errorText, type RejectionCode, type VerificationResult } from '@batchguard/types';

import { fatal, rejected } from './results.js';

/** Maps an error code to its descriptive text */
export type ErrorTextLookup = (code: RejectionCode) => string | undefined;

/**
 * Turns rejection codes into results carrying a readable message, e.g.
 * `Illegal attribute or resource value Resource_List.ncpus`.
 *
 * A failure while building the message is reported as a fatal system error
 * so it is never mistaken for a user input error.
 */
export class ErrorReporter {
  private readonly lookup: ErrorTextLookup;

  constructor(lookup: ErrorTextLookup = errorText) {
    this.lookup = lookup;
  }

  reject(code: RejectionCode, qualifiers: readonly string[] = []): VerificationResult {
    let message: string | undefined;
    try {
      const text = this.lookup(code);
      if (text !== undefined) {
        message = qualifiers.length > 0 ? `${text} ${qualifiers.join('.')}` : text;
      }
    } catch (error) {
      return fatal(error);
    }

    return rejected(code, message);
  }

  /**
   * Keeps a message an inner verifier already set, otherwise builds one.
   */
  qualify(result: VerificationResult, qualifiers: readonly string[] = []): VerificationResult {
    if (result.status !== 'rejected' || result.message !== undefined) {
      return result;
    }
    return this.reject(result.code, qualifiers);
  }
}
