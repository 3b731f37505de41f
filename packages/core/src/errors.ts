/**
 * Library-level errors. Verification outcomes are never thrown; these cover
 * broken definition tables and configuration.
 */

/**
 * Base class for errors raised by batchguard
 */
export class BatchguardError extends Error {
  readonly errorCause?: unknown;
  /** Hint for the operator on how to fix the problem */
  readonly suggestion?: string;

  constructor(message: string, options?: { cause?: unknown; suggestion?: string }) {
    super(message);
    this.name = 'BatchguardError';
    if (options?.cause) {
      this.errorCause = options.cause;
    }
    this.suggestion = options?.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface DefinitionErrorOptions {
  cause?: unknown;
  /** Definition file path */
  source?: string;
  /** Table or entry the error refers to, e.g. `resources.ncpus` */
  path?: string;
  line?: number;
  column?: number;
  suggestion?: string;
}

/**
 * Malformed resource or attribute definition table
 */
export class DefinitionError extends BatchguardError {
  readonly source?: string;
  readonly path?: string;
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, options: DefinitionErrorOptions = {}) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'DefinitionError';
    this.source = options.source;
    this.path = options.path;
    this.line = options.line;
    this.column = options.column;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ConfigErrorOptions {
  cause?: unknown;
  /** Config file path */
  source?: string;
  /** Offending key */
  key?: string;
  suggestion?: string;
}

/**
 * Unreadable or invalid verifier configuration
 */
export class ConfigError extends BatchguardError {
  readonly source?: string;
  readonly key?: string;

  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'ConfigError';
    this.source = options.source;
    this.key = options.key;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isBatchguardError(value: unknown): value is BatchguardError {
  return value instanceof BatchguardError;
}
