import { BatchguardError } from "@batchguard/core";

/**
 * Request document that cannot be read or does not describe a request
 */
export class RequestFileError extends BatchguardError {
  /** Request file path */
  readonly source?: string;
  /** Offending field, e.g. `attributes[2].name` */
  readonly path?: string;

  constructor(message: string, options: { source?: string; path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "RequestFileError";
    this.source = options.source;
    this.path = options.path;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}
