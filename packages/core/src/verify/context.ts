import type {
  AttributeValue,
  ManagerCommand,
  ObjectKind,
  RequestKind,
  VerificationResult,
} from '@batchguard/types';

import type { VerifierConfig } from '../config/config.js';
import type { ValueVerifierKind } from '../definitions/kinds.js';
import type { DefinitionCatalog } from '../definitions/table.js';
import type { HostResolver } from './host-resolver.js';
import type { ErrorReporter } from './reporter.js';

export type VerificationLogger = Pick<Console, 'debug' | 'warn'>;

/**
 * Everything a verifier may consult. Built once per request; every field
 * is read-only for the lifetime of the request.
 */
export interface VerificationContext {
  readonly request: RequestKind;
  readonly object: ObjectKind;
  readonly command: ManagerCommand;
  readonly catalog: DefinitionCatalog;
  readonly config: Readonly<VerifierConfig>;
  readonly reporter: ErrorReporter;
  readonly resolver: HostResolver;
  readonly logger: VerificationLogger;
  /** Runs a synchronous value verifier; composite verifiers recurse through it */
  verifyValue(kind: ValueVerifierKind, attribute: AttributeValue): VerificationResult;
}

/** Signature shared by every synchronous verifier */
export type ValueVerifier = (context: VerificationContext, attribute: AttributeValue) => VerificationResult;
