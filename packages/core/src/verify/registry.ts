import {
  applyVerification,
  ErrorCodes,
  formatAttributeName,
  type AttributeValue,
  type FatalResult,
  type ManagerCommand,
  type ObjectKind,
  type RejectedResult,
  type RequestKind,
  type VerificationResult,
} from '@batchguard/types';

import type { VerifierConfig } from '../config/config.js';
import { checkDatatype } from '../definitions/datatypes.js';
import type { DefinitionCatalog } from '../definitions/table.js';
import type { VerificationContext, VerificationLogger } from './context.js';
import { runAttributeVerifier, runValueVerifier } from './dispatch.js';
import { DnsHostResolver, type HostResolver } from './host-resolver.js';
import { ErrorReporter } from './reporter.js';
import { accepted, fatal } from './results.js';

export interface CreateVerificationContextOptions {
  request: RequestKind;
  object: ObjectKind;
  command?: ManagerCommand;
  catalog: DefinitionCatalog;
  config: VerifierConfig;
  reporter?: ErrorReporter;
  resolver?: HostResolver;
  logger?: VerificationLogger;
}

const silentLogger: VerificationLogger = {
  debug: () => {},
  warn: () => {},
};

export function createVerificationContext(options: CreateVerificationContextOptions): VerificationContext {
  const context: VerificationContext = {
    request: options.request,
    object: options.object,
    command: options.command ?? 'none',
    catalog: options.catalog,
    config: Object.freeze({ ...options.config }),
    reporter: options.reporter ?? new ErrorReporter(),
    resolver: options.resolver ?? new DnsHostResolver(),
    logger: options.logger ?? silentLogger,
    verifyValue: (kind, attribute) => runValueVerifier(context, kind, attribute),
  };
  return context;
}

/**
 * Verifies one attribute of a request. Attributes missing from the object's
 * table are left to the server and accepted.
 *
 * Never throws: an exception escaping a verifier becomes a fatal result.
 */
export async function verifyAttribute(
  context: VerificationContext,
  attribute: AttributeValue
): Promise<VerificationResult> {
  const definition = context.catalog.attributes[context.object].find(attribute.name);
  if (definition === undefined) {
    context.logger.debug(`${context.object} attribute ${attribute.name} is not defined, accepted unchecked`);
    return accepted();
  }

  const label = formatAttributeName(attribute);

  try {
    if (checkDatatype(definition.datatype, attribute.value) !== ErrorCodes.none) {
      return context.reporter.reject(ErrorCodes.badAttributeValue, [label]);
    }
    if (definition.verifier === 'none') {
      return accepted();
    }

    const result = await runAttributeVerifier(context, definition.verifier, attribute);
    return context.reporter.qualify(result, [label]);
  } catch (error) {
    context.logger.warn(`verifier for ${label} failed: ${error instanceof Error ? error.message : String(error)}`);
    return fatal(error);
  }
}

export type RequestVerification =
  | { ok: true; attributes: AttributeValue[] }
  | { ok: false; index: number; attribute: AttributeValue; result: RejectedResult | FatalResult };

/**
 * Verifies every attribute in order, stopping at the first failure. On
 * success the list carries any rewritten values.
 */
export async function verifyAttributes(
  context: VerificationContext,
  attributes: readonly AttributeValue[]
): Promise<RequestVerification> {
  const verified: AttributeValue[] = [];

  for (const [index, attribute] of attributes.entries()) {
    const result = await verifyAttribute(context, attribute);
    if (result.status !== 'accepted') {
      return { ok: false, index, attribute, result };
    }
    verified.push(applyVerification(attribute, result));
  }

  return { ok: true, attributes: verified };
}
