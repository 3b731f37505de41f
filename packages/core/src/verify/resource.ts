import { type AttributeValue, ErrorCodes, type VerificationResult } from '@batchguard/types';

import { checkDatatype } from '../definitions/datatypes.js';
import { isValueVerifierKind } from '../definitions/kinds.js';
import type { AttributeDefinition } from '../definitions/table.js';
import type { VerificationContext } from './context.js';
import { accepted, badValue, hasValue, rejected } from './results.js';

/**
 * Datatype first, then the definition's value verifier. Value verifiers may
 * therefore assume a well-typed input.
 *
 * Only synchronous verifiers can run here; a definition naming an
 * asynchronous one is a broken table and is rejected as an internal error.
 */
export function checkDefinition(
  context: VerificationContext,
  definition: AttributeDefinition,
  attribute: AttributeValue
): VerificationResult {
  if (checkDatatype(definition.datatype, attribute.value) !== ErrorCodes.none) {
    return badValue();
  }

  const verifier = definition.verifier;
  if (verifier === 'none') {
    return accepted();
  }
  if (!isValueVerifierKind(verifier)) {
    context.logger.warn(`verifier "${verifier}" cannot run inside a resource check (${definition.name})`);
    return rejected(ErrorCodes.internal);
  }

  return context.verifyValue(verifier, attribute);
}

/**
 * Verifies `attribute.value` against the resource named by
 * `attribute.resource`. Resources missing from the table are custom
 * resources and are left to the server.
 */
export function verifyResource(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  const resource = attribute.resource;
  if (!hasValue(resource)) {
    return accepted();
  }

  const definition = context.catalog.resources.find(resource);
  if (definition === undefined) {
    context.logger.debug(`custom resource ${attribute.name}.${resource} accepted without checks`);
    return accepted();
  }

  const result = checkDefinition(context, definition, attribute);
  return context.reporter.qualify(result, [attribute.name, resource]);
}
