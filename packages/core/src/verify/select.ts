import type { AttributeValue, VerificationResult } from '@batchguard/types';

import { decodeChunk, splitPlusSpec } from '../grammar/select.js';
import type { VerificationContext } from './context.js';
import { verifyResource } from './resource.js';
import { accepted, badValue, hasValue } from './results.js';

/**
 * Selection specs: `[N:]res=val[:res=val...][+[N:]res=val...]`. Every pair
 * is checked against the resource table, chunks left to right and pairs in
 * order. The first failure wins.
 */
export function verifySelect(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return badValue();
  }

  const chunks = splitPlusSpec(attribute.value);
  if (!chunks.ok) {
    context.logger.debug(`select rejected: ${chunks.reason}`);
    return badValue();
  }

  for (const text of chunks.value) {
    const chunk = decodeChunk(text);
    if (!chunk.ok) {
      context.logger.debug(`select chunk "${text}" rejected: ${chunk.reason}`);
      return badValue();
    }

    for (const { key, value } of chunk.value.resources) {
      const result = verifyResource(context, {
        name: attribute.name,
        resource: key,
        value,
        operator: attribute.operator,
      });
      if (result.status !== 'accepted') {
        return result;
      }
    }
  }

  return accepted();
}
