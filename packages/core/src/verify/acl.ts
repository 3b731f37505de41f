import { ErrorCodes, type AttributeValue, type VerificationResult } from '@batchguard/types';

import type { VerificationContext } from './context.js';
import { accepted, badValue, hasValue, rejected } from './results.js';

/**
 * Manager and operator lists: `user@host[,user@host...]`. Each host must
 * already be fully qualified, i.e. resolve to itself; `*` prefixed hosts
 * are wildcards and are not resolved.
 */
export async function verifyManagerAcl(
  context: VerificationContext,
  attribute: AttributeValue
): Promise<VerificationResult> {
  if (!hasValue(attribute.value)) {
    return badValue();
  }
  if (!context.config.aclHostCheck) {
    return accepted();
  }

  for (const rawEntry of attribute.value.split(',')) {
    const entry = rawEntry.trim();
    const at = entry.indexOf('@');
    if (at === -1) {
      return rejected(ErrorCodes.badHost);
    }

    const host = entry.slice(at + 1);
    if (host.length === 0) {
      return rejected(ErrorCodes.badHost);
    }
    if (host.startsWith('*')) {
      continue;
    }

    let resolved: string;
    try {
      resolved = await context.resolver.resolveFullHostname(host);
    } catch (error) {
      context.logger.warn(`cannot resolve ${host}: ${error instanceof Error ? error.message : String(error)}`);
      return rejected(ErrorCodes.badHost);
    }

    if (resolved.toLowerCase() !== host.toLowerCase()) {
      context.logger.debug(`${host} resolves to ${resolved}`);
      return rejected(ErrorCodes.badHost);
    }
  }

  return accepted();
}
