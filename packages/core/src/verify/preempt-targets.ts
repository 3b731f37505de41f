import { ErrorCodes, type AttributeValue, type VerificationResult } from '@batchguard/types';

import type { AttributeDefinition, DefinitionCatalog, DefinitionTable } from '../definitions/table.js';
import type { AttributeVerifierKind } from '../definitions/kinds.js';
import type { VerificationContext } from './context.js';
import { checkDefinition } from './resource.js';
import { accepted, hasValue } from './results.js';

/**
 * Attribute namespace a preemption target may refer to.
 */
export interface TargetNamespace {
  readonly keyword: string;
  /** Match the keyword case-insensitively and read the entry from a lower-cased copy */
  readonly caseFold: boolean;
  /** `Keyword.name=value` instead of `keyword=value` */
  readonly requiresDot: boolean;
  readonly table: (catalog: DefinitionCatalog) => DefinitionTable<AttributeVerifierKind>;
}

/** Scanned in this order */
export const TARGET_NAMESPACES: readonly TargetNamespace[] = [
  {
    keyword: 'Resource_List',
    caseFold: false,
    requiresDot: true,
    table: (catalog) => catalog.resources,
  },
  {
    keyword: 'queue',
    caseFold: true,
    requiresDot: false,
    table: (catalog) => catalog.attributes.reservation,
  },
];

const NO_TARGETS = 'none';

interface TargetEntry {
  /** Where the keyword match starts */
  start: number;
  /** End of the keyword (past the dot when one is required) */
  nameStart: number;
  name: string;
  value: string;
  /** Index of the terminating comma, or the input length */
  end: number;
}

type ScanStep = { kind: 'done' } | { kind: 'malformed' } | { kind: 'entry'; entry: TargetEntry };

function nextEntry(text: string, namespace: TargetNamespace, keyword: string, from: number): ScanStep {
  const start = text.indexOf(keyword, from);
  if (start === -1) {
    return { kind: 'done' };
  }

  let nameStart = start + keyword.length;
  if (namespace.requiresDot) {
    if (text.charAt(nameStart) !== '.') {
      return { kind: 'malformed' };
    }
    nameStart += 1;
  }

  const comma = text.indexOf(',', nameStart);
  const end = comma === -1 ? text.length : comma;
  const equals = text.indexOf('=', nameStart);
  if (equals === -1 || equals > end) {
    return { kind: 'malformed' };
  }

  const name = (namespace.requiresDot ? text.slice(nameStart, equals) : text.slice(start, equals)).trim();
  const value = text.slice(equals + 1, end).trim();
  return { kind: 'entry', entry: { start, nameStart, name, value, end } };
}

/**
 * `NONE`, or comma separated `Resource_List.<resource>=<value>` and
 * `queue=<value>` entries in any order. Entries whose name is not defined
 * are custom and pass unchecked, but at least one recognised keyword must
 * appear.
 */
export function verifyPreemptTargets(context: VerificationContext, attribute: AttributeValue): VerificationResult {
  if (!hasValue(attribute.value)) {
    return context.reporter.reject(ErrorCodes.badAttributeValue);
  }
  const value = attribute.value.trimStart();

  if (value.slice(0, NO_TARGETS.length).toLowerCase() === NO_TARGETS) {
    return value.length === NO_TARGETS.length ? accepted() : context.reporter.reject(ErrorCodes.badAttributeValue);
  }

  let found = false;

  for (const namespace of TARGET_NAMESPACES) {
    const text = namespace.caseFold ? value.toLowerCase() : value;
    const keyword = namespace.caseFold ? namespace.keyword.toLowerCase() : namespace.keyword;
    const table = namespace.table(context.catalog);

    let from = 0;
    for (;;) {
      const step = nextEntry(text, namespace, keyword, from);
      if (step.kind === 'done') {
        break;
      }
      if (step.kind === 'malformed') {
        return context.reporter.reject(ErrorCodes.badAttributeValue);
      }

      const { entry } = step;
      found = true;

      const definition: AttributeDefinition | undefined = table.find(entry.name);
      if (definition === undefined) {
        context.logger.debug(`custom preemption target ${namespace.keyword} ${entry.name}`);
        from = entry.nameStart;
        continue;
      }

      const result = checkDefinition(context, definition, {
        name: entry.name,
        value: entry.value,
        operator: attribute.operator,
      });
      if (result.status !== 'accepted') {
        return context.reporter.qualify(result);
      }

      from = entry.end;
    }
  }

  return found ? accepted() : context.reporter.reject(ErrorCodes.badAttributeValue);
}
