import type { ObjectKind } from '@batchguard/types';

import { DefinitionError } from '../errors.js';
import type { AttributeVerifierKind, DatatypeKind, ValueVerifierKind } from './kinds.js';

export interface Definition<V extends AttributeVerifierKind = ValueVerifierKind> {
  readonly name: string;
  readonly datatype: DatatypeKind;
  /** Value check run after the datatype check passes */
  readonly verifier: V | 'none';
}

export type ResourceDefinition = Definition<ValueVerifierKind>;

export type AttributeDefinition = Definition<AttributeVerifierKind>;

/**
 * Immutable name -> definition lookup. Tables are built once at start-up
 * and shared by every verification.
 */
export class DefinitionTable<V extends AttributeVerifierKind = ValueVerifierKind> {
  private readonly entries: ReadonlyMap<string, Definition<V>>;

  private constructor(entries: Map<string, Definition<V>>) {
    this.entries = entries;
  }

  static fromEntries<V extends AttributeVerifierKind = ValueVerifierKind>(
    definitions: Iterable<Definition<V>>
  ): DefinitionTable<V> {
    const entries = new Map<string, Definition<V>>();
    for (const definition of definitions) {
      if (entries.has(definition.name)) {
        throw new DefinitionError(`Duplicate definition for "${definition.name}"`, {
          path: definition.name,
        });
      }
      entries.set(definition.name, Object.freeze({ ...definition }));
    }
    return new DefinitionTable(entries);
  }

  find(name: string): Definition<V> | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}

export type ResourceTable = DefinitionTable<ValueVerifierKind>;

export type AttributeTable = DefinitionTable<AttributeVerifierKind>;

export interface DefinitionCatalog {
  /** Resources valid inside `Resource_List` and friends */
  readonly resources: ResourceTable;
  /** Attribute definitions per parent object */
  readonly attributes: Readonly<Record<ObjectKind, AttributeTable>>;
}
