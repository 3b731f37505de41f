/**
 * Definition table loading
 *
 * Resource and attribute tables ship as YAML beside the package and are
 * parsed once at start-up.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { parseDocument, YAMLError } from 'yaml';

import { isPlainObject, type ObjectKind } from '@batchguard/types';

import { DefinitionError } from '../errors.js';
import {
  isAttributeVerifierKind,
  isDatatypeKind,
  isValueVerifierKind,
  type AttributeVerifierKind,
  type ValueVerifierKind,
} from './kinds.js';
import {
  DefinitionTable,
  type AttributeTable,
  type Definition,
  type DefinitionCatalog,
  type ResourceTable,
} from './table.js';

export const DEFAULT_RESOURCES_PATH = fileURLToPath(new URL('../../definitions/resources.yaml', import.meta.url));

export const DEFAULT_ATTRIBUTES_PATH = fileURLToPath(new URL('../../definitions/attributes.yaml', import.meta.url));

export interface DefinitionPaths {
  resources?: string;
  attributes?: string;
}

/**
 * Parses a YAML document into a plain object.
 * @throws DefinitionError on YAML syntax errors or a non-mapping document
 */
export function parseYamlMapping(content: string, source?: string): Record<string, unknown> {
  let result: unknown;
  try {
    const doc = parseDocument(content);
    const firstError = doc.errors[0];
    if (firstError) {
      throw new DefinitionError(firstError.message, {
        source,
        line: getLineFromError(firstError),
        column: getColumnFromError(firstError),
      });
    }
    result = doc.toJS();
  } catch (error) {
    if (error instanceof DefinitionError) {
      throw error;
    }
    if (error instanceof YAMLError) {
      throw new DefinitionError(error.message, { source, cause: error });
    }
    throw new DefinitionError(error instanceof Error ? error.message : 'Unknown parse error', {
      source,
      cause: error,
    });
  }

  if (!isPlainObject(result)) {
    throw new DefinitionError('Definition document must be a mapping', { source });
  }
  return result;
}

function getLineFromError(error: YAMLError): number | undefined {
  return error.linePos?.[0]?.line;
}

function getColumnFromError(error: YAMLError): number | undefined {
  return error.linePos?.[0]?.col;
}

function readEntries<V extends AttributeVerifierKind>(
  section: unknown,
  sectionPath: string,
  isVerifier: (value: unknown) => value is V,
  source: string | undefined
): Definition<V>[] {
  if (section === undefined || section === null) {
    return [];
  }
  if (!isPlainObject(section)) {
    throw new DefinitionError(`"${sectionPath}" must be a mapping of names to definitions`, {
      source,
      path: sectionPath,
    });
  }

  const definitions: Definition<V>[] = [];
  for (const [name, raw] of Object.entries(section)) {
    const path = `${sectionPath}.${name}`;
    if (!isPlainObject(raw)) {
      throw new DefinitionError(`"${path}" must be a mapping`, { source, path });
    }

    const datatype = raw.type ?? 'none';
    if (!isDatatypeKind(datatype)) {
      throw new DefinitionError(`Unknown datatype "${String(datatype)}" for "${path}"`, {
        source,
        path,
        suggestion: 'Use one of none, long, float, size, time, boolean or string',
      });
    }

    const rawVerifier = raw.verify ?? 'none';
    let verifier: V | 'none';
    if (rawVerifier === 'none') {
      verifier = 'none';
    } else if (isVerifier(rawVerifier)) {
      verifier = rawVerifier;
    } else {
      throw new DefinitionError(`Unknown verifier "${String(rawVerifier)}" for "${path}"`, { source, path });
    }

    definitions.push({ name, datatype, verifier });
  }

  return definitions;
}

export function parseResourceTable(content: string, source?: string): ResourceTable {
  const document = parseYamlMapping(content, source);
  const entries = readEntries<ValueVerifierKind>(document.resources, 'resources', isValueVerifierKind, source);
  return withSource(() => DefinitionTable.fromEntries(entries), source);
}

export function parseAttributeTables(content: string, source?: string): Record<ObjectKind, AttributeTable> {
  const document = parseYamlMapping(content, source);

  const table = (objectKind: ObjectKind): AttributeTable => {
    const entries = readEntries<AttributeVerifierKind>(
      document[objectKind],
      objectKind,
      isAttributeVerifierKind,
      source
    );
    return withSource(() => DefinitionTable.fromEntries(entries), source);
  };

  return {
    job: table('job'),
    queue: table('queue'),
    reservation: table('reservation'),
    server: table('server'),
  };
}

function withSource<T>(build: () => T, source: string | undefined): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof DefinitionError && error.source === undefined && source !== undefined) {
      throw new DefinitionError(error.message, { source, path: error.path, cause: error });
    }
    throw error;
  }
}

export function parseDefinitionCatalog(resources: string, attributes: string): DefinitionCatalog {
  return {
    resources: parseResourceTable(resources),
    attributes: parseAttributeTables(attributes),
  };
}

/**
 * Loads the resource and attribute tables, defaulting to the ones shipped
 * with the package.
 */
export async function loadDefinitionCatalog(paths: DefinitionPaths = {}): Promise<DefinitionCatalog> {
  const resourcesPath = paths.resources ?? DEFAULT_RESOURCES_PATH;
  const attributesPath = paths.attributes ?? DEFAULT_ATTRIBUTES_PATH;

  const [resources, attributes] = await Promise.all([
    readDefinitionFile(resourcesPath),
    readDefinitionFile(attributesPath),
  ]);

  return {
    resources: parseResourceTable(resources, resourcesPath),
    attributes: parseAttributeTables(attributes, attributesPath),
  };
}

async function readDefinitionFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    throw new DefinitionError(`Cannot read definition file ${filePath}`, {
      source: filePath,
      cause: error,
      suggestion: 'Check the definitions path in the verifier configuration',
    });
  }
}
