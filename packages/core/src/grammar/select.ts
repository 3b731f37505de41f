import { failed, parsed, type GrammarOutcome } from './outcome.js';

export interface KeyValuePair {
  key: string;
  value: string;
}

/** One `+`-separated segment of a selection spec */
export interface Chunk {
  count: number;
  resources: KeyValuePair[];
}

const RESOURCE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

/**
 * Splits `value` on `separator`, leaving separators inside single or double
 * quotes alone.
 */
function splitOutsideQuotes(value: string, separator: string): GrammarOutcome<string[]> {
  const parts: string[] = [];
  let current = '';
  let quote: string | undefined;

  for (const ch of value) {
    if (quote !== undefined) {
      if (ch === quote) {
        quote = undefined;
      }
      current += ch;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === separator) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (quote !== undefined) {
    return failed(`unterminated ${quote} quote`);
  }

  parts.push(current);
  return parsed(parts);
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value.charAt(0);
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Breaks a selection spec into its `+`-separated chunks.
 */
export function splitPlusSpec(value: string): GrammarOutcome<string[]> {
  const split = splitOutsideQuotes(value, '+');
  if (!split.ok) {
    return split;
  }

  const chunks: string[] = [];
  for (const chunk of split.value) {
    const trimmed = chunk.trim();
    if (trimmed.length === 0) {
      return failed('empty chunk');
    }
    chunks.push(trimmed);
  }

  return parsed(chunks);
}

/**
 * Decodes `[count:]key=value[:key=value...]`.
 */
export function decodeChunk(chunk: string): GrammarOutcome<Chunk> {
  const split = splitOutsideQuotes(chunk, ':');
  if (!split.ok) {
    return split;
  }

  const parts = split.value;
  let count = 1;

  const first = parts[0];
  if (first !== undefined && /^\d+$/.test(first)) {
    count = Number.parseInt(first, 10);
    if (count <= 0) {
      return failed(`chunk count must be positive, got ${first}`);
    }
    parts.shift();
  }

  const resources: KeyValuePair[] = [];
  for (const part of parts) {
    const eq = part.indexOf('=');
    if (eq === -1) {
      return failed(`"${part}" is not key=value`);
    }

    const key = part.slice(0, eq);
    const value = unquote(part.slice(eq + 1));
    if (!RESOURCE_NAME_PATTERN.test(key)) {
      return failed(`bad resource name "${key}"`);
    }
    if (value.length === 0) {
      return failed(`resource "${key}" has no value`);
    }

    resources.push({ key, value });
  }

  if (resources.length === 0) {
    return failed(`chunk "${chunk}" names no resources`);
  }

  return parsed({ count, resources });
}
