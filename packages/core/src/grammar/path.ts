import { failed, parsed, type GrammarOutcome } from './outcome.js';

export interface PathOptions {
  /** Host used when the value names none */
  host: string;
  /** Base for relative paths */
  workingDirectory: string;
}

/** Longest path accepted after normalisation */
export const MAX_PATH_LENGTH = 1024;

const HOST_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Normalises `[host:]path` into `host:/absolute/path`.
 */
export function normalizePath(value: string, options: PathOptions): GrammarOutcome<string> {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return failed('empty path');
  }

  let host = options.host;
  let filePath = trimmed;

  const colon = trimmed.indexOf(':');
  if (colon !== -1) {
    const prefix = trimmed.slice(0, colon);
    if (!prefix.includes('/')) {
      host = prefix;
      filePath = trimmed.slice(colon + 1);
    }
  }

  if (!HOST_PATTERN.test(host)) {
    return failed(`bad host "${host}"`);
  }
  if (filePath.length === 0) {
    return failed('no path after host');
  }
  if (/[\s]/.test(filePath)) {
    return failed(`path "${filePath}" contains whitespace`);
  }

  if (!filePath.startsWith('/')) {
    const base = options.workingDirectory.endsWith('/')
      ? options.workingDirectory.slice(0, -1)
      : options.workingDirectory;
    filePath = `${base}/${filePath}`;
  }

  const normalized = `${host}:${filePath}`;
  if (normalized.length > MAX_PATH_LENGTH) {
    return failed(`path exceeds ${MAX_PATH_LENGTH} characters`);
  }

  return parsed(normalized);
}
