import { failed, parsed, type GrammarOutcome } from './outcome.js';

export interface AtListEntry {
  name: string;
  host?: string;
}

export interface AtListOptions {
  /** Each host (including "no host") may appear at most once */
  uniqueHosts: boolean;
  /** Names must be absolute paths */
  absolutePath: boolean;
}

/**
 * Parses `name[@host][,name[@host]...]`, as used by user, group, mail and
 * shell lists.
 */
export function parseAtList(value: string, options: AtListOptions): GrammarOutcome<AtListEntry[]> {
  if (value.trim().length === 0) {
    return failed('empty list');
  }

  const entries: AtListEntry[] = [];
  const seenHosts = new Set<string>();

  for (const rawEntry of value.split(',')) {
    const entry = rawEntry.trim();
    if (entry.length === 0) {
      return failed('empty list entry');
    }

    const at = entry.indexOf('@');
    const name = at === -1 ? entry : entry.slice(0, at);
    const host = at === -1 ? undefined : entry.slice(at + 1);

    if (name.length === 0 || /\s/.test(name)) {
      return failed(`bad name in "${entry}"`);
    }
    if (host !== undefined && (host.length === 0 || /[\s@]/.test(host))) {
      return failed(`bad host in "${entry}"`);
    }
    if (options.absolutePath && !name.startsWith('/')) {
      return failed(`"${name}" is not an absolute path`);
    }

    if (options.uniqueHosts) {
      const hostKey = host?.toLowerCase() ?? '';
      if (seenHosts.has(hostKey)) {
        return failed(host === undefined ? 'more than one entry without a host' : `host "${host}" repeated`);
      }
      seenHosts.add(hostKey);
    }

    entries.push(host === undefined ? { name } : { name, host });
  }

  return parsed(entries);
}
