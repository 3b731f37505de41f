import { failed, parsed, type GrammarOutcome } from './outcome.js';

export interface StageEntry {
  localFile: string;
  host: string;
  remoteFile: string;
}

/**
 * Parses file staging lists: `local@host:remote[,local@host:remote...]`.
 */
export function parseStageList(value: string): GrammarOutcome<StageEntry[]> {
  const entries: StageEntry[] = [];

  for (const rawEntry of value.split(',')) {
    const entry = rawEntry.trim();
    const at = entry.indexOf('@');
    if (at <= 0) {
      return failed(`missing local file in "${entry}"`);
    }

    const remote = entry.slice(at + 1);
    const colon = remote.indexOf(':');
    if (colon <= 0) {
      return failed(`missing host in "${entry}"`);
    }
    if (colon === remote.length - 1) {
      return failed(`missing remote file in "${entry}"`);
    }

    entries.push({
      localFile: entry.slice(0, at),
      host: remote.slice(0, colon),
      remoteFile: remote.slice(colon + 1),
    });
  }

  return parsed(entries);
}
