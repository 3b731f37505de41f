import { failed, parsed, type GrammarOutcome } from './outcome.js';

export const DEPEND_TYPES = [
  'after',
  'afterok',
  'afternotok',
  'afterany',
  'before',
  'beforeok',
  'beforenotok',
  'beforeany',
  'on',
  'runone',
] as const;

export type DependType = (typeof DEPEND_TYPES)[number];

/** Upper bound on the expanded dependency list */
export const MAX_DEPEND_LENGTH = 2040;

export interface DependListOptions {
  /** Server appended to job ids that do not name one */
  defaultServer?: string;
  maxLength?: number;
}

const JOB_ID_PATTERN = /^(\d+(?:\[\d*\])?)(\.[A-Za-z0-9][A-Za-z0-9._-]*)?$/;

function isDependType(value: string): value is DependType {
  return DEPEND_TYPES.some((type) => type === value);
}

/**
 * Parses `type:arg[:arg...][,type:arg...]` and returns the list with every
 * job id expanded to `<seq>.<server>`. Feeding the result back in returns
 * it unchanged.
 */
export function parseDependList(value: string, options: DependListOptions = {}): GrammarOutcome<string> {
  const maxLength = options.maxLength ?? MAX_DEPEND_LENGTH;
  const groups: string[] = [];

  for (const group of value.split(',')) {
    const [type, ...args] = group.split(':');
    if (type === undefined || !isDependType(type)) {
      return failed(`unknown dependency type in "${group}"`);
    }
    if (args.length === 0) {
      return failed(`dependency "${type}" has no argument`);
    }

    if (type === 'on') {
      const [count] = args;
      if (args.length !== 1 || count === undefined || !/^\d+$/.test(count)) {
        return failed(`"on" takes a single count, got "${args.join(':')}"`);
      }
      groups.push(`on:${count}`);
      continue;
    }

    const jobIds: string[] = [];
    for (const arg of args) {
      const match = JOB_ID_PATTERN.exec(arg);
      if (match === null) {
        return failed(`bad job id "${arg}"`);
      }

      const server = match[2];
      if (server === undefined && options.defaultServer !== undefined && options.defaultServer.length > 0) {
        jobIds.push(`${arg}.${options.defaultServer}`);
      } else {
        jobIds.push(arg);
      }
    }
    groups.push([type, ...jobIds].join(':'));
  }

  const expanded = groups.join(',');
  if (expanded.length > maxLength) {
    return failed(`expanded dependency list exceeds ${maxLength} characters`);
  }

  return parsed(expanded);
}
