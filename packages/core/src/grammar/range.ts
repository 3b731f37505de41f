export type RangeCheck = 'ok' | 'malformed' | 'outOfRange';

const RANGE_PATTERN = /^(\d+)-(\d+)(?::(\d+))?$/;

/**
 * Checks an array index range `X-Y[:Z]`. Syntax errors are `malformed`;
 * an empty range (`X >= Y`) or a zero step is `outOfRange`.
 */
export function checkRange(value: string): RangeCheck {
  const match = RANGE_PATTERN.exec(value);
  if (match === null) {
    return 'malformed';
  }

  const start = Number.parseInt(match[1] ?? '', 10);
  const end = Number.parseInt(match[2] ?? '', 10);
  const step = match[3] === undefined ? 1 : Number.parseInt(match[3], 10);

  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || !Number.isSafeInteger(step)) {
    return 'outOfRange';
  }
  if (start >= end || step < 1) {
    return 'outOfRange';
  }

  return 'ok';
}
