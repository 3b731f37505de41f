export type GrammarOutcome<T> = { ok: true; value: T } | { ok: false; reason: string };

export function parsed<T>(value: T): GrammarOutcome<T> {
  return { ok: true, value };
}

export function failed<T>(reason: string): GrammarOutcome<T> {
  return { ok: false, reason };
}
