export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }

  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  if (typeof value !== "string") {
    return false;
  }

  return values.some((candidate) => candidate === value);
}
