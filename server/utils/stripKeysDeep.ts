/** Only object literals and null-prototype records are rebuilt; class instances are returned as they are. */
function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function omitFrom(value: unknown, blocked: ReadonlySet<string>): unknown {
  if (Array.isArray(value)) return value.map((item: unknown) => omitFrom(item, blocked));
  if (!isPlainRecord(value)) return value;
  return Object.fromEntries(
    Object.entries(value)
      .filter(([key]) => !blocked.has(key))
      .map(([key, item]) => [key, omitFrom(item, blocked)])
  );
}

/** Copies a JSON-bound payload without the given keys, at any depth. The input is not modified. */
export function stripKeysDeep(input: unknown, keysToStrip: readonly string[]): unknown {
  return omitFrom(input, new Set(keysToStrip));
}
