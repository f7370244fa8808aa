/**
 * Returns a shallow copy of the provided record without any `undefined` values.
 *
 * Configuration readers and spawn option builders rely on it so optional
 * fields disappear instead of overriding defaults with `undefined`.
 */
export function omitUndefinedEntries<T extends object>(entries: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in entries) {
    if (!Object.prototype.hasOwnProperty.call(entries, key)) {
      continue;
    }
    const value = entries[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
