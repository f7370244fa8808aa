const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Numeric identifiers (years) compare by value and sort before every other
 * identifier; the rest compare by code units.
 */
export function compareIdentifiers(left: string, right: string): number {
  const leftNumeric = NUMERIC.test(left);
  const rightNumeric = NUMERIC.test(right);
  if (leftNumeric !== rightNumeric) {
    return leftNumeric ? -1 : 1;
  }
  if (leftNumeric) {
    const delta = Number(left) - Number(right);
    if (delta !== 0) {
      return delta;
    }
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

export function sortIdentifiers(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort(compareIdentifiers);
}
