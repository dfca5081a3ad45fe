/**
 * Deterministic ordering: binary UTF-16 code unit ascending.
 * localeCompare is avoided so output never depends on the host locale.
 */

export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Compare two equal-length key tuples field by field. */
export function tupleCompareBinary(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const cmp = stringCompareBinary(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

export function sortBy<T>(arr: readonly T[], key: (x: T) => string): T[] {
  return [...arr].sort((a, b) => stringCompareBinary(key(a), key(b)));
}

export function sortByTuple<T>(arr: readonly T[], key: (x: T) => readonly string[]): T[] {
  return [...arr].sort((a, b) => tupleCompareBinary(key(a), key(b)));
}
