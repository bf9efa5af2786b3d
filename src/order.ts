/**
 * Canonical labels first, in canonical order; the rest after them, sorted by
 * UTF-16 code unit.
 */
export function orderCategories(observed: Iterable<string>, canonical: readonly string[]): string[] {
  const remaining = new Set(observed);
  const ordered: string[] = [];
  for (const label of canonical) {
    if (remaining.has(label)) {
      ordered.push(label);
      remaining.delete(label);
    }
  }
  ordered.push(...[...remaining].sort());
  return ordered;
}
