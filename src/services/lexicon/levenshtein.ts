/**
 * Levenshtein edit distance (insert, delete, substitute; unit costs).
 * Two-row dynamic programming, O(len(a) * len(b)) time.
 */
export function levenshtein(a: string, b: string): number {
  if (a.length < b.length) return levenshtein(b, a);
  if (b.length === 0) return a.length;

  let previous: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 0; i < a.length; i++) {
    const current: number[] = [i + 1];
    for (let j = 0; j < b.length; j++) {
      const insertion = previous[j + 1] + 1;
      const deletion = current[j] + 1;
      const substitution = previous[j] + (a[i] === b[j] ? 0 : 1);
      current.push(Math.min(insertion, deletion, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}
