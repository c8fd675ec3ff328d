/** Distance d'édition (insertion, suppression, substitution). */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const cur = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      cur[j] = Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = cur;
  }
  return prev[b.length];
}

/**
 * Jusqu'à 3 suggestions proches d'une saisie inconnue (distance <= 2), triées par similarité.
 */
export function suggest(candidates: readonly string[], input: string): string[] {
  const scored = candidates.map((k) => ({ k, d: levenshtein(k.toLowerCase(), input.toLowerCase()) }));
  scored.sort((a, b) => a.d - b.d);
  return scored.filter((x) => x.d <= 2).slice(0, 3).map((x) => x.k);
}
