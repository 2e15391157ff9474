/**
 * Suggestion helpers
 * Pure functions used to enrich user-facing errors. No state.
 */

/**
 * Levenshtein distance: the fewest single-character insertions, deletions
 * and substitutions that turn `a` into `b`.
 */
export function calculateDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Row i holds the distances from a[0..i) to every prefix of b
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + substitution
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Return up to 3 close matches for a misspelt string, closest first. Equal
 * distances keep the order of `validOptions`.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 3
): string[] {
  return validOptions
    .map((option) => ({
      option,
      distance: calculateDistance(input, option),
    }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}
