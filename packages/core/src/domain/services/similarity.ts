/** Default minimum similarity for a fuzzy column match. */
export const DEFAULT_FUZZY_THRESHOLD = 0.8;

/** Lowercase and drop whitespace, underscores and hyphens: `"First_Name"` and `"first name"` compare equal. */
export function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/[\s_-]+/g, '');
}

function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min((current[j - 1] ?? 0) + 1, (previous[j] ?? 0) + 1, (previous[j - 1] ?? 0) + cost);
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/** Levenshtein distance between the normalized forms of two labels. */
export function editDistance(a: string, b: string): number {
  return levenshtein(normalizeLabel(a), normalizeLabel(b));
}

/**
 * Similarity in [0, 1] between two column labels: `1 - distance / longer length`
 * over the normalized forms. Either side normalizing to empty scores 0.
 */
export function similarity(a: string, b: string): number {
  const left = normalizeLabel(a);
  const right = normalizeLabel(b);
  if (left.length === 0 || right.length === 0) return 0;
  return 1 - levenshtein(left, right) / Math.max(left.length, right.length);
}
