/**
 * String similarity for the fuzzy identity tier.
 *
 * Scores are integers 0..100. tokenSortRatio ignores word order and case,
 * so "The Crown, 1 High St" and "crown the 1 high st" score 100.
 */

/**
 * Edit distance (insert, delete, substitute; each costs 1)
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Normalized similarity: 100 * (1 - distance / longer length), rounded.
 * Two empty strings have nothing to compare and score 0.
 */
export function ratio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 0;
  return Math.round(100 * (1 - levenshteinDistance(a, b) / longest));
}

/**
 * Lowercase, turn punctuation into spaces, sort the tokens.
 */
export function tokenSortKey(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .split(' ')
    .filter(Boolean)
    .sort()
    .join(' ');
}

export function tokenSortRatio(a: string, b: string): number {
  return ratio(tokenSortKey(a), tokenSortKey(b));
}
