const SEPARATORS = new Set(['/', '-', '_', ' ']);

/** Scores below zero mean "no match" and must never be ranked as real scores. */
export const NO_MATCH = -1;

/**
 * True when every character of `query` appears in `target`, in order, ignoring
 * case. The characters need not be adjacent. An empty query matches anything.
 */
export function fuzzyMatch(query: string, target: string): boolean {
  if (query === '') return true;

  const needle = Array.from(query.toLowerCase());
  let cursor = 0;

  for (const ch of target.toLowerCase()) {
    if (needle[cursor] === ch) cursor++;
    if (cursor === needle.length) return true;
  }
  return cursor === needle.length;
}

/**
 * Higher is better. Each consumed character earns 5, plus 20 at the start of
 * the target, 15 right after a separator, and a growing bonus (10, 20, 30...)
 * for each extension of a contiguous run.
 */
export function fuzzyScore(query: string, target: string): number {
  if (query === '') return 0;

  const needle = Array.from(query.toLowerCase());
  const haystack = Array.from(target.toLowerCase());

  let score = 0;
  let cursor = 0;
  let lastMatch: number | null = null;
  let run = 0;

  for (let i = 0; i < haystack.length; i++) {
    if (cursor >= needle.length || haystack[i] !== needle[cursor]) continue;
    cursor++;

    if (lastMatch !== null) {
      if (i === lastMatch + 1) {
        run++;
        score += run * 10;
      } else {
        run = 0;
      }
    }

    if (i === 0) {
      score += 20;
    } else if (SEPARATORS.has(haystack[i - 1] ?? '')) {
      score += 15;
    }

    lastMatch = i;
    score += 5;
  }

  return cursor < needle.length ? NO_MATCH : score;
}

/**
 * Sort `items` in place, best match first. Equal scores keep their input
 * order. An empty query leaves the array untouched.
 */
export function fuzzySort<T>(items: T[], query: string, getText: (item: T) => string): T[] {
  if (query === '') return items;

  const scored = items.map((item, index) => ({ item, index, score: fuzzyScore(query, getText(item)) }));
  scored.sort((a, b) => b.score - a.score || a.index - b.index);

  scored.forEach((entry, i) => {
    items[i] = entry.item;
  });
  return items;
}
