/** Levenshtein distance (insert/delete/substitute, unit cost) over UTF-16 code units. */
export function levenshtein(a: string, b: string): number {
  return boundedLevenshtein(a, b, Math.max(a.length, b.length));
}

// Row buffers shared across calls; every call runs to completion synchronously.
let rowA: number[] = [];
let rowB: number[] = [];

/**
 * Levenshtein distance when it is at most `max`, otherwise `max + 1`. Only the
 * diagonal band of width 2*max+1 is computed, and the scan stops as soon as a
 * whole row exceeds `max`.
 */
export function boundedLevenshtein(a: string, b: string, max: number): number {
  const over = max + 1;
  if (Math.abs(a.length - b.length) > max) return over;
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  const n = b.length;
  if (rowA.length < n + 1) {
    rowA = new Array<number>(n + 1);
    rowB = new Array<number>(n + 1);
  }
  let prev = rowA.fill(over, 0, n + 1);
  let curr = rowB.fill(over, 0, n + 1);
  for (let j = 0; j <= Math.min(n, max); j++) prev[j] = j;

  for (let i = 1; i <= a.length; i++) {
    const lo = Math.max(1, i - max);
    const hi = Math.min(n, i + max);
    curr[lo - 1] = lo === 1 ? i : over;
    let rowMin = curr[lo - 1];

    const ca = a.charCodeAt(i - 1);
    for (let j = lo; j <= hi; j++) {
      const cost = ca === b.charCodeAt(j - 1) ? 0 : 1;
      const v = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
      curr[j] = v;
      if (v < rowMin) rowMin = v;
    }
    if (hi < n) curr[hi + 1] = over;

    if (rowMin > max) return over;
    [prev, curr] = [curr, prev];
  }

  return Math.min(prev[n], over);
}

/** Distance scaled to [0, 1] by the longer input's length. */
export function normalizedDistance(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 0;
  return levenshtein(a, b) / longest;
}
