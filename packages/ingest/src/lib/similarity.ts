const lcsLength = (a: string, b: string) => {
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
};

/**
 * Normalized Indel similarity (0-100): `2 * lcs / (len(a) + len(b))`, where only
 * insertions and deletions count as edits.
 */
export const indelRatio = (a: string, b: string): number => {
  const total = a.length + b.length;
  if (!total) {
    return 100;
  }
  return (200 * lcsLength(a, b)) / total;
};

/**
 * Best-window similarity (0-100) of the shorter string inside the longer one.
 *
 * The shorter input is scored against every window of its own length in the
 * longer input, and against the shorter windows hanging off either end, so a
 * company name embedded in a longer title still scores 100.
 */
export const partialRatio = (a: string, b: string): number => {
  if (!a || !b) {
    return 0;
  }
  const [needle, haystack] = a.length <= b.length ? [a, b] : [b, a];
  if (haystack.includes(needle)) {
    return 100;
  }

  let best = 0;
  const score = (window: string) => {
    best = Math.max(best, indelRatio(needle, window));
  };

  for (let size = 1; size < needle.length; size += 1) {
    score(haystack.slice(0, size));
    score(haystack.slice(haystack.length - size));
  }
  for (let start = 0; start + needle.length <= haystack.length; start += 1) {
    score(haystack.slice(start, start + needle.length));
  }
  return best;
};
