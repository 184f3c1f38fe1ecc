function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, " ").trim();
}

/** Longest common substring of a[aLo..aHi) and b[bLo..bHi): [aStart, bStart, length]. */
function longestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): [number, number, number] {
  let best: [number, number, number] = [aLo, bLo, 0];
  // lengths[j] = length of the common run ending at a[i-1], b[j-1]
  let prev = new Array<number>(bHi - bLo + 1).fill(0);
  for (let i = aLo; i < aHi; i++) {
    const curr = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const k = j - bLo + 1;
      curr[k] = prev[k - 1] + 1;
      if (curr[k] > best[2]) best = [i - curr[k] + 1, j - curr[k] + 1, curr[k]];
    }
    prev = curr;
  }
  return best;
}

/**
 * Number of characters covered by matching blocks: take the longest common
 * block, then recurse on the pieces to its left and to its right.
 */
export function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const stack: [number, number, number, number][] = [[0, a.length, 0, b.length]];
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    const [i, j, size] = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (size === 0) continue;
    total += size;
    if (aLo < i && bLo < j) stack.push([aLo, i, bLo, j]);
    if (i + size < aHi && j + size < bHi) stack.push([i + size, aHi, j + size, bHi]);
  }
  return total;
}

/**
 * Titles at least this close in length are compared by the share of the
 * shorter one that matches; further apart, by the share of both.
 */
const MIN_LENGTH_RATIO = 0.6;

/**
 * Similarity of two headlines in [0, 1]. Case and runs of whitespace are
 * ignored, so a headline republished with an inserted word still scores
 * high, while a short title contained in a much longer one does not.
 */
export function titleSimilarity(a: string, b: string): number {
  const left = normalizeTitle(a);
  const right = normalizeTitle(b);
  const shorter = Math.min(left.length, right.length);
  const longer = Math.max(left.length, right.length);
  if (shorter === 0) return left.length === right.length ? 1 : 0;

  const matched = matchingCharacters(left, right);
  if (shorter / longer >= MIN_LENGTH_RATIO) return matched / shorter;
  return (2 * matched) / (left.length + right.length);
}
