/**
 * Ratcliff/Obershelp similarity: 2 * matched characters / total characters,
 * where matches are found by recursively taking the longest common block.
 */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchedCharacters(a, b)) / total;
}

function matchedCharacters(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  let bestLength = 0;
  let bestA = 0;
  let bestB = 0;
  // lengths[j] = length of the common suffix of a[..i] and b[..j]
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        current[j] = previous[j - 1] + 1;
        if (current[j] > bestLength) {
          bestLength = current[j];
          bestA = i - bestLength;
          bestB = j - bestLength;
        }
      }
    }
    previous = current;
  }
  if (bestLength === 0) return 0;
  return (
    bestLength +
    matchedCharacters(a.slice(0, bestA), b.slice(0, bestB)) +
    matchedCharacters(a.slice(bestA + bestLength), b.slice(bestB + bestLength))
  );
}

/** Best candidate scoring at least `cutoff`, compared case-insensitively; null when none qualifies. */
export function closestMatch(word: string, candidates: readonly string[], cutoff: number): string | null {
  const needle = word.trim().toLowerCase();
  let best: string | null = null;
  let bestScore = cutoff;
  for (const candidate of candidates) {
    const score = similarity(needle, candidate.toLowerCase());
    if (score >= bestScore && (best === null || score > bestScore)) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}
