export interface SearchWindow {
  from: number;
  to: number;
}

export interface SpanMatch {
  // Word offsets into the reference, end exclusive
  start: number;
  end: number;
  distance: number;
  matched: number;
}

/**
 * `left` is better than `right`: lower edit rate, then closer to the
 * expected position, then earlier. Rates are compared as fractions.
 */
const isBetter = (left: SpanMatch, right: SpanMatch, expected: number) => {
  const leftCross = left.distance * (right.end - right.start);
  const rightCross = right.distance * (left.end - left.start);
  if (leftCross !== rightCross) return leftCross < rightCross;

  const leftGap = Math.abs(left.start - expected);
  const rightGap = Math.abs(right.start - expected);
  if (leftGap !== rightGap) return leftGap < rightGap;

  if (left.start !== right.start) return left.start < right.start;
  return left.end - left.start > right.end - right.start;
};

/**
 * Find the contiguous reference span that best matches the hypothesis
 * within the window, using edit distance with a free start and end in the
 * reference. Spans where no hypothesis word matches are not plausible and
 * are never returned.
 */
export function findBestSpan(
  hypothesis: string[],
  reference: string[],
  window: SearchWindow,
  expected: number
): SpanMatch | null {
  const from = Math.max(0, Math.min(window.from, reference.length));
  const to = Math.max(from, Math.min(window.to, reference.length));
  const columns = to - from;
  const rows = hypothesis.length;
  if (rows === 0 || columns === 0) return null;

  let prevCost = new Int32Array(columns + 1);
  let prevStart = new Int32Array(columns + 1);
  let prevMatched = new Int32Array(columns + 1);
  let cost = new Int32Array(columns + 1);
  let start = new Int32Array(columns + 1);
  let matched = new Int32Array(columns + 1);

  for (let j = 0; j <= columns; j++) {
    prevStart[j] = j;
  }

  for (let i = 1; i <= rows; i++) {
    const word = hypothesis[i - 1];
    cost[0] = i;
    start[0] = 0;
    matched[0] = 0;

    for (let j = 1; j <= columns; j++) {
      const same = word === reference[from + j - 1];

      // Diagonal: hypothesis word aligned with reference word
      let bestCost = prevCost[j - 1] + (same ? 0 : 1);
      let bestStart = prevStart[j - 1];
      let bestMatched = prevMatched[j - 1] + (same ? 1 : 0);

      // Reference word missing from the hypothesis
      if (cost[j - 1] + 1 < bestCost) {
        bestCost = cost[j - 1] + 1;
        bestStart = start[j - 1];
        bestMatched = matched[j - 1];
      }

      // Extra hypothesis word
      if (prevCost[j] + 1 < bestCost) {
        bestCost = prevCost[j] + 1;
        bestStart = prevStart[j];
        bestMatched = prevMatched[j];
      }

      cost[j] = bestCost;
      start[j] = bestStart;
      matched[j] = bestMatched;
    }

    [prevCost, cost] = [cost, prevCost];
    [prevStart, start] = [start, prevStart];
    [prevMatched, matched] = [matched, prevMatched];
  }

  let best: SpanMatch | null = null;
  for (let j = 1; j <= columns; j++) {
    if (prevMatched[j] === 0 || prevStart[j] >= j) continue;
    const candidate: SpanMatch = {
      start: from + prevStart[j],
      end: from + j,
      distance: prevCost[j],
      matched: prevMatched[j],
    };
    if (!best || isBetter(candidate, best, expected)) {
      best = candidate;
    }
  }

  return best;
}
