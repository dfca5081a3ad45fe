/**
 * Block-matching similarity over token sequences: find the longest contiguous
 * matching block, then repeat on the unmatched remainders to its left and right.
 */

export interface MatchingBlock {
  /** Start in sequence a. */
  a: number;
  /** Start in sequence b. */
  b: number;
  size: number;
}

/** token -> ascending positions in b */
function indexPositions(b: readonly string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  b.forEach((token, j) => {
    const list = positions.get(token);
    if (list) list.push(j);
    else positions.set(token, [j]);
  });
  return positions;
}

/**
 * Longest block with a[i..i+size) == b[j..j+size) inside the given windows.
 * Ties go to the smallest i, then the smallest j.
 */
function longestMatch(
  a: readonly string[],
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): MatchingBlock {
  let best: MatchingBlock = { a: aLo, b: bLo, size: 0 };
  // run length of the match ending at (i - 1, j), keyed by j
  let prev = new Map<number, number>();
  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (prev.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) best = { a: i - size + 1, b: j - size + 1, size };
    }
    prev = next;
  }
  return best;
}

/** All matching blocks, ordered by position in a. */
export function matchingBlocks(a: readonly string[], b: readonly string[]): MatchingBlock[] {
  const positions = indexPositions(b);
  const blocks: MatchingBlock[] = [];
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  for (let window = pending.pop(); window !== undefined; window = pending.pop()) {
    const [aLo, aHi, bLo, bHi] = window;
    const match = longestMatch(a, positions, aLo, aHi, bLo, bHi);
    if (match.size === 0) continue;
    blocks.push(match);
    if (aLo < match.a && bLo < match.b) pending.push([aLo, match.a, bLo, match.b]);
    const aEnd = match.a + match.size;
    const bEnd = match.b + match.size;
    if (aEnd < aHi && bEnd < bHi) pending.push([aEnd, aHi, bEnd, bHi]);
  }

  return blocks.sort((x, y) => x.a - y.a);
}

/** 2M / (|a| + |b|) where M is the total size of the matching blocks; 1 for two empty sequences. */
export function matchingRatio(a: readonly string[], b: readonly string[]): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matched = matchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}
