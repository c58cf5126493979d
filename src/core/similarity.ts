/**
 * Block-matching similarity ratio.
 *
 * Finds the longest common block of the two strings, then recurses on
 * the pieces to its left and right. The ratio is 2·M / (|a| + |b|),
 * where M is the total length of all blocks found. This is the
 * Ratcliff/Obershelp "gestalt" measure, not an edit distance.
 */

/** Strings at least this long get the popular-character heuristic */
const POPULAR_MIN_LENGTH = 200;

interface Block {
  a: number;
  b: number;
  size: number;
}

/**
 * Similarity of `a` and `b` in [0, 1]. Two empty strings are identical (1).
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const matches = matchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matches) / total;
}

/**
 * Non-overlapping matching blocks, longest first, recursing left and right.
 */
export function matchingBlocks(a: string, b: string): Block[] {
  const index = indexPositions(b);
  const blocks: Block[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;

    const block = longestMatch(a, b, index, alo, ahi, blo, bhi);
    if (block.size === 0) continue;

    blocks.push(block);
    if (alo < block.a && blo < block.b) {
      queue.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * Positions of every character in `b`. For long strings, characters
 * that make up more than 1% of `b` are left out — they seed no matches,
 * though blocks may still extend across them.
 */
function indexPositions(b: string): Map<string, number[]> {
  const index = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const positions = index.get(b[j]);
    if (positions) positions.push(j);
    else index.set(b[j], [j]);
  }

  if (b.length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, positions] of index) {
      if (positions.length > limit) index.delete(ch);
    }
  }

  return index;
}

/**
 * Longest block a[i..i+k) === b[j..j+k) within the given ranges.
 * Ties go to the smallest i, then the smallest j.
 */
function longestMatch(
  a: string,
  b: string,
  index: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let bestA = alo;
  let bestB = blo;
  let bestSize = 0;

  // lengths[j] = length of the match ending at a[i - 1], b[j]
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextLengths = new Map<number, number>();
    for (const j of index.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      nextLengths.set(j, k);
      if (k > bestSize) {
        bestA = i - k + 1;
        bestB = j - k + 1;
        bestSize = k;
      }
    }
    lengths = nextLengths;
  }

  // Extend across characters the index skipped
  while (bestA > alo && bestB > blo && a[bestA - 1] === b[bestB - 1]) {
    bestA--;
    bestB--;
    bestSize++;
  }
  while (
    bestA + bestSize < ahi &&
    bestB + bestSize < bhi &&
    a[bestA + bestSize] === b[bestB + bestSize]
  ) {
    bestSize++;
  }

  return { a: bestA, b: bestB, size: bestSize };
}
