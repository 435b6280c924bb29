export type OpcodeTag = "equal" | "replace" | "delete" | "insert";

export interface Opcode {
  tag: OpcodeTag;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
}

export interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

const indexPositions = (b: readonly string[]): Map<string, number[]> => {
  const positions = new Map<string, number[]>();
  b.forEach((value, idx) => {
    const bucket = positions.get(value);
    if (bucket) {
      bucket.push(idx);
    } else {
      positions.set(value, [idx]);
    }
  });
  return positions;
};

/* Longest run a[i..i+k) === b[j..j+k) inside the window. Ties go to the
 * smallest i, then the smallest j. */
const findLongestMatch = (
  a: readonly string[],
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchingBlock => {
  let best: MatchingBlock = { a: alo, b: blo, size: 0 };
  let runLengths = new Map<number, number>();
  for (let i = alo; i < ahi; i += 1) {
    const nextRunLengths = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }
    runLengths = nextRunLengths;
  }
  return best;
};

export const getMatchingBlocks = (a: readonly string[], b: readonly string[]): MatchingBlock[] => {
  const positions = indexPositions(b);
  const found: MatchingBlock[] = [];
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const window = pending.pop();
    if (!window) break;
    const [alo, ahi, blo, bhi] = window;
    const match = findLongestMatch(a, positions, alo, ahi, blo, bhi);
    if (match.size === 0) continue;
    found.push(match);
    if (alo < match.a && blo < match.b) {
      pending.push([alo, match.a, blo, match.b]);
    }
    if (match.a + match.size < ahi && match.b + match.size < bhi) {
      pending.push([match.a + match.size, ahi, match.b + match.size, bhi]);
    }
  }

  found.sort((x, y) => x.a - y.a || x.b - y.b);

  const merged: MatchingBlock[] = [];
  for (const block of found) {
    const last = merged[merged.length - 1];
    if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
      last.size += block.size;
    } else {
      merged.push({ ...block });
    }
  }
  merged.push({ a: a.length, b: b.length, size: 0 });
  return merged;
};

export const getOpcodes = (a: readonly string[], b: readonly string[]): Opcode[] => {
  const opcodes: Opcode[] = [];
  let i = 0;
  let j = 0;
  for (const block of getMatchingBlocks(a, b)) {
    let tag: OpcodeTag | null = null;
    if (i < block.a && j < block.b) tag = "replace";
    else if (i < block.a) tag = "delete";
    else if (j < block.b) tag = "insert";
    if (tag) {
      opcodes.push({ tag, i1: i, i2: block.a, j1: j, j2: block.b });
    }
    i = block.a + block.size;
    j = block.b + block.size;
    if (block.size > 0) {
      opcodes.push({ tag: "equal", i1: block.a, i2: i, j1: block.b, j2: j });
    }
  }
  return opcodes;
};

export const similarityRatio = (a: readonly string[], b: readonly string[]): number => {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matched = getMatchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
};
