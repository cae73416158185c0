export interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

// Below this length of `b` every element may seed a match.
const POPULAR_MIN_LENGTH = 200;

/**
 * Gestalt pattern matching (Ratcliff/Obershelp) over Unicode code points.
 *
 * The longest common block is found first, then the regions to its left and
 * right are matched recursively. When `b` is long, elements that make up more
 * than 1% of it ("popular" elements) are not used to seed a match, though a
 * match may still extend across them.
 */
export class SequenceMatcher {
  private readonly a: string[];
  private readonly b: string[];
  private readonly b2j = new Map<string, number[]>();
  private matchingBlocks: MatchingBlock[] | null = null;

  constructor(a: string, b: string, autojunk = true) {
    this.a = Array.from(a);
    this.b = Array.from(b);
    this.indexB(autojunk);
  }

  ratio(): number {
    const total = this.a.length + this.b.length;
    if (total === 0) return 1;

    const matches = this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
    return (2 * matches) / total;
  }

  /**
   * Non-overlapping matching blocks in increasing order, adjacent blocks
   * merged, terminated by a zero-size sentinel at `(a.length, b.length)`.
   */
  getMatchingBlocks(): MatchingBlock[] {
    if (this.matchingBlocks) return this.matchingBlocks;

    const la = this.a.length;
    const lb = this.b.length;
    const pending: Array<[number, number, number, number]> = [[0, la, 0, lb]];
    const found: MatchingBlock[] = [];

    let next = pending.pop();
    while (next) {
      const [alo, ahi, blo, bhi] = next;
      const match = this.findLongestMatch(alo, ahi, blo, bhi);

      if (match.size > 0) {
        found.push(match);
        if (alo < match.a && blo < match.b) {
          pending.push([alo, match.a, blo, match.b]);
        }
        if (match.a + match.size < ahi && match.b + match.size < bhi) {
          pending.push([match.a + match.size, ahi, match.b + match.size, bhi]);
        }
      }
      next = pending.pop();
    }

    found.sort((x, y) => x.a - y.a || x.b - y.b);

    const collapsed: MatchingBlock[] = [];
    let current: MatchingBlock = { a: 0, b: 0, size: 0 };
    for (const block of found) {
      if (current.a + current.size === block.a && current.b + current.size === block.b) {
        current = { ...current, size: current.size + block.size };
      } else {
        if (current.size > 0) collapsed.push(current);
        current = block;
      }
    }
    if (current.size > 0) collapsed.push(current);
    collapsed.push({ a: la, b: lb, size: 0 });

    this.matchingBlocks = collapsed;
    return collapsed;
  }

  /**
   * Longest block with `a[i..i+size) == b[j..j+size)` inside the given
   * ranges. Ties go to the smallest `i`, then the smallest `j`.
   */
  findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
    const { a, b } = this;
    let besti = alo;
    let bestj = blo;
    let bestsize = 0;
    let j2len = new Map<number, number>();

    for (let i = alo; i < ahi; i++) {
      const nextJ2len = new Map<number, number>();
      for (const j of this.b2j.get(a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (j2len.get(j - 1) ?? 0) + 1;
        nextJ2len.set(j, k);
        if (k > bestsize) {
          besti = i - k + 1;
          bestj = j - k + 1;
          bestsize = k;
        }
      }
      j2len = nextJ2len;
    }

    while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
      besti--;
      bestj--;
      bestsize++;
    }
    while (besti + bestsize < ahi && bestj + bestsize < bhi && a[besti + bestsize] === b[bestj + bestsize]) {
      bestsize++;
    }

    return { a: besti, b: bestj, size: bestsize };
  }

  private indexB(autojunk: boolean): void {
    this.b.forEach((element, j) => {
      const indices = this.b2j.get(element);
      if (indices) {
        indices.push(j);
      } else {
        this.b2j.set(element, [j]);
      }
    });

    const n = this.b.length;
    if (autojunk && n >= POPULAR_MIN_LENGTH) {
      const ntest = Math.floor(n / 100) + 1;
      for (const [element, indices] of this.b2j) {
        if (indices.length > ntest) this.b2j.delete(element);
      }
    }
  }
}

export const similarityRatio = (a: string, b: string): number => new SequenceMatcher(a, b).ratio();
