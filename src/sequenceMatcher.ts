/*********************************************************************
 * src/sequenceMatcher.ts
 *
 * Longest-matching-block alignment of two sequences, reported as
 * edit opcodes. Items are compared through a string key.
 *
 * Every item is significant: there is no junk filter and no
 * popularity heuristic, so long tracks with many repeated positions
 * align the same way short ones do.
 *********************************************************************/

export type OpcodeTag = "equal" | "replace" | "delete" | "insert";

/** `a[i1..i2)` turns into `b[j1..j2)` */
export interface Opcode {
  tag: OpcodeTag;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
}

interface Match {
  a: number;
  b: number;
  size: number;
}

export class SequenceMatcher<T> {
  private readonly a: string[];
  private readonly b: string[];
  /** key → every index in b holding it, ascending */
  private readonly b2j = new Map<string, number[]>();
  private blocks?: Match[];

  constructor(a: readonly T[], b: readonly T[], key: (item: T) => string) {
    this.a = a.map(key);
    this.b = b.map(key);
    this.b.forEach((k, j) => {
      const list = this.b2j.get(k);
      if (list) list.push(j);
      else this.b2j.set(k, [j]);
    });
  }

  /** Longest common block in a[alo..ahi) × b[blo..bhi); earliest wins ties. */
  private longestMatch(alo: number, ahi: number, blo: number, bhi: number): Match {
    let best: Match = { a: alo, b: blo, size: 0 };
    let lengths = new Map<number, number>();
    for (let i = alo; i < ahi; i++) {
      const next = new Map<number, number>();
      for (const j of this.b2j.get(this.a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (lengths.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > best.size) best = { a: i - k + 1, b: j - k + 1, size: k };
      }
      lengths = next;
    }
    return best;
  }

  matchingBlocks(): Match[] {
    if (this.blocks) return this.blocks;
    const found: Match[] = [];
    const queue: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]];
    for (let range = queue.pop(); range; range = queue.pop()) {
      const [alo, ahi, blo, bhi] = range;
      const m = this.longestMatch(alo, ahi, blo, bhi);
      if (!m.size) continue;
      found.push(m);
      if (alo < m.a && blo < m.b) queue.push([alo, m.a, blo, m.b]);
      if (m.a + m.size < ahi && m.b + m.size < bhi) queue.push([m.a + m.size, ahi, m.b + m.size, bhi]);
    }
    found.sort((x, y) => x.a - y.a || x.b - y.b);

    // fuse adjacent blocks
    const merged: Match[] = [];
    for (const m of found) {
      const last = merged[merged.length - 1];
      if (last && last.a + last.size === m.a && last.b + last.size === m.b) {
        last.size += m.size;
      } else {
        merged.push({ ...m });
      }
    }
    merged.push({ a: this.a.length, b: this.b.length, size: 0 });
    this.blocks = merged;
    return merged;
  }

  opcodes(): Opcode[] {
    const result: Opcode[] = [];
    let i = 0;
    let j = 0;
    for (const m of this.matchingBlocks()) {
      const tag: OpcodeTag | undefined =
        i < m.a && j < m.b ? "replace" : i < m.a ? "delete" : j < m.b ? "insert" : undefined;
      if (tag) result.push({ tag, i1: i, i2: m.a, j1: j, j2: m.b });
      i = m.a + m.size;
      j = m.b + m.size;
      if (m.size) result.push({ tag: "equal", i1: m.a, i2: i, j1: m.b, j2: j });
    }
    return result;
  }
}
