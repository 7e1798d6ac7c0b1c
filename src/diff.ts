/*********************************************************************
 * src/diff.ts
 *
 * Compare two sets of records.
 *
 *   identical : same equality key (see TrackRecord.key())
 *   similar   : at least `similarMinPositions` shared (lon, lat) pairs,
 *               compared in detail as a Pair
 *   exclusive : everything left over on either side
 *
 * Matching is one-to-one and greedy in left order: a left record
 * first takes the first identical right record still free, otherwise
 * the free right record sharing the most positions (earliest wins a
 * tie).
 *********************************************************************/

import { getConfig } from "./config.ts";
import { positionsEqual } from "./geo.ts";
import { log } from "./log.ts";
import type { TrackRecord } from "./record.ts";
import { type RecordSource, collectRecords } from "./recordSource.ts";
import { type Opcode, SequenceMatcher } from "./sequenceMatcher.ts";
import type { TrackPoint } from "./types.ts";

/**
 * T title, D description, C category, S status (visibility),
 * K keywords (tags), P points, Z time
 */
export type DiffFlag = "T" | "D" | "C" | "S" | "K" | "P" | "Z";

export interface DiffOptions {
  /** Shared positions needed for "similar"; defaults to the config value */
  similarMinPositions?: number;
  /** List every differing point pair */
  verbose?: boolean;
}

function positionKey(point: TrackPoint): string {
  return `${point.longitude},${point.latitude}`;
}

function alignKey(point: TrackPoint): string {
  return `${point.latitude},${point.longitude},${point.elevation ?? ""}`;
}

function timeText(point: TrackPoint | undefined): string {
  return point?.time?.toISOString() ?? "?";
}

/** 7_200_000 → "2:00:00" */
export function formatDuration(ms: number): string {
  const total = Math.round(Math.abs(ms) / 1000);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const text = `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`;
  return ms < 0 ? `-${text}` : text;
}

function pointText(point: TrackPoint): string {
  const ele = point.elevation !== undefined ? ` ${point.elevation}m` : "";
  return `${timeText(point)} ${point.latitude}/${point.longitude}${ele}`;
}

/* ------------------------------------------------------------------ */
/* Pair                                                                */
/* ------------------------------------------------------------------ */

/** Detailed comparison of two records believed to be the same track. */
export class Pair {
  readonly opcodes: Opcode[];
  readonly differences = new Map<DiffFlag, string[]>();

  constructor(
    readonly left: TrackRecord,
    readonly right: TrackRecord,
    private readonly verbose = false,
  ) {
    const leftPoints = left.pointList();
    const rightPoints = right.pointList();
    this.opcodes = new SequenceMatcher(leftPoints, rightPoints, alignKey).opcodes();
    this.compareMetadata();
    this.comparePoints(leftPoints, rightPoints);
    const offset = left.timeOffset(right);
    if (offset !== undefined) this.add("Z", `Time offset: ${formatDuration(offset)}`);
  }

  get flags(): DiffFlag[] {
    return [...this.differences.keys()];
  }

  private add(flag: DiffFlag, message: string): void {
    const list = this.differences.get(flag);
    if (list) list.push(message);
    else this.differences.set(flag, [message]);
  }

  private compareMetadata(): void {
    const { left, right } = this;
    const compare = (flag: DiffFlag, name: string, a: string, b: string) => {
      if (a !== b) this.add(flag, `${name}: ${a} / ${b}`);
    };
    compare("T", "Title", left.getTitle(), right.getTitle());
    compare("D", "Description", left.getDescription(), right.getDescription());
    compare("C", "Category", left.getCategory(), right.getCategory());
    compare("S", "Status", left.isPublic() ? "public" : "private", right.isPublic() ? "public" : "private");
    compare("K", "Keywords", left.getTags().join(", "), right.getTags().join(", "));
  }

  private comparePoints(a: TrackPoint[], b: TrackPoint[]): void {
    for (const op of this.opcodes) {
      const between = (points: TrackPoint[], from: number, to: number) =>
        `between ${timeText(points[from])} and ${timeText(points[to - 1])}`;
      switch (op.tag) {
        case "equal":
          break;
        case "delete":
          this.add("P", `${op.i2 - op.i1} points ${between(a, op.i1, op.i2)} missing on the right`);
          break;
        case "insert":
          this.add("P", `${op.j2 - op.j1} points ${between(b, op.j1, op.j2)} missing on the left`);
          break;
        case "replace":
          this.compareReplaced(a.slice(op.i1, op.i2), b.slice(op.j1, op.j2), between(a, op.i1, op.i2));
          break;
      }
    }
  }

  private compareReplaced(a: TrackPoint[], b: TrackPoint[], between: string): void {
    const samePositions = a.length === b.length && a.every((p, i) => positionsEqual(p, b[i], 6));
    if (samePositions) {
      const offsets = new Set<number | undefined>(
        a.map((p, i) => {
          const theirs = b[i].time;
          return p.time && theirs ? theirs.getTime() - p.time.getTime() : undefined;
        }),
      );
      if (offsets.size === 1) {
        const [offset] = offsets;
        if (offset) {
          const direction = offset > 0 ? "later" : "earlier";
          this.add("Z", `${a.length} points ${between} are ${formatDuration(Math.abs(offset))} ${direction} on the right`);
        }
        return;
      }
      this.add("Z", `Points ${between} have different times`);
      return;
    }
    this.add("P", `points ${between} are different`);
    if (!this.verbose) return;
    for (let i = 0; i < Math.max(a.length, b.length); i++) {
      this.add("P", `  ${a[i] ? pointText(a[i]) : "-"}  /  ${b[i] ? pointText(b[i]) : "-"}`);
    }
  }
}

/* ------------------------------------------------------------------ */
/* Sides and the collection diff                                       */
/* ------------------------------------------------------------------ */

export class DiffSide {
  readonly records: TrackRecord[];
  /** Distinct (lon, lat) pairs per record */
  readonly positions = new Map<TrackRecord, Set<string>>();
  readonly exclusive: TrackRecord[] = [];

  constructor(source: RecordSource) {
    this.records = collectRecords(source);
    for (const record of this.records) {
      this.positions.set(record, new Set(record.pointList().map(positionKey)));
    }
  }

  shared(record: TrackRecord, other: DiffSide, theirs: TrackRecord): number {
    const mine = this.positions.get(record);
    const their = other.positions.get(theirs);
    if (!mine || !their) return 0;
    let count = 0;
    const [small, large] = mine.size <= their.size ? [mine, their] : [their, mine];
    for (const key of small) if (large.has(key)) count++;
    return count;
  }
}

export class CollectionDiff {
  readonly left: DiffSide;
  readonly right: DiffSide;
  readonly identical: Array<[TrackRecord, TrackRecord]> = [];
  readonly similar: Pair[] = [];

  constructor(left: RecordSource, right: RecordSource, options: DiffOptions = {}) {
    const minPositions = options.similarMinPositions ?? getConfig().similarMinPositions;
    this.left = new DiffSide(left);
    this.right = new DiffSide(right);

    const keys = new Map<TrackRecord, string>();
    const keyOf = (record: TrackRecord): string => {
      let key = keys.get(record);
      if (key === undefined) {
        key = record.key();
        keys.set(record, key);
      }
      return key;
    };

    const free = [...this.right.records];
    const notIdentical: TrackRecord[] = [];
    for (const record of this.left.records) {
      const index = free.findIndex((other) => keyOf(other) === keyOf(record));
      if (index < 0) {
        notIdentical.push(record);
        continue;
      }
      this.identical.push([record, free[index]]);
      free.splice(index, 1);
    }

    for (const record of notIdentical) {
      let bestIndex = -1;
      let bestCount = minPositions - 1;
      free.forEach((other, index) => {
        const count = this.left.shared(record, this.right, other);
        if (count > bestCount) {
          bestCount = count;
          bestIndex = index;
        }
      });
      if (bestIndex < 0) {
        this.left.exclusive.push(record);
        continue;
      }
      this.similar.push(new Pair(record, free[bestIndex], options.verbose));
      free.splice(bestIndex, 1);
    }
    this.right.exclusive.push(...free);
    log.debug(
      `diff: ${this.identical.length} identical, ${this.similar.length} similar, ` +
        `${this.left.exclusive.length}/${this.right.exclusive.length} exclusive`,
    );
  }
}
