/*********************************************************************
 * src/merge.ts
 *
 * Fold one record into another that carries the same track.
 *
 * Every step reports what it changes (or would change, with dryRun).
 * The real run happens inside one batchChanges() scope, so the target
 * is written exactly once.
 *********************************************************************/

import { cleanCrossIds, normalizeTags } from "./codec.ts";
import type { Collection } from "./collection.ts";
import { CannotMergeError } from "./errors.ts";
import { positionsEqual } from "./geo.ts";
import { log } from "./log.ts";
import type { TrackRecord } from "./record.ts";
import { type RecordSource, collectRecords } from "./recordSource.ts";
import type { Waypoint } from "./types.ts";

export type MergeCheck = { mergeable: true; offset: number } | { mergeable: false; reason: string };

export interface MergeOptions {
  /** Remove `other` afterwards */
  remove?: boolean;
  /** Only report */
  dryRun?: boolean;
  /** Also accept `other` being a contiguous part of `self` or the reverse */
  partial?: boolean;
}

/**
 * Can `other` be merged into `self`, and at which point offset do the
 * two line up?
 */
export function canMerge(self: TrackRecord, other: TrackRecord, partial = false): MergeCheck {
  if (self === other || (self.identity !== undefined && self.toString() === other.toString())) {
    return { mergeable: false, reason: `Cannot merge ${self.toString()} into itself` };
  }
  if (other.pointCount() === 0 && other.waypoints().length > 0) {
    return { mergeable: true, offset: 0 };
  }
  if (partial) {
    const offset =
      self.pointCount() >= other.pointCount() ? self.index(other) : other.index(self);
    if (offset !== undefined) return { mergeable: true, offset };
  }
  if (self.pointsEqual(other)) return { mergeable: true, offset: 0 };
  return { mergeable: false, reason: `${other.toString()} cannot be merged into ${self.toString()}: points differ` };
}

/** Empty, "<category> track", or a bare date/time like "2024-01-01 07:56". */
function looksDefault(record: TrackRecord, title: string): boolean {
  return !title || title === `${record.getCategory()} track` || /^[\d :_-]+$/.test(title);
}

/**
 * Merge `other` into `self`. Returns one line per change. Throws
 * CannotMergeError if the geometry does not fit.
 */
export function mergeRecords(self: TrackRecord, other: TrackRecord, options: MergeOptions = {}): string[] {
  const { remove = false, dryRun = false, partial = false } = options;
  const check = canMerge(self, other, partial);
  if (!check.mergeable) {
    throw new CannotMergeError(check.reason, { self: self.toString(), other: other.toString() });
  }
  const name = other.toString();
  const messages: string[] = [];
  const steps = () => {
    mergeGeometry(self, other, check.offset, dryRun, messages);
    mergeWaypoints(self, other, dryRun, messages);
    mergeTitle(self, other, dryRun, messages);
    mergeDescription(self, other, dryRun, messages);
    mergeVisibility(self, other, dryRun, messages);
    mergeCategory(self, other, messages);
    mergeTags(self, other, dryRun, messages);
    mergeIds(self, other, dryRun, messages);
  };
  if (dryRun) steps();
  else self.batchChanges(steps);

  if (remove) {
    if (!messages.length) messages.push(`removed exact duplicate ${name}`);
    if (!dryRun && other.collection) other.remove();
  }
  messages.forEach((m) => log.debug(`merge into ${self.toString()}: ${m}`));
  return messages;
}

function mergeGeometry(self: TrackRecord, other: TrackRecord, offset: number, dryRun: boolean, messages: string[]): void {
  const mine = self.pointList();
  const theirs = other.pointList();
  if (theirs.length > mine.length) {
    messages.push(`${theirs.length} points from ${other.toString()} replace ${mine.length}`);
    if (!dryRun) self.replaceTracks(other.getGpx().tracks);
    return;
  }
  let filled = 0;
  theirs.forEach((point, i) => {
    const target = mine[offset + i];
    if (target && !target.time && point.time) {
      filled++;
      if (!dryRun) target.time = new Date(point.time.getTime());
    }
  });
  if (!filled) return;
  messages.push(`Copied times for ${filled} points from ${other.toString()}`);
  if (!dryRun) self.rewrite();
}

function mergeWaypoints(self: TrackRecord, other: TrackRecord, dryRun: boolean, messages: string[]): void {
  const known = [...self.waypoints()];
  const added: Waypoint[] = [];
  for (const waypoint of other.waypoints()) {
    if (known.some((k) => positionsEqual(k, waypoint, 6))) continue;
    known.push(waypoint);
    added.push(waypoint);
  }
  if (!added.length) return;
  messages.push(`Added ${added.length} waypoints from ${other.toString()}`);
  if (!dryRun) self.addWaypoints(added);
}

function mergeTitle(self: TrackRecord, other: TrackRecord, dryRun: boolean, messages: string[]): void {
  const mine = self.getTitle();
  const theirs = other.getTitle();
  if (mine === theirs || !looksDefault(self, mine)) return;
  if (looksDefault(other, theirs) && (mine || !theirs)) return;
  messages.push(`Title: ${mine} -> ${theirs}`);
  if (!dryRun) self.setTitle(theirs);
}

function mergeDescription(self: TrackRecord, other: TrackRecord, dryRun: boolean, messages: string[]): void {
  const mine = self.getDescription();
  const theirs = other.getDescription();
  if (!theirs || theirs === mine) return;
  messages.push(`Appended description from ${other.toString()}`);
  if (!dryRun) self.setDescription(mine ? `${mine}\n${theirs}` : theirs);
}

function mergeVisibility(self: TrackRecord, other: TrackRecord, dryRun: boolean, messages: string[]): void {
  if (self.isPublic() || !other.isPublic()) return;
  messages.push("Visibility: private -> public");
  if (!dryRun) self.setPublic(true);
}

function mergeCategory(self: TrackRecord, other: TrackRecord, messages: string[]): void {
  const mine = self.getCategory();
  const theirs = other.getCategory();
  if (mine !== theirs) messages.push(`Category: ${other.toString()} has ${theirs}, keeping ${mine}`);
}

function mergeTags(self: TrackRecord, other: TrackRecord, dryRun: boolean, messages: string[]): void {
  const mine = self.getTags();
  const union = normalizeTags([...mine, ...other.getTags()]);
  if (union.length <= mine.length) return;
  messages.push(`Tags: added ${union.filter((t) => !mine.includes(t)).join(", ")}`);
  if (!dryRun) self.setTags(union);
}

function mergeIds(self: TrackRecord, other: TrackRecord, dryRun: boolean, messages: string[]): void {
  const mine = self.getIds();
  const cleaned = cleanCrossIds([...mine, ...other.getIds()]);
  if (cleaned.length === mine.length && cleaned.every((id, i) => id === mine[i])) return;
  messages.push(`Ids: ${cleaned.join(" ")}`);
  if (!dryRun) self.setIds(cleaned);
}

/* ------------------------------------------------------------------ */
/* Whole collections                                                   */
/* ------------------------------------------------------------------ */

export interface CollectionMergeOptions {
  /** Move instead of copy: sources are removed afterwards */
  remove?: boolean;
  dryRun?: boolean;
  /** Never merge, add every source as a new record */
  copy?: boolean;
}

/**
 * Bring every record of `source` into `target`. A source record whose
 * points match a target record is merged into it, all others are added.
 */
export function mergeCollections(
  target: Collection,
  source: RecordSource,
  options: CollectionMergeOptions = {},
): string[] {
  const { remove = false, dryRun = false, copy = false } = options;
  const byHash = new Map<number, TrackRecord[]>();
  const index = (record: TrackRecord) => {
    const hash = record.pointsHash();
    const list = byHash.get(hash);
    if (list) list.push(record);
    else byHash.set(hash, [record]);
  };
  if (!copy) target.list().forEach(index);

  const messages: string[] = [];
  for (const record of collectRecords(source)) {
    if (record.collection === target) continue;
    const match = copy
      ? undefined
      : byHash.get(record.pointsHash())?.find((candidate) => canMerge(candidate, record).mergeable);
    if (match) {
      const lines = mergeRecords(match, record, { remove, dryRun });
      messages.push(...lines.map((line) => `${match.toString()}: ${line}`));
      continue;
    }
    const verb = remove ? "moved" : "copied";
    if (dryRun) {
      messages.push(`${record.toString()} would be ${verb} to ${target.identifier()}`);
      continue;
    }
    const name = record.toString();
    const added = target.add(record);
    if (remove && added !== record) record.remove();
    if (!copy) index(added);
    messages.push(`${name} ${verb} to ${added.toString()}`);
  }
  return messages;
}
