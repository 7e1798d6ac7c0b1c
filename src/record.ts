/*********************************************************************
 * src/record.ts
 *
 * TrackRecord: one track, either free-standing or hosted by a
 * Collection. Hosted records mirror their store:
 *
 *   - reads load the full document on first need (header fields from
 *     the listing are served without a load)
 *   - every setter writes back before it returns, unless inside
 *     batchChanges() which coalesces everything into one write
 *   - while the host is decoupled (it is filling the record itself)
 *     setters only touch memory
 *
 * A record without a host behaves as permanently decoupled.
 *********************************************************************/

import {
  checkCategory,
  checkCrossIds,
  checkTag,
  cleanCrossIds,
  decodeAttributes,
  encodeAttributes,
  normalizeTags,
} from "./codec.ts";
import type { Collection } from "./collection.ts";
import { IllegalIdentityChangeError, UnsupportedOperationError, ValidationError } from "./errors.ts";
import { GeoSequence, clonePoint, cloneTracks, outsideFences } from "./geo.ts";
import { toGpxXml } from "./gpxXml.ts";
import { log } from "./log.ts";
import type {
  DirtyMarker,
  Fence,
  GpxTrack,
  RecordAttributes,
  RecordHeader,
  TrackPoint,
  Waypoint,
} from "./types.ts";

/** Which header entry goes stale when a marker is set */
const HEADER_FOR: Record<DirtyMarker, ReadonlyArray<keyof RecordHeader>> = {
  title: ["title"],
  description: ["description"],
  category: ["category"],
  public: ["isPublic"],
  tags: ["tags"],
  ids: ["ids"],
  gpx: ["time", "distance"],
};

export class TrackRecord {
  private host?: Collection;
  private _identity?: string;
  private loaded = true;
  private batching = false;
  private readonly pending = new Set<DirtyMarker>();
  private header: RecordHeader = {};
  private gpx = new GeoSequence();
  /** The real document while fenced() shows a filtered copy */
  private unfenced?: GeoSequence;
  private attrs: RecordAttributes = decodeAttributes("");

  /** Similarity scores against other records, kept in sync on both sides */
  readonly similarities = new Map<TrackRecord, number>();

  /**
   * A free-standing record. The keyword string of `gpx`, if any, is
   * decoded into category, visibility, ids and tags.
   */
  constructor(gpx?: GeoSequence) {
    if (gpx) this.populate(gpx);
  }

  /* ================================================================ */
  /* State                                                             */
  /* ================================================================ */

  get identity(): string | undefined {
    return this._identity;
  }

  get collection(): Collection | undefined {
    return this.host;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /** Pending write markers in the order they were set */
  get dirty(): readonly DirtyMarker[] {
    return [...this.pending];
  }

  get isDecoupled(): boolean {
    return !this.host || this.host.decoupled;
  }

  toString(): string {
    if (!this.host) return `unsaved:${this.gpx.name || "untitled"}`;
    return `${this.host.identifier()}/${this._identity ?? "unsaved"}`;
  }

  /* ================================================================ */
  /* Lazy metadata                                                     */
  /* ================================================================ */

  private fromHeader<K extends keyof RecordHeader>(key: K): RecordHeader[K] {
    return this.loaded ? undefined : this.header[key];
  }

  getTitle(): string {
    const cached = this.fromHeader("title");
    if (cached !== undefined) return cached;
    this.loadFull();
    return this.gpx.name;
  }

  setTitle(value: string): void {
    this.loadFull();
    if (value === this.gpx.name) return;
    this.gpx.name = value;
    this.changed("title");
  }

  getDescription(): string {
    const cached = this.fromHeader("description");
    if (cached !== undefined) return cached;
    this.loadFull();
    return this.gpx.description;
  }

  setDescription(value: string): void {
    this.loadFull();
    if (value === this.gpx.description) return;
    this.gpx.description = value;
    this.changed("description");
  }

  getCategory(): string {
    const cached = this.fromHeader("category");
    if (cached !== undefined) return cached;
    this.loadFull();
    return this.attrs.category;
  }

  setCategory(value: string): void {
    checkCategory(value);
    this.loadFull();
    if (value === this.attrs.category) return;
    this.attrs.category = value;
    this.changed("category");
  }

  isPublic(): boolean {
    const cached = this.fromHeader("isPublic");
    if (cached !== undefined) return cached;
    this.loadFull();
    return this.attrs.isPublic;
  }

  setPublic(value: boolean): void {
    if (typeof value !== "boolean") {
      throw new ValidationError(`Visibility must be true or false, got ${String(value)}`, "public");
    }
    this.loadFull();
    if (value === this.attrs.isPublic) return;
    this.attrs.isPublic = value;
    this.changed("public");
  }

  /** Plain tags, sorted. */
  getTags(): string[] {
    const cached = this.fromHeader("tags");
    if (cached !== undefined) return [...cached];
    this.loadFull();
    return [...this.attrs.tags];
  }

  setTags(tags: readonly string[]): void {
    tags.forEach(checkTag);
    const normalized = normalizeTags(tags);
    if (normalized.length !== tags.length) {
      throw new ValidationError(`Duplicate tag in ${tags.join(", ")}`, "tags");
    }
    this.loadFull();
    if (sameList(normalized, this.attrs.tags)) return;
    this.attrs.tags = normalized;
    this.changed("tags");
  }

  /** Tags already present are ignored. */
  addTags(tags: readonly string[]): void {
    tags.forEach(checkTag);
    this.setTags(normalizeTags([...this.getTags(), ...tags]));
  }

  removeTags(tags: readonly string[]): void {
    const drop = new Set(tags.map((t) => t.trim()));
    this.setTags(this.getTags().filter((t) => !drop.has(t)));
  }

  /** Ids this track is known by in other collections, newest first. */
  getIds(): string[] {
    const cached = this.fromHeader("ids");
    if (cached !== undefined) return [...cached];
    this.loadFull();
    return [...this.attrs.ids];
  }

  setIds(ids: readonly string[]): void {
    checkCrossIds(ids);
    this.loadFull();
    if (sameList(ids, this.attrs.ids)) return;
    this.attrs.ids = [...ids];
    this.changed("ids");
  }

  firstTime(): Date | undefined {
    const cached = this.fromHeader("time");
    if (cached !== undefined) return cached;
    this.loadFull();
    return this.gpx.firstTime();
  }

  /** Length in km. */
  distance(): number {
    const cached = this.fromHeader("distance");
    if (cached !== undefined) return cached;
    this.loadFull();
    return this.gpx.distance();
  }

  /* ================================================================ */
  /* Geometry                                                          */
  /* ================================================================ */

  /**
   * The underlying document. Direct edits are not noticed; call
   * rewrite() afterwards.
   */
  getGpx(): GeoSequence {
    this.loadFull();
    return this.gpx;
  }

  /** Mark the whole document as changed and write it back. */
  rewrite(): void {
    this.loadFull();
    this.changed("gpx");
  }

  addPoints(points: readonly TrackPoint[]): void {
    if (!points.length) return;
    this.loadFull();
    this.gpx.addPoints(points);
    this.changed("gpx");
  }

  addWaypoints(waypoints: readonly Waypoint[]): void {
    if (!waypoints.length) return;
    this.loadFull();
    const copies = waypoints.map(clonePoint);
    GeoSequence.roundPoints(copies);
    this.gpx.waypoints.push(...copies);
    this.changed("gpx");
  }

  replaceTracks(tracks: readonly GpxTrack[]): void {
    this.loadFull();
    const copies = cloneTracks(tracks);
    for (const track of copies) {
      for (const segment of track.segments) GeoSequence.roundPoints(segment.points);
    }
    this.gpx.tracks = copies;
    this.changed("gpx");
  }

  /** Shift all times by `ms` milliseconds. */
  adjustTime(ms: number): void {
    if (!ms) return;
    this.loadFull();
    this.gpx.adjustTime(ms);
    this.changed("gpx");
  }

  /** Start a new segment wherever the recording paused or jumped. */
  splitAtStops(minutes = 30): boolean {
    this.loadFull();
    const changed = this.gpx.fixJumps(minutes);
    if (changed) this.changed("gpx");
    return changed;
  }

  /**
   * Put all segments into the first track. The names of the other
   * tracks get lost; unless `force` is set nothing is joined then, and
   * the returned lines say what would be lost.
   */
  joinTracks(force = false): string[] {
    this.loadFull();
    const [first, ...rest] = this.gpx.tracks;
    if (!first || !rest.length) return [];
    const lost = rest.filter((track) => track.name).map((track) => `  track name: ${track.name ?? ""}`);
    if (lost.length) {
      lost.unshift(
        force
          ? `Joining tracks in ${this.toString()} lost metadata from joined tracks:`
          : `Joining tracks in ${this.toString()} would lose metadata from joined tracks, use force:`,
      );
      if (!force) return lost;
    }
    first.segments = this.gpx.tracks.flatMap((track) => track.segments);
    this.gpx.tracks = [first];
    this.changed("gpx");
    return lost;
  }

  /**
   * Replace this stored record by one record per segment, each with a
   * copy of the metadata. If storing a part fails, the parts stored so
   * far are removed, the original is stored again and the error is
   * rethrown.
   */
  splitSegments(): TrackRecord[] {
    const host = this.host;
    if (!host) throw new UnsupportedOperationError("split segments", this.toString());
    this.loadFull();
    if (this.gpx.tracks.flatMap((track) => track.segments).length < 2) return [this];

    const source = this.toString();
    const backup = this.withEncodedKeywords(() => this.gpx.clone());
    host.remove(this);
    const parts: TrackRecord[] = [];
    try {
      for (const track of backup.tracks) {
        for (const segment of track.segments) {
          const gpx = backup.clone();
          gpx.tracks = cloneTracks([{ ...(track.name !== undefined ? { name: track.name } : {}), segments: [segment] }]);
          parts.push(host.add(new TrackRecord(gpx)));
        }
      }
    } catch (err) {
      log.error(`splitting ${source} failed, restoring it`, err);
      for (const part of parts) part.remove();
      host.add(new TrackRecord(backup));
      throw err;
    }
    log.debug(`split ${source} into ${parts.map((p) => p.toString()).join(", ")}`);
    return parts;
  }

  /**
   * Run `fn` while points and waypoints inside `fences` are hidden.
   * The view is read-only: changing geometry or metadata in there
   * throws.
   */
  fenced<T>(fences: readonly Fence[], fn: () => T): T {
    if (!fences.length) return fn();
    if (this.unfenced) throw new ValidationError(`${this.toString()}: fenced() is already active`, "fences");
    this.loadFull();
    const original = this.gpx;
    const view = original.clone();
    for (const segment of view.segments()) {
      segment.points = segment.points.filter((p) => outsideFences(p, fences));
    }
    view.waypoints = view.waypoints.filter((w) => outsideFences(w, fences));
    this.unfenced = original;
    this.gpx = view;
    this.dropSimilarities();
    try {
      return fn();
    } finally {
      this.gpx = original;
      this.unfenced = undefined;
      this.dropSimilarities();
    }
  }

  /* ================================================================ */
  /* Derived data                                                      */
  /* ================================================================ */

  lastTime(): Date | undefined {
    this.loadFull();
    return this.gpx.lastTime();
  }

  speed(): number {
    this.loadFull();
    return this.gpx.speed();
  }

  movingSpeed(): number {
    this.loadFull();
    return this.gpx.movingSpeed();
  }

  angle(): number {
    this.loadFull();
    return this.gpx.angle();
  }

  pointCount(): number {
    this.loadFull();
    return this.gpx.pointCount();
  }

  points(): Generator<TrackPoint, void, undefined> {
    this.loadFull();
    return this.gpx.points();
  }

  pointList(): TrackPoint[] {
    this.loadFull();
    return this.gpx.pointList();
  }

  waypoints(): readonly Waypoint[] {
    this.loadFull();
    return this.gpx.waypoints;
  }

  /** Things about the geometry a user may want to fix. */
  warnings(): string[] {
    this.loadFull();
    const result: string[] = [];
    let untimed = 0;
    let previous: Date | undefined;
    for (const segment of this.gpx.segments()) {
      if (!segment.points.length) result.push("empty segment");
      for (const point of segment.points) {
        if (!point.time) {
          untimed++;
          continue;
        }
        if (previous && point.time < previous) {
          result.push(`time goes backwards at ${point.time.toISOString()}`);
        }
        previous = point.time;
      }
    }
    if (untimed) result.push(`${untimed} points have no time`);
    return result;
  }

  /* ================================================================ */
  /* Comparison                                                        */
  /* ================================================================ */

  /** Everything two records must share to count as identical. */
  key(): string {
    return JSON.stringify([
      this.getTitle(),
      this.getDescription(),
      this.getTags()
        .map((t) => t.toLowerCase())
        .sort(),
      this.getCategory(),
      this.isPublic(),
      this.lastTime()?.toISOString() ?? null,
      this.angle(),
      this.pointCount(),
      this.pointsHash(),
    ]);
  }

  equals(other: TrackRecord): boolean {
    return this.key() === other.key();
  }

  pointsHash(): number {
    this.loadFull();
    return this.gpx.pointsHash();
  }

  pointsEqual(other: TrackRecord, digits = 4): boolean {
    return this.getGpx().pointsEqual(other.getGpx(), digits);
  }

  /** Offset of `other` as a contiguous part of this track. */
  index(other: TrackRecord, digits = 4): number | undefined {
    return this.getGpx().index(other.getGpx(), digits);
  }

  /** Milliseconds `other` is shifted against this track, if constant. */
  timeOffset(other: TrackRecord): number | undefined {
    return this.getGpx().timeOffset(other.getGpx());
  }

  /**
   * Group records whose [first, last] time spans overlap. Only groups
   * of two or more are returned; records without times are skipped.
   */
  static overlappingTimes(records: Iterable<TrackRecord>): TrackRecord[][] {
    const spans: Array<{ record: TrackRecord; start: number; end: number }> = [];
    for (const record of records) {
      const start = record.firstTime();
      const end = record.lastTime();
      if (start && end) spans.push({ record, start: start.getTime(), end: end.getTime() });
    }
    spans.sort((a, b) => a.start - b.start);

    const groups: TrackRecord[][] = [];
    let group: TrackRecord[] = [];
    let groupEnd = -Infinity;
    for (const span of spans) {
      if (span.start <= groupEnd) {
        group.push(span.record);
      } else {
        if (group.length > 1) groups.push(group);
        group = [span.record];
      }
      groupEnd = Math.max(groupEnd, span.end);
    }
    if (group.length > 1) groups.push(group);
    return groups;
  }

  /* ================================================================ */
  /* Scopes                                                            */
  /* ================================================================ */

  /**
   * Run `fn` with write-back deferred; whatever is dirty afterwards is
   * written once, also when `fn` throws. Nested calls flush only at
   * the outermost level.
   */
  batchChanges<T>(fn: () => T): T {
    const previous = this.batching;
    this.batching = true;
    try {
      return fn();
    } finally {
      this.batching = previous;
      this.flush();
    }
  }

  /** Run `fn` with the host decoupled: no loads, no write-back. */
  decouple<T>(fn: () => T): T {
    return this.host ? this.host.decouple(fn) : fn();
  }

  /* ================================================================ */
  /* Lifecycle                                                         */
  /* ================================================================ */

  /** Fetch the full document from the host unless there is nothing to fetch. */
  loadFull(): void {
    const host = this.host;
    if (this.loaded || !host || this._identity === undefined || host.decoupled) return;
    log.debug(`loading ${this.toString()}`);
    host.readFull(this);
    this.loaded = true;
    this.header = {};
  }

  /**
   * Assign or change the identity. On an attached record with an
   * identity this renames it in the store.
   */
  setIdentity(value: string | undefined): void {
    if (value !== undefined && (!value || value.includes("/"))) {
      throw new ValidationError(`Illegal identity "${value}"`, "identity", { value });
    }
    const host = this.host;
    if (!host) {
      if (value === undefined) return;
      throw new IllegalIdentityChangeError(`${this.toString()}: cannot set an identity without a collection`, {
        value,
      });
    }
    if (value === this._identity) return;
    if (host.decoupled || this._identity === undefined) {
      this._identity = value;
      return;
    }
    if (value === undefined) {
      throw new IllegalIdentityChangeError(`${this.toString()}: the identity cannot be removed`);
    }
    host.renameRecord(this, value);
  }

  /** Remove from the hosting collection. */
  remove(): void {
    if (!this.host) throw new UnsupportedOperationError("remove", this.toString());
    this.host.remove(this);
  }

  /**
   * An unattached deep copy. If this record is hosted, its own
   * cross-id goes first in the copy's id list.
   */
  clone(): TrackRecord {
    const gpx = this.getGpx().clone();
    gpx.keywords = this.encodeAttributes();
    const copy = new TrackRecord(gpx);
    if (this.host && this._identity !== undefined) {
      copy.attrs.ids = cleanCrossIds([this.toString(), ...copy.attrs.ids]);
    }
    return copy;
  }

  /** The GPX document as it would be stored. */
  toXml(): string {
    return this.withEncodedKeywords(() => toGpxXml(this.getGpx()));
  }

  /* ================================================================ */
  /* Collection-facing                                                 */
  /* ================================================================ */

  /**
   * Bind to `collection`. A record never moves silently between
   * collections: attaching to a second host fails.
   */
  attach(collection: Collection, options: { loaded?: boolean } = {}): void {
    if (this.host && this.host !== collection) {
      throw new IllegalIdentityChangeError(`${this.toString()} already belongs to ${this.host.identifier()}`);
    }
    this.host = collection;
    if (options.loaded !== undefined) this.loaded = options.loaded;
  }

  /** Forget host, identity and pending writes. */
  detach(): void {
    this.host = undefined;
    this._identity = undefined;
    this.pending.clear();
  }

  /** Header fields from a listing; ignored once loaded. */
  adoptHeaders(header: RecordHeader): void {
    if (this.loaded) return;
    this.header = { ...header };
  }

  /**
   * Replace the document with one read from storage. Nothing is marked
   * dirty. Throws before touching anything if the keywords are invalid.
   */
  populate(gpx: GeoSequence): void {
    const attrs = decodeAttributes(gpx.keywords);
    GeoSequence.roundPoints(gpx.points());
    GeoSequence.roundPoints(gpx.waypoints);
    this.gpx = gpx;
    this.attrs = attrs;
    this.dropSimilarities();
  }

  encodeAttributes(): string {
    return encodeAttributes(this.attrs);
  }

  /**
   * Run `fn` while the document's keyword string holds the encoded
   * attributes; the previous string is put back afterwards.
   */
  withEncodedKeywords<T>(fn: () => T): T {
    const previous = this.gpx.keywords;
    this.gpx.keywords = this.encodeAttributes();
    try {
      return fn();
    } finally {
      this.gpx.keywords = previous;
    }
  }

  /* ================================================================ */
  /* Write-back                                                        */
  /* ================================================================ */

  private changed(marker: DirtyMarker): void {
    if (this.unfenced) {
      throw new ValidationError(`${this.toString()}: no changes while fenced`, marker);
    }
    for (const key of HEADER_FOR[marker]) delete this.header[key];
    if (marker === "gpx") this.dropSimilarities();
    if (this.isDecoupled) return;
    this.pending.add(marker);
    this.flush();
  }

  private dropSimilarities(): void {
    for (const other of this.similarities.keys()) other.similarities.delete(this);
    this.similarities.clear();
  }

  private flush(): void {
    const host = this.host;
    if (!host || host.decoupled || this.batching || !this.pending.size) return;
    const markers = [...this.pending];
    const full = markers.some((m) => m === "gpx" || !host.capabilities.writeField.has(m));
    if (full) {
      log.debug(`writing ${this.toString()} in full (${markers.join(",")})`);
      host.writeFull(this);
      this.pending.clear();
      return;
    }
    for (const field of markers) {
      if (field === "gpx") continue;
      log.debug(`writing ${field} of ${this.toString()}`);
      host.writeField(this, field);
      this.pending.delete(field);
    }
  }
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
