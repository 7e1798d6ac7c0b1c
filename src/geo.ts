/*********************************************************************
 * src/geo.ts
 *
 * The geometry half of a record: tracks → segments → points, plus
 * waypoints and the three header strings of a GPX document.
 *
 * Points are expected in ascending time order; nothing here sorts them.
 *********************************************************************/

import { ValidationError } from "./errors.ts";
import type { BoundingBox, Fence, GpxTrack, TrackPoint, TrackSegment, Waypoint } from "./types.ts";

const EARTH_RADIUS_M = 6_371_000;
/** Below this speed an interval counts as standing still (km/h) */
const STOPPED_SPEED_KMH = 1.0;
/** A hop longer than this always starts a new segment in fixJumps() */
const MAX_HOP_M = 5000;

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance in metres. */
export function haversineMeters(a: TrackPoint, b: TrackPoint): number {
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function isClose(a: number, b: number, relTol: number): boolean {
  return Math.abs(a - b) <= relTol * Math.max(Math.abs(a), Math.abs(b));
}

/**
 * `"52.52/13.405/500 48.14/11.58/200"` → fences, each `lat/lon/metres`.
 * An empty string gives none.
 */
export function parseFences(text: string): Fence[] {
  return text
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .map((part) => {
      const numbers = part.split("/").map((n) => Number(n.trim()));
      const [latitude, longitude, radius] = numbers;
      if (numbers.length !== 3 || numbers.some((n) => !Number.isFinite(n)) || radius < 0) {
        throw new ValidationError(`Fence needs latitude/longitude/radius, got "${part}"`, "fences", { part });
      }
      return { latitude, longitude, radius };
    });
}

/** True if `point` lies outside every fence. */
export function outsideFences(point: TrackPoint, fences: readonly Fence[]): boolean {
  return fences.every((fence) => haversineMeters(point, fence) > fence.radius);
}

/**
 * Same position to `digits` decimal places: both coordinates within half
 * a unit of the last digit. Elevation and time are ignored.
 */
export function positionsEqual(a: TrackPoint, b: TrackPoint, digits = 4): boolean {
  const tol = 0.5 / 10 ** digits;
  return Math.abs(a.longitude - b.longitude) <= tol && Math.abs(a.latitude - b.latitude) <= tol;
}

export function clonePoint<T extends TrackPoint>(point: T): T {
  const copy = { ...point };
  if (point.time) copy.time = new Date(point.time.getTime());
  return copy;
}

export function cloneTracks(tracks: readonly GpxTrack[]): GpxTrack[] {
  return tracks.map((track) => ({
    ...(track.name !== undefined ? { name: track.name } : {}),
    segments: track.segments.map((segment) => ({ points: segment.points.map(clonePoint) })),
  }));
}

/**
 * An in-memory GPX document. Fields are public and mutable; whoever
 * changes them directly is responsible for telling the owning record
 * (see TrackRecord.rewrite()).
 */
export class GeoSequence {
  name = "";
  description = "";
  /** Raw keyword string exactly as it sits in the document */
  keywords = "";
  /** Document-level time, used only when there are no points */
  time?: Date;
  tracks: GpxTrack[] = [];
  waypoints: Waypoint[] = [];

  /* ------------------------------------------------------------------
   * Traversal
   * ------------------------------------------------------------------ */

  *segments(): Generator<TrackSegment, void, undefined> {
    for (const track of this.tracks) {
      yield* track.segments;
    }
  }

  *points(): Generator<TrackPoint, void, undefined> {
    for (const segment of this.segments()) {
      yield* segment.points;
    }
  }

  pointList(): TrackPoint[] {
    return [...this.points()];
  }

  pointCount(): number {
    let count = 0;
    for (const segment of this.segments()) count += segment.points.length;
    return count;
  }

  firstPoint(): TrackPoint | undefined {
    for (const point of this.points()) return point;
    return undefined;
  }

  lastPoint(): TrackPoint | undefined {
    for (let t = this.tracks.length - 1; t >= 0; t--) {
      const segments = this.tracks[t].segments;
      for (let s = segments.length - 1; s >= 0; s--) {
        const points = segments[s].points;
        if (points.length) return points[points.length - 1];
      }
    }
    return undefined;
  }

  /** Time of the first point, falling back to the document time. */
  firstTime(): Date | undefined {
    return this.firstPoint()?.time ?? this.time;
  }

  lastTime(): Date | undefined {
    return this.lastPoint()?.time;
  }

  /* ------------------------------------------------------------------
   * Derived values
   * ------------------------------------------------------------------ */

  /** Length over all points in km, rounded to metres. */
  distance(): number {
    let meters = 0;
    let previous: TrackPoint | undefined;
    for (const point of this.points()) {
      if (previous) meters += haversineMeters(previous, point);
      previous = point;
    }
    return roundTo(meters / 1000, 3);
  }

  /** Average km/h between first and last point time, or 0. */
  speed(): number {
    const first = this.firstTime();
    const last = this.lastTime();
    if (!first || !last) return 0;
    const seconds = Math.floor((last.getTime() - first.getTime()) / 1000);
    return seconds ? (this.distance() / seconds) * 3600 : 0;
  }

  /** km/h counting only intervals where we actually moved. */
  movingSpeed(): number {
    let movingMeters = 0;
    let movingSeconds = 0;
    for (const segment of this.segments()) {
      for (let i = 1; i < segment.points.length; i++) {
        const a = segment.points[i - 1];
        const b = segment.points[i];
        if (!a.time || !b.time) continue;
        const seconds = (b.time.getTime() - a.time.getTime()) / 1000;
        if (seconds <= 0) continue;
        const meters = haversineMeters(a, b);
        if ((meters / seconds) * 3.6 > STOPPED_SPEED_KMH) {
          movingMeters += meters;
          movingSeconds += seconds;
        }
      }
    }
    return movingSeconds ? (movingMeters / movingSeconds) * 3.6 : 0;
  }

  /**
   * Direction from the last point back to the first in degrees 0..360,
   * on a flat earth scaled to ±90/±180. 0 without points.
   */
  angle(): number {
    const first = this.firstPoint();
    const last = this.lastPoint();
    if (!first || !last) return 0;
    const normLat = (roundTo(first.latitude, 6) - roundTo(last.latitude, 6)) / 90;
    const normLon = (roundTo(first.longitude, 6) - roundTo(last.longitude, 6)) / 180;
    const norm = Math.sqrt(normLat ** 2 + normLon ** 2);
    if (norm === 0) return 0;
    const result = (Math.asin(normLon / norm) * 180) / Math.PI;
    if (normLat >= 0) return (360 + result) % 360;
    return 180 - result;
  }

  bounds(): BoundingBox | undefined {
    let box: BoundingBox | undefined;
    for (const { longitude: lon, latitude: lat } of this.points()) {
      if (!box) {
        box = { minLon: lon, minLat: lat, maxLon: lon, maxLat: lat };
        continue;
      }
      if (lon < box.minLon) box.minLon = lon;
      if (lon > box.maxLon) box.maxLon = lon;
      if (lat < box.minLat) box.minLat = lat;
      if (lat > box.maxLat) box.maxLat = lat;
    }
    return box;
  }

  /**
   * Cheap fingerprint over all points. Equal geometry gives an equal
   * hash; the converse is only very likely.
   */
  pointsHash(): number {
    let result = 1.0;
    for (const point of this.points()) {
      if (point.longitude) result *= point.longitude;
      if (point.latitude) result *= point.latitude;
      if (point.elevation) result *= point.elevation;
      if (point.time) {
        result *= point.time.getUTCHours() + 1;
        result *= point.time.getUTCMinutes() + 1;
        result *= point.time.getUTCSeconds() + 1;
      }
      result %= 1e20;
    }
    return result;
  }

  /* ------------------------------------------------------------------
   * Comparison
   * ------------------------------------------------------------------ */

  pointsEqual(other: GeoSequence, digits = 4): boolean {
    if (this.pointCount() !== other.pointCount()) return false;
    if (!isClose(this.angle(), other.angle(), 1 / 10 ** digits)) return false;
    const theirs = other.points();
    for (const mine of this.points()) {
      const next = theirs.next();
      if (next.done || !positionsEqual(mine, next.value, digits)) return false;
    }
    return true;
  }

  /**
   * Where does `other` start inside this sequence? Brute force over every
   * offset. undefined if it is not a contiguous part.
   */
  index(other: GeoSequence, digits = 4): number | undefined {
    const mine = this.pointList();
    const theirs = other.pointList();
    for (let start = 0; start <= mine.length - theirs.length; start++) {
      let matches = true;
      for (let i = 0; i < theirs.length; i++) {
        if (!positionsEqual(mine[start + i], theirs[i], digits)) {
          matches = false;
          break;
        }
      }
      if (matches) return start;
    }
    return undefined;
  }

  /**
   * If the first points and the last points are shifted by the same
   * non-zero amount, return it in milliseconds (other minus this).
   */
  timeOffset(other: GeoSequence): number | undefined {
    const offset = (a?: TrackPoint, b?: TrackPoint): number | undefined =>
      a?.time && b?.time ? b.time.getTime() - a.time.getTime() : undefined;

    const start = offset(this.firstPoint(), other.firstPoint());
    if (!start) return undefined;
    const end = offset(this.lastPoint(), other.lastPoint());
    return start === end ? start : undefined;
  }

  /* ------------------------------------------------------------------
   * Mutation
   * ------------------------------------------------------------------ */

  /** Append to the last segment of the last track, creating both if needed. */
  addPoints(points: readonly TrackPoint[]): void {
    if (!points.length) return;
    if (!this.tracks.length) this.tracks.push({ segments: [] });
    const track = this.tracks[this.tracks.length - 1];
    if (!track.segments.length) track.segments.push({ points: [] });
    const segment = track.segments[track.segments.length - 1];
    const copies = points.map(clonePoint);
    GeoSequence.roundPoints(copies);
    segment.points.push(...copies);
  }

  /** Shift every point and waypoint time by `ms`. */
  adjustTime(ms: number): void {
    const shift = (point: TrackPoint) => {
      if (point.time) point.time = new Date(point.time.getTime() + ms);
    };
    for (const point of this.points()) shift(point);
    this.waypoints.forEach(shift);
    if (this.time) this.time = new Date(this.time.getTime() + ms);
  }

  /**
   * Split segments wherever time jumps back, leaps forward by more than
   * `minutes`, appears or disappears, or the position hops over 5 km.
   * Empty segments are dropped. Returns true if anything changed.
   */
  fixJumps(minutes = 30): boolean {
    let changed = false;
    const maxGap = minutes * 60_000;
    const newTracks: GpxTrack[] = [];
    for (const track of this.tracks) {
      const newSegments: TrackSegment[] = [];
      for (const segment of track.segments) {
        if (!segment.points.length) {
          changed = true;
          continue;
        }
        let current: TrackSegment = { points: [segment.points[0]] };
        for (const point of segment.points.slice(1)) {
          const prev = current.points[current.points.length - 1];
          let needsBreak: boolean;
          if (!point.time || !prev.time) {
            needsBreak = Boolean(point.time) !== Boolean(prev.time) || haversineMeters(prev, point) > MAX_HOP_M;
          } else {
            const gap = point.time.getTime() - prev.time.getTime();
            needsBreak = gap > maxGap || gap < 0 || haversineMeters(prev, point) > MAX_HOP_M;
          }
          if (needsBreak) {
            changed = true;
            newSegments.push(current);
            current = { points: [] };
          }
          current.points.push(point);
        }
        newSegments.push(current);
      }
      newTracks.push({ ...(track.name !== undefined ? { name: track.name } : {}), segments: newSegments });
    }
    if (changed) this.tracks = newTracks;
    return changed;
  }

  clone(): GeoSequence {
    const copy = new GeoSequence();
    copy.name = this.name;
    copy.description = this.description;
    copy.keywords = this.keywords;
    if (this.time) copy.time = new Date(this.time.getTime());
    copy.tracks = cloneTracks(this.tracks);
    copy.waypoints = this.waypoints.map(clonePoint);
    return copy;
  }

  /** Round in place to 6 decimal digits; some stores truncate further. */
  static roundPoints(points: Iterable<TrackPoint>): void {
    for (const point of points) {
      point.latitude = roundTo(point.latitude, 6);
      point.longitude = roundTo(point.longitude, 6);
    }
  }
}
