// Shared fixtures for the test suites
import { GeoSequence, roundTo } from "../geo.ts";
import { TrackRecord } from "../record.ts";
import type { TrackPoint } from "../types.ts";

export const START = new Date("2024-05-01T08:00:00.000Z");

export interface PointOptions {
  start?: Date;
  latitude?: number;
  longitude?: number;
  /** Degrees added per point on both axes */
  step?: number;
  /** Seconds between points */
  seconds?: number;
}

/** A straight line heading north-east, one point every `seconds`. */
export function makePoints(count: number, options: PointOptions = {}): TrackPoint[] {
  const { start = START, latitude = 52.5, longitude = 13.4, step = 0.0001, seconds = 10 } = options;
  return Array.from({ length: count }, (_, i) => ({
    latitude: roundTo(latitude + i * step, 6),
    longitude: roundTo(longitude + i * step, 6),
    elevation: 40,
    time: new Date(start.getTime() + i * seconds * 1000),
  }));
}

export function makeGpx(points: TrackPoint[], title = ""): GeoSequence {
  const gpx = new GeoSequence();
  gpx.name = title;
  gpx.tracks = [{ segments: [{ points }] }];
  return gpx;
}

export function makeRecord(count: number, title = "", options: PointOptions = {}): TrackRecord {
  return new TrackRecord(makeGpx(makePoints(count, options), title));
}
