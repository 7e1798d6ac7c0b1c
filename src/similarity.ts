/*********************************************************************
 * src/similarity.ts
 *
 * How alike are two tracks, 0..1?
 *
 * Both tracks are reduced with Douglas-Peucker (simplify-js) to a
 * resolution of `simplifyMeters`, the remaining coordinates rounded
 * to 3 digits (~100 m) and compared as sets:
 *
 *   score = (1 - |n1 - n2| / max(n1, n2)) * |set1 ∩ set2| / min(|set1|, |set2|)
 *
 * with n the number of simplified points. Scores at the configured
 * resolution are cached on both records; any geometry change on either
 * side drops them.
 *********************************************************************/

import simplify from "simplify-js";
import { getConfig } from "./config.ts";
import { roundTo } from "./geo.ts";
import type { TrackRecord } from "./record.ts";

/**
 * Compute a *dynamic* tolerance (in degrees) for a resolution in metres.
 *
 *   - We approximate 1° ≈ 111 km at the equator → 0.001° ≈ 111 m.
 *   - For higher latitudes we shrink the tolerance proportionally.
 */
export function toleranceForResolution(coords: ReadonlyArray<[number, number]>, targetMeters: number): number {
  if (coords.length === 0) return 0;

  let minLat = Infinity,
    maxLat = -Infinity;
  for (const [, lat] of coords) {
    if (lat < minLat) minLat = lat;
    if (lat > maxLat) maxLat = lat;
  }

  // Degree-to-metre conversion at the track's centre latitude
  const centerLat = (minLat + maxLat) / 2;
  const metersPerDegreeLat = 111_132;
  const metersPerDegreeLon = 111_320 * Math.cos((centerLat * Math.PI) / 180);

  // Worst case of the two
  const metersPerDegree = Math.min(metersPerDegreeLat, metersPerDegreeLon);

  // Never more than 0.01° ≈ 1 km
  return Math.min(targetMeters / metersPerDegree, 0.01);
}

interface Simplified {
  count: number;
  positions: Set<string>;
}

function simplified(record: TrackRecord, meters: number): Simplified {
  const coords = record.pointList().map((p): [number, number] => [p.longitude, p.latitude]);
  const tolerance = toleranceForResolution(coords, meters);
  const reduced = simplify(
    coords.map(([x, y]) => ({ x, y })),
    tolerance,
    true,
  );
  return {
    count: reduced.length,
    positions: new Set(reduced.map((p) => `${roundTo(p.x, 3)},${roundTo(p.y, 3)}`)),
  };
}

/**
 * 0 = nothing in common, 1 = the same line at this resolution. Only
 * scores at the configured resolution are cached.
 */
export function similarity(a: TrackRecord, b: TrackRecord, meters: number = getConfig().simplifyMeters): number {
  const cacheable = meters === getConfig().simplifyMeters;
  const cached = cacheable ? a.similarities.get(b) : undefined;
  if (cached !== undefined) return cached;

  let score = 0;
  if (a.pointCount() && b.pointCount()) {
    const left = simplified(a, meters);
    const right = simplified(b, meters);
    const lengthFactor = 1 - Math.abs(left.count - right.count) / Math.max(left.count, right.count);
    let shared = 0;
    for (const key of left.positions) if (right.positions.has(key)) shared++;
    score = (lengthFactor * shared) / Math.min(left.positions.size, right.positions.size);
  }

  if (cacheable) {
    a.similarities.set(b, score);
    b.similarities.set(a, score);
  }
  return score;
}

/** The most similar of `others`, or undefined if there are none. */
export function bestSimilarity(
  record: TrackRecord,
  others: Iterable<TrackRecord>,
): { record: TrackRecord; score: number } | undefined {
  let best: { record: TrackRecord; score: number } | undefined;
  for (const other of others) {
    if (other === record) continue;
    const score = similarity(record, other);
    if (!best || score > best.score) best = { record: other, score };
  }
  return best;
}
