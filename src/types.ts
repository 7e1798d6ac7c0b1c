/* src/types.ts ----------------------------------------------------------- */

export interface BoundingBox {
  /** Westernmost longitude (‑180 → 180) */
  minLon: number;
  /** Southernmost latitude (‑90 → 90) */
  minLat: number;
  /** Easternmost longitude */
  maxLon: number;
  /** Northernmost latitude */
  maxLat: number;
}

/**
 * One recorded position. Coordinates are rounded to 6 decimal digits
 * whenever a point enters a record.
 */
export interface TrackPoint {
  latitude: number;
  longitude: number;
  /** Metres above sea level */
  elevation?: number;
  time?: Date;
}

export interface Waypoint extends TrackPoint {
  name?: string;
}

export interface TrackSegment {
  points: TrackPoint[];
}

/** A `<trk>` element: one or more segments. */
export interface GpxTrack {
  name?: string;
  segments: TrackSegment[];
}

/* --------------------------------------------------------------------
 * Typed fields that the attribute codec multiplexes into the keyword
 * string of the persisted document.
 * ------------------------------------------------------------------- */

export interface RecordAttributes {
  /** Plain tags, sorted and unique */
  tags: string[];
  category: string;
  isPublic: boolean;
  /** Cross-collection ids, newest first */
  ids: string[];
}

/**
 * Whatever a collection can tell about a record from its listing alone.
 * Every field is optional; a missing field forces a full load on access.
 */
export interface RecordHeader {
  title?: string;
  description?: string;
  category?: string;
  isPublic?: boolean;
  tags?: string[];
  ids?: string[];
  /** Time of the first point */
  time?: Date;
  /** Length in km */
  distance?: number;
}

/** Field names a collection may be able to write one at a time. */
export type WritableField = "title" | "description" | "category" | "public" | "tags" | "ids";

/** A pending-write marker: one field, or "gpx" for a full rewrite. */
export type DirtyMarker = WritableField | "gpx";

/** A circle whose points are hidden inside TrackRecord.fenced(). */
export interface Fence {
  latitude: number;
  longitude: number;
  /** Metres */
  radius: number;
}
