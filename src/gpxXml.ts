/*********************************************************************
 * src/gpxXml.ts
 *
 * GPX 1.1 <-> GeoSequence.
 *
 *   metadata/name     ↔ title
 *   metadata/desc     ↔ description
 *   metadata/keywords ↔ encoded attribute string (see codec.ts)
 *   metadata/time     ↔ fallback time for point-less documents
 *   wpt, trk/trkseg/trkpt ↔ waypoints and tracks
 *
 * Output is deterministic: the same GeoSequence always serialises to
 * the same bytes.
 *********************************************************************/

import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { StorageError } from "./errors.ts";
import { GeoSequence } from "./geo.ts";
import type { GpxTrack, TrackPoint, Waypoint } from "./types.ts";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';
const ARRAY_TAGS = new Set(["wpt", "trk", "trkseg", "trkpt"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  // title and description keep their surrounding whitespace
  trimValues: false,
  isArray: (tagName) => ARRAY_TAGS.has(tagName),
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  suppressEmptyNode: true,
});

/* ------------------------------------------------------------------ */
/* Shape of the parsed tree                                            */
/* ------------------------------------------------------------------ */

const PointSchema = z.object({
  "@_lat": z.coerce.number(),
  "@_lon": z.coerce.number(),
  ele: z.coerce.number().optional(),
  time: z.string().optional(),
  name: z.string().optional(),
});

type ParsedPoint = z.infer<typeof PointSchema>;

// `<trkseg/>` and `<trk/>` come back as strings, empty or blank
const Blank = z.string().regex(/^\s*$/);

const SegmentSchema = z.union([
  Blank,
  z.object({ trkpt: z.array(PointSchema).default([]) }),
]);

const TrackSchema = z.union([
  Blank,
  z.object({
    name: z.string().optional(),
    trkseg: z.array(SegmentSchema).default([]),
  }),
]);

const MetadataSchema = z.union([
  Blank,
  z.object({
    name: z.string().optional(),
    desc: z.string().optional(),
    keywords: z.string().optional(),
    time: z.string().optional(),
  }),
]);

const DocumentSchema = z.object({
  gpx: z.object({
    metadata: MetadataSchema.optional(),
    wpt: z.array(PointSchema).default([]),
    trk: z.array(TrackSchema).default([]),
  }),
});

/* ------------------------------------------------------------------ */
/* Parsing                                                             */
/* ------------------------------------------------------------------ */

function parseTime(raw: string): Date {
  const time = new Date(raw.trim());
  if (Number.isNaN(time.getTime())) {
    throw new StorageError(`GPX: illegal time "${raw}"`);
  }
  return time;
}

function toPoint(parsed: ParsedPoint): TrackPoint {
  const point: TrackPoint = { latitude: parsed["@_lat"], longitude: parsed["@_lon"] };
  if (parsed.ele !== undefined) point.elevation = parsed.ele;
  if (parsed.time) point.time = parseTime(parsed.time);
  return point;
}

function toWaypoint(parsed: ParsedPoint): Waypoint {
  const waypoint: Waypoint = toPoint(parsed);
  if (parsed.name) waypoint.name = parsed.name;
  return waypoint;
}

/**
 * Parse a GPX document. Anything that is not well formed GPX raises
 * StorageError; the document is never partially applied.
 */
export function parseGpxXml(xml: string): GeoSequence {
  let tree: unknown;
  try {
    tree = parser.parse(xml, true);
  } catch (err) {
    throw new StorageError(`GPX: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  const result = DocumentSchema.safeParse(tree);
  if (!result.success) {
    const where = result.error.issues[0]?.path.join("/") ?? "";
    throw new StorageError(`GPX: unexpected structure at ${where || "root"}`, result.error);
  }
  const { metadata, wpt, trk } = result.data.gpx;

  const geo = new GeoSequence();
  if (metadata && typeof metadata !== "string") {
    geo.name = metadata.name ?? "";
    geo.description = metadata.desc ?? "";
    geo.keywords = metadata.keywords ?? "";
    if (metadata.time) geo.time = parseTime(metadata.time);
  }
  geo.waypoints = wpt.map(toWaypoint);
  geo.tracks = trk.map((track): GpxTrack => {
    if (typeof track === "string") return { segments: [] };
    return {
      ...(track.name ? { name: track.name } : {}),
      segments: track.trkseg.map((segment) => ({
        points: typeof segment === "string" ? [] : segment.trkpt.map(toPoint),
      })),
    };
  });
  return geo;
}

/* ------------------------------------------------------------------ */
/* Writing                                                             */
/* ------------------------------------------------------------------ */

type XmlNode = Record<string, unknown>;

function pointNode(point: Waypoint, withName: boolean): XmlNode {
  const node: XmlNode = {
    "@_lat": String(point.latitude),
    "@_lon": String(point.longitude),
  };
  if (point.elevation !== undefined) node.ele = String(point.elevation);
  if (point.time) node.time = point.time.toISOString();
  if (withName && point.name) node.name = point.name;
  return node;
}

function metadataNode(geo: GeoSequence): XmlNode {
  const node: XmlNode = {};
  if (geo.name) node.name = geo.name;
  if (geo.description) node.desc = geo.description;
  if (geo.keywords) node.keywords = geo.keywords;
  if (geo.time) node.time = geo.time.toISOString();
  return node;
}

export function toGpxXml(geo: GeoSequence): string {
  const gpx: XmlNode = {
    "@_version": "1.1",
    "@_creator": "tracksync",
    "@_xmlns": "http://www.topografix.com/GPX/1/1",
  };
  const metadata = metadataNode(geo);
  if (Object.keys(metadata).length) gpx.metadata = metadata;
  if (geo.waypoints.length) gpx.wpt = geo.waypoints.map((w) => pointNode(w, true));
  if (geo.tracks.length) {
    gpx.trk = geo.tracks.map((track) => {
      const node: XmlNode = {};
      if (track.name) node.name = track.name;
      node.trkseg = track.segments.map((segment) =>
        segment.points.length ? { trkpt: segment.points.map((p) => pointNode(p, false)) } : "",
      );
      return node;
    });
  }
  const body: string = builder.build({ gpx });
  return XML_DECLARATION + body;
}
