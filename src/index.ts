// src/index.ts
export type {
  BoundingBox,
  DirtyMarker,
  Fence,
  GpxTrack,
  RecordAttributes,
  RecordHeader,
  TrackPoint,
  TrackSegment,
  WritableField,
  Waypoint,
} from "./types.ts";

export { getConfig, loadConfig, type LogLevel, type TrackSyncConfig } from "./config.ts";
export { log } from "./log.ts";
export * from "./errors.ts";

export { GeoSequence, haversineMeters, outsideFences, parseFences, positionsEqual } from "./geo.ts";
export { parseGpxXml, toGpxXml } from "./gpxXml.ts";
export {
  CATEGORIES,
  DEFAULT_CATEGORY,
  MAX_CROSS_IDS,
  checkCrossIds,
  checkTag,
  cleanCrossIds,
  decodeAttributes,
  encodeAttributes,
  isCategory,
  normalizeTags,
  originOf,
} from "./codec.ts";

export { TrackRecord } from "./record.ts";
export { Collection, type Capabilities, type ListedRecord, type Operation } from "./collection.ts";
export { MemoryCollection } from "./collections/memory.ts";
export { DirectoryCollection } from "./collections/directory.ts";
export { SqliteCollection } from "./collections/sqlite.ts";
export {
  builtinCollections,
  openCollection,
  registerCollections,
  type CollectionPlugin,
  type CollectionRegistry,
} from "./registry.ts";
export { collectRecords, type RecordSource } from "./recordSource.ts";

export { SequenceMatcher, type Opcode, type OpcodeTag } from "./sequenceMatcher.ts";
export { CollectionDiff, DiffSide, Pair, formatDuration, type DiffFlag, type DiffOptions } from "./diff.ts";
export {
  canMerge,
  mergeCollections,
  mergeRecords,
  type CollectionMergeOptions,
  type MergeCheck,
  type MergeOptions,
} from "./merge.ts";
export { bestSimilarity, similarity, toleranceForResolution } from "./similarity.ts";
