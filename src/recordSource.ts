// src/recordSource.ts
import { Collection } from "./collection.ts";
import { TrackRecord } from "./record.ts";

/** Anything the diff and merge functions accept as "some records". */
export type RecordSource = TrackRecord | Collection | readonly RecordSource[];

/** Flatten a source, keeping order. A record listed twice appears once. */
export function collectRecords(source: RecordSource): TrackRecord[] {
  const result: TrackRecord[] = [];
  const seen = new Set<TrackRecord>();
  const visit = (item: RecordSource): void => {
    if (item instanceof TrackRecord) {
      if (!seen.has(item)) {
        seen.add(item);
        result.push(item);
      }
    } else if (item instanceof Collection) {
      item.list().forEach(visit);
    } else {
      item.forEach(visit);
    }
  };
  visit(source);
  return result;
}
