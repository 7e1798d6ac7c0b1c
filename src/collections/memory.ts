// src/collections/memory.ts
import { type Capabilities, Collection, type ListedRecord } from "../collection.ts";
import { StorageError } from "../errors.ts";
import type { GeoSequence } from "../geo.ts";
import type { TrackRecord } from "../record.ts";

/**
 * Keeps documents in a Map. Useful for tests and as a scratch target
 * for merges. Only full writes; renames are supported.
 */
export class MemoryCollection extends Collection {
  readonly kind = "memory";
  readonly capabilities: Capabilities = {
    list: true,
    readFull: true,
    writeFull: true,
    writeField: new Set(),
    remove: true,
    rename: true,
  };

  private readonly storage = new Map<string, GeoSequence>();
  private counter = 0;

  constructor(url = "default") {
    super(url);
  }

  protected *listRecords(): Iterable<ListedRecord> {
    for (const [identity, gpx] of this.storage) {
      yield {
        identity,
        header: { title: gpx.name, time: gpx.firstTime(), distance: gpx.distance() },
      };
    }
  }

  protected readRecord(record: TrackRecord): void {
    record.populate(this.stored(record.identity).clone());
  }

  protected writeRecord(record: TrackRecord, identity: string | undefined): string {
    const id = identity ?? this.unique(String(++this.counter));
    this.storage.set(id, record.getGpx().clone());
    return id;
  }

  protected renameIdentity(from: string, to: string): void {
    const gpx = this.stored(from);
    this.storage.delete(from);
    this.storage.set(to, gpx);
  }

  protected removeIdentity(identity: string): void {
    if (!this.storage.delete(identity)) {
      throw new StorageError(`${this.identifier()}: no track ${identity}`);
    }
  }

  private stored(identity: string | undefined): GeoSequence {
    const gpx = identity === undefined ? undefined : this.storage.get(identity);
    if (!gpx) throw new StorageError(`${this.identifier()}: no track ${identity ?? "(unsaved)"}`);
    return gpx;
  }

  private unique(wanted: string): string {
    let result = wanted;
    for (let n = 1; this.storage.has(result); n++) result = `${wanted}.${n}`;
    return result;
  }
}
