/*********************************************************************
 * src/collection.ts
 *
 * Base class for everything that hosts TrackRecords. Adapters
 * implement the protected hooks and declare what they can do in
 * `capabilities`; the public methods add bookkeeping, the decoupled
 * scope and error wrapping around them.
 *
 * Hooks raising anything but a TrackSyncError are wrapped into a
 * StorageError.
 *********************************************************************/

import { StorageError, UnsupportedOperationError, ValidationError, asStorageError } from "./errors.ts";
import { log } from "./log.ts";
import { TrackRecord } from "./record.ts";
import type { RecordHeader, WritableField } from "./types.ts";

export interface Capabilities {
  readonly list: boolean;
  readonly readFull: boolean;
  readonly writeFull: boolean;
  /** Fields that can be written without rewriting the whole document */
  readonly writeField: ReadonlySet<WritableField>;
  readonly remove: boolean;
  readonly rename: boolean;
}

export type Operation = Exclude<keyof Capabilities, "writeField">;

/** One entry of an adapter's listing. */
export interface ListedRecord {
  identity: string;
  header: RecordHeader;
}

export abstract class Collection implements Iterable<TrackRecord> {
  /** Short type name, first part of identifier() */
  abstract readonly kind: string;
  abstract readonly capabilities: Capabilities;

  protected readonly records: TrackRecord[] = [];
  private scanned = false;
  private _decoupled = false;

  constructor(readonly url: string) {}

  /* ---------------------------------------------------------------- */
  /* Adapter hooks                                                     */
  /* ---------------------------------------------------------------- */

  protected abstract listRecords(): Iterable<ListedRecord>;

  /** Fill `record` through populate() and, while decoupled, its setters. */
  protected abstract readRecord(record: TrackRecord): void;

  /**
   * Store the full record. `identity` is the one it already has, or
   * undefined for a new record. Returns the identity actually used.
   */
  protected abstract writeRecord(record: TrackRecord, identity: string | undefined): string;

  protected abstract removeIdentity(identity: string): void;

  protected writeRecordField(record: TrackRecord, field: WritableField): void {
    throw new UnsupportedOperationError(`write ${field} of ${record.toString()}`, this.identifier());
  }

  protected renameIdentity(from: string, to: string): void {
    throw new UnsupportedOperationError(`rename ${from} to ${to}`, this.identifier());
  }

  /* ---------------------------------------------------------------- */
  /* Scopes and introspection                                          */
  /* ---------------------------------------------------------------- */

  get decoupled(): boolean {
    return this._decoupled;
  }

  /**
   * Run `fn` with all records of this collection decoupled. Nested
   * calls restore the previous state.
   */
  decouple<T>(fn: () => T): T {
    const previous = this._decoupled;
    this._decoupled = true;
    try {
      return fn();
    } finally {
      this._decoupled = previous;
    }
  }

  supports(name: Operation | WritableField): boolean {
    switch (name) {
      case "list":
      case "readFull":
      case "writeFull":
      case "remove":
      case "rename":
        return this.capabilities[name];
      default:
        return this.capabilities.writeField.has(name);
    }
  }

  /** `kind:url`, also the prefix of every cross-id pointing here. */
  identifier(): string {
    return `${this.kind}:${this.url}`;
  }

  toString(): string {
    return this.identifier();
  }

  private require(operation: Operation): void {
    if (!this.capabilities[operation]) {
      throw new UnsupportedOperationError(operation, this.identifier());
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw asStorageError(`${this.identifier()}: ${operation}`, err);
    }
  }

  private ownRecord(record: TrackRecord): void {
    if (record.collection !== this) {
      throw new ValidationError(`${record.toString()} does not belong to ${this.identifier()}`, "collection");
    }
  }

  /* ---------------------------------------------------------------- */
  /* Listing                                                           */
  /* ---------------------------------------------------------------- */

  /** Re-read the listing; every record starts out unloaded. */
  scan(): void {
    this.require("list");
    const listed = this.guard("list", () => [...this.listRecords()]);
    this.records.length = 0;
    for (const { identity, header } of listed) {
      const record = new TrackRecord();
      record.attach(this, { loaded: false });
      this.decouple(() => record.setIdentity(identity));
      record.adoptHeaders(header);
      this.records.push(record);
    }
    this.scanned = true;
    log.debug(`${this.identifier()}: ${this.records.length} records listed`);
  }

  list(): TrackRecord[] {
    if (!this.scanned) this.scan();
    return [...this.records];
  }

  get size(): number {
    return this.list().length;
  }

  [Symbol.iterator](): Iterator<TrackRecord> {
    return this.list()[Symbol.iterator]();
  }

  get(identity: string): TrackRecord | undefined {
    return this.list().find((r) => r.identity === identity);
  }

  has(identity: string): boolean {
    return this.get(identity) !== undefined;
  }

  /* ---------------------------------------------------------------- */
  /* Record I/O                                                        */
  /* ---------------------------------------------------------------- */

  readFull(record: TrackRecord): void {
    this.require("readFull");
    this.ownRecord(record);
    this.decouple(() => this.guard(`read ${record.toString()}`, () => this.readRecord(record)));
  }

  /** Write everything; the record takes the returned identity. */
  writeFull(record: TrackRecord): string {
    this.require("writeFull");
    this.ownRecord(record);
    const identity = this.decouple(() =>
      this.guard(`write ${record.toString()}`, () =>
        record.withEncodedKeywords(() => this.writeRecord(record, record.identity)),
      ),
    );
    this.decouple(() => record.setIdentity(identity));
    return identity;
  }

  writeField(record: TrackRecord, field: WritableField): void {
    if (!this.capabilities.writeField.has(field)) {
      throw new UnsupportedOperationError(`write ${field}`, this.identifier());
    }
    this.ownRecord(record);
    this.decouple(() => this.guard(`write ${field} of ${record.toString()}`, () => this.writeRecordField(record, field)));
  }

  renameRecord(record: TrackRecord, identity: string): void {
    this.require("rename");
    this.ownRecord(record);
    const previous = record.identity;
    if (previous === identity) return;
    if (this.has(identity)) {
      throw new ValidationError(`${this.identifier()} already has ${identity}`, "identity", { identity });
    }
    if (previous !== undefined) {
      this.guard(`rename ${previous}`, () => this.renameIdentity(previous, identity));
    }
    this.decouple(() => record.setIdentity(identity));
    log.debug(`${this.identifier()}: renamed ${previous ?? "(new)"} to ${identity}`);
  }

  /**
   * Store `record` here. A record hosted elsewhere is cloned first and
   * the clone is returned; on failure nothing stays attached.
   */
  add(record: TrackRecord): TrackRecord {
    if (record.collection === this) return record;
    if (this.capabilities.list && !this.scanned) this.scan();
    const target = record.collection ? record.clone() : record;
    target.attach(this);
    try {
      this.writeFull(target);
    } catch (err) {
      target.detach();
      throw err;
    }
    this.records.push(target);
    log.debug(`${this.identifier()}: added ${target.toString()}`);
    return target;
  }

  /** Remove a record, given as object or identity. */
  remove(target: TrackRecord | string): void {
    this.require("remove");
    const record = typeof target === "string" ? this.get(target) : target;
    if (record) this.ownRecord(record);
    const identity = typeof target === "string" ? target : target.identity;
    if (identity === undefined) {
      throw new StorageError(`${this.identifier()}: cannot remove a record that was never saved`);
    }
    this.guard(`remove ${identity}`, () => this.removeIdentity(identity));
    const index = record ? this.records.indexOf(record) : -1;
    if (index >= 0) this.records.splice(index, 1);
    record?.detach();
  }

  removeAll(): void {
    for (const record of this.list()) this.remove(record);
  }
}
