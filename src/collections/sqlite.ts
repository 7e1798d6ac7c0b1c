/*********************************************************************
 * src/collections/sqlite.ts
 *
 * Records in a single SQLite file.
 *
 * Table `tracks` keeps the header columns next to the full document:
 *   - title, description : TEXT
 *   - keywords           : TEXT  (encoded attributes, see codec.ts)
 *   - first_time         : TEXT  (ISO-8601, may be NULL)
 *   - distance_km        : REAL
 *   - bbox               : TEXT  ("minLon,minLat,maxLon,maxLat", may be NULL)
 *   - gpx                : TEXT  (the GPX document)
 *
 * Title, description and keywords can be updated on their own; the
 * columns then win over what the stored document says.
 *
 * The `meta` key/value table holds the identity counter.
 *
 * Usage:
 *   const tracks = new SqliteCollection("tracks.db");
 *   for (const record of tracks) console.log(record.getTitle());
 *   tracks.close();
 *********************************************************************/

import Database from "better-sqlite3";
import { type Capabilities, Collection, type ListedRecord } from "../collection.ts";
import { decodeAttributes } from "../codec.ts";
import { getConfig } from "../config.ts";
import { StorageError } from "../errors.ts";
import { parseGpxXml } from "../gpxXml.ts";
import type { TrackRecord } from "../record.ts";
import type { WritableField } from "../types.ts";

interface TrackRow {
  id: string;
  title: string;
  description: string;
  keywords: string;
  first_time: string | null;
  distance_km: number;
  bbox: string | null;
  gpx: string;
}

type HeaderRow = Omit<TrackRow, "bbox" | "gpx">;

export class SqliteCollection extends Collection {
  readonly kind = "sqlite";
  readonly capabilities: Capabilities = {
    list: true,
    readFull: true,
    writeFull: true,
    writeField: new Set<WritableField>(["title", "description", "category", "public", "tags"]),
    remove: true,
    rename: false,
  };

  private readonly db: Database.Database;

  constructor(url: string = getConfig().dbPath) {
    super(url);
    this.db = new Database(url);
    this.ensureSchema();
  }

  /** -----------------------------------------------------------------
   *  Create tables if they do not exist.
   * ----------------------------------------------------------------- */
  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tracks (
        id          TEXT PRIMARY KEY,
        title       TEXT NOT NULL DEFAULT '',
        description TEXT NOT NULL DEFAULT '',
        keywords    TEXT NOT NULL DEFAULT '',
        first_time  TEXT,
        distance_km REAL NOT NULL DEFAULT 0,
        bbox        TEXT,
        gpx         TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  /* ---------------------------------------------------------------- */
  /* Collection hooks                                                  */
  /* ---------------------------------------------------------------- */

  protected *listRecords(): Iterable<ListedRecord> {
    const rows = this.db
      .prepare<[], HeaderRow>(
        "SELECT id, title, description, keywords, first_time, distance_km FROM tracks ORDER BY rowid",
      )
      .all();
    for (const row of rows) {
      const attrs = decodeAttributes(row.keywords);
      yield {
        identity: row.id,
        header: {
          title: row.title,
          description: row.description,
          category: attrs.category,
          isPublic: attrs.isPublic,
          tags: attrs.tags,
          ids: attrs.ids,
          ...(row.first_time ? { time: new Date(row.first_time) } : {}),
          distance: row.distance_km,
        },
      };
    }
  }

  protected readRecord(record: TrackRecord): void {
    const row = this.db
      .prepare<[string], TrackRow>("SELECT * FROM tracks WHERE id = ?")
      .get(record.identity ?? "");
    if (!row) throw new StorageError(`${this.identifier()}: no track ${record.identity ?? "(unsaved)"}`);
    const gpx = parseGpxXml(row.gpx);
    gpx.name = row.title;
    gpx.description = row.description;
    gpx.keywords = row.keywords;
    record.populate(gpx);
  }

  protected writeRecord(record: TrackRecord, identity: string | undefined): string {
    const id = identity ?? this.nextIdentity();
    const gpx = record.getGpx();
    const bounds = gpx.bounds();
    this.db
      .prepare<TrackRow>(`
        INSERT INTO tracks (id, title, description, keywords, first_time, distance_km, bbox, gpx)
        VALUES (@id, @title, @description, @keywords, @first_time, @distance_km, @bbox, @gpx)
        ON CONFLICT(id) DO UPDATE SET
          title       = excluded.title,
          description = excluded.description,
          keywords    = excluded.keywords,
          first_time  = excluded.first_time,
          distance_km = excluded.distance_km,
          bbox        = excluded.bbox,
          gpx         = excluded.gpx;
      `)
      .run({
        id,
        title: gpx.name,
        description: gpx.description,
        keywords: record.encodeAttributes(),
        first_time: gpx.firstTime()?.toISOString() ?? null,
        distance_km: gpx.distance(),
        bbox: bounds ? `${bounds.minLon},${bounds.minLat},${bounds.maxLon},${bounds.maxLat}` : null,
        gpx: record.toXml(),
      });
    return id;
  }

  protected writeRecordField(record: TrackRecord, field: WritableField): void {
    const id = record.identity ?? "";
    switch (field) {
      case "title":
        this.update("title", record.getTitle(), id);
        break;
      case "description":
        this.update("description", record.getDescription(), id);
        break;
      case "category":
      case "public":
      case "tags":
        this.update("keywords", record.encodeAttributes(), id);
        break;
      default:
        super.writeRecordField(record, field);
    }
  }

  protected removeIdentity(identity: string): void {
    const result = this.db.prepare<[string]>("DELETE FROM tracks WHERE id = ?").run(identity);
    if (result.changes === 0) throw new StorageError(`${this.identifier()}: no track ${identity}`);
  }

  /* ---------------------------------------------------------------- */
  /* Helpers                                                           */
  /* ---------------------------------------------------------------- */

  private update(column: "title" | "description" | "keywords", value: string, id: string): void {
    const result = this.db.prepare<[string, string]>(`UPDATE tracks SET ${column} = ? WHERE id = ?`).run(value, id);
    if (result.changes === 0) throw new StorageError(`${this.identifier()}: no track ${id}`);
  }

  private nextIdentity(): string {
    let next = Number(this.getMeta("next_id") ?? "1");
    const exists = this.db.prepare<[string], { id: string }>("SELECT id FROM tracks WHERE id = ?");
    while (exists.get(String(next))) next++;
    this.setMeta("next_id", String(next + 1));
    return String(next);
  }

  /** -----------------------------------------------------------------
   *  Meta-table helpers (generic key/value store)
   * ----------------------------------------------------------------- */
  public getMeta(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?").get(key);
    return row?.value;
  }

  public setMeta(key: string, value: string): void {
    const stmt = this.db.prepare<[string, string]>(`
      INSERT INTO meta (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value;
    `);
    stmt.run(key, value);
  }

  /** Close the DB connection. */
  public close(): void {
    this.db.close();
  }
}
