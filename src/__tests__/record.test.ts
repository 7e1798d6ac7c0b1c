import { describe, expect, it, vi } from "vitest";
import type { Capabilities } from "../collection.ts";
import { MemoryCollection } from "../collections/memory.ts";
import { SqliteCollection } from "../collections/sqlite.ts";
import {
  IllegalIdentityChangeError,
  ReservedKeywordError,
  StorageError,
  UnsupportedOperationError,
  ValidationError,
} from "../errors.ts";
import { GeoSequence, parseFences } from "../geo.ts";
import { TrackRecord } from "../record.ts";
import type { WritableField } from "../types.ts";
import { START, makeGpx, makePoints, makeRecord } from "./helpers.ts";

/** Memory storage that also writes title and description on their own. */
class FieldCollection extends MemoryCollection {
  readonly capabilities: Capabilities = {
    list: true,
    readFull: true,
    writeFull: true,
    writeField: new Set<WritableField>(["title", "description"]),
    remove: true,
    rename: true,
  };
  readonly fieldWrites: string[] = [];
  failOn?: WritableField;

  protected writeRecordField(record: TrackRecord, field: WritableField): void {
    if (field === this.failOn) throw new Error("disk full");
    this.fieldWrites.push(`${record.identity ?? "?"}:${field}`);
  }
}

class ReadOnlyCollection extends MemoryCollection {
  protected writeRecord(): string {
    throw new Error("read-only");
  }
}

/** Remembers the keyword string every full write sees. */
class KeywordWatchCollection extends MemoryCollection {
  readonly seen: string[] = [];

  protected writeRecord(record: TrackRecord, identity: string | undefined): string {
    this.seen.push(record.getGpx().keywords);
    return super.writeRecord(record, identity);
  }
}

/** Fails the n-th full write, counting from 1. */
class FlakyCollection extends MemoryCollection {
  private writes = 0;
  failOnWrite?: number;

  protected writeRecord(record: TrackRecord, identity: string | undefined): string {
    if (++this.writes === this.failOnWrite) throw new Error("disk full");
    return super.writeRecord(record, identity);
  }
}

function twoSegments(title = "Tour"): GeoSequence {
  const gpx = makeGpx(makePoints(3), title);
  gpx.tracks[0].segments.push({ points: makePoints(2, { latitude: 53 }) });
  return gpx;
}

/** A stored record, freshly listed so nothing is loaded yet. */
function listedRecord(title = "Morning"): { collection: MemoryCollection; record: TrackRecord } {
  const collection = new MemoryCollection("listed");
  collection.add(makeRecord(5, title));
  collection.scan();
  const [record] = collection.list();
  return { collection, record };
}

describe("TrackRecord", () => {
  describe("unattached", () => {
    it("changes memory only", () => {
      const record = makeRecord(3, "Morning");
      record.setTitle("Evening");
      record.setPublic(true);
      expect(record.isDecoupled).toBe(true);
      expect(record.dirty).toEqual([]);
      expect(record.getTitle()).toBe("Evening");
      expect(record.toString()).toBe("unsaved:Evening");
    });

    it("decodes the keyword string of the document it is built from", () => {
      const gpx = new GeoSequence();
      gpx.keywords = "berlin, Category:Hiking, Status:public, Id:memory:x/3";
      const record = new TrackRecord(gpx);
      expect(record.getCategory()).toBe("Hiking");
      expect(record.isPublic()).toBe(true);
      expect(record.getTags()).toEqual(["berlin"]);
      expect(record.getIds()).toEqual(["memory:x/3"]);
    });

    it("rounds points to 6 digits", () => {
      const record = new TrackRecord();
      record.addPoints([{ latitude: 52.12345678, longitude: 13.98765432 }]);
      expect(record.pointList()).toEqual([{ latitude: 52.123457, longitude: 13.987654 }]);
    });
  });

  describe("lazy loading", () => {
    it("serves listing headers without a load", () => {
      const { collection, record } = listedRecord();
      const read = vi.spyOn(collection, "readFull");
      expect(record.isLoaded).toBe(false);
      expect(record.getTitle()).toBe("Morning");
      expect(read).not.toHaveBeenCalled();
      expect(record.getCategory()).toBe("Cycling");
      expect(read).toHaveBeenCalledTimes(1);
      expect(record.isLoaded).toBe(true);
    });

    it("loads only once", () => {
      const { collection, record } = listedRecord();
      const read = vi.spyOn(collection, "readFull");
      record.loadFull();
      record.loadFull();
      expect(read).toHaveBeenCalledTimes(1);
      expect(record.pointCount()).toBe(5);
    });

    it("does not load while decoupled", () => {
      const { collection, record } = listedRecord();
      const read = vi.spyOn(collection, "readFull");
      record.decouple(() => record.loadFull());
      expect(read).not.toHaveBeenCalled();
      expect(record.isLoaded).toBe(false);
    });
  });

  describe("write-back", () => {
    it("leaves nothing dirty after a setter returns", () => {
      const { collection, record } = listedRecord();
      const write = vi.spyOn(collection, "writeFull");
      record.setTitle("Evening");
      expect(record.dirty).toEqual([]);
      expect(write).toHaveBeenCalledTimes(1);

      collection.scan();
      expect(collection.get("1")?.getTitle()).toBe("Evening");
    });

    it("skips the write when nothing changes", () => {
      const { collection, record } = listedRecord();
      const write = vi.spyOn(collection, "writeFull");
      record.setTitle("Morning");
      expect(write).not.toHaveBeenCalled();
    });

    it("writes once per batch", () => {
      const { collection, record } = listedRecord();
      const write = vi.spyOn(collection, "writeFull");
      record.batchChanges(() => {
        record.setTitle("a");
        record.setDescription("b");
        expect(record.dirty).toEqual(["title", "description"]);
        record.batchChanges(() => {
          record.setPublic(true);
          record.addTags(["x"]);
        });
        expect(write).not.toHaveBeenCalled();
      });
      expect(write).toHaveBeenCalledTimes(1);
      expect(record.dirty).toEqual([]);
    });

    it("still flushes when the batch throws", () => {
      const { collection, record } = listedRecord();
      const write = vi.spyOn(collection, "writeFull");
      expect(() =>
        record.batchChanges(() => {
          record.setTitle("c");
          throw new Error("boom");
        }),
      ).toThrow("boom");
      expect(write).toHaveBeenCalledTimes(1);
      expect(record.dirty).toEqual([]);
    });

    it("writes single fields where the collection can", () => {
      const collection = new FieldCollection("fields");
      const record = collection.add(makeRecord(3));
      const write = vi.spyOn(collection, "writeFull");
      record.setTitle("T");
      record.setDescription("D");
      expect(collection.fieldWrites).toEqual(["1:title", "1:description"]);
      expect(write).not.toHaveBeenCalled();

      record.setCategory("Hiking");
      expect(write).toHaveBeenCalledTimes(1);
    });

    it("rewrites everything when one dirty field cannot be written alone", () => {
      const collection = new FieldCollection("fields");
      const record = collection.add(makeRecord(3));
      const write = vi.spyOn(collection, "writeFull");
      record.batchChanges(() => {
        record.setTitle("T");
        record.setPublic(true);
      });
      expect(collection.fieldWrites).toEqual([]);
      expect(write).toHaveBeenCalledTimes(1);
    });

    it("keeps a failed field dirty and retries on the next change", () => {
      const collection = new FieldCollection("fields");
      const record = collection.add(makeRecord(3));
      collection.failOn = "title";
      expect(() => record.setTitle("X")).toThrow(StorageError);
      expect(record.dirty).toEqual(["title"]);
      expect(record.getTitle()).toBe("X");

      collection.failOn = undefined;
      record.setDescription("later");
      expect(collection.fieldWrites).toEqual(["1:title", "1:description"]);
      expect(record.dirty).toEqual([]);
    });

    it("encodes the keywords only for the duration of a full write", () => {
      const gpx = makeGpx(makePoints(3), "Morning");
      gpx.keywords = "old, Category:Cycling";
      const collection = new KeywordWatchCollection("keywords");
      const record = collection.add(new TrackRecord(gpx));
      record.setCategory("Hiking");
      expect(collection.seen).toEqual([
        "old, Category:Cycling, Status:private",
        "old, Category:Hiking, Status:private",
      ]);
      expect(record.getGpx().keywords).toBe("old, Category:Cycling");
    });

    it("does not re-mark fields already written in a failed flush", () => {
      const collection = new FieldCollection("fields");
      const record = collection.add(makeRecord(3));
      collection.failOn = "description";
      expect(() =>
        record.batchChanges(() => {
          record.setTitle("T");
          record.setDescription("D");
        }),
      ).toThrow(StorageError);
      expect(collection.fieldWrites).toEqual(["1:title"]);
      expect(record.dirty).toEqual(["description"]);
    });
  });

  describe("validation", () => {
    it("rejects bad values before touching anything", () => {
      const { collection, record } = listedRecord();
      record.loadFull();
      const write = vi.spyOn(collection, "writeFull");

      expect(() => record.setCategory("Flying carpet")).toThrow(ValidationError);
      expect(() => record.setTags(["Status:public"])).toThrow(ReservedKeywordError);
      expect(() => record.setTags(["a", "a"])).toThrow(ValidationError);
      expect(() => record.addTags(["a,b"])).toThrow(ValidationError);
      expect(() => record.setIds(["no-origin"])).toThrow(ValidationError);

      expect(record.getCategory()).toBe("Cycling");
      expect(record.getTags()).toEqual([]);
      expect(record.getIds()).toEqual([]);
      expect(record.dirty).toEqual([]);
      expect(write).not.toHaveBeenCalled();
    });
  });

  describe("identity", () => {
    it("cannot be set without a collection", () => {
      expect(() => new TrackRecord().setIdentity("x")).toThrow(IllegalIdentityChangeError);
    });

    it("cannot be removed once assigned", () => {
      const { record } = listedRecord();
      expect(() => record.setIdentity(undefined)).toThrow(IllegalIdentityChangeError);
      expect(record.identity).toBe("1");
    });

    it("must not contain a slash", () => {
      const { record } = listedRecord();
      expect(() => record.setIdentity("a/b")).toThrow(ValidationError);
    });

    it("renames through the collection", () => {
      const { collection, record } = listedRecord();
      record.setIdentity("renamed");
      expect(record.identity).toBe("renamed");
      expect(collection.has("renamed")).toBe(true);
      collection.scan();
      expect(collection.list().map((r) => r.identity)).toEqual(["renamed"]);
    });

    it("is a plain assignment while decoupled", () => {
      const { collection, record } = listedRecord();
      const rename = vi.spyOn(collection, "renameRecord");
      record.decouple(() => record.setIdentity("other"));
      expect(record.identity).toBe("other");
      expect(rename).not.toHaveBeenCalled();
    });

    it("needs rename support", () => {
      const collection = new SqliteCollection(":memory:");
      const record = collection.add(makeRecord(3));
      expect(() => record.setIdentity("new")).toThrow(UnsupportedOperationError);
      expect(record.identity).toBe("1");
      collection.close();
    });
  });

  describe("lifecycle", () => {
    it("names itself after its collection", () => {
      const collection = new MemoryCollection("names");
      const record = collection.add(makeRecord(3, "Morning"));
      expect(record.toString()).toBe("memory:names/1");
    });

    it("clones into an unattached record that remembers where it came from", () => {
      const collection = new MemoryCollection("clone");
      const record = collection.add(makeRecord(3, "Morning"));
      const copy = record.clone();
      expect(copy.collection).toBeUndefined();
      expect(copy.identity).toBeUndefined();
      expect(copy.getIds()).toEqual(["memory:clone/1"]);
      expect(copy.getTitle()).toBe("Morning");

      copy.setTitle("Changed");
      copy.addPoints(makePoints(1));
      expect(record.getTitle()).toBe("Morning");
      expect(record.pointCount()).toBe(3);
    });

    it("copies records hosted elsewhere when adding", () => {
      const source = new MemoryCollection("source");
      const target = new MemoryCollection("target");
      const original = source.add(makeRecord(3, "Morning"));
      const added = target.add(original);
      expect(added).not.toBe(original);
      expect(original.collection).toBe(source);
      expect(added.toString()).toBe("memory:target/1");
      expect(added.getIds()).toEqual(["memory:source/1"]);
    });

    it("rolls back a failed add", () => {
      const collection = new ReadOnlyCollection("ro");
      const record = makeRecord(3);
      expect(() => collection.add(record)).toThrow(StorageError);
      expect(record.collection).toBeUndefined();
      expect(record.identity).toBeUndefined();
      expect(collection.size).toBe(0);
    });

    it("cannot remove a record without a collection", () => {
      expect(() => makeRecord(3).remove()).toThrow(UnsupportedOperationError);
    });

    it("forgets identity and host on removal", () => {
      const collection = new MemoryCollection("remove");
      const record = collection.add(makeRecord(3));
      record.remove();
      expect(record.identity).toBeUndefined();
      expect(record.collection).toBeUndefined();
      expect(collection.size).toBe(0);
    });
  });

  describe("derived data", () => {
    it("compares by key", () => {
      const a = makeRecord(5, "Same");
      const b = makeRecord(5, "Same");
      expect(a.equals(b)).toBe(true);
      b.setTitle("Other");
      expect(a.equals(b)).toBe(false);
    });

    it("groups records with overlapping times", () => {
      const a = makeRecord(61, "a");
      const b = makeRecord(61, "b", { start: new Date(START.getTime() + 5 * 60_000) });
      const c = makeRecord(31, "c", { start: new Date(START.getTime() + 2 * 3_600_000) });
      expect(TrackRecord.overlappingTimes([c, b, a])).toEqual([[a, b]]);
    });

    it("warns about points without time", () => {
      const record = new TrackRecord();
      record.addPoints([...makePoints(2), { latitude: 1, longitude: 2 }]);
      expect(record.warnings()).toEqual(["1 points have no time"]);
    });

    it("splits segments at long pauses", () => {
      const record = new TrackRecord();
      record.addPoints(makePoints(3));
      record.addPoints(makePoints(3, { start: new Date(START.getTime() + 3_600_000), latitude: 52.6 }));
      expect(record.splitAtStops(30)).toBe(true);
      expect(record.getGpx().tracks[0].segments.map((s) => s.points.length)).toEqual([3, 3]);
    });
  });

  describe("segments and tracks", () => {
    it("joins tracks, refusing to drop track names unless forced", () => {
      const gpx = makeGpx(makePoints(2));
      gpx.tracks.push({ name: "second", segments: [{ points: makePoints(2, { latitude: 53 }) }] });
      const record = new TrackRecord(gpx);
      expect(record.joinTracks()).toEqual([
        "Joining tracks in unsaved:untitled would lose metadata from joined tracks, use force:",
        "  track name: second",
      ]);
      expect(record.getGpx().tracks).toHaveLength(2);

      expect(record.joinTracks(true)).toEqual([
        "Joining tracks in unsaved:untitled lost metadata from joined tracks:",
        "  track name: second",
      ]);
      expect(record.getGpx().tracks.map((t) => t.segments.length)).toEqual([2]);
      expect(record.pointCount()).toBe(4);
    });

    it("writes a join back once and has nothing to do afterwards", () => {
      const gpx = makeGpx(makePoints(2));
      gpx.tracks.push({ segments: [{ points: makePoints(2, { latitude: 53 }) }] });
      const collection = new MemoryCollection("join");
      const record = collection.add(new TrackRecord(gpx));
      const write = vi.spyOn(collection, "writeFull");
      expect(record.joinTracks()).toEqual([]);
      expect(record.joinTracks()).toEqual([]);
      expect(write).toHaveBeenCalledTimes(1);
    });

    it("splits a stored record into one record per segment", () => {
      const collection = new MemoryCollection("split");
      const record = collection.add(new TrackRecord(twoSegments()));
      record.setTags(["alps"]);

      const parts = record.splitSegments();
      expect(parts.map((p) => p.identity)).toEqual(["2", "3"]);
      expect(parts.map((p) => p.pointCount())).toEqual([3, 2]);
      expect(parts.map((p) => p.getTitle())).toEqual(["Tour", "Tour"]);
      expect(parts[1].getTags()).toEqual(["alps"]);
      expect(collection.list()).toEqual(parts);
      expect(record.collection).toBeUndefined();
    });

    it("restores the original when a part cannot be stored", () => {
      const collection = new FlakyCollection("flaky");
      const record = collection.add(new TrackRecord(twoSegments()));
      collection.failOnWrite = 3;

      expect(() => record.splitSegments()).toThrow(StorageError);
      expect(collection.size).toBe(1);
      const [restored] = collection.list();
      expect(restored.getTitle()).toBe("Tour");
      expect(restored.getGpx().tracks[0].segments.map((s) => s.points.length)).toEqual([3, 2]);
    });

    it("needs a collection to split", () => {
      expect(() => new TrackRecord(twoSegments()).splitSegments()).toThrow(UnsupportedOperationError);
    });
  });

  describe("fences", () => {
    const fences = parseFences("52.5/13.4/5");

    it("hides points inside fences for the duration of a call", () => {
      const record = new TrackRecord(makeGpx(makePoints(5), "Home"));
      record.addWaypoints([{ latitude: 52.5, longitude: 13.4, name: "Home" }]);
      const seen = record.fenced(fences, () => ({
        points: record.pointCount(),
        waypoints: record.waypoints().length,
      }));
      expect(seen).toEqual({ points: 4, waypoints: 0 });
      expect(record.pointCount()).toBe(5);
      expect(record.waypoints()).toHaveLength(1);
    });

    it("is read-only and not re-entrant", () => {
      const record = new TrackRecord(makeGpx(makePoints(5), "Home"));
      expect(() => record.fenced(fences, () => record.setTitle("Away"))).toThrow(ValidationError);
      expect(record.getTitle()).toBe("Home");
      expect(() => record.fenced(fences, () => record.fenced(fences, () => 0))).toThrow(ValidationError);
      expect(record.fenced([], () => record.pointCount())).toBe(5);
    });
  });
});
