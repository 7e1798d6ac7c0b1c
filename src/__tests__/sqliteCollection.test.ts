import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SqliteCollection } from "../collections/sqlite.ts";
import { StorageError, UnsupportedOperationError } from "../errors.ts";
import { START, makePoints, makeRecord } from "./helpers.ts";

describe("SqliteCollection", () => {
  let tracks: SqliteCollection;

  beforeEach(() => {
    tracks = new SqliteCollection(":memory:");
  });

  afterEach(() => {
    tracks.close();
  });

  /** Store one record and re-list, so the returned record is not loaded. */
  function storedAndListed(title = "Ride") {
    tracks.add(makeRecord(10, title));
    tracks.scan();
    const [record] = tracks.list();
    return record;
  }

  it("numbers identities and never reuses them", () => {
    const first = tracks.add(makeRecord(3, "a"));
    const second = tracks.add(makeRecord(3, "b"));
    expect([first.identity, second.identity]).toEqual(["1", "2"]);
    tracks.remove(first);
    expect(tracks.add(makeRecord(3, "c")).identity).toBe("3");
    expect(tracks.list().map((r) => r.identity)).toEqual(["2", "3"]);
  });

  it("serves list headers without reading the document", () => {
    const record = storedAndListed();
    const read = vi.spyOn(tracks, "readFull");
    expect(record.getTitle()).toBe("Ride");
    expect(record.getCategory()).toBe("Cycling");
    expect(record.firstTime()).toEqual(START);
    expect(record.isLoaded).toBe(false);
    expect(read).not.toHaveBeenCalled();

    expect(record.pointList()).toEqual(makePoints(10));
    expect(read).toHaveBeenCalledTimes(1);
    expect(record.isLoaded).toBe(true);
  });

  it("writes single columns without a full write", () => {
    const record = storedAndListed();
    const full = vi.spyOn(tracks, "writeFull");
    record.setTitle("Renamed");
    record.setTags(["night"]);
    expect(full).not.toHaveBeenCalled();

    tracks.scan();
    const [again] = tracks.list();
    expect(again.getTitle()).toBe("Renamed");
    expect(again.getTags()).toEqual(["night"]);
    again.loadFull();
    expect(again.getTitle()).toBe("Renamed");
  });

  it("writes everything for an id change", () => {
    const record = storedAndListed();
    const full = vi.spyOn(tracks, "writeFull");
    record.setIds(["memory:default/4"]);
    expect(full).toHaveBeenCalledTimes(1);
    tracks.scan();
    expect(tracks.list()[0].getIds()).toEqual(["memory:default/4"]);
  });

  it("cannot rename", () => {
    const record = storedAndListed();
    expect(tracks.supports("rename")).toBe(false);
    expect(tracks.supports("title")).toBe(true);
    expect(tracks.supports("ids")).toBe(false);
    expect(() => record.setIdentity("other")).toThrow(UnsupportedOperationError);
    expect(record.identity).toBe("1");
  });

  it("rejects removing an unknown identity", () => {
    expect(() => tracks.remove("99")).toThrow(StorageError);
  });

  it("keeps meta values", () => {
    expect(tracks.getMeta("owner")).toBeUndefined();
    tracks.setMeta("owner", "test-user");
    tracks.setMeta("owner", "other-user");
    expect(tracks.getMeta("owner")).toBe("other-user");
  });
});
