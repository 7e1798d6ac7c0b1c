import { describe, expect, it } from "vitest";
import { MemoryCollection } from "../collections/memory.ts";
import { SqliteCollection } from "../collections/sqlite.ts";
import { ValidationError } from "../errors.ts";
import { collectRecords } from "../recordSource.ts";
import { builtinCollections, openCollection, registerCollections } from "../registry.ts";
import { makeRecord } from "./helpers.ts";

describe("registry", () => {
  it("opens collections by kind:url", () => {
    const memory = openCollection(builtinCollections, "memory:abc");
    expect(memory).toBeInstanceOf(MemoryCollection);
    expect(memory.identifier()).toBe("memory:abc");

    const sqlite = openCollection(builtinCollections, "sqlite::memory:");
    expect(sqlite).toBeInstanceOf(SqliteCollection);
    expect(sqlite.identifier()).toBe("sqlite::memory:");
    if (sqlite instanceof SqliteCollection) sqlite.close();
  });

  it("uses the default url when none is given", () => {
    expect(openCollection(builtinCollections, "memory").identifier()).toBe("memory:default");
  });

  it("rejects unknown kinds", () => {
    expect(() => openCollection(builtinCollections, "ftp:host/tracks")).toThrow(
      'Unknown collection kind "ftp", known: memory, directory, sqlite',
    );
  });

  it("validates registrations", () => {
    const plugin = { kind: "memory", create: (url: string) => new MemoryCollection(url) };
    expect(() => registerCollections([plugin, plugin])).toThrow(ValidationError);
    expect(() => registerCollections([{ ...plugin, kind: "a:b" }])).toThrow(ValidationError);
    expect(Object.isFrozen(registerCollections([plugin]))).toBe(true);
  });
});

describe("collectRecords", () => {
  it("flattens in order without repeats", () => {
    const a = makeRecord(2, "a");
    const b = makeRecord(2, "b");
    const collection = new MemoryCollection("c");
    const c = collection.add(makeRecord(2, "c"));
    expect(collectRecords([a, [b, a], collection, c])).toEqual([a, b, c]);
    expect(collectRecords(b)).toEqual([b]);
  });
});
