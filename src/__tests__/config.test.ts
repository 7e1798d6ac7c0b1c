import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.ts";
import { StorageError, ValidationError, asStorageError } from "../errors.ts";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "warn",
      dbPath: "tracks.db",
      directory: "tracks",
      similarMinPositions: 100,
      simplifyMeters: 50,
    });
  });

  it("reads and coerces overrides", () => {
    const config = loadConfig({
      TRACKSYNC_LOG_LEVEL: "debug",
      TRACKSYNC_SIMILAR_MIN_POSITIONS: "20",
      TRACKSYNC_SIMPLIFY_METERS: "12.5",
    });
    expect(config.logLevel).toBe("debug");
    expect(config.similarMinPositions).toBe(20);
    expect(config.simplifyMeters).toBe(12.5);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ TRACKSYNC_LOG_LEVEL: "loud" })).toThrow(
      new ValidationError("Invalid configuration: TRACKSYNC_LOG_LEVEL"),
    );
    expect(() => loadConfig({ TRACKSYNC_SIMILAR_MIN_POSITIONS: "-3" })).toThrow(ValidationError);
  });
});

describe("asStorageError", () => {
  it("wraps foreign errors", () => {
    const wrapped = asStorageError("sqlite:x: read 1", new Error("disk I/O error"));
    expect(wrapped).toBeInstanceOf(StorageError);
    expect(wrapped.message).toBe("sqlite:x: read 1 failed: disk I/O error");
    expect(wrapped.toJSON()).toEqual({
      name: "StorageError",
      message: "sqlite:x: read 1 failed: disk I/O error",
      code: "STORAGE_ERROR",
      context: { operation: "sqlite:x: read 1" },
    });
  });

  it("passes our own errors through", () => {
    const error = new ValidationError("bad", "title");
    expect(asStorageError("anything", error)).toBe(error);
  });
});
