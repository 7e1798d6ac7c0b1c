// src/registry.ts
import type { Collection } from "./collection.ts";
import { DirectoryCollection } from "./collections/directory.ts";
import { MemoryCollection } from "./collections/memory.ts";
import { SqliteCollection } from "./collections/sqlite.ts";
import { ValidationError } from "./errors.ts";

export interface CollectionPlugin {
  /** Prefix used in `kind:url` strings */
  readonly kind: string;
  /** An empty url means "the configured default" */
  create(url: string): Collection;
}

export type CollectionRegistry = readonly CollectionPlugin[];

/**
 * Build the list of collection types a process knows about. Call once
 * at start-up; the result is frozen.
 */
export function registerCollections(plugins: readonly CollectionPlugin[]): CollectionRegistry {
  const seen = new Set<string>();
  for (const plugin of plugins) {
    if (!plugin.kind || plugin.kind.includes(":")) {
      throw new ValidationError(`Illegal collection kind "${plugin.kind}"`, "kind");
    }
    if (seen.has(plugin.kind)) {
      throw new ValidationError(`Collection kind "${plugin.kind}" registered twice`, "kind");
    }
    seen.add(plugin.kind);
  }
  return Object.freeze([...plugins]);
}

/** `"sqlite:/data/tracks.db"` → a SqliteCollection on that file. */
export function openCollection(registry: CollectionRegistry, address: string): Collection {
  const colon = address.indexOf(":");
  const kind = colon < 0 ? address : address.slice(0, colon);
  const url = colon < 0 ? "" : address.slice(colon + 1);
  const plugin = registry.find((p) => p.kind === kind);
  if (!plugin) {
    throw new ValidationError(
      `Unknown collection kind "${kind}", known: ${registry.map((p) => p.kind).join(", ")}`,
      "kind",
    );
  }
  return plugin.create(url);
}

export const builtinCollections: CollectionRegistry = registerCollections([
  { kind: "memory", create: (url) => new MemoryCollection(url || undefined) },
  { kind: "directory", create: (url) => new DirectoryCollection(url || undefined) },
  { kind: "sqlite", create: (url) => new SqliteCollection(url || undefined) },
]);
