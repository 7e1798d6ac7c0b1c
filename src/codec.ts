/*********************************************************************
 * src/codec.ts
 *
 * GPX has a single free-text keyword field. We store three typed
 * attributes inside it next to the user's own tags:
 *
 *   berlin, night, Category:Cycling, Status:public, Id:sqlite:/x.db/17
 *
 * encodeAttributes() builds that string, decodeAttributes() takes it
 * apart again. Plain tags may never start with one of the prefixes.
 *********************************************************************/

import { readFileSync } from "fs";
import { z } from "zod";
import { DuplicateKeywordError, ReservedKeywordError, ValidationError } from "./errors.ts";
import { log } from "./log.ts";
import type { RecordAttributes } from "./types.ts";

/** Reserved prefix → the TrackRecord setter to use instead */
const RESERVED = {
  Category: "setCategory",
  Status: "setPublic",
  Id: "setIds",
} as const;

type ReservedPrefix = keyof typeof RESERVED;

export const MAX_CROSS_IDS = 5;

const CategoriesSchema = z.array(z.string().min(1)).nonempty();

function loadCategories(): readonly string[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./data/categories.json", import.meta.url), "utf8"),
  );
  return Object.freeze(CategoriesSchema.parse(raw));
}

/** Every legal category. The first one is the default. */
export const CATEGORIES: readonly string[] = loadCategories();
export const DEFAULT_CATEGORY: string = CATEGORIES[0];

const categorySet = new Set(CATEGORIES);

export function isCategory(value: string): boolean {
  return categorySet.has(value);
}

export function checkCategory(value: string): void {
  if (!isCategory(value)) {
    throw new ValidationError(`Category "${value}" is not known`, "category", { value });
  }
}

/* ------------------------------------------------------------------ */
/* Plain tags                                                          */
/* ------------------------------------------------------------------ */

/** Throws if `tag` cannot be stored as a plain tag. */
export function checkTag(tag: string): void {
  for (const prefix of Object.keys(RESERVED) as ReservedPrefix[]) {
    if (tag.startsWith(`${prefix}:`)) {
      throw new ReservedKeywordError(prefix, RESERVED[prefix]);
    }
  }
  if (tag.includes(",")) {
    throw new ValidationError(`No comma allowed within a tag: "${tag}"`, "tags", { tag });
  }
  if (!tag.trim()) {
    throw new ValidationError("Tags must not be empty", "tags");
  }
}

/** Sorted, trimmed, without duplicates. */
export function normalizeTags(tags: Iterable<string>): string[] {
  return [...new Set([...tags].map((t) => t.trim()))].sort();
}

/** Split a raw comma separated string, dropping empty entries. */
export function splitTags(raw: string): string[] {
  return raw
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

/* ------------------------------------------------------------------ */
/* Cross-collection ids                                                */
/* ------------------------------------------------------------------ */

/**
 * `sqlite:/data/tracks.db/17` → `sqlite:/data/tracks.db`.
 * undefined if the id has no origin or no identity part.
 */
export function originOf(id: string): string | undefined {
  const slash = id.lastIndexOf("/");
  if (slash <= 0 || slash === id.length - 1) return undefined;
  return id.slice(0, slash);
}

function isWellFormedId(id: string): boolean {
  return !id.includes(",") && id.trim() === id && originOf(id) !== undefined;
}

/**
 * Enforce the id list invariants: well formed, unique, one id per
 * origin, at most five.
 */
export function checkCrossIds(ids: readonly string[]): void {
  if (ids.length > MAX_CROSS_IDS) {
    throw new ValidationError(`At most ${MAX_CROSS_IDS} ids are kept, got ${ids.length}`, "ids");
  }
  const origins = new Set<string>();
  for (const id of ids) {
    const origin = originOf(id);
    if (!isWellFormedId(id) || origin === undefined) {
      throw new ValidationError(`Illegal id "${id}"`, "ids", { id });
    }
    if (origins.has(origin)) {
      throw new ValidationError(`More than one id from ${origin}`, "ids", { id });
    }
    origins.add(origin);
  }
}

/**
 * Reduce an id list (newest first) to what we keep:
 * exact repeats go, only the newest id per origin survives, and the
 * list is cut to five. Malformed entries are dropped.
 */
export function cleanCrossIds(original: readonly string[]): string[] {
  const seenIds = new Set<string>();
  const seenOrigins = new Set<string>();
  const result: string[] = [];
  for (const id of original) {
    if (seenIds.has(id)) continue;
    seenIds.add(id);
    const origin = originOf(id);
    if (!isWellFormedId(id) || origin === undefined) continue;
    if (seenOrigins.has(origin)) continue;
    seenOrigins.add(origin);
    result.push(id);
  }
  const kept = result.slice(0, MAX_CROSS_IDS);
  if (kept.length !== original.length || kept.some((id, i) => id !== original[i])) {
    log.debug(`ids: ${original.join(" ")} -> ${kept.join(" ")}`);
  }
  return kept;
}

/* ------------------------------------------------------------------ */
/* The codec                                                           */
/* ------------------------------------------------------------------ */

/**
 * Tags first, then Category, then Status, then one Id entry per id,
 * joined with ", ".
 */
export function encodeAttributes(attrs: RecordAttributes): string {
  return [
    ...attrs.tags,
    `Category:${attrs.category}`,
    `Status:${attrs.isPublic ? "public" : "private"}`,
    ...attrs.ids.map((id) => `Id:${id}`),
  ].join(", ");
}

/**
 * Parse a stored keyword string. Missing Category or Status entries
 * yield the defaults; a Category or Status given twice is an error.
 * Stored ids go through cleanCrossIds().
 */
export function decodeAttributes(raw: string): RecordAttributes {
  let category: string | undefined;
  let status: boolean | undefined;
  const ids: string[] = [];
  const tags: string[] = [];

  for (const entry of splitTags(raw)) {
    if (entry.startsWith("Category:")) {
      if (category !== undefined) throw new DuplicateKeywordError("Category", raw);
      category = entry.slice("Category:".length).trim();
      checkCategory(category);
    } else if (entry.startsWith("Status:")) {
      if (status !== undefined) throw new DuplicateKeywordError("Status", raw);
      const value = entry.slice("Status:".length).trim();
      if (value !== "public" && value !== "private") {
        throw new ValidationError(`Status must be public or private, got "${value}"`, "public");
      }
      status = value === "public";
    } else if (entry.startsWith("Id:")) {
      ids.push(entry.slice("Id:".length).trim());
    } else {
      tags.push(entry);
    }
  }

  return {
    tags: normalizeTags(tags),
    category: category ?? DEFAULT_CATEGORY,
    isPublic: status ?? false,
    ids: cleanCrossIds(ids),
  };
}
