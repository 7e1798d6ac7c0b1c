// src/config.ts
import dotenv from "dotenv";
import { z } from "zod";
import { ValidationError } from "./errors.ts";

// -------------------------------------------------------------------
// Environment schema – every key is optional, defaults live here
// -------------------------------------------------------------------
const EnvSchema = z.object({
  TRACKSYNC_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  TRACKSYNC_DB_PATH: z.string().min(1).default("tracks.db"),
  TRACKSYNC_DIRECTORY: z.string().min(1).default("tracks"),
  TRACKSYNC_SIMILAR_MIN_POSITIONS: z.coerce.number().int().positive().default(100),
  TRACKSYNC_SIMPLIFY_METERS: z.coerce.number().positive().default(50),
});

export type LogLevel = z.infer<typeof EnvSchema>["TRACKSYNC_LOG_LEVEL"];

export interface TrackSyncConfig {
  /** Minimum level that reaches the console */
  logLevel: LogLevel;
  /** Default database file for SqliteCollection */
  dbPath: string;
  /** Default folder for DirectoryCollection */
  directory: string;
  /** Shared (lon, lat) pairs needed before two records count as "similar" */
  similarMinPositions: number;
  /** Simplification resolution for the similarity estimator, in metres */
  simplifyMeters: number;
}

/**
 * Validate an environment map and turn it into a frozen config.
 * Unknown keys are ignored.
 */
export function loadConfig(env: NodeJS.ProcessEnv): Readonly<TrackSyncConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ValidationError(`Invalid configuration: ${keys.join(", ")}`, keys[0], {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  const e = parsed.data;
  return Object.freeze({
    logLevel: e.TRACKSYNC_LOG_LEVEL,
    dbPath: e.TRACKSYNC_DB_PATH,
    directory: e.TRACKSYNC_DIRECTORY,
    similarMinPositions: e.TRACKSYNC_SIMILAR_MIN_POSITIONS,
    simplifyMeters: e.TRACKSYNC_SIMPLIFY_METERS,
  });
}

let cached: Readonly<TrackSyncConfig> | undefined;

/** Process-wide config: reads .env once, then `process.env`. */
export function getConfig(): Readonly<TrackSyncConfig> {
  if (!cached) {
    dotenv.config(); // loads .env → process.env
    cached = loadConfig(process.env);
  }
  return cached;
}
