// src/log.ts
import { getConfig, type LogLevel } from "./config.ts";

const ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return ORDER[level] >= ORDER[getConfig().logLevel];
}

/**
 * Thin console wrapper. Same emoji prefixes as the batch scripts used,
 * gated by TRACKSYNC_LOG_LEVEL so library callers are not spammed.
 */
export const log = {
  debug(message: string, ...rest: unknown[]): void {
    if (enabled("debug")) console.debug(`🔎 ${message}`, ...rest);
  },
  info(message: string, ...rest: unknown[]): void {
    if (enabled("info")) console.log(`✅ ${message}`, ...rest);
  },
  warn(message: string, ...rest: unknown[]): void {
    if (enabled("warn")) console.warn(`⚠️  ${message}`, ...rest);
  },
  error(message: string, ...rest: unknown[]): void {
    if (enabled("error")) console.error(`❌ ${message}`, ...rest);
  },
};
