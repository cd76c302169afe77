import { parseLogLevel } from "@devteam-sim/core";
import type { LogEntry } from "@devteam-sim/core";

export interface RuntimeConfig {
  logLevel: LogEntry["level"];
  progressIntervalDays: number;
  comparisonConcurrency: number;
  outputDir: string;
  /** Seed for scenarios that do not declare one. */
  defaultSeed: number | undefined;
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a positive integer`);
  }
  return value;
}

function optionalInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid ${name}: ${raw}. Must be an integer`);
  }
  return value;
}

let cachedConfig: RuntimeConfig | null = null;

export function loadConfig(): RuntimeConfig {
  const rawLevel = process.env.LOG_LEVEL;
  const logLevel = rawLevel ? parseLogLevel(rawLevel) : "info";
  if (!logLevel) {
    throw new Error(`Invalid LOG_LEVEL: ${rawLevel}. Must be one of: debug, info, warn, error`);
  }

  cachedConfig = {
    logLevel,
    progressIntervalDays: positiveInt("PROGRESS_INTERVAL_DAYS", process.env.PROGRESS_INTERVAL_DAYS, 7),
    comparisonConcurrency: positiveInt("COMPARISON_CONCURRENCY", process.env.COMPARISON_CONCURRENCY, 1),
    outputDir: process.env.OUTPUT_DIR || "./results",
    defaultSeed: optionalInt("DEFAULT_SEED", process.env.DEFAULT_SEED),
  };

  return cachedConfig;
}

export function getConfig(): RuntimeConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
