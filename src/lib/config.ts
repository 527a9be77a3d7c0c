import os from "node:os";
import path from "node:path";
import {
  DEFAULT_EVICTION_MISS_THRESHOLD,
  DEFAULT_FETCH_CONCURRENCY,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_HOME_REGION,
  DEFAULT_OPTIMISTIC_EXPIRY_TICKS,
  DEFAULT_REBOOT_EXPIRY_TICKS,
  DEFAULT_REFRESH_INTERVAL_MS,
  HOME_DIR_NAME,
  MAX_FETCH_CONCURRENCY,
  MIN_FETCH_CONCURRENCY
} from "./constants";
import { CliError } from "./errors";
import { normalizeInputPath, parseMaybeNumber } from "./utils";

export interface FleetConfig {
  homeRegion: string;
  refreshIntervalMs: number;
  fetchTimeoutMs: number;
  concurrency: number;
  optimisticExpiryTicks: number;
  rebootExpiryTicks: number;
  evictionThreshold: number;
  staleAfterMs: number;
  regions: string[];
  homeDir: string;
  debug: boolean;
}

/** Command-line values win over the environment. */
export interface ConfigOverrides {
  intervalSeconds?: string;
  concurrency?: string;
  regions?: string[];
  verbose?: boolean;
}

export function resolveFleetConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const refreshIntervalMs = secondsToMs(
    "--interval",
    overrides.intervalSeconds ?? env.FLEETWATCH_REFRESH_INTERVAL_SECONDS,
    DEFAULT_REFRESH_INTERVAL_MS
  );
  const fetchTimeoutMs = secondsToMs("FLEETWATCH_FETCH_TIMEOUT_SECONDS", env.FLEETWATCH_FETCH_TIMEOUT_SECONDS, DEFAULT_FETCH_TIMEOUT_MS);

  return {
    homeRegion: env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_HOME_REGION,
    refreshIntervalMs,
    fetchTimeoutMs,
    concurrency: parseIntegerInRange(
      "--concurrency",
      overrides.concurrency ?? env.FLEETWATCH_CONCURRENCY,
      DEFAULT_FETCH_CONCURRENCY,
      MIN_FETCH_CONCURRENCY,
      MAX_FETCH_CONCURRENCY
    ),
    optimisticExpiryTicks: parseIntegerInRange(
      "FLEETWATCH_OPTIMISTIC_TICKS",
      env.FLEETWATCH_OPTIMISTIC_TICKS,
      DEFAULT_OPTIMISTIC_EXPIRY_TICKS,
      1,
      100
    ),
    rebootExpiryTicks: parseIntegerInRange("FLEETWATCH_REBOOT_TICKS", env.FLEETWATCH_REBOOT_TICKS, DEFAULT_REBOOT_EXPIRY_TICKS, 1, 100),
    evictionThreshold: parseIntegerInRange(
      "FLEETWATCH_EVICTION_MISSES",
      env.FLEETWATCH_EVICTION_MISSES,
      DEFAULT_EVICTION_MISS_THRESHOLD,
      1,
      100
    ),
    staleAfterMs: secondsToMs("FLEETWATCH_STALE_AFTER_SECONDS", env.FLEETWATCH_STALE_AFTER_SECONDS, refreshIntervalMs + fetchTimeoutMs),
    regions: overrides.regions && overrides.regions.length > 0 ? overrides.regions : splitList(env.FLEETWATCH_REGIONS),
    homeDir: env.FLEETWATCH_HOME ? normalizeInputPath(env.FLEETWATCH_HOME) : path.join(os.homedir(), HOME_DIR_NAME),
    debug: overrides.verbose === true || env.FLEETWATCH_DEBUG === "1"
  };
}

export function splitList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function secondsToMs(source: string, raw: string | undefined, fallbackMs: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallbackMs;
  }
  const seconds = parseMaybeNumber(raw);
  if (seconds === undefined || seconds <= 0) {
    throw new CliError({
      kind: "validation",
      message: `${source} must be a positive number of seconds (got '${raw}').`
    });
  }
  return Math.round(seconds * 1000);
}

function parseIntegerInRange(source: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = parseMaybeNumber(raw);
  if (value === undefined || !Number.isInteger(value) || value < min || value > max) {
    throw new CliError({
      kind: "validation",
      message: `${source} must be an integer between ${min} and ${max} (got '${raw}').`
    });
  }
  return value;
}
