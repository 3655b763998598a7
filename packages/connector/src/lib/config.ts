/**
 * Configuration
 *
 * Typed configuration with defaults, loaded from a JSON file
 * (XDG compliant). Every value is validated on its own: an invalid value
 * logs a warning and falls back to that value's default.
 *
 * {
 *   "sync": { "interval_minutes": 10, "change_threshold_steps": 100, ... },
 *   "status": { "freshness_warning_minutes": 30 },
 *   "storage": { "data_dir": "/path/to/data" }
 * }
 */

import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { config } from "dotenv";
import { z } from "zod";
import { setupLogger } from "./logger.js";
import { ConfigInvalidError } from "./errors.js";
import { METRIC_KINDS, type MetricKind } from "../types.js";

// Load .env for local development
config();

const logger = setupLogger("config");

// Types
export interface SyncConfig {
  /** Minimum spacing between syncs of the same kind */
  intervalMinutes: number;
  /** Step delta that makes a steps change notification-worthy */
  changeThresholdSteps: number;
  wakingHoursStart: number;
  wakingHoursEnd: number;
  /** Days re-fetched before the last seen remote timestamp */
  safetyOverlapDays: number;
  /** Applies to each chunk request, not to the whole kind */
  fetchTimeoutSeconds: number;
  /** Days per remote fetch; each chunk is merged before the next is requested */
  fetchChunkDays: number;
  /** Lookback of the first sync per kind */
  bootstrapDays: Readonly<Record<MetricKind, number>>;
}

export interface StatusConfig {
  freshnessWarningMinutes: number;
}

export interface StorageConfig {
  dataDir: string;
}

export interface AppConfig {
  sync: Readonly<SyncConfig>;
  status: Readonly<StatusConfig>;
  storage: Readonly<StorageConfig>;
}

export type Env = Record<string, string | undefined>;

// ~6 years of daily history, 5 years of weigh-ins
export const DEFAULT_BOOTSTRAP_DAYS: Readonly<Record<MetricKind, number>> = {
  steps: 2200,
  sleep: 2200,
  weight: 1825,
  activity: 2200,
  "body-battery": 2200,
  stress: 2200,
};

export function defaultDataDir(env: Env = process.env): string {
  return env.HEALTH_DATA_DIR || join(homedir(), "Health", "Garmin");
}

export function defaultConfig(env: Env = process.env): AppConfig {
  return {
    sync: {
      intervalMinutes: 10,
      changeThresholdSteps: 100,
      wakingHoursStart: 7,
      wakingHoursEnd: 23,
      safetyOverlapDays: 3,
      fetchTimeoutSeconds: 30,
      fetchChunkDays: 30,
      bootstrapDays: { ...DEFAULT_BOOTSTRAP_DAYS },
    },
    status: {
      freshnessWarningMinutes: 30,
    },
    storage: {
      dataDir: defaultDataDir(env),
    },
  };
}

/**
 * Config file location: HEALTH_CACHE_CONFIG, then XDG_CONFIG_HOME, then ~/.config
 */
export function resolveConfigPath(env: Env = process.env): string {
  if (env.HEALTH_CACHE_CONFIG) {
    return env.HEALTH_CACHE_CONFIG;
  }
  const base = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, "health-cache", "config.json");
}

// =============================================================================
// Parsing
// =============================================================================

const sectionSchema = z.record(z.string(), z.unknown());
const nonNegativeInt = z.number().int().min(0);
const hourOfDay = z.number().int().min(0).max(23);

function sectionOf(raw: Record<string, unknown>, path: string): Record<string, unknown> {
  const name = path.slice(path.lastIndexOf(".") + 1);
  if (!(name in raw)) return {};
  const parsed = sectionSchema.safeParse(raw[name]);
  if (!parsed.success) {
    warnInvalid(new ConfigInvalidError(path, "expected an object"));
    return {};
  }
  return parsed.data;
}

function warnInvalid(error: ConfigInvalidError): void {
  logger.warn(`${error.message}; using default`);
}

/**
 * Validate one value. `path` is the dotted key, its last segment is looked up in `section`.
 */
function pick<T>(
  section: Record<string, unknown>,
  path: string,
  schema: z.ZodType<T>,
  fallback: T
): T {
  const key = path.slice(path.lastIndexOf(".") + 1);
  if (!(key in section)) return fallback;

  const parsed = schema.safeParse(section[key]);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
    warnInvalid(new ConfigInvalidError(path, reason));
    return fallback;
  }
  return parsed.data;
}

/**
 * Merge a parsed JSON document into the defaults.
 */
export function parseConfig(raw: unknown, env: Env = process.env): AppConfig {
  const defaults = defaultConfig(env);

  const root = sectionSchema.safeParse(raw);
  if (!root.success) {
    warnInvalid(new ConfigInvalidError("<root>", "expected an object"));
    return freezeConfig(defaults);
  }

  const sync = sectionOf(root.data, "sync");
  const status = sectionOf(root.data, "status");
  const storage = sectionOf(root.data, "storage");

  const bootstrapSection = sectionOf(sync, "sync.bootstrap_days");
  const bootstrapDays: Record<MetricKind, number> = { ...defaults.sync.bootstrapDays };
  for (const kind of METRIC_KINDS) {
    bootstrapDays[kind] = pick(
      bootstrapSection,
      `sync.bootstrap_days.${kind}`,
      z.number().int().min(1),
      defaults.sync.bootstrapDays[kind]
    );
  }

  return freezeConfig({
    sync: {
      intervalMinutes: pick(sync, "sync.interval_minutes", nonNegativeInt, defaults.sync.intervalMinutes),
      changeThresholdSteps: pick(sync, "sync.change_threshold_steps", nonNegativeInt, defaults.sync.changeThresholdSteps),
      wakingHoursStart: pick(sync, "sync.waking_hours_start", hourOfDay, defaults.sync.wakingHoursStart),
      wakingHoursEnd: pick(sync, "sync.waking_hours_end", hourOfDay, defaults.sync.wakingHoursEnd),
      safetyOverlapDays: pick(sync, "sync.safety_overlap_days", nonNegativeInt, defaults.sync.safetyOverlapDays),
      fetchTimeoutSeconds: pick(sync, "sync.fetch_timeout_seconds", z.number().positive(), defaults.sync.fetchTimeoutSeconds),
      fetchChunkDays: pick(sync, "sync.fetch_chunk_days", z.number().int().min(1), defaults.sync.fetchChunkDays),
      bootstrapDays,
    },
    status: {
      freshnessWarningMinutes: pick(
        status,
        "status.freshness_warning_minutes",
        z.number().int().min(1),
        defaults.status.freshnessWarningMinutes
      ),
    },
    storage: {
      dataDir: pick(storage, "storage.data_dir", z.string().min(1), defaults.storage.dataDir),
    },
  });
}

function freezeConfig(cfg: AppConfig): AppConfig {
  return Object.freeze({
    sync: Object.freeze({ ...cfg.sync, bootstrapDays: Object.freeze({ ...cfg.sync.bootstrapDays }) }),
    status: Object.freeze({ ...cfg.status }),
    storage: Object.freeze({ ...cfg.storage }),
  });
}

export interface LoadConfigOptions {
  path?: string;
  env?: Env;
}

/**
 * Load config from file, using defaults for missing or invalid values.
 * Never throws.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? resolveConfigPath(env);

  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.debug(`No config file at ${path}, using defaults`);
    } else {
      logger.warn(`Could not read config from ${path}: ${error}; using defaults`);
    }
    return freezeConfig(defaultConfig(env));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    logger.warn(`Could not parse config from ${path}: ${error}; using defaults`);
    return freezeConfig(defaultConfig(env));
  }

  return parseConfig(raw, env);
}

/**
 * Check whether an hour (0-23) falls within the waking-hours window.
 * A window with start > end wraps past midnight.
 */
export function isWakingHour(sync: Pick<SyncConfig, "wakingHoursStart" | "wakingHoursEnd">, hour: number): boolean {
  const { wakingHoursStart: start, wakingHoursEnd: end } = sync;
  if (start <= end) {
    return start <= hour && hour <= end;
  }
  return hour >= start || hour <= end;
}
