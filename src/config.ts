import type { RecipientMap } from "./alertEngine.js";
import { DEFAULT_DEDUP_OPTIONS } from "./alertDeduplicator.js";
import type { DedupOptions } from "./alertDeduplicator.js";
import { DEFAULT_ANOMALY_OPTIONS } from "./anomalyDetector.js";
import type { DetectorToggles } from "./anomalyDetector.js";
import type { LatLon } from "./geo.js";
import { DEFAULT_PROXIMITY_OPTIONS } from "./proximity.js";
import type { ProximityOptions } from "./proximity.js";

const DEFAULT_FEED_URL = "http://localhost:8080/data/aircraft.json";
const DEFAULT_POLL_MS = 15_000;
const DEFAULT_FAILURE_BACKOFF_MS = 30_000;
const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
const DEFAULT_PORT = 3000;
const DEFAULT_STALENESS_MS = 60_000;
const DEFAULT_OUTAGE_ALERT_AFTER = 20;
const DEFAULT_HEALTH_COOLDOWN_MS = 6 * 3600_000;
const DEFAULT_HISTORY_RETENTION_DAYS = 30;

type Env = Record<string, string | undefined>;

export interface AppConfig {
  feedUrl: string;
  home: LatLon;
  pollMs: number;
  failureBackoffMs: number;
  fetchTimeoutMs: number;
  port: number;
  dbPath: string;
  watchListPath: string;
  airportsPath: string;
  restrictedAreasPath: string;
  stalenessMs: number;
  /** Consecutive failed polls before a feed health alert. */
  outageAlertAfterFailures: number;
  healthCooldownMs: number;
  historyRetentionDays: number;
  webhookUrls: string[];
  recipients: RecipientMap;
  alertsEnabled: { tracked: boolean; anomaly: boolean };
  announceStart: boolean;
  /** 0 disables periodic alive notices. */
  aliveIntervalMs: number;
  proximity: ProximityOptions;
  dedup: DedupOptions;
  detectors: DetectorToggles;
}

function readRequiredNumber(env: Env, envKey: string): number {
  const value = env[envKey];
  if (!value) {
    throw new Error(`Missing required environment variable ${envKey}`);
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${envKey} must be a valid number`);
  }
  return parsed;
}

function readOptionalNumber(env: Env, envKey: string, fallback: number): number {
  const value = env[envKey];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${envKey} must be a valid number`);
  }
  return parsed;
}

function readPositiveNumber(env: Env, envKey: string, fallback: number): number {
  const parsed = readOptionalNumber(env, envKey, fallback);
  if (parsed <= 0) {
    throw new Error(`Environment variable ${envKey} must be greater than zero`);
  }
  return parsed;
}

function readOptionalBoolean(env: Env, envKey: string, fallback: boolean): boolean {
  const value = env[envKey];
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`Environment variable ${envKey} must be true or false`);
}

function readList(env: Env, envKey: string): string[] {
  return (env[envKey] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const lat = readRequiredNumber(env, "HOME_LAT");
  const lon = readRequiredNumber(env, "HOME_LON");
  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    throw new Error(`HOME_LAT/HOME_LON out of range: ${lat}, ${lon}`);
  }

  const aliveIntervalMs = readOptionalNumber(env, "ALIVE_INTERVAL_MS", 0);
  if (aliveIntervalMs < 0) {
    throw new Error("Environment variable ALIVE_INTERVAL_MS must not be negative");
  }

  const port = readOptionalNumber(env, "PORT", DEFAULT_PORT);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Environment variable PORT must be a port number, got ${port}`);
  }

  return {
    feedUrl: env.FEED_URL || DEFAULT_FEED_URL,
    home: { lat, lon },
    pollMs: readPositiveNumber(env, "POLL_MS", DEFAULT_POLL_MS),
    failureBackoffMs: readPositiveNumber(env, "FAILURE_BACKOFF_MS", DEFAULT_FAILURE_BACKOFF_MS),
    fetchTimeoutMs: readPositiveNumber(env, "FETCH_TIMEOUT_MS", DEFAULT_FETCH_TIMEOUT_MS),
    port,
    dbPath: env.DB_PATH || "data/tracker.db",
    watchListPath: env.WATCHLIST_PATH || "data/watchlist.json",
    airportsPath: env.AIRPORTS_PATH || "data/airports.json",
    restrictedAreasPath: env.RESTRICTED_AREAS_PATH || "data/restricted-areas.json",
    stalenessMs: readPositiveNumber(env, "STALENESS_MS", DEFAULT_STALENESS_MS),
    outageAlertAfterFailures: readPositiveNumber(env, "OUTAGE_ALERT_AFTER_FAILURES", DEFAULT_OUTAGE_ALERT_AFTER),
    healthCooldownMs: readPositiveNumber(env, "HEALTH_COOLDOWN_MS", DEFAULT_HEALTH_COOLDOWN_MS),
    historyRetentionDays: readPositiveNumber(env, "HISTORY_RETENTION_DAYS", DEFAULT_HISTORY_RETENTION_DAYS),
    webhookUrls: readList(env, "WEBHOOK_URLS"),
    recipients: {
      tracked: readList(env, "TRACKED_RECIPIENTS"),
      anomaly: readList(env, "ANOMALY_RECIPIENTS"),
      health: readList(env, "HEALTH_RECIPIENTS"),
    },
    alertsEnabled: {
      tracked: readOptionalBoolean(env, "TRACKED_ALERTS_ENABLED", true),
      anomaly: readOptionalBoolean(env, "ANOMALY_ALERTS_ENABLED", true),
    },
    announceStart: readOptionalBoolean(env, "START_NOTICE_ENABLED", true),
    aliveIntervalMs,
    proximity: {
      timeoutMs: readPositiveNumber(env, "FLYBY_TIMEOUT_MS", DEFAULT_PROXIMITY_OPTIONS.timeoutMs),
      trailingWindow: readPositiveNumber(env, "FLYBY_TRAILING_WINDOW", DEFAULT_PROXIMITY_OPTIONS.trailingWindow),
      closeApproachMiles: readOptionalNumber(env, "CLOSE_APPROACH_MILES", DEFAULT_PROXIMITY_OPTIONS.closeApproachMiles),
    },
    dedup: {
      ...DEFAULT_DEDUP_OPTIONS,
      trackedCooldownMs: readPositiveNumber(env, "TRACKED_COOLDOWN_MS", DEFAULT_DEDUP_OPTIONS.trackedCooldownMs),
      anomalyCooldownMs: readPositiveNumber(env, "ANOMALY_COOLDOWN_MS", DEFAULT_DEDUP_OPTIONS.anomalyCooldownMs),
      maxAnomaliesPerHour: readPositiveNumber(env, "MAX_ANOMALIES_PER_HOUR", DEFAULT_DEDUP_OPTIONS.maxAnomaliesPerHour),
    },
    detectors: {
      emergency: readOptionalBoolean(env, "DETECT_EMERGENCY", DEFAULT_ANOMALY_OPTIONS.enabled.emergency),
      patterns: readOptionalBoolean(env, "DETECT_PATTERNS", DEFAULT_ANOMALY_OPTIONS.enabled.patterns),
      loitering: readOptionalBoolean(env, "DETECT_LOITERING", DEFAULT_ANOMALY_OPTIONS.enabled.loitering),
      formation: readOptionalBoolean(env, "DETECT_FORMATION", DEFAULT_ANOMALY_OPTIONS.enabled.formation),
      restrictedAreas: readOptionalBoolean(env, "DETECT_RESTRICTED_AREAS", DEFAULT_ANOMALY_OPTIONS.enabled.restrictedAreas),
    },
  };
}
