import { FingerprintModeSchema } from "@quakewatch/types";
import type { PollerConfig } from "./types";

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  FEED_URL: "https://earthquake.usgs.gov/fdsnws/event/1/query",
  MIN_MAGNITUDE: 5.0,
  WINDOW_DAYS: 5,
  WINDOW_END_OFFSET_DAYS: 2,
  POLL_INTERVAL_MS: 1000,
  MAX_BACKOFF_MS: 60000,
  MAX_BACKOFF_STEPS: 6,
  FETCH_TIMEOUT_MS: 10000,
  DEDUP_MAX_ENTRIES: 10000,
  REGION_MAX_MATCHES: 1000,
};

const MIN_POLL_INTERVAL_MS = 100;

export function loadConfig(env: Env = process.env): PollerConfig {
  const feedUrl = (env.FEED_URL || DEFAULTS.FEED_URL).replace(/\/+$/, "");
  try {
    new URL(feedUrl);
  } catch {
    throw new Error(`FEED_URL is not a valid URL: ${feedUrl}`);
  }

  const minMagnitude = floatOr(env.MIN_MAGNITUDE, DEFAULTS.MIN_MAGNITUDE);
  if (minMagnitude < 0) {
    throw new Error("MIN_MAGNITUDE must be non-negative");
  }

  const windowDays = intOr(env.WINDOW_DAYS, DEFAULTS.WINDOW_DAYS);
  if (windowDays < 0) {
    throw new Error("WINDOW_DAYS must be non-negative");
  }

  const fingerprint = FingerprintModeSchema.safeParse(env.FINGERPRINT_MODE || "rendered");
  if (!fingerprint.success) {
    throw new Error(`FINGERPRINT_MODE must be "rendered" or "feed-id", got ${env.FINGERPRINT_MODE}`);
  }

  const pollIntervalMs = Math.max(
    MIN_POLL_INTERVAL_MS,
    intOr(env.POLL_INTERVAL_MS, DEFAULTS.POLL_INTERVAL_MS),
  );

  const maxCycles = parseInt(env.MAX_CYCLES || "", 10);

  return {
    feedUrl,
    minMagnitude,
    windowDays,
    windowEndOffsetDays: intOr(env.WINDOW_END_OFFSET_DAYS, DEFAULTS.WINDOW_END_OFFSET_DAYS),
    pollIntervalMs,
    maxBackoffMs: Math.max(pollIntervalMs, intOr(env.MAX_BACKOFF_MS, DEFAULTS.MAX_BACKOFF_MS)),
    maxBackoffSteps: Math.max(0, intOr(env.MAX_BACKOFF_STEPS, DEFAULTS.MAX_BACKOFF_STEPS)),
    fetchTimeoutMs: Math.max(1, intOr(env.FETCH_TIMEOUT_MS, DEFAULTS.FETCH_TIMEOUT_MS)),
    dedupMaxEntries: Math.max(1, intOr(env.DEDUP_MAX_ENTRIES, DEFAULTS.DEDUP_MAX_ENTRIES)),
    regionMaxMatches: Math.max(1, intOr(env.REGION_MAX_MATCHES, DEFAULTS.REGION_MAX_MATCHES)),
    fingerprintMode: fingerprint.data,
    placeFilter: env.PLACE_FILTER || null,
    rawLogPath: env.RAW_LOG_PATH || null,
    maxCycles: Number.isFinite(maxCycles) && maxCycles > 0 ? maxCycles : null,
  };
}

function intOr(value: string | undefined, fallback: number): number {
  const n = parseInt(value || "", 10);
  return Number.isFinite(n) ? n : fallback;
}

function floatOr(value: string | undefined, fallback: number): number {
  const n = parseFloat(value || "");
  return Number.isFinite(n) ? n : fallback;
}
