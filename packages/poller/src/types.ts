import type { FingerprintMode, SeismicEvent } from "@quakewatch/types";

export interface QueryWindow {
  startDate: string; // yyyy-MM-dd
  endDate: string; // yyyy-MM-dd
  startMs: number;
}

export interface FeedQuery {
  startDate: string;
  endDate: string;
  minMagnitude: number;
}

export interface FeedBatch {
  events: SeismicEvent[];
  raw: string;
}

export interface FeedSource {
  fetch(query: FeedQuery, signal?: AbortSignal): Promise<FeedBatch>;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export interface PollerStats {
  totalPolls: number;
  successfulPolls: number;
  failedPolls: number;
  eventsFetched: number;
  eventsEmitted: number;
  regionMatches: number;
  consecutiveFailures: number;
  averageCycleMs: number;
  uptime: number;
}

export interface PollerConfig {
  feedUrl: string;
  minMagnitude: number;
  windowDays: number;
  windowEndOffsetDays: number;
  pollIntervalMs: number;
  maxBackoffMs: number;
  maxBackoffSteps: number;
  fetchTimeoutMs: number;
  dedupMaxEntries: number;
  regionMaxMatches: number;
  fingerprintMode: FingerprintMode;
  placeFilter: string | null;
  rawLogPath: string | null;
  maxCycles: number | null;
}
