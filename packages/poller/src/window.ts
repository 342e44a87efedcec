import type { QueryWindow } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Window of `windowDays` whole UTC days ending `endOffsetDays` after the
 * date of `now`.
 */
export function computeQueryWindow(
  now: Date,
  windowDays: number,
  endOffsetDays: number,
): QueryWindow {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const endMs = today + endOffsetDays * DAY_MS;
  const startMs = endMs - windowDays * DAY_MS;

  return {
    startDate: formatDate(startMs),
    endDate: formatDate(endMs),
    startMs,
  };
}

export function formatDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}
