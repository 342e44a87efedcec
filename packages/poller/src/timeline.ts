import type { SeismicEvent } from "@quakewatch/types";

/** Oldest first. Array.prototype.sort is stable, so ties keep feed order. */
export function orderByTime(batch: readonly SeismicEvent[]): SeismicEvent[] {
  return [...batch].sort((a, b) => a.occurredAt - b.occurredAt);
}
