import type { Feature, SeismicEvent } from "@quakewatch/types";
import { vi } from "vitest";
import { DedupIndex } from "../src/dedup";
import { createEvent, createFingerprinter } from "../src/event";
import { RegionFilter } from "../src/region";
import { PollScheduler, type PollSchedulerOptions } from "../src/scheduler";
import type { FeedBatch, FeedQuery, FeedSource } from "../src/types";

/** 2026-10-17T04:12:09.120Z */
export const BASE_TIME = Date.UTC(2026, 9, 17, 4, 12, 9, 120);

/** Fixed "now" for window computation: window is 2026-10-15..2026-10-20. */
export const FIXED_NOW = new Date("2026-10-18T12:00:00Z");

export function makeEvent(overrides: Partial<SeismicEvent> = {}): SeismicEvent {
  return createEvent({
    magnitude: 5.3,
    place: "10 km SSW of Ocotillo, CA",
    occurredAt: BASE_TIME,
    latitude: 32.6001,
    longitude: -116.1022,
    depth: 10,
    feedId: null,
    ...overrides,
  });
}

export function makeFeature(overrides: Partial<SeismicEvent> = {}): Feature {
  const event = makeEvent(overrides);
  return {
    ...(event.feedId ? { id: event.feedId } : {}),
    type: "Feature",
    properties: { mag: event.magnitude, place: event.place, time: event.occurredAt },
    geometry: { type: "Point", coordinates: [event.longitude, event.latitude, event.depth] },
  };
}

export function featureCollection(features: unknown[]): string {
  return JSON.stringify({ type: "FeatureCollection", features });
}

export function fakeLogger() {
  return {
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Replays queued batches or errors, one per fetch. Empty batch once the queue runs out. */
export class FakeFeedSource implements FeedSource {
  readonly queries: FeedQuery[] = [];
  private readonly queue: Array<SeismicEvent[] | Error> = [];
  onFetch: (() => void) | null = null;

  push(...items: Array<SeismicEvent[] | Error>): this {
    this.queue.push(...items);
    return this;
  }

  async fetch(query: FeedQuery): Promise<FeedBatch> {
    this.queries.push(query);
    this.onFetch?.();
    const next = this.queue.shift() ?? [];
    if (next instanceof Error) throw next;
    return { events: next, raw: "" };
  }
}

type SchedulerOverrides = Partial<PollSchedulerOptions>;

export function makeScheduler(overrides: SchedulerOverrides = {}) {
  const source = new FakeFeedSource();
  const dedup = new DedupIndex(100);
  const logger = fakeLogger();
  const emitted: string[] = [];
  const delays: number[] = [];

  const scheduler = new PollScheduler({
    source,
    dedup,
    region: new RegionFilter(),
    fingerprint: createFingerprinter("rendered"),
    minMagnitude: 5,
    windowDays: 5,
    windowEndOffsetDays: 2,
    pollIntervalMs: 1000,
    maxBackoffMs: 5000,
    maxBackoffSteps: 6,
    regionMaxMatches: 100,
    onEvent: (line) => emitted.push(line),
    logger,
    now: () => FIXED_NOW,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides,
  });

  return { scheduler, source, dedup, logger, emitted, delays };
}
