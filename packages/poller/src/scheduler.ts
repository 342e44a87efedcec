import type { SeismicEvent } from "@quakewatch/types";
import type { DedupIndex } from "./dedup";
import { FeedError, StateError, isFeedError } from "./errors";
import { type Fingerprinter, renderEvent } from "./event";
import type { RegionFilter } from "./region";
import { orderByTime } from "./timeline";
import type { FeedSource, Logger, PollerStats } from "./types";
import { computeQueryWindow } from "./window";

export interface PollSchedulerOptions {
  source: FeedSource;
  dedup: DedupIndex;
  region: RegionFilter;
  fingerprint: Fingerprinter;
  minMagnitude: number;
  windowDays: number;
  windowEndOffsetDays: number;
  pollIntervalMs: number;
  maxBackoffMs: number;
  maxBackoffSteps: number;
  regionMaxMatches: number;
  onEvent: (line: string, event: SeismicEvent) => void;
  onRegionMatch?: (line: string, event: SeismicEvent) => void;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export type CycleOutcome =
  | { ok: true; fetched: number; emitted: number; regionMatches: number }
  | { ok: false; error: FeedError };

export class PollScheduler {
  private running = false;
  private batch: readonly SeismicEvent[] = [];
  private readonly matches: string[] = [];
  private consecutiveFailures = 0;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly counters = {
    totalPolls: 0,
    successfulPolls: 0,
    failedPolls: 0,
    eventsFetched: 0,
    eventsEmitted: 0,
    regionMatches: 0,
    totalCycleMs: 0,
    startTime: Date.now(),
  };

  constructor(private readonly options: PollSchedulerOptions) {
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? abortableDelay;
  }

  /** Last successfully fetched batch in time order; empty until the first success. */
  lastBatch(): readonly SeismicEvent[] {
    return this.batch;
  }

  regionMatches(): readonly string[] {
    return [...this.matches];
  }

  isRunning(): boolean {
    return this.running;
  }

  stats(): PollerStats {
    const c = this.counters;
    return {
      totalPolls: c.totalPolls,
      successfulPolls: c.successfulPolls,
      failedPolls: c.failedPolls,
      eventsFetched: c.eventsFetched,
      eventsEmitted: c.eventsEmitted,
      regionMatches: c.regionMatches,
      consecutiveFailures: this.consecutiveFailures,
      averageCycleMs: c.totalPolls > 0 ? c.totalCycleMs / c.totalPolls : 0,
      uptime: Date.now() - c.startTime,
    };
  }

  /**
   * Delay before the next cycle. Doubles per consecutive failure up to
   * `maxBackoffSteps` doublings, never above `maxBackoffMs`.
   */
  nextDelayMs(): number {
    const { pollIntervalMs, maxBackoffMs, maxBackoffSteps } = this.options;
    if (this.consecutiveFailures === 0) return pollIntervalMs;
    const steps = Math.min(this.consecutiveFailures, maxBackoffSteps);
    return Math.min(pollIntervalMs * 2 ** steps, maxBackoffMs);
  }

  async pollOnce(signal?: AbortSignal): Promise<CycleOutcome> {
    const startedAt = Date.now();
    const { source, minMagnitude, windowDays, windowEndOffsetDays } = this.options;
    const window = computeQueryWindow(this.now(), windowDays, windowEndOffsetDays);

    let fetched: SeismicEvent[];
    try {
      const result = await source.fetch(
        { startDate: window.startDate, endDate: window.endDate, minMagnitude },
        signal,
      );
      fetched = result.events;
    } catch (err) {
      if (!isFeedError(err)) throw err;

      // Cut short by a stop request; not a feed failure.
      if (signal?.aborted) return { ok: false, error: err };

      this.counters.totalPolls++;
      this.counters.failedPolls++;
      this.counters.totalCycleMs += Date.now() - startedAt;
      this.consecutiveFailures++;
      this.logger.error(`[poller] ${err.label()}: ${err.message}`);
      return { ok: false, error: err };
    }

    const ordered = orderByTime(fetched);
    let emitted = 0;
    let regionMatches = 0;

    for (const event of ordered) {
      const line = renderEvent(event);
      const fingerprint = this.options.fingerprint(event, line);

      if (this.options.dedup.isNew(fingerprint)) {
        this.options.onEvent(line, event);
        emitted++;
      }
      this.options.dedup.record(fingerprint, line, event.occurredAt);

      if (this.options.region.isInRegion(event)) {
        this.appendMatch(line);
        this.options.onRegionMatch?.(line, event);
        regionMatches++;
      }
    }

    this.batch = ordered;
    this.consecutiveFailures = 0;
    const evicted = this.options.dedup.evictOlderThan(window.startMs);
    if (evicted > 0) {
      this.logger.log(`[poller] Evicted ${evicted} fingerprints before ${window.startDate}`);
    }

    this.counters.totalPolls++;
    this.counters.successfulPolls++;
    this.counters.eventsFetched += ordered.length;
    this.counters.eventsEmitted += emitted;
    this.counters.regionMatches += regionMatches;
    this.counters.totalCycleMs += Date.now() - startedAt;

    return { ok: true, fetched: ordered.length, emitted, regionMatches };
  }

  /**
   * Polls until `signal` aborts or `maxCycles` cycles have completed.
   * Feed errors are logged and retried; anything else rejects.
   */
  async run(signal: AbortSignal, maxCycles: number | null = null): Promise<void> {
    if (this.running) {
      throw new StateError("PollScheduler is already running");
    }
    this.running = true;

    try {
      let cycles = 0;
      while (!signal.aborted) {
        await this.pollOnce(signal);
        cycles++;
        if (signal.aborted) break;
        if (maxCycles !== null && cycles >= maxCycles) break;
        await this.sleep(this.nextDelayMs(), signal);
      }
    } finally {
      this.running = false;
    }
  }

  private appendMatch(line: string): void {
    this.matches.push(line);
    if (this.matches.length > this.options.regionMaxMatches) {
      this.matches.splice(0, this.matches.length - this.options.regionMaxMatches);
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
