import type { SeismicEvent } from "@quakewatch/types";
import { ServerError, SinkError, TransportError, stringifyError } from "./errors";
import type { RawSink } from "./sink";
import type { FeedBatch, FeedQuery, FeedSource } from "./types";
import { parseFeedResponse } from "./usgsParser";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Fetches `url` and hands the response to `read`. The timeout and the
 * caller's signal stay armed until `read` settles, so a stalled body is
 * aborted too.
 */
export async function fetchWithTimeout<T>(
  url: string,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    if (signal?.aborted) controller.abort();
    const response = await fetch(url, { signal: controller.signal });
    return await read(response);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

export function buildQueryUrl(endpoint: string, query: FeedQuery): string {
  const { startDate, endDate, minMagnitude } = query;
  if (!DATE_PATTERN.test(startDate) || !DATE_PATTERN.test(endDate)) {
    throw new RangeError(`Query dates must be yyyy-MM-dd, got ${startDate}..${endDate}`);
  }
  if (startDate > endDate) {
    throw new RangeError(`startDate ${startDate} is after endDate ${endDate}`);
  }
  if (!Number.isFinite(minMagnitude) || minMagnitude < 0) {
    throw new RangeError(`minMagnitude must be a non-negative number, got ${minMagnitude}`);
  }

  const url = new URL(endpoint);
  url.searchParams.set("format", "geojson");
  url.searchParams.set("starttime", startDate);
  url.searchParams.set("endtime", endDate);
  url.searchParams.set("minmagnitude", String(minMagnitude));
  return url.toString();
}

interface UsgsFeedSourceOptions {
  endpoint: string;
  timeoutMs: number;
  rawSink?: RawSink | null;
}

export class UsgsFeedSource implements FeedSource {
  constructor(private readonly options: UsgsFeedSourceOptions) {}

  async fetch(query: FeedQuery, signal?: AbortSignal): Promise<FeedBatch> {
    const url = buildQueryUrl(this.options.endpoint, query);

    let raw: string;
    try {
      raw = await fetchWithTimeout(
        url,
        this.options.timeoutMs,
        async (response) => {
          if (response.status !== 200) {
            throw new ServerError(response.status);
          }
          return response.text();
        },
        signal,
      );
    } catch (err) {
      if (err instanceof ServerError) throw err;
      throw new TransportError(`Request to ${this.options.endpoint} failed: ${stringifyError(err)}`, {
        cause: err,
      });
    }

    if (this.options.rawSink) {
      await this.appendRaw(this.options.rawSink, raw);
    }

    const events: SeismicEvent[] = parseFeedResponse(raw);
    return { events, raw };
  }

  private async appendRaw(sink: RawSink, raw: string): Promise<void> {
    try {
      await sink.append(raw);
    } catch (err) {
      if (err instanceof SinkError) throw err;
      throw new SinkError("Raw response sink failed", { cause: err });
    }
  }
}
