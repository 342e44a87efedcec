import { loadConfig } from "./config";
import { DedupIndex } from "./dedup";
import { createFingerprinter } from "./event";
import { UsgsFeedSource } from "./http";
import { RegionFilter } from "./region";
import { renderSummary } from "./report";
import { PollScheduler } from "./scheduler";
import { FileSink } from "./sink";
import type { Logger } from "./types";

const config = loadConfig();
const controller = new AbortController();

// stdout carries event lines and the summary only
const diagnostics: Logger = { log: console.error, warn: console.warn, error: console.error };

const region = new RegionFilter();
const scheduler = new PollScheduler({
  source: new UsgsFeedSource({
    endpoint: config.feedUrl,
    timeoutMs: config.fetchTimeoutMs,
    rawSink: config.rawLogPath ? new FileSink(config.rawLogPath) : null,
  }),
  dedup: new DedupIndex(config.dedupMaxEntries),
  region,
  fingerprint: createFingerprinter(config.fingerprintMode),
  minMagnitude: config.minMagnitude,
  windowDays: config.windowDays,
  windowEndOffsetDays: config.windowEndOffsetDays,
  pollIntervalMs: config.pollIntervalMs,
  maxBackoffMs: config.maxBackoffMs,
  maxBackoffSteps: config.maxBackoffSteps,
  regionMaxMatches: config.regionMaxMatches,
  onEvent: (line) => console.log(line),
  logger: diagnostics,
});

function stop(signal: NodeJS.Signals): void {
  if (controller.signal.aborted) return;
  console.error(`[poller] Received ${signal}, stopping`);
  controller.abort();
}

async function start(): Promise<void> {
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  console.error(
    "[poller] Starting feed poller with interval",
    config.pollIntervalMs,
    "ms, min magnitude",
    config.minMagnitude,
  );
  await scheduler.run(controller.signal, config.maxCycles);

  const summary = renderSummary({
    batch: scheduler.lastBatch(),
    regionMatches: scheduler.regionMatches(),
    regionLabel: region.label,
    placeFilter: config.placeFilter,
  });
  for (const line of summary) {
    console.log(line);
  }
  console.error("[poller] Stopped", scheduler.stats());
}

start().catch((err) => {
  console.error("[poller] Fatal error", err);
  process.exitCode = 1;
});
