import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { HistorySummary, SongStatsSource } from "../src/catalog/sources.js";
import { isDataError } from "../src/common/errors.js";
import { mean, roundTo } from "../src/common/math.js";
import { Logger } from "../src/logger.js";
import {
  batchConfidence,
  collectTriggers,
  nextShowTrigger,
  run,
  type RunOptions,
} from "../src/orchestrator.js";
import { loadDefaultTuning, type PredictionTuning } from "../src/predict/tuning.js";
import type {
  PredictionBatch,
  PredictionTransport,
  RunConfig,
  ShowTrigger,
  SongCatalogEntry,
} from "../src/types.js";
import { sampleCatalog } from "./fixtures/catalog.js";

const RED_ROCKS: ShowTrigger = {
  bandName: "Goose",
  nextShowDate: "2025-07-19",
  venueName: "Red Rocks Amphitheatre",
};

class FakeSource implements SongStatsSource {
  readonly name = "fake";
  constructor(
    private readonly catalog: SongCatalogEntry[],
    private readonly summary: HistorySummary,
  ) {}

  async fetchSongStats(): Promise<SongCatalogEntry[]> {
    return this.catalog;
  }

  async describeHistory(): Promise<HistorySummary> {
    return this.summary;
  }
}

class RecordingTransport implements PredictionTransport {
  readonly batches: PredictionBatch[] = [];
  constructor(readonly name = "recording") {}

  async sendBatch(batch: PredictionBatch): Promise<void> {
    this.batches.push(batch);
  }
}

class BrokenTransport implements PredictionTransport {
  readonly name = "broken";
  async sendBatch(): Promise<void> {
    throw new Error("socket hang up");
  }
}

function config(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    triggers: [RED_ROCKS],
    source: { kind: "history", path: "unused.json" },
    minHistoryShows: 5,
    console: false,
    telegram: false,
    tgSendMaxRpm: 0,
    debug: false,
    seed: "test-seed",
    ...overrides,
  };
}

interface Harness {
  tuning: PredictionTuning;
  lines: string[];
  transport: RecordingTransport;
  options(source: SongStatsSource, extra?: Partial<RunOptions>): RunOptions;
}

async function harness(): Promise<Harness> {
  const tuning = await loadDefaultTuning();
  const lines: string[] = [];
  const transport = new RecordingTransport();
  const logger = new Logger({ debugEnabled: false, sink: (line) => lines.push(line) });
  return {
    tuning,
    lines,
    transport,
    options: (source, extra = {}) => ({
      tuning,
      source,
      logger,
      transports: [transport],
      now: () => new Date("2025-07-18T12:00:00.000Z"),
      ...extra,
    }),
  };
}

test("a trigger with enough history is predicted and delivered", async () => {
  const h = await harness();
  const source = new FakeSource(sampleCatalog(h.tuning), {
    showsAnalyzed: 25,
    dataThroughDate: "2025-07-13",
  });
  const summary = await run(config(), h.options(source));

  assert.deepEqual(summary, {
    startedAt: "2025-07-18T12:00:00.000Z",
    finishedAt: "2025-07-18T12:00:00.000Z",
    processedTriggers: 1,
    predictedShows: 1,
    skippedShows: 0,
    failedTriggers: 0,
    transportFailures: 0,
  });
  assert.equal(h.transport.batches.length, 1);
  const [batch] = h.transport.batches;
  assert.deepEqual(batch.trigger, RED_ROCKS);
  assert.equal(batch.showsAnalyzed, 25);
  assert.equal(batch.dataThroughDate, "2025-07-13");
  assert.equal(batch.algorithmVersion, "goldilocks_v9.0");
  assert.equal(batch.context.venueType, "amphitheater");
  assert.ok(batch.records.length > 0 && batch.records.length <= 16);

  const average = roundTo(mean(batch.records.map((item) => item.confidence)) ?? 0, 4);
  assert.equal(batch.confidenceScore, roundTo(average * 0.5, 4));
});

test("short histories and empty catalogs are skipped", async () => {
  const h = await harness();
  const thin = await run(
    config(),
    h.options(new FakeSource(sampleCatalog(h.tuning), { showsAnalyzed: 3 })),
  );
  assert.equal(thin.skippedShows, 1);
  assert.equal(thin.predictedShows, 0);
  assert.ok(h.lines.some((line) => line.includes("insufficient_history (need=5, have=3)")));

  const empty = await run(config(), h.options(new FakeSource([], { showsAnalyzed: 10 })));
  assert.equal(empty.skippedShows, 1);
  assert.equal(h.transport.batches.length, 0);
});

test("a malformed show date fails that trigger only", async () => {
  const h = await harness();
  const source = new FakeSource(sampleCatalog(h.tuning), { showsAnalyzed: 40 });
  const summary = await run(
    config({ triggers: [{ ...RED_ROCKS, nextShowDate: "07/19/2025" }, RED_ROCKS] }),
    h.options(source),
  );

  assert.equal(summary.processedTriggers, 2);
  assert.equal(summary.failedTriggers, 1);
  assert.equal(summary.predictedShows, 1);
  assert.ok(
    h.lines.some((line) =>
      line.includes('[ERROR] Rejected Goose 07/19/2025 @ Red Rocks Amphitheatre: Show date is not a valid'),
    ),
  );
});

test("a failing transport is counted without stopping the others", async () => {
  const h = await harness();
  const source = new FakeSource(sampleCatalog(h.tuning), { showsAnalyzed: 60 });
  const summary = await run(
    config(),
    h.options(source, { transports: [new BrokenTransport(), h.transport] }),
  );
  assert.equal(summary.transportFailures, 1);
  assert.equal(summary.predictedShows, 1);
  assert.equal(h.transport.batches.length, 1);
  assert.ok(
    h.lines.some((line) =>
      line.endsWith(
        "[WARN] [transport] broken failed for Goose 2025-07-19 @ Red Rocks Amphitheatre: socket hang up\n",
      ),
    ),
  );
});

test("seeded runs repeat exactly", async () => {
  const h = await harness();
  const source = new FakeSource(sampleCatalog(h.tuning), { showsAnalyzed: 60 });
  await run(config(), h.options(source));
  await run(config(), h.options(source));
  assert.equal(h.transport.batches.length, 2);
  assert.deepEqual(h.transport.batches[0], h.transport.batches[1]);
});

test("maxPredictions from config caps every batch", async () => {
  const h = await harness();
  const source = new FakeSource(sampleCatalog(h.tuning), { showsAnalyzed: 60 });
  await run(config({ maxPredictions: 4 }), h.options(source));
  assert.equal(h.transport.batches[0].records.length, 4);
});

test("an aborted run stops before any work", async () => {
  const h = await harness();
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    run(config(), h.options(new FakeSource([], { showsAnalyzed: 0 }), { signal: controller.signal })),
    (error: unknown) => error instanceof Error && error.name === "AbortError",
  );
});

test("batch confidence is discounted for thin histories", () => {
  assert.equal(batchConfidence(0.8, 100), 0.8);
  assert.equal(batchConfidence(0.8, 25), 0.4);
  assert.equal(batchConfidence(undefined, 25), 0);
  assert.equal(batchConfidence(0.9, 0), 0);
});

test("an ingested show triggers a prediction for the following day", () => {
  assert.deepEqual(nextShowTrigger({ bandName: "Goose", showDate: "2025-12-31" }), {
    bandName: "Goose",
    nextShowDate: "2026-01-01",
    venueName: "Unknown Venue",
  });
  assert.deepEqual(
    nextShowTrigger(
      { bandName: "Goose", showDate: "2025-07-18T23:00:00" },
      { venueName: "Red Rocks Amphitheatre", venueState: "CO" },
    ),
    { bandName: "Goose", nextShowDate: "2025-07-19", venueName: "Red Rocks Amphitheatre", venueState: "CO" },
  );
  assert.throws(() => nextShowTrigger({ bandName: "Goose", showDate: "TBD" }), isDataError);
});

test("triggers from a file follow the inline ones", async () => {
  const dir = await mkdtemp(join(tmpdir(), "setlist-triggers-"));
  const path = join(dir, "triggers.json");
  await writeFile(
    path,
    JSON.stringify([{ bandName: " Goose ", nextShowDate: "2025-07-20", venueName: "Red Rocks Amphitheatre" }]),
    "utf8",
  );
  const triggers = await collectTriggers([RED_ROCKS], path);
  assert.deepEqual(triggers, [
    RED_ROCKS,
    { bandName: "Goose", nextShowDate: "2025-07-20", venueName: "Red Rocks Amphitheatre" },
  ]);
  await writeFile(path, JSON.stringify([{ bandName: "Goose" }]), "utf8");
  await assert.rejects(collectTriggers([], path));
});
