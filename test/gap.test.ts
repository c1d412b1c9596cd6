import test from "node:test";
import assert from "node:assert/strict";

import type { RandomSource } from "../src/common/random.js";
import {
  classifyGap,
  describeGap,
  estimateDaysSincePlayed,
  gapScore,
} from "../src/predict/gap.js";
import { loadDefaultTuning } from "../src/predict/tuning.js";
import { SUMMER_AMPHITHEATER, song } from "./fixtures/catalog.js";

const HALF: RandomSource = { next: () => 0.5 };
const NEVER: RandomSource = {
  next: () => {
    throw new Error("random should not be drawn");
  },
};

test("classifyGap splits the zone into four bands", async () => {
  const zone = (await loadDefaultTuning()).gapZones.opener;
  assert.equal(classifyGap(14, zone), "too_recent");
  assert.equal(classifyGap(15, zone), "sweet");
  assert.equal(classifyGap(45, zone), "sweet");
  assert.equal(classifyGap(46, zone), "near");
  assert.equal(classifyGap(90, zone), "near");
  assert.equal(classifyGap(91, zone), "stale");
});

test("gapScore rewards the sweet spot and penalizes both extremes", async () => {
  const scores = (await loadDefaultTuning()).gapScores;
  assert.equal(gapScore("sweet", scores), 0.03);
  assert.equal(gapScore("near", scores), 0.01);
  assert.equal(gapScore("too_recent", scores), -0.04);
  assert.equal(gapScore("stale", scores), -0.04);
});

test("describeGap labels each band", () => {
  assert.equal(describeGap("sweet", "encore", 30), "Encore-optimized gap (30 days)");
  assert.equal(describeGap("sweet", "rotation", 12), "Goldilocks zone (12 days)");
  assert.equal(describeGap("near", "rotation", 50), "Due back soon (50 days)");
  assert.equal(describeGap("too_recent", "opener", 3), "Played recently (3 days ago)");
  assert.equal(describeGap("stale", "wildcard", 300), "Overdue for rotation (300 days)");
});

test("a recorded last play wins over the simulated gap", async () => {
  const tuning = await loadDefaultTuning();
  const recent = song(tuning, "Arcadia", { lastPlayed: "2025-07-01", averageGapDays: 90 });
  assert.equal(estimateDaysSincePlayed(recent, "rotation", SUMMER_AMPHITHEATER, NEVER, tuning), 18);

  const sameDay = song(tuning, "Arcadia", { lastPlayed: "2025-07-19" });
  assert.equal(estimateDaysSincePlayed(sameDay, "rotation", SUMMER_AMPHITHEATER, NEVER, tuning), 1);
});

test("the simulated gap adds slot jitter to the average and floors at 1", async () => {
  const tuning = await loadDefaultTuning();
  const typical = song(tuning, "Madhuvan", { averageGapDays: 35 });
  // encore jitter [-15, 20] at the midpoint adds 2.5
  assert.equal(estimateDaysSincePlayed(typical, "encore", SUMMER_AMPHITHEATER, HALF, tuning), 37);

  const fractional = song(tuning, "Jive Lee", { averageGapDays: 35.5 });
  assert.equal(
    estimateDaysSincePlayed(fractional, "sequence_follow", SUMMER_AMPHITHEATER, NEVER, tuning),
    35,
  );

  const constant = song(tuning, "Drive", { averageGapDays: 0 });
  const zero: RandomSource = { next: () => 0 };
  assert.equal(estimateDaysSincePlayed(constant, "opener", SUMMER_AMPHITHEATER, zero, tuning), 1);
});
