import test from "node:test";
import assert from "node:assert/strict";

import {
  createSeededRandom,
  stableHash,
  uniform,
  type RandomSource,
} from "../src/common/random.js";

function draw(random: RandomSource, count: number): number[] {
  return Array.from({ length: count }, () => random.next());
}

test("seeded random repeats the same sequence for the same seed", () => {
  assert.deepEqual(draw(createSeededRandom("test-seed"), 6), draw(createSeededRandom("test-seed"), 6));
  assert.deepEqual(draw(createSeededRandom(42), 3), draw(createSeededRandom(42), 3));
});

test("seeded random stays inside [0, 1) and differs across seeds", () => {
  const values = draw(createSeededRandom("alpha"), 200);
  assert.ok(values.every((value) => value >= 0 && value < 1));
  assert.notDeepEqual(values.slice(0, 5), draw(createSeededRandom("beta"), 5));
});

test("stableHash is FNV-1a over char codes", () => {
  assert.equal(stableHash(""), 2166136261);
  assert.equal(stableHash("goose"), stableHash("goose"));
  assert.notEqual(stableHash("goose"), stableHash("Goose"));
});

test("uniform maps the draw onto the range and skips drawing for empty ranges", () => {
  let draws = 0;
  const half: RandomSource = {
    next: () => {
      draws += 1;
      return 0.5;
    },
  };
  assert.equal(uniform(half, -10, 15), 2.5);
  assert.equal(draws, 1);
  assert.equal(uniform(half, 5, 5), 5);
  assert.equal(uniform(half, 7, 3), 7);
  assert.equal(draws, 1);
});
