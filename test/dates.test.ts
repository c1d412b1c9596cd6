import test from "node:test";
import assert from "node:assert/strict";

import {
  addDays,
  daysBetween,
  formatIsoDate,
  parseIsoDate,
  weekdayIndex,
} from "../src/common/dates.js";

function mustParse(value: string) {
  const date = parseIsoDate(value);
  assert.ok(date, `expected ${value} to parse`);
  return date;
}

test("parseIsoDate reads calendar dates and tolerates a time suffix", () => {
  assert.deepEqual(parseIsoDate("2025-07-19"), {
    year: 2025,
    month: 7,
    day: 19,
    epochMs: Date.UTC(2025, 6, 19),
  });
  assert.equal(mustParse("2025-07-19T20:00:00Z").day, 19);
  assert.equal(mustParse(" 2024-02-29 ").month, 2);
});

test("parseIsoDate rejects impossible or foreign formats", () => {
  assert.equal(parseIsoDate("2025-02-30"), undefined);
  assert.equal(parseIsoDate("2025-13-01"), undefined);
  assert.equal(parseIsoDate("07/19/2025"), undefined);
  assert.equal(parseIsoDate(""), undefined);
  assert.equal(parseIsoDate(undefined), undefined);
});

test("weekdayIndex counts from Monday", () => {
  assert.equal(weekdayIndex(mustParse("2025-07-19")), 5);
  assert.equal(weekdayIndex(mustParse("2025-07-20")), 6);
  assert.equal(weekdayIndex(mustParse("2025-07-21")), 0);
});

test("addDays and daysBetween handle month and leap-year boundaries", () => {
  assert.equal(addDays(mustParse("2025-03-01"), -1), "2025-02-28");
  assert.equal(addDays(mustParse("2024-02-28"), 1), "2024-02-29");
  assert.equal(addDays(mustParse("2025-07-19"), -37), "2025-06-12");
  assert.equal(daysBetween(mustParse("2025-01-01"), mustParse("2025-03-01")), 59);
  assert.equal(daysBetween(mustParse("2025-03-01"), mustParse("2025-01-01")), -59);
  assert.equal(formatIsoDate(Date.UTC(2025, 11, 31)), "2025-12-31");
});
