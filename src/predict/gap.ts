import { daysBetween, parseIsoDate } from "../common/dates.js";
import { uniform, type RandomSource } from "../common/random.js";
import type { ScoredSlotType, ShowContext, SlotType, SongCatalogEntry } from "../types.js";
import type { GapZone, PredictionTuning } from "./tuning.js";

export type GapZoneMatch = "sweet" | "near" | "too_recent" | "stale";

/**
 * Days since the song was last played before the show. Uses the recorded
 * last play when both dates are known; otherwise simulates one from the
 * average gap plus slot-specific jitter. Never below 1.
 */
export function estimateDaysSincePlayed(
  song: SongCatalogEntry,
  slotType: SlotType,
  context: ShowContext,
  random: RandomSource,
  tuning: PredictionTuning,
): number {
  const showDate = parseIsoDate(context.date);
  const lastPlayed = parseIsoDate(song.lastPlayed);
  if (showDate && lastPlayed) {
    return Math.max(1, daysBetween(lastPlayed, showDate));
  }
  const [low, high] = tuning.gapJitter[slotType];
  const jitter = low === high ? low : uniform(random, low, high);
  return Math.max(1, Math.floor(song.averageGapDays + jitter));
}

export function classifyGap(daysGap: number, zone: GapZone): GapZoneMatch {
  if (daysGap < zone.sweetMin) {
    return "too_recent";
  }
  if (daysGap <= zone.sweetMax) {
    return "sweet";
  }
  if (daysGap <= zone.nearMax) {
    return "near";
  }
  return "stale";
}

export function gapScore(match: GapZoneMatch, scores: PredictionTuning["gapScores"]): number {
  if (match === "sweet") {
    return scores.sweet;
  }
  if (match === "near") {
    return scores.near;
  }
  return scores.outside;
}

const SWEET_LABELS: Record<ScoredSlotType, string> = {
  opener: "Opener-optimized gap",
  encore: "Encore-optimized gap",
  rotation: "Goldilocks zone",
  wildcard: "Deep-cut window",
};

export function describeGap(match: GapZoneMatch, slotType: ScoredSlotType, daysGap: number): string {
  switch (match) {
    case "sweet":
      return `${SWEET_LABELS[slotType]} (${daysGap} days)`;
    case "near":
      return `Due back soon (${daysGap} days)`;
    case "too_recent":
      return `Played recently (${daysGap} days ago)`;
    case "stale":
      return `Overdue for rotation (${daysGap} days)`;
  }
}
