import { clamp, roundTo } from "../common/math.js";
import { daysBetween, parseIsoDate } from "../common/dates.js";
import { songKey } from "../predict/songs.js";
import type { PredictionTuning, TierRule } from "../predict/tuning.js";
import type { ShowHistoryRecord, SongCatalogEntry, SongTier } from "../types.js";

const OPENING_SETS = new Set(["Set 1", "One Set"]);

export interface RawCatalogEntry {
  name: string;
  historicalFrequency?: number;
  openerRate?: number;
  encoreRate?: number;
  totalPlays?: number;
  averageGapDays?: number;
  energyTag?: string;
  lastPlayed?: string;
}

export interface BuildCatalogOptions {
  bandName: string;
  /** Only shows strictly before this date count. */
  asOfDate?: string;
  tuning: PredictionTuning;
}

export interface HistorySlice {
  shows: ShowHistoryRecord[];
  dataThroughDate?: string;
}

/**
 * Tiers are checked from the highest lower bound down; the last tier catches
 * everything below it, frequency 0 included.
 */
export function findTierRule(frequency: number, tiers: TierRule[]): TierRule {
  for (const rule of tiers) {
    if (frequency > rule.above) {
      return rule;
    }
  }
  return tiers[tiers.length - 1];
}

export function tierForFrequency(frequency: number, tiers: TierRule[]): SongTier {
  return findTierRule(frequency, tiers).tier;
}

export function normalizeCatalogEntry(
  raw: RawCatalogEntry,
  tuning: PredictionTuning,
): SongCatalogEntry {
  const frequency = finiteOr(raw.historicalFrequency, tuning.baseline.frequency);
  const historicalFrequency = clamp(frequency, 0, 1);
  const lastPlayed = parseIsoDate(raw.lastPlayed) ? raw.lastPlayed : undefined;
  return {
    name: raw.name.trim(),
    historicalFrequency,
    openerRate: clamp(finiteOr(raw.openerRate, 0), 0, 1),
    encoreRate: clamp(finiteOr(raw.encoreRate, 0), 0, 1),
    totalPlays: Math.max(0, Math.round(finiteOr(raw.totalPlays, 0))),
    averageGapDays: Math.max(0, finiteOr(raw.averageGapDays, tuning.baseline.averageGapDays)),
    energyTag: raw.energyTag || knownEnergyTag(tuning, raw.name.trim()) || tuning.baseline.energyTag,
    tier: tierForFrequency(historicalFrequency, tuning.tiers),
    ...(lastPlayed ? { lastPlayed } : {}),
  };
}

function knownEnergyTag(tuning: PredictionTuning, name: string): string | undefined {
  const { tags } = tuning.energy;
  return Object.hasOwn(tags, name) ? tags[name] : undefined;
}

export function selectHistory(
  shows: ShowHistoryRecord[],
  bandName: string,
  asOfDate?: string,
): HistorySlice {
  const band = bandName.trim().toLowerCase();
  const cutoff = parseIsoDate(asOfDate);
  const selected = shows.filter((show) => {
    if (show.isPrediction === true) {
      return false;
    }
    if (show.bandName.trim().toLowerCase() !== band) {
      return false;
    }
    const date = parseIsoDate(show.showDate);
    if (!date) {
      return false;
    }
    return !cutoff || date.epochMs < cutoff.epochMs;
  });
  const dataThroughDate = selected
    .map((show) => show.showDate.slice(0, 10))
    .sort()
    .at(-1);
  return { shows: selected, dataThroughDate };
}

export function countDistinctShows(shows: ShowHistoryRecord[]): number {
  return new Set(shows.map((show) => show.showDate.slice(0, 10))).size;
}

interface SongTally {
  name: string;
  firstSeen: number;
  plays: number;
  openerPlays: number;
  encorePlays: number;
  dates: Set<string>;
}

export function buildCatalog(
  shows: ShowHistoryRecord[],
  options: BuildCatalogOptions,
): SongCatalogEntry[] {
  const history = selectHistory(shows, options.bandName, options.asOfDate);
  const totalShows = countDistinctShows(history.shows);
  if (totalShows === 0) {
    return [];
  }

  const ordered = [...history.shows].sort((a, b) => a.showDate.localeCompare(b.showDate));
  const tallies = new Map<string, SongTally>();
  for (const show of ordered) {
    const date = show.showDate.slice(0, 10);
    const firstSetPosition = lowestOpeningPosition(show);
    for (const entry of show.setlist) {
      const name = entry.songName.trim();
      if (!name) {
        continue;
      }
      // Spellings differing only in case are one song; the first one seen names it.
      const key = songKey(name);
      let tally = tallies.get(key);
      if (!tally) {
        tally = {
          name,
          firstSeen: tallies.size,
          plays: 0,
          openerPlays: 0,
          encorePlays: 0,
          dates: new Set(),
        };
        tallies.set(key, tally);
      }
      tally.plays += 1;
      tally.dates.add(date);
      if (OPENING_SETS.has(entry.setType) && entry.setPosition === firstSetPosition) {
        tally.openerPlays += 1;
      }
      if (entry.setType === "Encore") {
        tally.encorePlays += 1;
      }
    }
  }

  return [...tallies.values()]
    .sort((a, b) => b.plays - a.plays || a.firstSeen - b.firstSeen)
    .map((tally) =>
      normalizeCatalogEntry(
        {
          name: tally.name,
          historicalFrequency: roundTo(tally.dates.size / totalShows, 4),
          openerRate: roundTo(tally.openerPlays / tally.plays, 4),
          encoreRate: roundTo(tally.encorePlays / tally.plays, 4),
          totalPlays: tally.plays,
          averageGapDays: averageGap(tally.dates),
          lastPlayed: [...tally.dates].sort().at(-1),
        },
        options.tuning,
      ),
    );
}

function lowestOpeningPosition(show: ShowHistoryRecord): number | undefined {
  let lowest: number | undefined;
  for (const entry of show.setlist) {
    if (!OPENING_SETS.has(entry.setType)) {
      continue;
    }
    if (lowest === undefined || entry.setPosition < lowest) {
      lowest = entry.setPosition;
    }
  }
  return lowest;
}

function averageGap(dates: Set<string>): number {
  const sorted = [...dates].sort();
  const first = parseIsoDate(sorted[0]);
  const last = parseIsoDate(sorted[sorted.length - 1]);
  if (!first || !last) {
    return 0;
  }
  return roundTo(daysBetween(first, last) / Math.max(sorted.length - 1, 1), 1);
}

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}
