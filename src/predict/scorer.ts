import { findTierRule } from "../catalog/catalog.js";
import { clamp, formatPercent, roundTo } from "../common/math.js";
import type { ScoredSlotType, ShowContext, SongCatalogEntry, SongTier } from "../types.js";
import { classifyGap, describeGap, gapScore } from "./gap.js";
import { includesSong } from "./songs.js";
import type { PredictionTuning, TierRule } from "./tuning.js";

export interface ScoredSong {
  confidence: number;
  reasoning: string[];
}

const TIER_LABELS: Record<SongTier, string> = {
  high: "High-frequency",
  medium: "Medium-frequency",
  low: "Low-frequency",
};

/**
 * Linear inside the song's tier. Upper tiers span a wider frequency range
 * with a narrower confidence band, so each extra point of frequency is worth
 * less the more often a song is already played.
 */
export function baseConfidence(frequency: number, tiers: TierRule[]): number {
  const rule = findTierRule(frequency, tiers);
  const span = rule.upTo - rule.above;
  const position = span > 0 ? clamp((frequency - rule.above) / span, 0, 1) : 0;
  return rule.floor + position * (rule.ceiling - rule.floor);
}

export function scoreSong(
  song: SongCatalogEntry,
  slotType: ScoredSlotType,
  context: ShowContext,
  daysGap: number,
  tuning: PredictionTuning,
): ScoredSong {
  const { bonuses, energy } = tuning;
  const reasoning: string[] = [];
  const frequency = Number.isFinite(song.historicalFrequency)
    ? clamp(song.historicalFrequency, 0, 1)
    : tuning.baseline.frequency;
  let confidence = baseConfidence(frequency, tuning.tiers);
  reasoning.push(`${TIER_LABELS[song.tier]} song (${formatPercent(frequency)} of shows)`);

  const gap = Number.isFinite(daysGap) ? Math.max(0, Math.round(daysGap)) : 0;
  const zone = classifyGap(gap, tuning.gapZones[slotType]);
  confidence += gapScore(zone, tuning.gapScores);
  reasoning.push(describeGap(zone, slotType, gap));

  if (song.totalPlays > 0) {
    reasoning.push(`${song.totalPlays} total performances`);
  }

  if (context.season && includesSong(tuning.seasonalAffinity[context.season], song.name)) {
    confidence += bonuses.season;
    reasoning.push(`${context.season} favorite`);
  }

  if (includesSong(tuning.venueAffinity[context.venueType], song.name)) {
    confidence += bonuses.venue;
    reasoning.push(`Fits ${context.venueType} venues`);
  }

  if (
    energy.epicTags.includes(song.energyTag) &&
    energy.epicVenueTypes.includes(context.venueType)
  ) {
    confidence += bonuses.epicVenue;
    reasoning.push(`Epic energy suits ${context.venueType} shows`);
  }

  if (slotType === "opener") {
    if (includesSong(tuning.specialists.opener, song.name)) {
      confidence += bonuses.openerSpecialist;
      reasoning.push("Opener specialist");
    }
    if (song.openerRate > 0) {
      confidence += song.openerRate * bonuses.openerRateWeight;
      reasoning.push(`Opens ${formatPercent(song.openerRate)} of appearances`);
    }
  } else if (slotType === "encore") {
    if (includesSong(tuning.specialists.encore, song.name)) {
      confidence += bonuses.encoreSpecialist;
      reasoning.push("Encore specialist");
    }
    if (song.encoreRate > 0) {
      confidence += song.encoreRate * bonuses.encoreRateWeight;
      reasoning.push(`Encore in ${formatPercent(song.encoreRate)} of appearances`);
    }
  }

  if (context.isWeekend && energy.highEnergyTags.includes(song.energyTag)) {
    confidence += bonuses.weekendEnergy;
    reasoning.push("Weekend energy boost");
  }

  if (slotType === "wildcard") {
    confidence += context.curveballScore * bonuses.wildcardCurveball;
    reasoning.push(`Curveball potential ${formatPercent(context.curveballScore, 0)}`);
  }

  return {
    confidence: boundConfidence(confidence, tuning),
    reasoning,
  };
}

export function boundConfidence(value: number, tuning: PredictionTuning): number {
  const bounded = clamp(value, tuning.confidence.min, tuning.confidence.max);
  return roundTo(bounded, tuning.confidence.digits);
}
