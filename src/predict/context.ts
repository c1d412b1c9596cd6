import { parseIsoDate, weekdayIndex, type CalendarDate } from "../common/dates.js";
import { clamp, roundTo } from "../common/math.js";
import type { Season, ShowContext, ShowRequest, VenueType } from "../types.js";
import type { PredictionTuning } from "./tuning.js";

export function seasonForMonth(month: number): Season {
  if (month === 12 || month <= 2) {
    return "Winter";
  }
  if (month <= 5) {
    return "Spring";
  }
  if (month <= 8) {
    return "Summer";
  }
  return "Fall";
}

/** First keyword group that matches wins; anything unmatched plays like a club. */
export function classifyVenue(
  venueName: string,
  keywords: PredictionTuning["venueKeywords"],
): VenueType {
  const venue = venueName.trim().toLowerCase();
  if (!venue) {
    return "club";
  }
  for (const group of keywords) {
    if (group.keywords.some((word) => venue.includes(word.toLowerCase()))) {
      return group.venueType;
    }
  }
  return "club";
}

export function isWeekendDate(date: CalendarDate | undefined): boolean {
  if (!date) {
    return false;
  }
  return weekdayIndex(date) >= 5;
}

export function computeCurveballScore(
  input: { season?: Season; venueType: VenueType; isWeekend: boolean; venueName: string },
  rules: PredictionTuning["curveball"],
): number {
  let score = 0;
  for (const combo of rules.seasonVenue) {
    if (combo.season === input.season && combo.venueType === input.venueType) {
      score += combo.boost;
    }
  }
  score += rules.venueTypes[input.venueType] ?? 0;
  if (input.isWeekend) {
    score += rules.weekend;
  }
  const venue = input.venueName.toLowerCase();
  if (rules.intimacyKeywords.some((word) => venue.includes(word.toLowerCase()))) {
    score += rules.intimacyBoost;
  }
  return roundTo(clamp(score, 0, 1), 4);
}

export function analyzeContext(request: ShowRequest, tuning: PredictionTuning): ShowContext {
  const date = parseIsoDate(request.date);
  const venueName = request.venueName.trim();
  const season = date ? seasonForMonth(date.month) : undefined;
  const venueType = classifyVenue(venueName, tuning.venueKeywords);
  const isWeekend = isWeekendDate(date);
  const curveballScore = computeCurveballScore(
    { season, venueType, isWeekend, venueName },
    tuning.curveball,
  );

  return Object.freeze({
    date: request.date,
    venueName,
    bandName: request.bandName,
    dateValid: date !== undefined,
    ...(season ? { season } : {}),
    venueType,
    isWeekend,
    curveballScore,
  });
}
