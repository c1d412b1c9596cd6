import { addDays, parseIsoDate } from "../common/dates.js";
import { DataError } from "../common/errors.js";
import type { PredictionRecord, RankedCandidate, ShowRequest } from "../types.js";
import { slugifySong } from "./songs.js";

export function buildPrimaryKey(
  showDate: string,
  bandName: string,
  slotType: string,
  songName: string,
): string {
  const band = bandName.trim().toLowerCase().replace(/\s+/g, "_");
  return `${showDate}_${band}_${slotType}_${slugifySong(songName)}`;
}

export function formatPredictions(
  ranked: readonly RankedCandidate[],
  show: ShowRequest,
  algorithmVersion: string,
): PredictionRecord[] {
  const showDate = parseIsoDate(show.date);
  if (!showDate) {
    throw new DataError(`Show date is not a valid YYYY-MM-DD date: "${show.date}"`);
  }
  const isoDate = show.date.trim().slice(0, 10);

  return ranked.map((candidate) => ({
    primaryKey: buildPrimaryKey(isoDate, show.bandName, candidate.slotType, candidate.song.name),
    songName: candidate.song.name,
    confidence: candidate.confidence,
    slotType: candidate.slotType,
    reasoning: [...candidate.reasoning],
    rank: candidate.rank,
    showDate: isoDate,
    bandName: show.bandName,
    venueName: show.venueName,
    totalPlays: candidate.song.totalPlays,
    daysSincePlayed: candidate.daysSincePlayed,
    lastPlayed: addDays(showDate, -candidate.daysSincePlayed),
    algorithmVersion,
  }));
}
