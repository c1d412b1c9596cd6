import { roundTo } from "../common/math.js";
import type { CatalogSourceConfig, ShowTrigger } from "../types.js";
import {
  createCatalogFileSource,
  createHistoryFileSource,
  type SongStatsSource,
} from "../catalog/sources.js";
import type { PredictionTuning } from "../predict/tuning.js";

/** Number of analyzed shows at which batch confidence stops being discounted. */
export const FULL_HISTORY_SHOWS = 50;

export function throwIfAborted(signal?: AbortSignal): void {
  if (!signal?.aborted) {
    return;
  }
  const error = new Error("Run aborted");
  error.name = "AbortError";
  throw error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function toSeconds(ms: number): number {
  return Number((ms / 1000).toFixed(2));
}

export function triggerLabel(trigger: ShowTrigger): string {
  const venue = trigger.venueName || "Unknown Venue";
  return `${trigger.bandName} ${trigger.nextShowDate} @ ${venue}`;
}

/** Mean record confidence, discounted while the band has little history. */
export function batchConfidence(averageConfidence: number | undefined, showsAnalyzed: number): number {
  if (averageConfidence === undefined || showsAnalyzed <= 0) {
    return 0;
  }
  const coverage = Math.min(1, showsAnalyzed / FULL_HISTORY_SHOWS);
  return roundTo(averageConfidence * coverage, 4);
}

export function createSongStatsSource(
  config: CatalogSourceConfig,
  tuning: PredictionTuning,
): SongStatsSource {
  if (config.kind === "history") {
    return createHistoryFileSource(config.path, tuning);
  }
  return createCatalogFileSource(config.path, tuning);
}
