import { mean, roundTo } from "./common/math.js";
import type { RandomSource } from "./common/random.js";
import { aggregateCandidates } from "./predict/aggregate.js";
import { analyzeContext } from "./predict/context.js";
import { formatPredictions } from "./predict/format.js";
import { flattenSlots, generateAllSlots } from "./predict/generators.js";
import type { PredictionTuning } from "./predict/tuning.js";
import type {
  PredictionOutcome,
  PredictionRecord,
  ShowRequest,
  SlotCounts,
  SongCatalogEntry,
} from "./types.js";

export interface PredictOptions {
  tuning: PredictionTuning;
  random: RandomSource;
}

/**
 * One prediction run: context, slot generators, dedupe/rank, format.
 * Pure apart from the random draws taken from `options.random`.
 */
export function predictSetlist(
  request: ShowRequest,
  catalog: readonly SongCatalogEntry[],
  options: PredictOptions,
): PredictionOutcome {
  const { tuning, random } = options;
  const context = analyzeContext(request, tuning);
  if (catalog.length === 0) {
    return {
      context,
      records: [],
      candidateCount: 0,
      slotCounts: countSlots([]),
    };
  }

  const slots = generateAllSlots({ catalog, context, tuning, random });
  const candidates = flattenSlots(slots);
  const ranked = aggregateCandidates(candidates, tuning.maxPredictions);
  const records = formatPredictions(ranked, request, tuning.algorithmVersion);
  const average = mean(records.map((record) => record.confidence));

  return {
    context,
    records,
    candidateCount: candidates.length,
    slotCounts: countSlots(records),
    ...(average === undefined ? {} : { averageConfidence: roundTo(average, 4) }),
  };
}

export function countSlots(records: readonly PredictionRecord[]): SlotCounts {
  const counts: SlotCounts = {
    opener: 0,
    encore: 0,
    rotation: 0,
    wildcard: 0,
    sequence_follow: 0,
  };
  for (const record of records) {
    counts[record.slotType] += 1;
  }
  return counts;
}
