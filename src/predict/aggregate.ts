import type { PredictionCandidate, RankedCandidate } from "../types.js";
import { songKey } from "./songs.js";

interface Survivor {
  candidate: PredictionCandidate;
  index: number;
}

/**
 * One candidate per song: the highest confidence wins and the earliest
 * emitted one wins a tie. Survivors are ordered by confidence, then by
 * emission order (opener, encore, rotation, wildcard, sequence-follow),
 * capped and ranked 1..N.
 */
export function aggregateCandidates(
  candidates: readonly PredictionCandidate[],
  maxPredictions: number,
): RankedCandidate[] {
  const best = new Map<string, Survivor>();
  candidates.forEach((candidate, index) => {
    const key = songKey(candidate.song.name);
    const current = best.get(key);
    if (!current || candidate.confidence > current.candidate.confidence) {
      best.set(key, { candidate, index });
    }
  });

  return [...best.values()]
    .sort((a, b) => b.candidate.confidence - a.candidate.confidence || a.index - b.index)
    .slice(0, Math.max(0, maxPredictions))
    .map((survivor, position) => ({ ...survivor.candidate, rank: position + 1 }));
}
