import { clamp } from "../common/math.js";
import type { RandomSource } from "../common/random.js";
import type {
  PredictionCandidate,
  ScoredSlotType,
  ShowContext,
  SongCatalogEntry,
} from "../types.js";
import { estimateDaysSincePlayed } from "./gap.js";
import { boundConfidence, scoreSong } from "./scorer.js";
import { includesSong, songKey } from "./songs.js";
import type { PredictionTuning } from "./tuning.js";

export interface GeneratorEnv {
  catalog: readonly SongCatalogEntry[];
  context: ShowContext;
  tuning: PredictionTuning;
  random: RandomSource;
}

export interface GeneratedSlots {
  opener: PredictionCandidate[];
  encore: PredictionCandidate[];
  rotation: PredictionCandidate[];
  wildcard: PredictionCandidate[];
  sequenceFollow: PredictionCandidate[];
}

/** Scores every song for one slot, then keeps the best `limit` in stable catalog order. */
export function rankForSlot(
  songs: readonly SongCatalogEntry[],
  slotType: ScoredSlotType,
  env: GeneratorEnv,
  limit: number,
): PredictionCandidate[] {
  const scored = songs.map((song): PredictionCandidate => {
    const daysSincePlayed = estimateDaysSincePlayed(
      song,
      slotType,
      env.context,
      env.random,
      env.tuning,
    );
    const { confidence, reasoning } = scoreSong(
      song,
      slotType,
      env.context,
      daysSincePlayed,
      env.tuning,
    );
    return { song, slotType, confidence, reasoning, daysSincePlayed };
  });
  return sortByConfidence(scored).slice(0, Math.max(0, limit));
}

export function generateOpeners(
  env: GeneratorEnv,
  claimed: ReadonlySet<string>,
): PredictionCandidate[] {
  const rule = env.tuning.slots.opener;
  const eligible = available(env, claimed).filter(
    (song) =>
      song.openerRate > rule.minRate || includesSong(env.tuning.specialists.opener, song.name),
  );
  return rankForSlot(eligible, "opener", env, rule.count);
}

export function generateEncores(
  env: GeneratorEnv,
  claimed: ReadonlySet<string>,
): PredictionCandidate[] {
  const rule = env.tuning.slots.encore;
  const eligible = available(env, claimed).filter(
    (song) =>
      song.encoreRate > rule.minRate || includesSong(env.tuning.specialists.encore, song.name),
  );
  return rankForSlot(eligible, "encore", env, rule.count);
}

export function rotationCount(catalogSize: number, rule: PredictionTuning["slots"]["rotation"]): number {
  return clamp(Math.floor(catalogSize * rule.catalogShare), rule.min, rule.max);
}

export function generateRotation(
  env: GeneratorEnv,
  claimed: ReadonlySet<string>,
): PredictionCandidate[] {
  const count = rotationCount(env.catalog.length, env.tuning.slots.rotation);
  return rankForSlot(available(env, claimed), "rotation", env, count);
}

export function wildcardCount(
  curveballScore: number,
  rule: PredictionTuning["slots"]["wildcard"],
): number {
  return rule.base + Math.floor(curveballScore * rule.curveballSlots);
}

export function generateWildcards(
  env: GeneratorEnv,
  claimed: ReadonlySet<string>,
): PredictionCandidate[] {
  const pool = available(env, claimed).filter(
    (song) => song.tier === "low" || includesSong(env.tuning.wildcardPool, song.name),
  );
  const count = wildcardCount(env.context.curveballScore, env.tuning.slots.wildcard);
  return rankForSlot(pool, "wildcard", env, count);
}

/**
 * Adds the known follower of every chosen song that starts a strong sequence.
 * Followers are themselves checked, so A -> B -> C chains resolve in one pass.
 */
export function generateSequenceFollows(
  env: GeneratorEnv,
  chosen: readonly PredictionCandidate[],
  claimed: ReadonlySet<string>,
): PredictionCandidate[] {
  const byKey = new Map(env.catalog.map((song) => [songKey(song.name), song] as const));
  const taken = new Set(claimed);
  const queue = chosen.map((candidate) => candidate.song.name);
  const follows: PredictionCandidate[] = [];

  for (let index = 0; index < queue.length; index += 1) {
    const leader = queue[index];
    for (const rule of env.tuning.sequences) {
      if (songKey(rule.from) !== songKey(leader)) {
        continue;
      }
      const follower = byKey.get(songKey(rule.to));
      if (!follower || taken.has(songKey(follower.name)) || isExcluded(env, follower)) {
        continue;
      }
      taken.add(songKey(follower.name));
      queue.push(follower.name);
      const reasoning = [`Strong sequence pattern: ${leader} -> ${follower.name}`];
      if (follower.totalPlays > 0) {
        reasoning.push(`${follower.totalPlays} total performances`);
      }
      follows.push({
        song: follower,
        slotType: "sequence_follow",
        confidence: boundConfidence(env.tuning.sequenceConfidence, env.tuning),
        reasoning,
        daysSincePlayed: estimateDaysSincePlayed(
          follower,
          "sequence_follow",
          env.context,
          env.random,
          env.tuning,
        ),
      });
    }
  }
  return follows;
}

/** Runs every generator in priority order; later ones never see songs claimed earlier. */
export function generateAllSlots(env: GeneratorEnv): GeneratedSlots {
  const claimed = new Set<string>();
  const claim = (candidates: PredictionCandidate[]): PredictionCandidate[] => {
    for (const candidate of candidates) {
      claimed.add(songKey(candidate.song.name));
    }
    return candidates;
  };

  const opener = claim(generateOpeners(env, claimed));
  const encore = claim(generateEncores(env, claimed));
  const rotation = claim(generateRotation(env, claimed));
  const wildcard = claim(generateWildcards(env, claimed));
  const sequenceFollow = claim(
    generateSequenceFollows(env, [...opener, ...encore, ...rotation, ...wildcard], claimed),
  );
  return { opener, encore, rotation, wildcard, sequenceFollow };
}

export function flattenSlots(slots: GeneratedSlots): PredictionCandidate[] {
  return [
    ...slots.opener,
    ...slots.encore,
    ...slots.rotation,
    ...slots.wildcard,
    ...slots.sequenceFollow,
  ];
}

function available(env: GeneratorEnv, claimed: ReadonlySet<string>): SongCatalogEntry[] {
  return env.catalog.filter(
    (song) => !claimed.has(songKey(song.name)) && !isExcluded(env, song),
  );
}

function isExcluded(env: GeneratorEnv, song: SongCatalogEntry): boolean {
  return includesSong(env.tuning.excludedSongs, song.name);
}

function sortByConfidence(candidates: PredictionCandidate[]): PredictionCandidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => b.candidate.confidence - a.candidate.confidence || a.index - b.index)
    .map((entry) => entry.candidate);
}
