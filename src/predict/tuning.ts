import { readFile } from "node:fs/promises";
import { z } from "zod";
import { resolveDataFile } from "../common/dataFiles.js";

const fraction = z.number().min(0).max(1);
const bonus = z.number().min(-1).max(1);
const songList = z.array(z.string().min(1));

export const seasonSchema = z.enum(["Spring", "Summer", "Fall", "Winter"]);
export const venueTypeSchema = z.enum(["amphitheater", "theater", "festival", "club"]);

const gapZoneSchema = z
  .object({
    sweetMin: z.number().int().min(0),
    sweetMax: z.number().int().min(0),
    nearMax: z.number().int().min(0),
  })
  .refine((zone) => zone.sweetMin <= zone.sweetMax && zone.sweetMax <= zone.nearMax, {
    message: "gap zone must satisfy sweetMin <= sweetMax <= nearMax",
  });

const jitterSchema = z
  .tuple([z.number(), z.number()])
  .refine(([low, high]) => low <= high, { message: "jitter range must be [low, high]" });

const tierSchema = z
  .object({
    tier: z.enum(["high", "medium", "low"]),
    above: fraction,
    upTo: fraction,
    floor: fraction,
    ceiling: fraction,
  })
  .refine((tier) => tier.above < tier.upTo && tier.floor <= tier.ceiling, {
    message: "tier needs above < upTo and floor <= ceiling",
  });

export const tuningSchema = z
  .object({
    algorithmVersion: z.string().min(1),
    maxPredictions: z.number().int().positive().max(100),
    confidence: z.object({
      min: fraction,
      max: fraction,
      digits: z.number().int().min(0).max(8),
    }),
    baseline: z.object({
      frequency: fraction,
      averageGapDays: z.number().positive(),
      energyTag: z.string().min(1),
    }),
    tiers: z.array(tierSchema).min(1),
    gapZones: z.object({
      opener: gapZoneSchema,
      encore: gapZoneSchema,
      rotation: gapZoneSchema,
      wildcard: gapZoneSchema,
    }),
    gapScores: z.object({
      sweet: bonus,
      near: bonus,
      outside: bonus,
    }),
    gapJitter: z.object({
      opener: jitterSchema,
      encore: jitterSchema,
      rotation: jitterSchema,
      wildcard: jitterSchema,
      sequence_follow: jitterSchema,
    }),
    bonuses: z.object({
      season: bonus,
      venue: bonus,
      epicVenue: bonus,
      openerSpecialist: bonus,
      encoreSpecialist: bonus,
      openerRateWeight: bonus,
      encoreRateWeight: bonus,
      weekendEnergy: bonus,
      wildcardCurveball: bonus,
    }),
    venueKeywords: z.array(
      z.object({
        venueType: venueTypeSchema,
        keywords: z.array(z.string().min(1)).min(1),
      }),
    ),
    curveball: z.object({
      seasonVenue: z.array(
        z.object({ season: seasonSchema, venueType: venueTypeSchema, boost: fraction }),
      ),
      venueTypes: z.record(venueTypeSchema, fraction),
      weekend: fraction,
      intimacyKeywords: z.array(z.string().min(1)),
      intimacyBoost: fraction,
    }),
    seasonalAffinity: z.record(seasonSchema, songList),
    venueAffinity: z.record(venueTypeSchema, songList),
    energy: z.object({
      highEnergyTags: z.array(z.string()),
      epicTags: z.array(z.string()),
      epicVenueTypes: z.array(venueTypeSchema),
      tags: z.record(z.string(), z.string()),
    }),
    specialists: z.object({
      opener: songList,
      encore: songList,
    }),
    sequences: z.array(z.object({ from: z.string().min(1), to: z.string().min(1) })),
    sequenceConfidence: fraction,
    wildcardPool: songList,
    excludedSongs: songList,
    slots: z.object({
      opener: z.object({ minRate: fraction, count: z.number().int().min(0) }),
      encore: z.object({ minRate: fraction, count: z.number().int().min(0) }),
      rotation: z.object({
        catalogShare: fraction,
        min: z.number().int().min(0),
        max: z.number().int().min(0),
      }),
      wildcard: z.object({
        base: z.number().int().min(0),
        curveballSlots: z.number().int().min(0),
      }),
    }),
  })
  .superRefine((tuning, ctx) => {
    if (tuning.confidence.min >= tuning.confidence.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["confidence"],
        message: "confidence.min must be below confidence.max",
      });
    }
    if (tuning.slots.rotation.min > tuning.slots.rotation.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["slots", "rotation"],
        message: "rotation.min must not exceed rotation.max",
      });
    }
    for (let index = 1; index < tuning.tiers.length; index += 1) {
      if (tuning.tiers[index].above >= tuning.tiers[index - 1].above) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", index],
          message: "tiers must be ordered by descending lower bound",
        });
      }
      if (tuning.tiers[index - 1].floor < tuning.tiers[index].ceiling) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", index - 1, "floor"],
          message: "a tier's floor must not fall below the ceiling of the tier under it",
        });
      }
    }
  });

export type PredictionTuning = z.infer<typeof tuningSchema>;
export type TierRule = PredictionTuning["tiers"][number];
export type GapZone = PredictionTuning["gapZones"]["opener"];

export function parseTuning(raw: unknown): PredictionTuning {
  return tuningSchema.parse(raw);
}

export async function loadTuningFile(path: string): Promise<PredictionTuning> {
  const body = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(body);
  return parseTuning(parsed);
}

export async function loadDefaultTuning(): Promise<PredictionTuning> {
  return loadTuningFile(await resolveDataFile("default-tuning.json"));
}

export async function loadTuning(path?: string): Promise<PredictionTuning> {
  if (path) {
    return loadTuningFile(path);
  }
  return loadDefaultTuning();
}

export function withOverrides(
  tuning: PredictionTuning,
  overrides: { maxPredictions?: number },
): PredictionTuning {
  if (typeof overrides.maxPredictions !== "number") {
    return tuning;
  }
  return parseTuning({ ...tuning, maxPredictions: overrides.maxPredictions });
}
