import { z } from "zod";
import { readJsonlLines } from "../transports/jsonl.js";
import type { PredictionRecord, ShowHistoryRecord } from "../types.js";

const recordSchema = z.object({
  primaryKey: z.string(),
  songName: z.string().min(1),
  confidence: z.number(),
  slotType: z.enum(["opener", "encore", "rotation", "wildcard", "sequence_follow"]),
  reasoning: z.array(z.string()),
  rank: z.number().int(),
  showDate: z.string(),
  bandName: z.string(),
  venueName: z.string(),
  totalPlays: z.number(),
  daysSincePlayed: z.number(),
  lastPlayed: z.string(),
  algorithmVersion: z.string(),
});

const loggedBatchSchema = z.object({
  trigger: z.object({
    bandName: z.string(),
    nextShowDate: z.string(),
    venueName: z.string(),
  }),
  generatedAt: z.string(),
  records: z.array(recordSchema),
});

export type LoggedBatch = z.infer<typeof loggedBatchSchema>;

export function parsePredictionLog(lines: readonly string[]): LoggedBatch[] {
  return lines.map((line, index) => {
    const parsed = loggedBatchSchema.safeParse(JSON.parse(line));
    if (!parsed.success) {
      throw new Error(`Prediction log line ${index + 1} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  });
}

export async function readPredictionLog(path: string): Promise<LoggedBatch[]> {
  return parsePredictionLog(await readJsonlLines(path));
}

/** Latest batch written for the show; later runs supersede earlier ones. */
export function findLatestBatch(
  batches: readonly LoggedBatch[],
  bandName: string,
  showDate: string,
): PredictionRecord[] | undefined {
  const band = bandName.trim().toLowerCase();
  let latest: LoggedBatch | undefined;
  for (const batch of batches) {
    if (batch.trigger.bandName.trim().toLowerCase() !== band) {
      continue;
    }
    if (batch.trigger.nextShowDate !== showDate) {
      continue;
    }
    if (!latest || batch.generatedAt >= latest.generatedAt) {
      latest = batch;
    }
  }
  return latest?.records;
}

/** Songs actually played at the show, soundcheck excluded, in set order. */
export function actualSongsFor(
  shows: readonly ShowHistoryRecord[],
  bandName: string,
  showDate: string,
): string[] | undefined {
  const band = bandName.trim().toLowerCase();
  const show = shows.find(
    (item) =>
      !item.isPrediction &&
      item.bandName.trim().toLowerCase() === band &&
      item.showDate.slice(0, 10) === showDate,
  );
  if (!show) {
    return undefined;
  }
  return show.setlist
    .filter((entry) => entry.setType !== "Soundcheck")
    .map((entry) => entry.songName);
}
