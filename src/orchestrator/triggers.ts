import { readFile } from "node:fs/promises";
import { z } from "zod";
import { addDays, parseIsoDate } from "../common/dates.js";
import { DataError } from "../common/errors.js";
import type { ShowHistoryRecord, ShowTrigger } from "../types.js";

export const triggerSchema = z.object({
  bandName: z.string().trim().min(1),
  nextShowDate: z.string().trim().min(1),
  venueName: z.string().trim(),
  venueCity: z.string().trim().min(1).optional(),
  venueState: z.string().trim().min(1).optional(),
});

export const triggerListSchema = z.array(triggerSchema);

export interface NextVenue {
  venueName?: string;
  venueCity?: string;
  venueState?: string;
}

const UNKNOWN_VENUE = "Unknown Venue";

/** A freshly ingested show asks for the band's next night, venue unknown unless given. */
export function nextShowTrigger(
  show: Pick<ShowHistoryRecord, "bandName" | "showDate">,
  venue: NextVenue = {},
): ShowTrigger {
  const date = parseIsoDate(show.showDate);
  if (!date) {
    throw new DataError(`Ingested show has no usable date: "${show.showDate}"`);
  }
  return {
    bandName: show.bandName,
    nextShowDate: addDays(date, 1),
    venueName: venue.venueName ?? UNKNOWN_VENUE,
    ...(venue.venueCity ? { venueCity: venue.venueCity } : {}),
    ...(venue.venueState ? { venueState: venue.venueState } : {}),
  };
}

export async function readTriggersFile(path: string): Promise<ShowTrigger[]> {
  const body = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(body);
  return triggerListSchema.parse(parsed);
}

export async function collectTriggers(
  inline: readonly ShowTrigger[],
  triggersFile?: string,
): Promise<ShowTrigger[]> {
  const fromFile = triggersFile ? await readTriggersFile(triggersFile) : [];
  return [...inline, ...fromFile];
}
