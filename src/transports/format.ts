import { formatPercent } from "../common/math.js";
import type { PredictionBatch, PredictionRecord } from "../types.js";

const SEPARATOR = "==================";
const DEFAULT_REASONS_PER_SONG = 2;

export type BatchMarkup = "plain" | "telegram_html";

export interface FormatBatchOptions {
  markup?: BatchMarkup;
  reasonsPerSong?: number;
}

export function formatBatchMessage(
  batch: PredictionBatch,
  options: FormatBatchOptions = {},
): string {
  const markup = options.markup ?? "plain";
  const reasonsPerSong = options.reasonsPerSong ?? DEFAULT_REASONS_PER_SONG;
  const text = (value: string): string => (markup === "telegram_html" ? escapeHtml(value) : value);
  const title = markup === "telegram_html" ? "<b>SETLIST FORECAST</b>" : "SETLIST FORECAST";

  const lines = [
    title,
    SEPARATOR,
    text(`${batch.trigger.bandName} @ ${formatVenue(batch)}`),
    `Date: ${text(formatShowDate(batch))}`,
    `Venue type: ${batch.context.venueType} | Curveball: ${formatPercent(batch.context.curveballScore, 0)}`,
    SEPARATOR,
  ];

  if (batch.records.length === 0) {
    lines.push("No predictions (not enough history for this band yet)");
  } else {
    for (const record of batch.records) {
      lines.push(text(formatRecordLine(record)));
      const reasons = record.reasoning.slice(0, reasonsPerSong);
      if (reasons.length > 0) {
        lines.push(`    ${text(reasons.join("; "))}`);
      }
    }
  }

  lines.push(SEPARATOR);
  lines.push(
    `Confidence: ${formatPercent(batch.confidenceScore)} | ` +
      `Shows analyzed: ${batch.showsAnalyzed}${formatThrough(batch.dataThroughDate)}`,
  );
  lines.push(`Algorithm: ${text(batch.algorithmVersion)}`);
  lines.push(SEPARATOR);
  return lines.join("\n");
}

export function formatRecordLine(record: PredictionRecord): string {
  const rank = String(record.rank).padStart(2, " ");
  return `${rank}. ${record.songName} | ${formatPercent(record.confidence)} | ${record.slotType}`;
}

function formatVenue(batch: PredictionBatch): string {
  const { venueName, venueCity, venueState } = batch.trigger;
  const place = [venueCity, venueState].filter((part): part is string => Boolean(part)).join(", ");
  const venue = venueName || "TBD";
  return place ? `${venue} (${place})` : venue;
}

function formatShowDate(batch: PredictionBatch): string {
  const { context } = batch;
  if (!context.dateValid || !context.season) {
    return batch.trigger.nextShowDate;
  }
  const weekend = context.isWeekend ? ", weekend" : "";
  return `${batch.trigger.nextShowDate} (${context.season}${weekend})`;
}

function formatThrough(date: string | undefined): string {
  return date ? ` (through ${date})` : "";
}

export function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
