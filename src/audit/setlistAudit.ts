import { formatPercent, roundTo } from "../common/math.js";
import { songKey } from "../predict/songs.js";
import { SLOT_ORDER, type PredictionRecord, type SlotType } from "../types.js";

export interface AccuracySummary {
  hit: number;
  total: number;
  rate?: number;
}

export interface SetlistAuditResult {
  bandName?: string;
  showDate?: string;
  exactMatches: number;
  totalPredictions: number;
  totalActual: number;
  precision: number;
  recall: number;
  f1: number;
  hitsBySlot: Record<SlotType, AccuracySummary>;
  surprises: string[];
  insights: string[];
}

const SURPRISES_IN_INSIGHT = 3;

/** Scores one show's predictions against the songs actually played. */
export function auditPredictions(
  records: readonly PredictionRecord[],
  actualSongs: readonly string[],
): SetlistAuditResult {
  const actual = uniqueSongs(actualSongs);
  const actualKeys = new Set(actual.map(songKey));
  const predicted = uniqueSongs(records.map((record) => record.songName));
  const predictedKeys = new Set(predicted.map(songKey));

  const hitsBySlot = emptySlotSummary();
  for (const record of records) {
    const summary = hitsBySlot[record.slotType];
    summary.total += 1;
    if (actualKeys.has(songKey(record.songName))) {
      summary.hit += 1;
    }
  }
  for (const slot of SLOT_ORDER) {
    const summary = hitsBySlot[slot];
    if (summary.total > 0) {
      summary.rate = roundTo(summary.hit / summary.total, 4);
    }
  }

  const exactMatches = predicted.filter((song) => actualKeys.has(songKey(song))).length;
  const precision = predicted.length > 0 ? exactMatches / predicted.length : 0;
  const recall = actual.length > 0 ? exactMatches / actual.length : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  const surprises = actual.filter((song) => !predictedKeys.has(songKey(song)));

  const first = records[0];
  return {
    ...(first ? { bandName: first.bandName, showDate: first.showDate } : {}),
    exactMatches,
    totalPredictions: predicted.length,
    totalActual: actual.length,
    precision: roundTo(precision, 4),
    recall: roundTo(recall, 4),
    f1: roundTo(f1, 4),
    hitsBySlot,
    surprises,
    insights: buildInsights(precision, recall, surprises, predicted.length, actual.length),
  };
}

function buildInsights(
  precision: number,
  recall: number,
  surprises: string[],
  predictedCount: number,
  actualCount: number,
): string[] {
  if (predictedCount === 0 || actualCount === 0) {
    return [];
  }
  const insights: string[] = [];
  if (precision > 0.3) {
    insights.push(`Good precision: ${formatPercent(precision)} of predictions were correct`);
  } else if (precision < 0.1) {
    insights.push(`Low precision: only ${formatPercent(precision)} of predictions were correct`);
  }
  if (recall > 0.2) {
    insights.push(`Good coverage: predicted ${formatPercent(recall)} of actual songs`);
  } else if (recall < 0.05) {
    insights.push(`Poor coverage: only predicted ${formatPercent(recall)} of actual songs`);
  }
  if (surprises.length > 0) {
    insights.push(`Surprise songs: ${surprises.slice(0, SURPRISES_IN_INSIGHT).join(", ")}`);
  }
  return insights;
}

export function formatSetlistAudit(result: SetlistAuditResult): string {
  const lines: string[] = [];
  lines.push("=== Setlist Audit ===");
  if (result.bandName && result.showDate) {
    lines.push(`Show: ${result.bandName} ${result.showDate}`);
  }
  lines.push(`Matches: ${result.exactMatches}/${result.totalPredictions} predicted, ${result.totalActual} played`);
  lines.push(`Precision: ${formatPercent(result.precision)}`);
  lines.push(`Recall: ${formatPercent(result.recall)}`);
  lines.push(`F1: ${result.f1.toFixed(2)}`);
  lines.push("");
  lines.push("Hit-rate by slot:");
  for (const slot of SLOT_ORDER) {
    lines.push(`- ${slot}: ${formatAccuracy(result.hitsBySlot[slot])}`);
  }
  if (result.insights.length > 0) {
    lines.push("");
    lines.push("Insights:");
    for (const insight of result.insights) {
      lines.push(`- ${insight}`);
    }
  }
  return lines.join("\n");
}

function formatAccuracy(summary: AccuracySummary): string {
  if (summary.total === 0 || summary.rate === undefined) {
    return "n/a";
  }
  return `${summary.hit}/${summary.total} (${formatPercent(summary.rate)})`;
}

function emptySlotSummary(): Record<SlotType, AccuracySummary> {
  return {
    opener: { hit: 0, total: 0 },
    encore: { hit: 0, total: 0 },
    rotation: { hit: 0, total: 0 },
    wildcard: { hit: 0, total: 0 },
    sequence_follow: { hit: 0, total: 0 },
  };
}

function uniqueSongs(songs: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const song of songs) {
    const name = song.trim();
    const key = songKey(name);
    if (!name || seen.has(key)) {
      continue;
    }
    seen.add(key);
    out.push(name);
  }
  return out;
}
