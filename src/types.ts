export type Season = "Spring" | "Summer" | "Fall" | "Winter";
export type VenueType = "amphitheater" | "theater" | "festival" | "club";
export type SongTier = "high" | "medium" | "low";
export type SlotType = "opener" | "encore" | "rotation" | "wildcard" | "sequence_follow";
export type ScoredSlotType = Exclude<SlotType, "sequence_follow">;

export const SLOT_ORDER: readonly SlotType[] = [
  "opener",
  "encore",
  "rotation",
  "wildcard",
  "sequence_follow",
];

export interface SongCatalogEntry {
  name: string;
  historicalFrequency: number;
  openerRate: number;
  encoreRate: number;
  totalPlays: number;
  averageGapDays: number;
  energyTag: string;
  tier: SongTier;
  lastPlayed?: string;
}

export interface ShowRequest {
  date: string;
  venueName: string;
  bandName: string;
}

export interface ShowContext {
  date: string;
  venueName: string;
  bandName: string;
  dateValid: boolean;
  season?: Season;
  venueType: VenueType;
  isWeekend: boolean;
  curveballScore: number;
}

export interface PredictionCandidate {
  song: SongCatalogEntry;
  slotType: SlotType;
  confidence: number;
  reasoning: string[];
  daysSincePlayed: number;
}

export interface RankedCandidate extends PredictionCandidate {
  rank: number;
}

export interface PredictionRecord {
  primaryKey: string;
  songName: string;
  confidence: number;
  slotType: SlotType;
  reasoning: string[];
  rank: number;
  showDate: string;
  bandName: string;
  venueName: string;
  totalPlays: number;
  daysSincePlayed: number;
  lastPlayed: string;
  algorithmVersion: string;
}

export interface SlotCounts {
  opener: number;
  encore: number;
  rotation: number;
  wildcard: number;
  sequence_follow: number;
}

export interface PredictionOutcome {
  context: ShowContext;
  records: PredictionRecord[];
  candidateCount: number;
  slotCounts: SlotCounts;
  averageConfidence?: number;
}

/** External event asking for predictions of one upcoming show. */
export interface ShowTrigger {
  bandName: string;
  nextShowDate: string;
  venueName: string;
  venueCity?: string;
  venueState?: string;
}

export type SetType =
  | "Set 1"
  | "Set 2"
  | "Set 3"
  | "One Set"
  | "Encore"
  | "Soundcheck"
  | "Other";

export interface SetlistEntry {
  songName: string;
  setType: SetType;
  setPosition: number;
  isCover?: boolean;
}

export interface ShowHistoryRecord {
  bandName: string;
  showDate: string;
  venueName: string;
  venueCity?: string;
  venueState?: string;
  isPrediction?: boolean;
  setlist: SetlistEntry[];
}

export interface PredictionBatch {
  trigger: ShowTrigger;
  context: ShowContext;
  records: PredictionRecord[];
  algorithmVersion: string;
  generatedAt: string;
  showsAnalyzed: number;
  dataThroughDate?: string;
  confidenceScore: number;
}

export interface PredictionTransport {
  readonly name: string;
  sendBatch(batch: PredictionBatch): Promise<void>;
}

export type CatalogSourceConfig =
  | { kind: "history"; path: string }
  | { kind: "catalog"; path: string };

export interface RunConfig {
  triggers: ShowTrigger[];
  triggersFile?: string;
  source: CatalogSourceConfig;
  tuningFile?: string;
  seed?: string;
  maxPredictions?: number;
  minHistoryShows: number;
  console: boolean;
  jsonOut?: string;
  telegram: boolean;
  telegramToken?: string;
  telegramChatId?: string;
  tgSendMaxRpm: number;
  debug: boolean;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  processedTriggers: number;
  predictedShows: number;
  skippedShows: number;
  failedTriggers: number;
  transportFailures: number;
}
