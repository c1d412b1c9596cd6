import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { PredictionTuning } from "../predict/tuning.js";
import type { ShowHistoryRecord, SongCatalogEntry } from "../types.js";
import {
  buildCatalog,
  countDistinctShows,
  normalizeCatalogEntry,
  selectHistory,
} from "./catalog.js";

export interface HistorySummary {
  showsAnalyzed: number;
  dataThroughDate?: string;
}

/** Read side of the storage layer, as far as the predictor cares. */
export interface SongStatsSource {
  readonly name: string;
  fetchSongStats(bandName: string, asOfDate?: string): Promise<SongCatalogEntry[]>;
  describeHistory(bandName: string, asOfDate?: string): Promise<HistorySummary>;
}

const setlistEntrySchema = z.object({
  songName: z.string().min(1),
  setType: z.enum(["Set 1", "Set 2", "Set 3", "One Set", "Encore", "Soundcheck", "Other"]),
  setPosition: z.number().int().positive(),
  isCover: z.boolean().optional(),
});

const showSchema = z.object({
  bandName: z.string().min(1),
  showDate: z.string().min(10),
  venueName: z.string(),
  venueCity: z.string().optional(),
  venueState: z.string().optional(),
  isPrediction: z.boolean().optional(),
  setlist: z.array(setlistEntrySchema),
});

export const historyFileSchema = z.union([
  z.array(showSchema),
  z.object({ shows: z.array(showSchema) }).transform((file) => file.shows),
]);

const catalogEntrySchema = z.object({
  name: z.string().min(1),
  historicalFrequency: z.number().optional(),
  openerRate: z.number().optional(),
  encoreRate: z.number().optional(),
  totalPlays: z.number().optional(),
  averageGapDays: z.number().optional(),
  energyTag: z.string().optional(),
  lastPlayed: z.string().optional(),
});

export const catalogFileSchema = z.object({
  bandName: z.string().min(1),
  showsAnalyzed: z.number().int().min(0),
  dataThroughDate: z.string().optional(),
  songs: z.array(catalogEntrySchema),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;

export class HistorySource implements SongStatsSource {
  readonly name: string;
  private readonly loadShows: () => Promise<ShowHistoryRecord[]>;
  private readonly tuning: PredictionTuning;
  private shows?: Promise<ShowHistoryRecord[]>;

  constructor(
    name: string,
    loadShows: () => Promise<ShowHistoryRecord[]>,
    tuning: PredictionTuning,
  ) {
    this.name = name;
    this.loadShows = loadShows;
    this.tuning = tuning;
  }

  async fetchSongStats(bandName: string, asOfDate?: string): Promise<SongCatalogEntry[]> {
    const shows = await this.getShows();
    return buildCatalog(shows, { bandName, asOfDate, tuning: this.tuning });
  }

  async describeHistory(bandName: string, asOfDate?: string): Promise<HistorySummary> {
    const shows = await this.getShows();
    const slice = selectHistory(shows, bandName, asOfDate);
    return {
      showsAnalyzed: countDistinctShows(slice.shows),
      dataThroughDate: slice.dataThroughDate,
    };
  }

  private getShows(): Promise<ShowHistoryRecord[]> {
    if (!this.shows) {
      this.shows = this.loadShows();
    }
    return this.shows;
  }
}

export class CatalogFileSource implements SongStatsSource {
  readonly name: string;
  private readonly load: () => Promise<CatalogFile>;
  private readonly tuning: PredictionTuning;
  private file?: Promise<CatalogFile>;

  constructor(name: string, load: () => Promise<CatalogFile>, tuning: PredictionTuning) {
    this.name = name;
    this.load = load;
    this.tuning = tuning;
  }

  async fetchSongStats(bandName: string): Promise<SongCatalogEntry[]> {
    const file = await this.getFile();
    if (!sameBand(file.bandName, bandName)) {
      return [];
    }
    return file.songs.map((song) => normalizeCatalogEntry(song, this.tuning));
  }

  async describeHistory(bandName: string): Promise<HistorySummary> {
    const file = await this.getFile();
    if (!sameBand(file.bandName, bandName)) {
      return { showsAnalyzed: 0 };
    }
    return { showsAnalyzed: file.showsAnalyzed, dataThroughDate: file.dataThroughDate };
  }

  private getFile(): Promise<CatalogFile> {
    if (!this.file) {
      this.file = this.load();
    }
    return this.file;
  }
}

export function createHistoryFileSource(path: string, tuning: PredictionTuning): HistorySource {
  return new HistorySource(
    `history:${path}`,
    async () => historyFileSchema.parse(await readJson(path)),
    tuning,
  );
}

export function createCatalogFileSource(path: string, tuning: PredictionTuning): CatalogFileSource {
  return new CatalogFileSource(
    `catalog:${path}`,
    async () => catalogFileSchema.parse(await readJson(path)),
    tuning,
  );
}

export async function readHistoryFile(path: string): Promise<ShowHistoryRecord[]> {
  return historyFileSchema.parse(await readJson(path));
}

async function readJson(path: string): Promise<unknown> {
  const body = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(body);
  return parsed;
}

function sameBand(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
