import { z } from "zod";
import { nextShowTrigger, triggerSchema } from "./orchestrator/triggers.js";
import type { CatalogSourceConfig, RunConfig, ShowTrigger } from "./types.js";

const schema = z.object({
  trigger: triggerSchema.optional(),
  triggersFile: z.string().min(1).optional(),
  historyFile: z.string().min(1).optional(),
  catalogFile: z.string().min(1).optional(),
  tuningFile: z.string().min(1).optional(),
  seed: z.string().min(1).optional(),
  maxPredictions: z.number().int().positive().max(100).optional(),
  minHistoryShows: z.number().int().min(0).max(10_000),
  console: z.boolean(),
  jsonOut: z.string().min(1).optional(),
  telegram: z.boolean(),
  tgSendMaxRpm: z.number().int().min(0).max(120),
  debug: z.boolean(),
});

const DEFAULTS = {
  bandName: "Goose",
  venueName: "Unknown Venue",
  minHistoryShows: 5,
  console: true,
  telegram: false,
  tgSendMaxRpm: 18,
  debug: false,
} as const;

type CliRaw = Record<string, string | boolean>;

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);

  const parsed = schema.parse({
    trigger: readTrigger(args),
    triggersFile: readOptionalString(args, "triggers-file"),
    historyFile: readOptionalString(args, "history-file"),
    catalogFile: readOptionalString(args, "catalog-file"),
    tuningFile: readOptionalString(args, "tuning-file"),
    seed: readOptionalString(args, "seed") ?? readEnvString(env, "SETLIST_SEED"),
    maxPredictions: readOptionalInt(args, "max-predictions"),
    minHistoryShows: readInt(args, "min-history-shows", DEFAULTS.minHistoryShows),
    console: readBool(args, "console", DEFAULTS.console),
    jsonOut: readOptionalString(args, "json-out"),
    telegram: readBool(args, "telegram", DEFAULTS.telegram),
    tgSendMaxRpm: readEnvInt(env, "TG_SEND_MAX_RPM", DEFAULTS.tgSendMaxRpm),
    debug: readBool(args, "debug", DEFAULTS.debug),
  });

  if (!parsed.trigger && !parsed.triggersFile) {
    throw new Error(
      "Nothing to predict: pass --date or --after (with --band/--venue) or --triggers-file.",
    );
  }

  const telegramToken = env.TG_BOT_TOKEN;
  const telegramChatId = env.TG_CHAT_ID;
  if (parsed.telegram && (!telegramToken || !telegramChatId)) {
    throw new Error(
      "Telegram is enabled but TG_BOT_TOKEN or TG_CHAT_ID is missing in environment.",
    );
  }

  const triggers: ShowTrigger[] = parsed.trigger ? [parsed.trigger] : [];
  return {
    triggers,
    triggersFile: parsed.triggersFile,
    source: resolveSource(parsed.historyFile, parsed.catalogFile),
    tuningFile: parsed.tuningFile,
    seed: parsed.seed,
    maxPredictions: parsed.maxPredictions,
    minHistoryShows: parsed.minHistoryShows,
    console: parsed.console,
    jsonOut: parsed.jsonOut,
    telegram: parsed.telegram,
    telegramToken,
    telegramChatId,
    tgSendMaxRpm: parsed.tgSendMaxRpm,
    debug: parsed.debug,
  };
}

function readTrigger(args: CliRaw): ShowTrigger | undefined {
  const bandName = readString(args, "band", DEFAULTS.bandName);
  const venueName = readString(args, "venue", DEFAULTS.venueName);
  const venueCity = readOptionalString(args, "city");
  const venueState = readOptionalString(args, "state");
  const date = readOptionalString(args, "date");
  if (date) {
    return { bandName, nextShowDate: date, venueName, venueCity, venueState };
  }
  const after = readOptionalString(args, "after");
  if (after) {
    return nextShowTrigger({ bandName, showDate: after }, { venueName, venueCity, venueState });
  }
  return undefined;
}

function resolveSource(historyFile?: string, catalogFile?: string): CatalogSourceConfig {
  if (historyFile && catalogFile) {
    throw new Error("Pass either --history-file or --catalog-file, not both.");
  }
  if (historyFile) {
    return { kind: "history", path: historyFile };
  }
  if (catalogFile) {
    return { kind: "catalog", path: catalogFile };
  }
  throw new Error("A song statistics source is required: --history-file or --catalog-file.");
}

export function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return value;
}

function readOptionalInt(args: CliRaw, key: string): number | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function readInt(args: CliRaw, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return Number.parseInt(value, 10);
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}

function readEnvString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (!raw || !raw.trim()) {
    return undefined;
  }
  return raw.trim();
}

function readEnvInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }
  return parsed;
}
