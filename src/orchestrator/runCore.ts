import type { SongStatsSource } from "../catalog/sources.js";
import { isDataError, stringifyError } from "../common/errors.js";
import { formatPercent } from "../common/math.js";
import { createSeededRandom, systemRandom, type RandomSource } from "../common/random.js";
import { Logger } from "../logger.js";
import { loadTuning, withOverrides, type PredictionTuning } from "../predict/tuning.js";
import { predictSetlist } from "../predictor.js";
import type {
  PredictionBatch,
  PredictionTransport,
  RunConfig,
  RunSummary,
  ShowTrigger,
} from "../types.js";
import { collectTriggers } from "./triggers.js";
import { createTransports } from "./transports.js";
import {
  batchConfidence,
  createSongStatsSource,
  isAbortError,
  throwIfAborted,
  toSeconds,
  triggerLabel,
} from "./utils.js";

export interface RunOptions {
  signal?: AbortSignal;
  logger?: Logger;
  tuning?: PredictionTuning;
  source?: SongStatsSource;
  transports?: PredictionTransport[];
  /** Overrides seed handling; one source is shared by every trigger in the run. */
  random?: RandomSource;
  now?: () => Date;
}

export async function run(config: RunConfig, options: RunOptions = {}): Promise<RunSummary> {
  const signal = options.signal;
  throwIfAborted(signal);
  const logger = options.logger ?? new Logger({ debugEnabled: config.debug });
  const transportLogger = logger.child("transport");
  const now = options.now ?? (() => new Date());

  const baseTuning = options.tuning ?? (await loadTuning(config.tuningFile));
  const tuning = withOverrides(baseTuning, { maxPredictions: config.maxPredictions });
  const source = options.source ?? createSongStatsSource(config.source, tuning);
  const transports = options.transports ?? createTransports(config);
  const triggers = await collectTriggers(config.triggers, config.triggersFile);

  logger.info(
    `Prediction policy: algorithm=${tuning.algorithmVersion}, source=${source.name}, ` +
      `max_predictions=${tuning.maxPredictions}, min_history_shows=${config.minHistoryShows}, ` +
      `seed=${config.seed ?? "none"}, transports=${transports.map((t) => t.name).join(",") || "none"}`,
  );

  const startedAt = now().toISOString();
  const summary: RunSummary = {
    startedAt,
    finishedAt: startedAt,
    processedTriggers: 0,
    predictedShows: 0,
    skippedShows: 0,
    failedTriggers: 0,
    transportFailures: 0,
  };

  try {
    for (let index = 0; index < triggers.length; index += 1) {
      throwIfAborted(signal);
      const trigger = triggers[index];
      const label = triggerLabel(trigger);
      const startedMs = Date.now();
      summary.processedTriggers += 1;
      logger.info(`[${index + 1}/${triggers.length}] ${label}`);

      try {
        const history = await source.describeHistory(trigger.bandName, trigger.nextShowDate);
        if (history.showsAnalyzed < config.minHistoryShows) {
          summary.skippedShows += 1;
          logger.warn(
            `Skipping ${label}: insufficient_history ` +
              `(need=${config.minHistoryShows}, have=${history.showsAnalyzed}).`,
          );
          continue;
        }

        const catalog = await source.fetchSongStats(trigger.bandName, trigger.nextShowDate);
        logger.debug(
          `Catalog for ${trigger.bandName}: songs=${catalog.length}, ` +
            `shows=${history.showsAnalyzed}, through=${history.dataThroughDate ?? "n/a"}`,
        );

        const outcome = predictSetlist(
          {
            date: trigger.nextShowDate,
            venueName: trigger.venueName,
            bandName: trigger.bandName,
          },
          catalog,
          { tuning, random: options.random ?? randomForTrigger(config.seed, trigger) },
        );
        const { context } = outcome;
        logger.info(
          `Context ${label}: season=${context.season ?? "unknown"}, venue_type=${context.venueType}, ` +
            `weekend=${context.isWeekend}, curveball=${formatPercent(context.curveballScore, 0)}`,
        );

        if (outcome.records.length === 0) {
          summary.skippedShows += 1;
          logger.warn(`Skipping ${label}: empty_catalog (no songs on record before this date).`);
          continue;
        }

        const counts = outcome.slotCounts;
        logger.info(
          `Predicted ${outcome.records.length}/${outcome.candidateCount} candidates for ${label}: ` +
            `opener=${counts.opener} encore=${counts.encore} rotation=${counts.rotation} ` +
            `wildcard=${counts.wildcard} sequence=${counts.sequence_follow} ` +
            `(${toSeconds(Date.now() - startedMs).toFixed(2)}s)`,
        );

        const batch: PredictionBatch = {
          trigger,
          context,
          records: outcome.records,
          algorithmVersion: tuning.algorithmVersion,
          generatedAt: now().toISOString(),
          showsAnalyzed: history.showsAnalyzed,
          ...(history.dataThroughDate ? { dataThroughDate: history.dataThroughDate } : {}),
          confidenceScore: batchConfidence(outcome.averageConfidence, history.showsAnalyzed),
        };

        for (const transport of transports) {
          throwIfAborted(signal);
          try {
            await transport.sendBatch(batch);
          } catch (error) {
            summary.transportFailures += 1;
            transportLogger.warn(`${transport.name} failed for ${label}: ${stringifyError(error)}`);
          }
        }

        summary.predictedShows += 1;
      } catch (error) {
        if (isAbortError(error)) {
          logger.warn("Run aborted by control signal.");
          throw error;
        }
        summary.failedTriggers += 1;
        if (isDataError(error)) {
          logger.error(`Rejected ${label}: ${error.message}`);
        } else {
          logger.error(`Failed to process ${label}: ${stringifyError(error)}`);
        }
      }
    }
  } finally {
    summary.finishedAt = now().toISOString();
  }

  logger.info(
    `Run summary: processed=${summary.processedTriggers}, predicted=${summary.predictedShows}, ` +
      `skipped=${summary.skippedShows}, failed=${summary.failedTriggers}, ` +
      `transportFailures=${summary.transportFailures}`,
  );

  return summary;
}

/** Seeded runs derive one stream per show so output does not depend on trigger order. */
function randomForTrigger(seed: string | undefined, trigger: ShowTrigger): RandomSource {
  if (!seed) {
    return systemRandom;
  }
  return createSeededRandom(`${seed}|${trigger.bandName.toLowerCase()}|${trigger.nextShowDate}`);
}
