import { actualSongsFor, findLatestBatch, readPredictionLog } from "./audit/predictionLog.js";
import { auditPredictions, formatSetlistAudit } from "./audit/setlistAudit.js";
import { readHistoryFile } from "./catalog/sources.js";
import { Logger } from "./logger.js";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const predictionsFile = readArg(argv, "predictions-file");
  const historyFile = readArg(argv, "history-file");
  const date = readArg(argv, "date");
  const band = readArg(argv, "band") ?? "Goose";
  if (!predictionsFile || !historyFile || !date) {
    throw new Error(
      "Usage: npm run evaluate -- --predictions-file ./predictions/latest.jsonl " +
        "--history-file ./history.json --date YYYY-MM-DD [--band Goose]",
    );
  }
  const logger = new Logger({ debugEnabled: false, scope: "evaluate" });

  const batches = await readPredictionLog(predictionsFile);
  const records = findLatestBatch(batches, band, date);
  if (!records) {
    throw new Error(`No predictions for ${band} ${date} in ${predictionsFile}`);
  }
  const shows = await readHistoryFile(historyFile);
  const actual = actualSongsFor(shows, band, date);
  if (!actual) {
    throw new Error(`No setlist for ${band} ${date} in ${historyFile}`);
  }
  logger.info(`Comparing ${records.length} predictions with ${actual.length} played songs.`);

  const result = auditPredictions(records, actual);
  process.stdout.write(`${formatSetlistAudit(result)}\n`);
}

function readArg(argv: string[], key: string): string | undefined {
  const token = `--${key}`;
  const index = argv.findIndex((value) => value === token);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    return undefined;
  }
  return value;
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Fatal error: ${message}\n`);
  process.exit(1);
});
