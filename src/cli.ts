#!/usr/bin/env node
import { buildRunConfig } from "./config.js";
import { run } from "./orchestrator.js";

async function main(): Promise<void> {
  const config = buildRunConfig(process.argv.slice(2), process.env);
  const summary = await run(config);
  process.stdout.write(
    `Finished. processed=${summary.processedTriggers} predicted=${summary.predictedShows} ` +
      `skipped=${summary.skippedShows} failed=${summary.failedTriggers} ` +
      `transportFailures=${summary.transportFailures}\n`,
  );
  if (summary.failedTriggers > 0) {
    process.exitCode = 2;
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Fatal error: ${message}\n`);
  process.exit(1);
});
