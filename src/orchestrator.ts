export { run, type RunOptions } from "./orchestrator/runCore.js";
export {
  collectTriggers,
  nextShowTrigger,
  readTriggersFile,
  type NextVenue,
} from "./orchestrator/triggers.js";
export { batchConfidence, createSongStatsSource } from "./orchestrator/utils.js";
