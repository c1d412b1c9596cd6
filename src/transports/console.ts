import type { PredictionBatch, PredictionTransport } from "../types.js";
import { formatBatchMessage } from "./format.js";

export type ConsoleWrite = (text: string) => void;

export class ConsoleTransport implements PredictionTransport {
  readonly name = "console";
  private readonly write: ConsoleWrite;

  constructor(write: ConsoleWrite = (text) => process.stdout.write(text)) {
    this.write = write;
  }

  async sendBatch(batch: PredictionBatch): Promise<void> {
    this.write(`${formatBatchMessage(batch, { markup: "plain" })}\n\n`);
  }
}
