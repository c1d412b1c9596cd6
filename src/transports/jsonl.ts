import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { PredictionBatch, PredictionTransport } from "../types.js";

/** Appends every batch as one JSON line; the persistence layer picks the file up from there. */
export class JsonlTransport implements PredictionTransport {
  readonly name = "jsonl";
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async sendBatch(batch: PredictionBatch): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(batch)}\n`, "utf8");
  }
}

export async function readJsonlLines(filePath: string): Promise<string[]> {
  const raw = await readFile(filePath, "utf8");
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}
