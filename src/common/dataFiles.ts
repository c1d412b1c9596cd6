import { access } from "node:fs/promises";
import { fileURLToPath } from "node:url";

// Source modules sit two levels under the root, compiled ones three (dist/src/...).
const SEARCH_PREFIXES = ["../../data/", "../../../data/"];

export async function resolveDataFile(fileName: string): Promise<string> {
  const tried: string[] = [];
  for (const prefix of SEARCH_PREFIXES) {
    const candidate = fileURLToPath(new URL(`${prefix}${fileName}`, import.meta.url));
    tried.push(candidate);
    try {
      await access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  throw new Error(`Bundled data file ${fileName} not found (looked in ${tried.join(", ")}).`);
}
