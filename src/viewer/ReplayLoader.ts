import { readFile } from "fs/promises";
import { ReplayDataset } from "../rollout/types.js";

export class ReplayLoader {
  async loadFromFile(filePath: string): Promise<ReplayDataset> {
    const text = await readFile(filePath, "utf-8");
    const parsed: unknown = JSON.parse(text);
    if (!isReplayDataset(parsed)) {
      throw new Error(`${filePath} is not a rollout replay`);
    }
    return parsed;
  }
}

function isReplayDataset(value: unknown): value is ReplayDataset {
  if (typeof value !== "object" || value === null) return false;
  return "episodes" in value && Array.isArray(value.episodes) && "summary" in value && "seed" in value;
}
