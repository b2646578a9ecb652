import { ObservationKind } from "../simulation/types.js";
import { JumpTaskEnv, JumpTaskEnvOptions } from "./JumpTaskEnv.js";

interface EnvEntry {
  id: string;
  observation: ObservationKind;
}

const REGISTRY: readonly EnvEntry[] = [
  { id: "jumping-task-v0", observation: "greyscale" },
  { id: "jumping-coordinates-task-v0", observation: "coordinates" },
  { id: "jumping-colors-task-v0", observation: "colors" },
];

export const ENV_IDS: readonly string[] = REGISTRY.map((entry) => entry.id);

export function makeEnv(id: string, options: Omit<JumpTaskEnvOptions, "observation"> = {}): JumpTaskEnv {
  const entry = REGISTRY.find((e) => e.id === id);
  if (!entry) {
    throw new Error(`Unknown environment "${id}". Available: ${ENV_IDS.join(", ")}`);
  }
  return new JumpTaskEnv({ ...options, observation: entry.observation });
}
