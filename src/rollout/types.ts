import { ConfigOverrides } from "../simulation/config.js";
import { Rect, Vec2 } from "../simulation/geometry.js";
import { Action, JumpPhase, ObstacleColor, TerminalReason } from "../simulation/types.js";

export type PolicyName = "random" | "heuristic";

export interface RolloutConfig {
  envId: string;
  episodes: number;
  policy: PolicyName;
  jumpDistance: number; // heuristic only: gap to the obstacle at which it jumps
  seed: number;
  snapshotInterval: number;
  output: string;
  env: Omit<ConfigOverrides, "observation" | "seed">;
}

export interface ReplayFrame {
  step: number;
  action: Action;
  reward: number;
  agent: Vec2;
  jumpPhase: JumpPhase;
  trajectory: Vec2[];
  collision: boolean;
  exit: boolean;
}

export interface EpisodeMetrics {
  totalReward: number;
  steps: number;
  collisions: number;
  outcome: TerminalReason;
}

export interface EpisodeSample {
  episode: number;
  screen: { width: number; height: number };
  floorHeight: number;
  agentSize: { width: number; height: number };
  obstacles: Rect[];
  obstacleColor?: ObstacleColor;
  metrics: EpisodeMetrics;
  frames: ReplayFrame[];
}

export interface RolloutSummary {
  episodes: number;
  meanReward: number;
  successRate: number;
  collisionRate: number;
  stepLimitRate: number;
}

export interface ReplayDataset {
  seed: number;
  config: Omit<RolloutConfig, "output">;
  snapshotInterval: number;
  episodes: EpisodeSample[];
  summary: RolloutSummary;
}
