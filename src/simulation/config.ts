import { isValidSeed } from "../utils/random.js";
import { JumpPhysics, JumpTaskConfig, LayoutRules, ObstacleColor, RewardTable } from "./types.js";

// The jump is a "hat": straight diagonal up to the jump height, then straight down.
export const JUMP_PHYSICS: Readonly<JumpPhysics> = Object.freeze({
  jumpHeight: 15,
  verticalSpeed: 1,
  horizontalSpeed: 1,
});

export const DEFAULT_LAYOUT: Readonly<LayoutRules> = Object.freeze({
  allowedObstacleX: Object.freeze([20, 30, 40]),
  allowedFloorHeights: Object.freeze([10, 20]),
  pairedObstacleX: Object.freeze([20, 55] as const),
  minObstacleX: 14,
  maxObstacleX: 48,
  minFloorHeight: 0,
  maxFloorHeight: 41,
});

export const DEFAULT_REWARDS: Readonly<RewardTable> = Object.freeze({ life: -1, exit: 100 });

export const DEFAULT_CONFIG: Readonly<JumpTaskConfig> = Object.freeze({
  screenWidth: 60,
  screenHeight: 60,
  floorHeight: 10,
  agentWidth: 5,
  agentHeight: 10,
  agentInitX: 0,
  agentSpeed: 1,
  obstaclePosition: 30,
  obstacleWidth: 9,
  obstacleHeight: 10,
  maxSteps: 600,
  withLeftAction: false,
  twoObstacles: false,
  finishJump: false,
  observation: "greyscale",
  obstacleColor: ObstacleColor.Green,
  seed: 42,
  physics: JUMP_PHYSICS,
  layout: DEFAULT_LAYOUT,
  rewards: DEFAULT_REWARDS,
});

export type ConfigOverrides = Partial<
  Omit<JumpTaskConfig, "physics" | "layout" | "rewards">
> & {
  physics?: Partial<JumpPhysics>;
  layout?: Partial<LayoutRules>;
  rewards?: Partial<RewardTable>;
};

const POSITIVE_FIELDS = [
  "screenWidth",
  "screenHeight",
  "agentWidth",
  "agentHeight",
  "agentSpeed",
  "obstacleWidth",
  "obstacleHeight",
] as const;

export function createConfig(overrides: ConfigOverrides = {}): Readonly<JumpTaskConfig> {
  const base = DEFAULT_CONFIG;
  // Field by field so that an explicit `undefined` (e.g. an absent CLI flag) keeps the default.
  const config: JumpTaskConfig = {
    screenWidth: overrides.screenWidth ?? base.screenWidth,
    screenHeight: overrides.screenHeight ?? base.screenHeight,
    floorHeight: overrides.floorHeight ?? base.floorHeight,
    agentWidth: overrides.agentWidth ?? base.agentWidth,
    agentHeight: overrides.agentHeight ?? base.agentHeight,
    agentInitX: overrides.agentInitX ?? base.agentInitX,
    agentSpeed: overrides.agentSpeed ?? base.agentSpeed,
    obstaclePosition: overrides.obstaclePosition ?? base.obstaclePosition,
    obstacleWidth: overrides.obstacleWidth ?? base.obstacleWidth,
    obstacleHeight: overrides.obstacleHeight ?? base.obstacleHeight,
    maxSteps: overrides.maxSteps ?? base.maxSteps,
    withLeftAction: overrides.withLeftAction ?? base.withLeftAction,
    twoObstacles: overrides.twoObstacles ?? base.twoObstacles,
    finishJump: overrides.finishJump ?? base.finishJump,
    observation: overrides.observation ?? base.observation,
    obstacleColor: overrides.obstacleColor ?? base.obstacleColor,
    seed: overrides.seed ?? base.seed,
    physics: Object.freeze({ ...base.physics, ...overrides.physics }),
    layout: Object.freeze({ ...base.layout, ...overrides.layout }),
    rewards: Object.freeze({ ...base.rewards, ...overrides.rewards }),
  };

  for (const field of POSITIVE_FIELDS) {
    if (!(config[field] > 0)) {
      throw new Error(`Invalid configuration: ${field} must be positive, got ${config[field]}`);
    }
  }
  if (!(config.maxSteps >= 0)) {
    throw new Error(`Invalid configuration: maxSteps must be non-negative, got ${config.maxSteps}`);
  }
  if (!isValidSeed(config.seed)) {
    throw new Error(`Invalid configuration: seed must be an integer in [0, 2^32), got ${config.seed}`);
  }
  if (!(config.physics.verticalSpeed > 0)) {
    throw new Error(`Invalid configuration: physics.verticalSpeed must be positive`);
  }
  return Object.freeze(config);
}
