export { Environment } from "./simulation/Environment.js";
export { createConfig, DEFAULT_CONFIG, DEFAULT_LAYOUT, DEFAULT_REWARDS, JUMP_PHYSICS } from "./simulation/config.js";
export type { ConfigOverrides } from "./simulation/config.js";
export { IllegalActionError, OutOfRangeConfigurationError } from "./simulation/errors.js";
export { overlaps } from "./simulation/geometry.js";
export type { Rect, Vec2 } from "./simulation/geometry.js";
export { detectStatus, obstacleRects } from "./simulation/collision.js";
export { applyAction, continueJump } from "./simulation/kinematics.js";
export { createColorsEncoder, createCoordinatesEncoder, createEncoder, createGreyscaleEncoder } from "./simulation/observations.js";
export type { ObservationEncoder } from "./simulation/observations.js";
export { ColoredRewardRule, createStandardRewardRule } from "./simulation/rewards.js";
export type { RewardRule, TickOutcome } from "./simulation/rewards.js";
export { createVariant } from "./simulation/variants.js";
export type { TaskVariant } from "./simulation/variants.js";
export { Action, JumpPhase, ObstacleColor, TerminalReason } from "./simulation/types.js";
export type {
  EpisodeState,
  JumpTaskConfig,
  ObservationKind,
  ObservationSpec,
  ResetOptions,
  Scene,
  SceneRenderer,
  StepInfo,
  StepResult,
} from "./simulation/types.js";
export { JumpTaskEnv } from "./env/JumpTaskEnv.js";
export type { EnvStepResult, JumpTaskEnvOptions } from "./env/JumpTaskEnv.js";
export { box, discrete } from "./env/spaces.js";
export type { BoxSpace, DiscreteSpace, Space } from "./env/spaces.js";
export { ENV_IDS, makeEnv } from "./env/registry.js";
export { RolloutRunner } from "./rollout/RolloutRunner.js";
export { createRng } from "./utils/random.js";
export type { Rng } from "./utils/random.js";
