import { ObservationEncoder, createEncoder } from "./observations.js";
import { ColoredRewardRule, RewardRule, createStandardRewardRule } from "./rewards.js";
import { JumpTaskConfig, ObservationKind } from "./types.js";

/** What the state machine delegates to: how state is observed and how it is scored. */
export interface TaskVariant {
  readonly kind: ObservationKind;
  readonly encoder: ObservationEncoder;
  readonly rewardRule: RewardRule;
}

export function createVariant(config: JumpTaskConfig): TaskVariant {
  const encoder = createEncoder(config);
  const rewardRule =
    config.observation === "colors"
      ? new ColoredRewardRule(config.rewards, config.obstacleColor)
      : createStandardRewardRule(config.rewards);
  return { kind: config.observation, encoder, rewardRule };
}
