import { EpisodeState, GameStatus, ObstacleColor, RewardTable, TerminalReason } from "./types.js";

/** Game status after the reward rule has decided what it means for the episode. */
export interface TickOutcome extends GameStatus {
  terminal: boolean;
  reason: TerminalReason;
}

export interface RewardRule {
  readonly rewards: Readonly<RewardTable> & { collision?: number };
  beginEpisode(): void;
  resolve(status: GameStatus): TickOutcome;
  reward(outcome: TickOutcome, progress: number, state: EpisodeState): number;
}

function standardOutcome(status: GameStatus): TickOutcome {
  const reason = status.collision
    ? TerminalReason.Collision
    : status.exit
      ? TerminalReason.Exit
      : TerminalReason.None;
  return { ...status, terminal: reason !== TerminalReason.None, reason };
}

/** Collision replaces the positional reward; reaching the edge adds the exit bonus. */
function standardReward(rewards: RewardTable, outcome: TickOutcome, progress: number): number {
  if (outcome.collision) return rewards.life;
  if (outcome.exit) return progress + rewards.exit;
  return progress;
}

export function createStandardRewardRule(rewards: RewardTable): RewardRule {
  return {
    rewards,
    beginEpisode() {},
    resolve: standardOutcome,
    reward: (outcome, progress) => standardReward(rewards, outcome, progress),
  };
}

/**
 * Coloured obstacle. A green obstacle pays a bonus for touching it (reported once
 * per episode) and only the right edge ends the episode; a red one behaves like
 * the standard task.
 */
export class ColoredRewardRule implements RewardRule {
  readonly rewards: Readonly<RewardTable> & { collision: number };
  private readonly color: ObstacleColor;
  private alreadyCollided = false;

  constructor(rewards: RewardTable, color: ObstacleColor) {
    this.color = color;
    this.rewards = { ...rewards, collision: color === ObstacleColor.Green ? 100 : 0 };
  }

  get hasCollided(): boolean {
    return this.alreadyCollided;
  }

  beginEpisode() {
    this.alreadyCollided = false;
  }

  resolve(status: GameStatus): TickOutcome {
    let outcome: TickOutcome;
    if (this.color === ObstacleColor.Green) {
      const collision = status.collision && !this.alreadyCollided;
      outcome = {
        collision,
        exit: status.exit,
        terminal: status.exit,
        reason: status.exit ? TerminalReason.Exit : TerminalReason.None,
      };
    } else {
      outcome = standardOutcome(status);
    }
    this.alreadyCollided = this.alreadyCollided || outcome.collision;
    return outcome;
  }

  reward(outcome: TickOutcome, progress: number, state: EpisodeState): number {
    let reward = standardReward(this.rewards, outcome, progress);
    const onFloor = state.agent.position.y === state.floorHeight;
    if (onFloor && outcome.collision) {
      reward += this.rewards.collision;
    }
    return reward;
  }
}
