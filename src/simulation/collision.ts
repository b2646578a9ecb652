import { Rect, overlapsAny, rectAt } from "./geometry.js";
import { EpisodeState, GameStatus, JumpTaskConfig, ObstacleLayout } from "./types.js";

export function obstaclePositions(layout: ObstacleLayout): number[] {
  return layout.kind === "pair" ? [...layout.positions] : [layout.position];
}

/** Obstacles rest on the floor. */
export function obstacleRects(
  layout: ObstacleLayout,
  floorHeight: number,
  config: Pick<JumpTaskConfig, "obstacleWidth" | "obstacleHeight">,
): Rect[] {
  return obstaclePositions(layout).map((x) => ({
    x,
    y: floorHeight,
    width: config.obstacleWidth,
    height: config.obstacleHeight,
  }));
}

export function agentRect(state: EpisodeState): Rect {
  return rectAt(state.agent.position, state.agent.width, state.agent.height);
}

/**
 * Collision and exit are observed independently; deciding what they mean for the
 * episode is left to the reward rule.
 */
export function detectStatus(agent: Rect, obstacles: readonly Rect[], screenWidth: number): GameStatus {
  return {
    collision: overlapsAny(agent, obstacles),
    exit: screenWidth < agent.x + agent.width,
  };
}
