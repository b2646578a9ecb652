import { isAirborne } from "../simulation/kinematics.js";
import { obstaclePositions } from "../simulation/collision.js";
import { Action, EpisodeState } from "../simulation/types.js";
import { Rng } from "../utils/random.js";
import { PolicyName } from "./types.js";

export interface PolicyContext {
  state: EpisodeState;
  legalActions: number;
  rng: Rng;
}

export type Policy = (ctx: PolicyContext) => Action;

export function randomPolicy(): Policy {
  return ({ rng, legalActions }) => {
    const idx = Math.min(legalActions - 1, Math.floor(rng() * legalActions));
    return idx === Action.Jump ? Action.Jump : idx === Action.MoveLeft ? Action.MoveLeft : Action.MoveRight;
  };
}

/**
 * Walks right and jumps once the gap between the agent's front and the next
 * obstacle shrinks to `jumpDistance`.
 */
export function heuristicPolicy(jumpDistance: number): Policy {
  return ({ state }) => {
    const { agent } = state;
    if (isAirborne(agent)) return Action.MoveRight;
    const front = agent.position.x + agent.width;
    const gaps = obstaclePositions(state.layout)
      .map((x) => x - front)
      .filter((gap) => gap >= 0);
    if (gaps.length > 0 && Math.min(...gaps) <= jumpDistance) {
      return Action.Jump;
    }
    return Action.MoveRight;
  };
}

export function createPolicy(name: PolicyName, jumpDistance: number): Policy {
  return name === "heuristic" ? heuristicPolicy(jumpDistance) : randomPolicy();
}
