import { Action, AgentState, JumpPhase, JumpPhysics } from "./types.js";

export interface MotionContext {
  floorHeight: number;
  agentSpeed: number;
  physics: JumpPhysics;
}

export function isAirborne(agent: AgentState): boolean {
  return agent.jumpPhase !== JumpPhase.Grounded;
}

export function groundedVelocity(ctx: Pick<MotionContext, "agentSpeed" | "physics">): number {
  return ctx.agentSpeed * ctx.physics.horizontalSpeed;
}

/**
 * Upper bound on the ticks a single jump can take: the rise to the apex, the fall
 * back to the floor and the tick that turns the agent around.
 */
export function maxJumpTicks(ctx: Pick<MotionContext, "agentSpeed" | "physics">): number {
  const vertical = ctx.agentSpeed * ctx.physics.verticalSpeed;
  return 2 * (Math.ceil((ctx.physics.jumpHeight + 1) / vertical) + 1) + 1;
}

/**
 * Advances an airborne agent by one tick of the jump trajectory. Horizontal motion
 * reuses the velocity captured on the ground, and x never drops below 0.
 */
export function continueJump(agent: AgentState, ctx: MotionContext): AgentState {
  const vertical = ctx.agentSpeed * ctx.physics.verticalSpeed;
  const x = Math.max(agent.position.x + agent.horizontalVelocity, 0);
  let y = agent.position.y;
  let phase = agent.jumpPhase;

  if (y > ctx.floorHeight + ctx.physics.jumpHeight) {
    phase = JumpPhase.Descending;
  }
  if (phase === JumpPhase.Ascending) {
    y += vertical;
  } else if (phase === JumpPhase.Descending) {
    y -= vertical;
    if (y <= ctx.floorHeight) {
      y = ctx.floorHeight;
      phase = JumpPhase.Grounded;
    }
  }

  return { ...agent, position: { x, y }, jumpPhase: phase };
}

/**
 * One tick of motion for the given action. While airborne the action is ignored
 * and the jump simply continues.
 */
export function applyAction(agent: AgentState, action: Action, ctx: MotionContext): AgentState {
  if (isAirborne(agent)) {
    return continueJump(agent, ctx);
  }
  const walk = groundedVelocity(ctx);
  switch (action) {
    case Action.MoveRight:
      return {
        ...agent,
        position: { x: agent.position.x + ctx.agentSpeed, y: agent.position.y },
        horizontalVelocity: walk,
      };
    case Action.Jump:
      return continueJump({ ...agent, jumpPhase: JumpPhase.Ascending }, ctx);
    case Action.MoveLeft:
      if (agent.position.x > 0) {
        return {
          ...agent,
          position: { x: agent.position.x - ctx.agentSpeed, y: agent.position.y },
          horizontalVelocity: -walk,
        };
      }
      return { ...agent, horizontalVelocity: 0 };
    default:
      return agent;
  }
}
