import { Rect, Vec2 } from "./geometry.js";
import { agentRect, detectStatus, obstacleRects } from "./collision.js";
import { createConfig } from "./config.js";
import { IllegalActionError, OutOfRangeConfigurationError } from "./errors.js";
import { MotionContext, applyAction, continueJump, groundedVelocity, isAirborne, maxJumpTicks } from "./kinematics.js";
import { TickOutcome } from "./rewards.js";
import {
  Action,
  EpisodeState,
  JumpPhase,
  JumpTaskConfig,
  ObservationSpec,
  ObstacleLayout,
  ResetOptions,
  Scene,
  StepResult,
  TerminalReason,
} from "./types.js";
import { TaskVariant, createVariant } from "./variants.js";
import { Rng, choice, createRng, randomSeed } from "../utils/random.js";
import { logger } from "../utils/logger.js";

function cloneState(state: EpisodeState): EpisodeState {
  return {
    ...state,
    agent: { ...state.agent, position: { ...state.agent.position } },
    layout: state.layout.kind === "pair" ? { kind: "pair", positions: [...state.layout.positions] } : { ...state.layout },
  };
}

/**
 * Episode state machine of the jumping task. Owns the agent, the obstacle layout and
 * the episode counters; observation and reward are delegated to the task variant.
 */
export class Environment {
  readonly config: Readonly<JumpTaskConfig>;
  readonly legalActions: readonly Action[];
  private readonly variant: TaskVariant;
  private readonly motion: MotionContext;
  private rng: Rng;
  private state: EpisodeState;

  constructor(config: Readonly<JumpTaskConfig> = createConfig(), variant: TaskVariant = createVariant(config)) {
    this.config = config;
    this.variant = variant;
    this.legalActions = config.withLeftAction
      ? [Action.MoveRight, Action.Jump, Action.MoveLeft]
      : [Action.MoveRight, Action.Jump];
    this.motion = { floorHeight: config.floorHeight, agentSpeed: config.agentSpeed, physics: config.physics };
    this.rng = createRng(config.seed);
    this.state = this.initialState(config.obstaclePosition, config.floorHeight, config.twoObstacles);
    this.resetRandom();
  }

  get observationSpec(): ObservationSpec {
    return this.variant.encoder.spec;
  }

  get done(): boolean {
    return this.state.terminal;
  }

  /** Reseeds the obstacle sampler; without a value a fresh seed is drawn. */
  seed(value?: number): number[] {
    const resolved = value ?? randomSeed();
    this.rng = createRng(resolved);
    return [resolved];
  }

  /** Training reset: the obstacle and floor are drawn from the allowed positions. */
  resetRandom(): Float32Array {
    const { layout } = this.config;
    const obstaclePosition = choice(this.rng, layout.allowedObstacleX);
    const floorHeight = choice(this.rng, layout.allowedFloorHeights);
    return this.reset({ obstaclePosition, floorHeight, twoObstacles: this.config.twoObstacles });
  }

  reset(options: ResetOptions = {}): Float32Array {
    const obstaclePosition = options.obstaclePosition ?? this.config.obstaclePosition;
    const floorHeight = options.floorHeight ?? this.config.floorHeight;
    const twoObstacles = options.twoObstacles ?? false;

    if (!twoObstacles) {
      const { layout } = this.config;
      if (!(obstaclePosition >= layout.minObstacleX && obstaclePosition < layout.maxObstacleX)) {
        throw new OutOfRangeConfigurationError(
          "obstacle x position",
          obstaclePosition,
          layout.minObstacleX,
          layout.maxObstacleX,
        );
      }
      if (!(floorHeight >= layout.minFloorHeight && floorHeight < layout.maxFloorHeight)) {
        throw new OutOfRangeConfigurationError("floor height", floorHeight, layout.minFloorHeight, layout.maxFloorHeight);
      }
    }

    this.state = this.initialState(obstaclePosition, floorHeight, twoObstacles);
    this.motion.floorHeight = floorHeight;
    this.variant.rewardRule.beginEpisode();
    return this.observe();
  }

  step(action: number): StepResult<Float32Array> {
    const legal = this.legalActions.find((a) => a === action);
    if (legal === undefined) {
      throw new IllegalActionError(action, this.legalActions);
    }

    if (this.state.terminal) {
      return this.idle();
    }
    if (this.state.stepCount > this.config.maxSteps) {
      logger.info("Reached the maximum number of steps", { maxSteps: this.config.maxSteps });
      this.state.terminal = true;
      this.state.terminalReason = TerminalReason.StepLimit;
      return this.idle();
    }

    const startX = this.state.agent.position.x;
    const trajectory: Vec2[] = [];

    this.state.agent = applyAction(this.state.agent, legal, this.motion);
    trajectory.push({ ...this.state.agent.position });
    let outcome = this.evaluate();

    if (this.config.finishJump) {
      const limit = maxJumpTicks(this.motion);
      for (let tick = 0; tick < limit && isAirborne(this.state.agent); tick++) {
        if (outcome.collision || outcome.exit) break;
        this.state.agent = continueJump(this.state.agent, this.motion);
        trajectory.push({ ...this.state.agent.position });
        outcome = this.evaluate();
      }
    }

    if (outcome.terminal) {
      this.state.terminal = true;
      this.state.terminalReason = outcome.reason;
    }
    const progress = this.state.agent.position.x - startX;
    const reward = this.variant.rewardRule.reward(outcome, progress, this.state);
    this.state.stepCount += 1;

    return {
      observation: this.observe(),
      reward,
      done: this.state.terminal,
      info: { collision: outcome.collision, exit: outcome.exit, stepCount: this.state.stepCount, trajectory },
    };
  }

  close() {
    if (this.state.terminal) return;
    this.state.terminal = true;
    this.state.terminalReason = TerminalReason.Closed;
  }

  getState(): EpisodeState {
    return cloneState(this.state);
  }

  obstacleRects(): Rect[] {
    return obstacleRects(this.state.layout, this.state.floorHeight, this.config);
  }

  getScene(): Scene {
    return {
      screen: { width: this.config.screenWidth, height: this.config.screenHeight },
      floorHeight: this.state.floorHeight,
      agent: agentRect(this.state),
      obstacles: this.obstacleRects(),
      obstacleColor: this.variant.kind === "colors" ? this.config.obstacleColor : undefined,
    };
  }

  observe(): Float32Array {
    return this.variant.encoder.encode(this.state);
  }

  private evaluate(): TickOutcome {
    const status = detectStatus(agentRect(this.state), this.obstacleRects(), this.config.screenWidth);
    return this.variant.rewardRule.resolve(status);
  }

  private idle(): StepResult<Float32Array> {
    return {
      observation: this.observe(),
      reward: 0,
      done: true,
      info: { collision: false, exit: false, stepCount: this.state.stepCount, trajectory: [] },
    };
  }

  private initialState(obstaclePosition: number, floorHeight: number, twoObstacles: boolean): EpisodeState {
    const layout: ObstacleLayout = twoObstacles
      ? { kind: "pair", positions: this.config.layout.pairedObstacleX }
      : { kind: "single", position: obstaclePosition };
    return {
      agent: {
        position: { x: this.config.agentInitX, y: floorHeight },
        width: this.config.agentWidth,
        height: this.config.agentHeight,
        jumpPhase: JumpPhase.Grounded,
        horizontalVelocity: groundedVelocity(this.config),
      },
      layout,
      floorHeight,
      stepCount: 0,
      terminal: false,
      terminalReason: TerminalReason.None,
    };
  }
}
