import { Rect, Vec2 } from "./geometry.js";

export enum Action {
  MoveRight = 0,
  Jump = 1,
  MoveLeft = 2,
}

export enum JumpPhase {
  Grounded = "GROUNDED",
  Ascending = "ASCENDING",
  Descending = "DESCENDING",
}

/** Values double as the RGB channel the obstacle is drawn on. */
export enum ObstacleColor {
  Red = 0,
  Green = 1,
}

/** Why an episode ended; `Closed` marks an episode stopped by `close()` before any other outcome. */
export enum TerminalReason {
  None = "none",
  Collision = "collision",
  Exit = "exit",
  StepLimit = "step_limit",
  Closed = "closed",
}

export type ObservationKind = "greyscale" | "colors" | "coordinates";

export interface JumpPhysics {
  jumpHeight: number;
  verticalSpeed: number; // multiplied by the agent speed
  horizontalSpeed: number; // multiplied by the agent speed
}

export interface LayoutRules {
  allowedObstacleX: readonly number[];
  allowedFloorHeights: readonly number[];
  pairedObstacleX: readonly [number, number];
  minObstacleX: number; // inclusive
  maxObstacleX: number; // exclusive
  minFloorHeight: number; // inclusive
  maxFloorHeight: number; // exclusive
}

export interface RewardTable {
  life: number;
  exit: number;
}

export interface JumpTaskConfig {
  screenWidth: number;
  screenHeight: number;
  floorHeight: number;
  agentWidth: number;
  agentHeight: number;
  agentInitX: number;
  agentSpeed: number;
  obstaclePosition: number;
  obstacleWidth: number;
  obstacleHeight: number;
  maxSteps: number;
  withLeftAction: boolean;
  twoObstacles: boolean;
  finishJump: boolean;
  observation: ObservationKind;
  obstacleColor: ObstacleColor;
  seed: number;
  physics: JumpPhysics;
  layout: LayoutRules;
  rewards: RewardTable;
}

export interface AgentState {
  position: Vec2;
  width: number;
  height: number;
  jumpPhase: JumpPhase;
  horizontalVelocity: number;
}

export type ObstacleLayout =
  | { kind: "single"; position: number }
  | { kind: "pair"; positions: readonly [number, number] };

export interface EpisodeState {
  agent: AgentState;
  layout: ObstacleLayout;
  floorHeight: number;
  stepCount: number;
  terminal: boolean;
  terminalReason: TerminalReason;
}

export interface ResetOptions {
  obstaclePosition?: number;
  floorHeight?: number;
  twoObstacles?: boolean;
}

export interface GameStatus {
  collision: boolean;
  exit: boolean;
}

export interface StepInfo {
  collision: boolean;
  exit: boolean;
  stepCount: number;
  trajectory: Vec2[]; // agent position after every tick of the step
}

export interface StepResult<O> {
  observation: O;
  reward: number;
  done: boolean;
  info: StepInfo;
}

export interface ObservationSpec {
  shape: readonly number[];
  low: readonly number[]; // one bound per element, or a single broadcast bound
  high: readonly number[];
}

export interface Scene {
  screen: { width: number; height: number };
  floorHeight: number;
  agent: Rect;
  obstacles: Rect[];
  obstacleColor?: ObstacleColor;
}

export interface SceneRenderer {
  draw(scene: Scene): void;
  close(): void;
}
