import * as tf from "@tensorflow/tfjs";
import { ConfigOverrides, createConfig } from "../simulation/config.js";
import { Environment } from "../simulation/Environment.js";
import { EpisodeState, ResetOptions, Scene, SceneRenderer, StepResult } from "../simulation/types.js";
import { BoxSpace, DiscreteSpace, box, discrete } from "./spaces.js";

export interface JumpTaskEnvOptions extends ConfigOverrides {
  renderer?: SceneRenderer;
}

export type EnvStepResult = StepResult<tf.Tensor>;

/**
 * Gym-style front of the jumping task. Observations are float32 tensors owned by
 * the caller, who is responsible for disposing them.
 */
export class JumpTaskEnv {
  readonly observationSpace: BoxSpace;
  readonly actionSpace: DiscreteSpace;
  private readonly engine: Environment;
  private readonly renderer?: SceneRenderer;

  constructor(options: JumpTaskEnvOptions = {}) {
    const { renderer, ...overrides } = options;
    this.engine = new Environment(createConfig(overrides));
    this.renderer = renderer;
    this.observationSpace = box(this.engine.observationSpec);
    this.actionSpace = discrete(this.engine.legalActions.length);
    this.render();
  }

  get done(): boolean {
    return this.engine.done;
  }

  get state(): EpisodeState {
    return this.engine.getState();
  }

  get config() {
    return this.engine.config;
  }

  /** Without options the obstacle and floor are sampled; otherwise they are set explicitly. */
  reset(options?: ResetOptions): tf.Tensor {
    const observation = options ? this.engine.reset(options) : this.engine.resetRandom();
    this.render();
    return this.toTensor(observation);
  }

  step(action: number): EnvStepResult {
    const result = this.engine.step(action);
    this.render();
    return { ...result, observation: this.toTensor(result.observation) };
  }

  seed(value?: number): number[] {
    return this.engine.seed(value);
  }

  scene(): Scene {
    return this.engine.getScene();
  }

  render() {
    this.renderer?.draw(this.scene());
  }

  close() {
    this.engine.close();
    this.renderer?.close();
  }

  private toTensor(observation: Float32Array): tf.Tensor {
    return tf.tensor(observation, [...this.observationSpace.shape], "float32");
  }
}
