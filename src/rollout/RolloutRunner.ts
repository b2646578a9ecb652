import * as fs from "fs";
import * as path from "path";
import { makeEnv } from "../env/registry.js";
import { TerminalReason } from "../simulation/types.js";
import { logger } from "../utils/logger.js";
import { createRng } from "../utils/random.js";
import { createPolicy } from "./policies.js";
import { EpisodeMetrics, ReplayDataset, ReplayFrame, RolloutConfig, RolloutSummary } from "./types.js";

/** Runs a scripted policy against one registered environment and records a replay. */
export class RolloutRunner {
  private readonly config: RolloutConfig;

  constructor(config: RolloutConfig) {
    this.config = config;
  }

  run(): ReplayDataset {
    const env = makeEnv(this.config.envId, { ...this.config.env, seed: this.config.seed });
    const policy = createPolicy(this.config.policy, this.config.jumpDistance);
    // Separate stream so the policy never perturbs the obstacle sampling.
    const rng = createRng(this.config.seed + 1);
    const { output: _output, ...datasetConfig } = this.config;

    const dataset: ReplayDataset = {
      seed: this.config.seed,
      config: datasetConfig,
      snapshotInterval: this.config.snapshotInterval,
      episodes: [],
      summary: { episodes: 0, meanReward: 0, successRate: 0, collisionRate: 0, stepLimitRate: 0 },
    };
    const outcomes: EpisodeMetrics[] = [];

    for (let episode = 0; episode < this.config.episodes; episode++) {
      env.reset().dispose();
      const captureSample = this.config.snapshotInterval > 0 && episode % this.config.snapshotInterval === 0;
      const frames: ReplayFrame[] = [];
      let totalReward = 0;
      let collisions = 0;

      while (!env.done) {
        const state = env.state;
        const action = policy({ state, legalActions: env.actionSpace.n, rng });
        const result = env.step(action);
        result.observation.dispose();
        totalReward += result.reward;
        if (result.info.collision) collisions += 1;

        if (captureSample) {
          const next = env.state;
          frames.push({
            step: result.info.stepCount,
            action,
            reward: result.reward,
            agent: { ...next.agent.position },
            jumpPhase: next.agent.jumpPhase,
            trajectory: result.info.trajectory,
            collision: result.info.collision,
            exit: result.info.exit,
          });
        }
      }

      const finalState = env.state;
      const metrics: EpisodeMetrics = {
        totalReward,
        steps: finalState.stepCount,
        collisions,
        outcome: finalState.terminalReason,
      };
      outcomes.push(metrics);

      if (captureSample) {
        const scene = env.scene();
        dataset.episodes.push({
          episode,
          screen: scene.screen,
          floorHeight: scene.floorHeight,
          agentSize: { width: scene.agent.width, height: scene.agent.height },
          obstacles: scene.obstacles,
          obstacleColor: scene.obstacleColor,
          metrics,
          frames,
        });
      }

      logger.info(
        `[episode ${episode + 1}/${this.config.episodes}] reward=${totalReward.toFixed(1)} steps=${metrics.steps} outcome=${metrics.outcome}`,
      );
    }

    env.close();
    dataset.summary = summarize(outcomes);
    return dataset;
  }

  saveReplay(dataset: ReplayDataset) {
    const outputPath = this.config.output || `dist/replays/rollout-${Date.now()}.json`;
    const resolved = path.isAbsolute(outputPath) ? outputPath : path.resolve(process.cwd(), outputPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, JSON.stringify(dataset, null, 2), "utf-8");
    return resolved;
  }
}

export function summarize(outcomes: EpisodeMetrics[]): RolloutSummary {
  const episodes = outcomes.length;
  const rate = (reason: TerminalReason) =>
    episodes === 0 ? 0 : outcomes.filter((o) => o.outcome === reason).length / episodes;
  return {
    episodes,
    meanReward: episodes === 0 ? 0 : outcomes.reduce((acc, o) => acc + o.totalReward, 0) / episodes,
    successRate: rate(TerminalReason.Exit),
    collisionRate: rate(TerminalReason.Collision),
    stepLimitRate: rate(TerminalReason.StepLimit),
  };
}
