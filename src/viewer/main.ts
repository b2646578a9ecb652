#!/usr/bin/env node
import { setTimeout as delay } from "timers/promises";
import { JumpTaskEnv } from "../env/JumpTaskEnv.js";
import { EpisodeSample } from "../rollout/types.js";
import { Scene } from "../simulation/types.js";
import { configOverridesFromArgs, flagArg, parseArgs, stringArg } from "../utils/args.js";
import { logger } from "../utils/logger.js";
import { Command, Controls } from "./Controls.js";
import { TerminalRenderer, drawStep, withAgentAt } from "./Renderer.js";
import { ReplayLoader } from "./ReplayLoader.js";

const FRAME_DELAY_MS = 100;

const cli = parseArgs();
const slowMotion = flagArg(cli, "slowMotion") ?? true;
const renderer = new TerminalRenderer(process.stdout, { clear: true });

async function pace() {
  if (slowMotion) await delay(FRAME_DELAY_MS);
}

async function play(): Promise<void> {
  const env = new JumpTaskEnv(configOverridesFromArgs(cli));
  const { obstaclePosition, floorHeight, twoObstacles, withLeftAction } = env.config;
  env.reset({ obstaclePosition, floorHeight, twoObstacles }).dispose();
  renderer.draw(env.scene());

  let score = 0;
  let busy = false;

  await new Promise<void>((resolve, reject) => {
    const finish = () => {
      controls.detach();
      env.close();
      renderer.close();
      console.log("---------------");
      console.log(`Final score: ${score}`);
      console.log("---------------");
      resolve();
    };

    const handle = async (command: Command) => {
      if (command.type === "exit") {
        finish();
        return;
      }
      if (command.type === "unknown") {
        console.log("Unrecognized key. Use the arrows to move the agent or 'e' to exit.");
        return;
      }
      const before = env.scene();
      const result = env.step(command.action);
      result.observation.dispose();
      await drawStep(renderer, before, env.scene(), result.info.trajectory, pace);
      score += result.reward;
      console.log(`Agent position: ${env.state.agent.position.x} | Reward: ${result.reward} | Terminal: ${result.done}`);
      if (result.done) finish();
    };

    const controls = new Controls(process.stdin, withLeftAction, (command) => {
      if (busy) return;
      busy = true;
      handle(command).then(
        () => {
          busy = false;
        },
        (err: unknown) => {
          controls.detach();
          reject(err);
        },
      );
    });
    controls.attach();
  });
}

async function replay(filePath: string): Promise<void> {
  const dataset = await new ReplayLoader().loadFromFile(filePath);
  for (const sample of dataset.episodes) {
    await replayEpisode(sample);
  }
  renderer.close();
  console.log(`Replayed ${dataset.episodes.length} episodes (mean reward ${dataset.summary.meanReward.toFixed(2)})`);
}

async function replayEpisode(sample: EpisodeSample) {
  const scene: Scene = {
    screen: sample.screen,
    floorHeight: sample.floorHeight,
    agent: { x: 0, y: sample.floorHeight, ...sample.agentSize },
    obstacles: sample.obstacles,
    obstacleColor: sample.obstacleColor,
  };
  for (const frame of sample.frames) {
    for (const point of frame.trajectory) {
      renderer.draw(withAgentAt(scene, point.x, point.y));
      await pace();
    }
  }
  console.log(`Episode ${sample.episode}: reward ${sample.metrics.totalReward} (${sample.metrics.outcome})`);
}

const replayPath = stringArg(cli, "replay");
const run = replayPath ? replay(replayPath) : play();

run.then(
  () => process.exit(0),
  (err: unknown) => {
    logger.error("Demo failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  },
);
