#!/usr/bin/env node
import { ENV_IDS } from "../env/registry.js";
import { configOverridesFromArgs, numberArg, parseArgs, stringArg } from "../utils/args.js";
import { logger } from "../utils/logger.js";
import { RolloutRunner } from "./RolloutRunner.js";
import { PolicyName, RolloutConfig } from "./types.js";

function parsePolicy(value: string | undefined): PolicyName {
  if (value === undefined || value === "heuristic") return "heuristic";
  if (value === "random") return "random";
  throw new Error(`--policy expects "heuristic" or "random", got "${value}"`);
}

function main() {
  const cli = parseArgs();
  const { seed, ...env } = configOverridesFromArgs(cli);
  const config: RolloutConfig = {
    envId: stringArg(cli, "env") ?? ENV_IDS[0],
    episodes: numberArg(cli, "episodes") ?? 60,
    policy: parsePolicy(stringArg(cli, "policy")),
    jumpDistance: numberArg(cli, "jumpDistance") ?? 9,
    seed: seed ?? 42,
    snapshotInterval: numberArg(cli, "snapshotInterval") ?? 10,
    output: stringArg(cli, "output") ?? "dist/replays/rollout.json",
    env,
  };

  logger.info("Starting rollouts", { envId: config.envId, episodes: config.episodes, policy: config.policy });
  const runner = new RolloutRunner(config);
  const replay = runner.run();
  const outputPath = runner.saveReplay(replay);
  logger.info(`Rollouts complete. Replay saved to ${outputPath}`, { ...replay.summary });
}

try {
  main();
} catch (err) {
  logger.error("Rollouts failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
}
