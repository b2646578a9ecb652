import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { Action, JumpPhase, TerminalReason } from "../simulation/types.js";
import { ReplayLoader } from "../viewer/ReplayLoader.js";
import { createRng } from "../utils/random.js";
import { heuristicPolicy, randomPolicy } from "./policies.js";
import { RolloutRunner, summarize } from "./RolloutRunner.js";
import { RolloutConfig } from "./types.js";

function rolloutConfig(overrides: Partial<RolloutConfig> = {}): RolloutConfig {
  return {
    envId: "jumping-coordinates-task-v0",
    episodes: 6,
    policy: "heuristic",
    jumpDistance: 9,
    seed: 42,
    snapshotInterval: 3,
    output: "",
    env: {},
    ...overrides,
  };
}

describe("policies", () => {
  const base = {
    agent: { position: { x: 15, y: 10 }, width: 5, height: 10, jumpPhase: JumpPhase.Grounded, horizontalVelocity: 1 },
    layout: { kind: "single" as const, position: 30 },
    floorHeight: 10,
    stepCount: 15,
    terminal: false,
    terminalReason: TerminalReason.None,
  };

  it("jumps once the obstacle is close enough", () => {
    const policy = heuristicPolicy(9);
    const rng = createRng(1);
    expect(policy({ state: base, legalActions: 2, rng })).toBe(Action.MoveRight);
    const close = { ...base, agent: { ...base.agent, position: { x: 16, y: 10 } } };
    expect(policy({ state: close, legalActions: 2, rng })).toBe(Action.Jump);
    const passed = { ...base, agent: { ...base.agent, position: { x: 40, y: 10 } } };
    expect(policy({ state: passed, legalActions: 2, rng })).toBe(Action.MoveRight);
  });

  it("only picks legal actions at random", () => {
    const policy = randomPolicy();
    const rng = createRng(9);
    const picks = new Set(Array.from({ length: 200 }, () => policy({ state: base, legalActions: 2, rng })));
    expect(picks).toEqual(new Set([Action.MoveRight, Action.Jump]));
  });
});

describe("RolloutRunner", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it("clears every layout with the heuristic policy", () => {
    const dataset = new RolloutRunner(rolloutConfig()).run();
    expect(dataset.summary).toEqual({
      episodes: 6,
      meanReward: 156,
      successRate: 1,
      collisionRate: 0,
      stepLimitRate: 0,
    });
    expect(dataset.episodes.map((sample) => sample.episode)).toEqual([0, 3]);

    const [sample] = dataset.episodes;
    expect(sample.metrics).toEqual({ totalReward: 156, steps: 56, collisions: 0, outcome: TerminalReason.Exit });
    expect(sample.frames).toHaveLength(56);
    expect(sample.frames[55]).toMatchObject({ step: 56, reward: 101, exit: true, collision: false });
    expect(sample.agentSize).toEqual({ width: 5, height: 10 });
  });

  it("is reproducible for a seed", () => {
    const config = rolloutConfig({ policy: "random", episodes: 5, snapshotInterval: 1 });
    const first = new RolloutRunner(config).run();
    const second = new RolloutRunner(config).run();
    expect(second).toEqual(first);
  });

  it("accounts for every episode with a random policy", () => {
    const { summary } = new RolloutRunner(rolloutConfig({ policy: "random", episodes: 20, snapshotInterval: 0 })).run();
    expect(summary.episodes).toBe(20);
    expect(summary.successRate + summary.collisionRate + summary.stepLimitRate).toBeCloseTo(1);
  });

  it("stops episodes at the step ceiling", () => {
    const { summary } = new RolloutRunner(rolloutConfig({ episodes: 2, env: { maxSteps: 10 } })).run();
    expect(summary.stepLimitRate).toBe(1);
    expect(summary.meanReward).toBe(11);
  });

  it("writes a replay the viewer can load", async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "jumping-rollout-"));
    const runner = new RolloutRunner(rolloutConfig({ episodes: 2, output: path.join(tempDir, "nested", "replay.json") }));
    const dataset = runner.run();
    const written = runner.saveReplay(dataset);
    expect(written).toBe(path.join(tempDir, "nested", "replay.json"));

    const loaded = await new ReplayLoader().loadFromFile(written);
    expect(loaded).toEqual(dataset);
  });

  it("rejects files that are not replays", async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "jumping-rollout-"));
    const file = path.join(tempDir, "other.json");
    fs.writeFileSync(file, JSON.stringify({ hello: "world" }), "utf-8");
    await expect(new ReplayLoader().loadFromFile(file)).rejects.toThrow(`${file} is not a rollout replay`);
  });
});

describe("summarize", () => {
  it("returns zeros without episodes", () => {
    expect(summarize([])).toEqual({ episodes: 0, meanReward: 0, successRate: 0, collisionRate: 0, stepLimitRate: 0 });
  });

  it("averages the rewards and counts the outcomes", () => {
    const summary = summarize([
      { totalReward: 156, steps: 56, collisions: 0, outcome: TerminalReason.Exit },
      { totalReward: 25, steps: 26, collisions: 1, outcome: TerminalReason.Collision },
    ]);
    expect(summary).toEqual({ episodes: 2, meanReward: 90.5, successRate: 0.5, collisionRate: 0.5, stepLimitRate: 0 });
  });
});
