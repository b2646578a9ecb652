import { describe, expect, it } from "vitest";
import { ObstacleColor, Scene, SceneRenderer } from "../simulation/types.js";
import { TerminalRenderer, drawStep, renderFrame } from "./Renderer.js";

const scene: Scene = {
  screen: { width: 10, height: 6 },
  floorHeight: 2,
  agent: { x: 1, y: 2, width: 2, height: 2 },
  obstacles: [{ x: 6, y: 2, width: 2, height: 1 }],
};

const expectedFrame = ["..........", "..........", ".##.......", ".##...oo..", "==========", ".........."].join("\n") + "\n";

describe("renderFrame", () => {
  it("draws the top of the screen first with the floor under the agent", () => {
    expect(renderFrame(scene)).toBe(expectedFrame);
  });

  it("marks coloured obstacles by their colour", () => {
    const frame = renderFrame({ ...scene, obstacleColor: ObstacleColor.Red });
    expect(frame.split("\n")[3]).toBe(".##...RR..");
    const green = renderFrame({ ...scene, obstacleColor: ObstacleColor.Green });
    expect(green.split("\n")[3]).toBe(".##...GG..");
  });

  it("clips shapes that leave the screen", () => {
    const frame = renderFrame({ ...scene, agent: { x: 9, y: 5, width: 3, height: 3 } });
    expect(frame.split("\n")[0]).toBe(".........#");
  });
});

describe("TerminalRenderer", () => {
  function sink() {
    const chunks: string[] = [];
    return { chunks, write: (chunk: string) => chunks.push(chunk) };
  }

  it("writes one frame per draw", () => {
    const out = sink();
    const renderer = new TerminalRenderer(out);
    renderer.draw(scene);
    renderer.draw(scene);
    expect(out.chunks).toEqual([expectedFrame, expectedFrame]);
  });

  it("clears the terminal before each frame when asked", () => {
    const out = sink();
    new TerminalRenderer(out, { clear: true }).draw(scene);
    expect(out.chunks).toEqual(["\x1b[2J\x1b[H" + expectedFrame]);
  });

  it("ignores draws after close", () => {
    const out = sink();
    const renderer = new TerminalRenderer(out);
    renderer.close();
    renderer.draw(scene);
    expect(out.chunks).toEqual([]);
  });
});

describe("drawStep", () => {
  function recorder() {
    const events: string[] = [];
    const renderer: SceneRenderer = {
      draw: (frame) => {
        events.push(`draw ${frame.agent.x},${frame.agent.y}`);
      },
      close: () => undefined,
    };
    const pace = async () => {
      events.push("pace");
    };
    return { events, renderer, pace };
  }

  const after: Scene = { ...scene, agent: { ...scene.agent, x: 2 } };

  it("pauses after the frame of an ordinary step", async () => {
    const { events, renderer, pace } = recorder();
    await drawStep(renderer, scene, after, [{ x: 2, y: 2 }], pace);
    expect(events).toEqual(["draw 2,2", "pace"]);
  });

  it("plays every tick of a collapsed jump before the final frame", async () => {
    const { events, renderer, pace } = recorder();
    const trajectory = [
      { x: 2, y: 3 },
      { x: 3, y: 4 },
      { x: 4, y: 3 },
    ];
    await drawStep(renderer, scene, { ...scene, agent: { ...scene.agent, x: 4, y: 3 } }, trajectory, pace);
    expect(events).toEqual(["draw 2,3", "pace", "draw 3,4", "pace", "draw 4,3", "pace"]);
  });
});
