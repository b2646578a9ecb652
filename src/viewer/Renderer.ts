import { Rect, Vec2 } from "../simulation/geometry.js";
import { ObstacleColor, Scene, SceneRenderer } from "../simulation/types.js";

export interface TextSink {
  write(chunk: string): unknown;
}

const EMPTY = ".";
const FLOOR = "=";
const AGENT = "#";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

function obstacleGlyph(color: ObstacleColor | undefined): string {
  if (color === ObstacleColor.Red) return "R";
  if (color === ObstacleColor.Green) return "G";
  return "o";
}

function paint(grid: string[][], rect: Rect, glyph: string) {
  const height = grid.length;
  const width = height > 0 ? grid[0].length : 0;
  const x0 = Math.max(0, Math.floor(rect.x));
  const x1 = Math.min(width, Math.floor(rect.x + rect.width));
  const y0 = Math.max(0, Math.floor(rect.y));
  const y1 = Math.min(height, Math.floor(rect.y + rect.height));
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      grid[y][x] = glyph;
    }
  }
}

/**
 * Text frame of the scene, top of the screen first. The floor line sits just
 * below the agent's feet.
 */
export function renderFrame(scene: Scene): string {
  const { width, height } = scene.screen;
  const grid = Array.from({ length: height }, () => Array.from({ length: width }, () => EMPTY));
  paint(grid, { x: 0, y: scene.floorHeight - 1, width, height: 1 }, FLOOR);
  const glyph = obstacleGlyph(scene.obstacleColor);
  for (const obstacle of scene.obstacles) {
    paint(grid, obstacle, glyph);
  }
  paint(grid, scene.agent, AGENT);
  return (
    grid
      .reverse()
      .map((row) => row.join(""))
      .join("\n") + "\n"
  );
}

export interface TerminalRendererOptions {
  clear?: boolean;
}

export class TerminalRenderer implements SceneRenderer {
  private readonly sink: TextSink;
  private readonly clear: boolean;
  private closed = false;

  constructor(sink: TextSink = process.stdout, options: TerminalRendererOptions = {}) {
    this.sink = sink;
    this.clear = options.clear ?? false;
  }

  draw(scene: Scene) {
    if (this.closed) return;
    this.sink.write((this.clear ? CLEAR_SCREEN : "") + renderFrame(scene));
  }

  close() {
    this.closed = true;
  }
}

export function withAgentAt(scene: Scene, x: number, y: number): Scene {
  return { ...scene, agent: { ...scene.agent, x, y } };
}

/**
 * Animates one step: every intermediate tick of a collapsed jump is drawn over the
 * scene before the step, then the final scene. `pace` runs after each frame.
 */
export async function drawStep(
  renderer: SceneRenderer,
  before: Scene,
  after: Scene,
  trajectory: readonly Vec2[],
  pace: () => Promise<void>,
): Promise<void> {
  for (const point of trajectory.slice(0, -1)) {
    renderer.draw(withAgentAt(before, point.x, point.y));
    await pace();
  }
  renderer.draw(after);
  await pace();
}
