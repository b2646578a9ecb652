import { Rect } from "./geometry.js";
import { agentRect, obstaclePositions, obstacleRects } from "./collision.js";
import { EpisodeState, JumpTaskConfig, ObservationKind, ObservationSpec } from "./types.js";

const WHITE = 1.0;
const GREY = 0.5;

export interface ObservationEncoder {
  readonly kind: ObservationKind;
  readonly spec: ObservationSpec;
  encode(state: EpisodeState): Float32Array;
}

/**
 * Row-major pixel buffer addressed in screen coordinates (x to the right, y up).
 * With `flipRows` the first row holds the top of the screen instead of the floor.
 */
class Raster {
  readonly data: Float32Array;
  private readonly width: number;
  private readonly height: number;
  private readonly channels: number;
  private readonly flipRows: boolean;

  constructor(width: number, height: number, channels: number, flipRows: boolean) {
    this.width = width;
    this.height = height;
    this.channels = channels;
    this.flipRows = flipRows;
    this.data = new Float32Array(width * height * channels);
  }

  fillRect(rect: Rect, color: readonly number[]) {
    const x0 = Math.max(0, Math.floor(rect.x));
    const x1 = Math.min(this.width, Math.floor(rect.x + rect.width));
    const y0 = Math.max(0, Math.floor(rect.y));
    const y1 = Math.min(this.height, Math.floor(rect.y + rect.height));
    for (let y = y0; y < y1; y++) {
      for (let x = x0; x < x1; x++) {
        this.setPixel(x, y, color);
      }
    }
  }

  fillRow(y: number, color: readonly number[]) {
    this.fillRect({ x: 0, y, width: this.width, height: 1 }, color);
  }

  fillColumn(x: number, color: readonly number[]) {
    this.fillRect({ x, y: 0, width: 1, height: this.height }, color);
  }

  private setPixel(x: number, y: number, color: readonly number[]) {
    const row = this.flipRows ? this.height - 1 - y : y;
    const base = (row * this.width + x) * this.channels;
    for (let c = 0; c < this.channels; c++) {
      this.data[base + c] = color[c];
    }
  }
}

function drawScreen(
  raster: Raster,
  state: EpisodeState,
  config: JumpTaskConfig,
  white: readonly number[],
  obstacle: readonly number[],
) {
  raster.fillRect(agentRect(state), white);
  for (const rect of obstacleRects(state.layout, state.floorHeight, config)) {
    raster.fillRect(rect, obstacle);
  }
  // Outline of the screen, then the floor line.
  raster.fillRow(0, white);
  raster.fillRow(config.screenHeight - 1, white);
  raster.fillColumn(0, white);
  raster.fillColumn(config.screenWidth - 1, white);
  raster.fillRow(state.floorHeight, white);
}

export function createGreyscaleEncoder(config: JumpTaskConfig): ObservationEncoder {
  return {
    kind: "greyscale",
    spec: { shape: [config.screenHeight, config.screenWidth], low: [0], high: [1] },
    encode(state) {
      const raster = new Raster(config.screenWidth, config.screenHeight, 1, false);
      drawScreen(raster, state, config, [WHITE], [GREY]);
      return raster.data;
    },
  };
}

export function createColorsEncoder(config: JumpTaskConfig): ObservationEncoder {
  const white = [WHITE, WHITE, WHITE];
  const obstacle = [0, 1, 2].map((channel) => (channel === config.obstacleColor ? GREY : 0));
  return {
    kind: "colors",
    spec: { shape: [config.screenHeight, config.screenWidth, 3], low: [0], high: [1] },
    encode(state) {
      const raster = new Raster(config.screenWidth, config.screenHeight, 3, true);
      drawScreen(raster, state, config, white, obstacle);
      return raster.data;
    },
  };
}

/**
 * The obstacle the agent is measured against: the first one it has not fully
 * passed yet, or the last one once every obstacle is behind it.
 */
export function referenceObstacleX(state: EpisodeState, config: Pick<JumpTaskConfig, "obstacleWidth">): number {
  const positions = obstaclePositions(state.layout);
  const ahead = positions.find((x) => x + config.obstacleWidth > state.agent.position.x);
  return ahead ?? positions[positions.length - 1];
}

export function createCoordinatesEncoder(config: JumpTaskConfig): ObservationEncoder {
  const { layout, physics } = config;
  const furthestX = config.screenWidth - config.agentWidth + config.agentSpeed;
  const apex = physics.jumpHeight + physics.verticalSpeed * config.agentSpeed;
  return {
    kind: "coordinates",
    spec: {
      shape: [2],
      low: [1 - layout.maxObstacleX, 0],
      high: [furthestX - layout.minObstacleX, apex],
    },
    encode(state) {
      return new Float32Array([
        state.agent.position.x - referenceObstacleX(state, config),
        state.agent.position.y - state.floorHeight,
      ]);
    },
  };
}

export function createEncoder(config: JumpTaskConfig): ObservationEncoder {
  switch (config.observation) {
    case "greyscale":
      return createGreyscaleEncoder(config);
    case "colors":
      return createColorsEncoder(config);
    case "coordinates":
      return createCoordinatesEncoder(config);
  }
}
