import * as tf from "@tensorflow/tfjs";
import { ObservationSpec } from "../simulation/types.js";
import { Rng } from "../utils/random.js";

export interface DiscreteSpace {
  readonly type: "discrete";
  readonly n: number;
  sample(rng: Rng): number;
  contains(value: unknown): boolean;
}

export interface BoxSpace {
  readonly type: "box";
  readonly dtype: "float32";
  readonly shape: readonly number[];
  readonly low: readonly number[];
  readonly high: readonly number[];
  contains(value: tf.Tensor | Float32Array): boolean;
}

export type Space = DiscreteSpace | BoxSpace;

export function discrete(n: number): DiscreteSpace {
  return {
    type: "discrete",
    n,
    sample: (rng) => Math.min(n - 1, Math.floor(rng() * n)),
    contains: (value) => typeof value === "number" && Number.isInteger(value) && value >= 0 && value < n,
  };
}

function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i]);
}

/** Bounds hold either one value per element or a single value for every element. */
function boundAt(bounds: readonly number[], index: number): number {
  return bounds.length === 1 ? bounds[0] : bounds[index];
}

export function box(spec: ObservationSpec): BoxSpace {
  const size = spec.shape.reduce((a, b) => a * b, 1);
  const withinBounds = (values: ArrayLike<number>) => {
    if (values.length !== size) return false;
    for (let i = 0; i < values.length; i++) {
      if (values[i] < boundAt(spec.low, i) || values[i] > boundAt(spec.high, i)) return false;
    }
    return true;
  };
  return {
    type: "box",
    dtype: "float32",
    shape: spec.shape,
    low: spec.low,
    high: spec.high,
    contains(value) {
      if (value instanceof Float32Array) return withinBounds(value);
      if (value.dtype !== "float32" || !sameShape(value.shape, spec.shape)) return false;
      return withinBounds(value.dataSync());
    },
  };
}
