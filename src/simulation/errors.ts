import { Action } from "./types.js";

export class OutOfRangeConfigurationError extends Error {
  readonly parameter: string;
  readonly value: number;
  readonly min: number;
  readonly max: number;

  constructor(parameter: string, value: number, min: number, max: number) {
    super(`The ${parameter} needs to be in the range [${min}, ${max}), got ${value}`);
    this.name = "OutOfRangeConfigurationError";
    this.parameter = parameter;
    this.value = value;
    this.min = min;
    this.max = max;
  }
}

export class IllegalActionError extends Error {
  readonly action: unknown;
  readonly legalActions: readonly Action[];

  constructor(action: unknown, legalActions: readonly Action[]) {
    super(`Unrecognized action ${String(action)}. It should be an int in [${legalActions.join(", ")}]`);
    this.name = "IllegalActionError";
    this.action = action;
    this.legalActions = legalActions;
  }
}
