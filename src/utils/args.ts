import { ConfigOverrides } from "../simulation/config.js";
import { ObstacleColor } from "../simulation/types.js";

export type CliArgs = Record<string, string>;

/** Parses `--key value` pairs; a key without a value is recorded as "true". */
export function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const result: CliArgs = {};
  for (let i = 0; i < argv.length; i++) {
    if (argv[i].startsWith("--")) {
      const key = argv[i].slice(2);
      const value = argv[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

export function numberArg(cli: CliArgs, key: string): number | undefined {
  const raw = cli[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${key} expects a number, got "${raw}"`);
  }
  return value;
}

export function flagArg(cli: CliArgs, key: string): boolean | undefined {
  const raw = cli[key];
  if (raw === undefined) return undefined;
  return raw !== "false";
}

export function stringArg(cli: CliArgs, key: string): string | undefined {
  return cli[key];
}

/** Environment options shared by the command-line tools, all named after their config field. */
export function configOverridesFromArgs(cli: CliArgs): ConfigOverrides {
  const color = stringArg(cli, "obstacleColor")?.toLowerCase();
  if (color !== undefined && color !== "red" && color !== "green") {
    throw new Error(`--obstacleColor expects "red" or "green", got "${color}"`);
  }
  return {
    screenWidth: numberArg(cli, "screenWidth"),
    screenHeight: numberArg(cli, "screenHeight"),
    floorHeight: numberArg(cli, "floorHeight"),
    agentWidth: numberArg(cli, "agentWidth"),
    agentHeight: numberArg(cli, "agentHeight"),
    agentInitX: numberArg(cli, "agentInitX"),
    agentSpeed: numberArg(cli, "agentSpeed"),
    obstaclePosition: numberArg(cli, "obstaclePosition"),
    maxSteps: numberArg(cli, "maxSteps"),
    withLeftAction: flagArg(cli, "withLeftAction"),
    twoObstacles: flagArg(cli, "twoObstacles"),
    finishJump: flagArg(cli, "finishJump"),
    obstacleColor: color === undefined ? undefined : color === "red" ? ObstacleColor.Red : ObstacleColor.Green,
    seed: numberArg(cli, "seed"),
  };
}
