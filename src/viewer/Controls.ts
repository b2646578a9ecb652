import * as readline from "readline";
import { Action } from "../simulation/types.js";

export type Command = { type: "action"; action: Action } | { type: "exit" } | { type: "unknown" };

export interface Keypress {
  name?: string;
  ctrl?: boolean;
}

export function keyToCommand(key: Keypress, withLeftAction: boolean): Command {
  if (key.ctrl && key.name === "c") return { type: "exit" };
  switch (key.name) {
    case "right":
      return { type: "action", action: Action.MoveRight };
    case "up":
      return { type: "action", action: Action.Jump };
    case "left":
      return withLeftAction ? { type: "action", action: Action.MoveLeft } : { type: "unknown" };
    case "e":
      return { type: "exit" };
    default:
      return { type: "unknown" };
  }
}

/** Arrow-key input on a terminal stream. */
export class Controls {
  private readonly input: NodeJS.ReadStream;
  private readonly withLeftAction: boolean;
  private readonly onCommand: (command: Command) => void;
  private readonly listener = (_str: string | undefined, key: Keypress | undefined) => {
    if (!key) return;
    this.onCommand(keyToCommand(key, this.withLeftAction));
  };

  constructor(input: NodeJS.ReadStream, withLeftAction: boolean, onCommand: (command: Command) => void) {
    this.input = input;
    this.withLeftAction = withLeftAction;
    this.onCommand = onCommand;
  }

  attach() {
    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode(true);
    this.input.on("keypress", this.listener);
    this.input.resume();
  }

  detach() {
    this.input.off("keypress", this.listener);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
  }
}
