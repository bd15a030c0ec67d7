import { createInterface } from "node:readline/promises";
import type { ApiFootballOptions } from "../data/sports-apis";
import { FileError } from "../errors";
import type { Painter } from "../render/painter";
import { ColorTable, loadColorTable } from "../store/colorTable";
import type { RosterStore } from "../store/roster";
import type { Output, Settings } from "../types";

export interface Prompter {
  ask(question: string): Promise<string>;
}

export interface CommandContext {
  settings: Settings;
  api: ApiFootballOptions;
  roster: RosterStore;
  colorsPath: string;
  paint: Painter;
  out: Output;
  prompt: Prompter;
  now?: () => Date;
}

export function createConsolePrompter(): Prompter & { close(): void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close()
  };
}

/** An unreadable color file leaves every team white rather than failing the command. */
export async function loadColors(ctx: CommandContext): Promise<ColorTable> {
  try {
    return await loadColorTable(ctx.colorsPath);
  } catch (error) {
    if (error instanceof FileError) {
      ctx.out.error(`${error.message}; team colors disabled`);
      return new Map();
    }
    throw error;
  }
}
