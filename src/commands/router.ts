import { describeError, FileError, isParseError, TransportError } from "../errors";
import { COMMAND_KINDS, CommandKind } from "../types";
import type { CommandContext } from "./context";
import { COMMANDS } from "./operations";

export function parseCommandKind(args: string[], fallback: CommandKind): CommandKind {
  const [word] = args;
  if (word === undefined) {
    return fallback;
  }
  const kind = COMMAND_KINDS.find((candidate) => candidate === word.trim().toLowerCase());
  if (!kind) {
    throw new Error("Invalid command type");
  }
  return kind;
}

/** Runs one command and turns any failure into a single stderr line. Resolves to the exit code. */
export async function runCommand(kind: CommandKind, ctx: CommandContext): Promise<number> {
  const command = COMMANDS[kind];
  try {
    await command.execute(ctx);
    return 0;
  } catch (error) {
    if (error instanceof TransportError) {
      ctx.out.error(`Error from the API: ${error.message}`);
    } else if (isParseError(error)) {
      ctx.out.error(`Error parsing ${command.subject}: ${error.message}`);
    } else if (error instanceof FileError) {
      ctx.out.error(error.message);
    } else {
      ctx.out.error(`Error: ${describeError(error)}`);
    }
    return 1;
  }
}
