import { lookupTeam } from "../data/sports-apis";
import { NotFoundError } from "../errors";
import { paintTeamName } from "../render/painter";
import type { RosterEntry } from "../types";
import { CommandContext, loadColors } from "./context";

async function addTeam(ctx: CommandContext): Promise<void> {
  const query = (await ctx.prompt.ask("Team name: ")).trim();
  let team: RosterEntry;
  try {
    team = await lookupTeam(query, ctx.api);
  } catch (error) {
    // An unknown team is reported and leaves the roster untouched; anything else fails the command.
    if (error instanceof NotFoundError) {
      ctx.out.error(error.message);
      return;
    }
    throw error;
  }
  await ctx.roster.append(team);
  ctx.out.log(`Added ${team.name} (${team.id}) to your teams`);
}

async function removeTeam(ctx: CommandContext): Promise<void> {
  const entries = await ctx.roster.entries();
  const colors = await loadColors(ctx);
  for (const entry of entries) {
    ctx.out.log(paintTeamName(entry.name, entry.id, colors, ctx.paint).trimEnd());
  }

  const name = (await ctx.prompt.ask("Team to remove: ")).trim();
  await ctx.roster.removeByName(name);
  ctx.out.log(`${name} removed from your teams`);
}

/** One pass: `a` adds a team, `r` removes one; anything else is rejected. */
export async function editRoster(ctx: CommandContext): Promise<void> {
  const answer = await ctx.prompt.ask("Add (a) or remove (r) a team? ");
  switch (answer.trim().charAt(0)) {
    case "a":
      await addTeam(ctx);
      return;
    case "r":
      await removeTeam(ctx);
      return;
    default:
      ctx.out.error("Invalid input");
  }
}
