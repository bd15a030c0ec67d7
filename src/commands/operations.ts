import {
  fetchLiveBodies,
  fetchScheduleBodies,
  fetchStandingsBodies,
  fetchTeamFixtureBodies
} from "../data/sports-apis";
import { isEmptyFixtureResult, normalizeFixtures, normalizeStandings } from "../parsers/envelope";
import { FixtureView, render, RenderContext } from "../render/rows";
import type { CommandKind } from "../types";
import { CommandContext, loadColors } from "./context";
import { editRoster } from "./rosterEditor";

export type CommandSubject = "fixtures" | "standings" | "teams";

export interface Command {
  /** What a parse failure is reported against. */
  subject: CommandSubject;
  execute(ctx: CommandContext): Promise<void>;
}

type BodyFetcher = (ctx: CommandContext) => Promise<string[]>;

async function renderContext(ctx: CommandContext): Promise<RenderContext> {
  return {
    colors: await loadColors(ctx),
    paint: ctx.paint,
    out: ctx.out,
    timeZone: ctx.settings.timeZone
  };
}

function fixtureCommand(kind: FixtureView, fetchBodies: BodyFetcher): Command {
  return {
    subject: "fixtures",
    execute: async (ctx) => {
      const bodies = await fetchBodies(ctx);
      const fixtures = normalizeFixtures(bodies);
      if (isEmptyFixtureResult(fixtures)) {
        ctx.out.log("No fixtures to show.");
        return;
      }
      render({ kind, fixtures }, await renderContext(ctx));
    }
  };
}

export const scheduleCommand = fixtureCommand("schedule", (ctx) =>
  fetchScheduleBodies(ctx.settings, ctx.api, ctx.now ? ctx.now() : new Date())
);

export const liveCommand = fixtureCommand("live", (ctx) => fetchLiveBodies(ctx.settings, ctx.api));

// Renders every one of the last fixtures per favorite team; no picking of
// the fixture closest to today happens here.
export const scoresCommand = fixtureCommand("scores", async (ctx) => {
  const roster = await ctx.roster.readAll();
  return fetchTeamFixtureBodies(Array.from(roster.values()), ctx.settings, ctx.api);
});

export const standingsCommand: Command = {
  subject: "standings",
  execute: async (ctx) => {
    const bodies = await fetchStandingsBodies(ctx.settings, ctx.api);
    const standings = normalizeStandings(bodies);
    render({ kind: "standings", standings }, await renderContext(ctx));
  }
};

export const teamsCommand: Command = {
  subject: "teams",
  execute: editRoster
};

export const COMMANDS: Record<CommandKind, Command> = {
  schedule: scheduleCommand,
  live: liveCommand,
  scores: scoresCommand,
  teams: teamsCommand,
  standings: standingsCommand
};
