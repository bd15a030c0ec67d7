import { MissingFieldError } from "../errors";
import type { ColorTable } from "../store/colorTable";
import type { Fixture, LeagueStandings, Output, TeamStanding } from "../types";
import { formatTimeOfDay } from "../utils";
import { paintTeamName, Painter } from "./painter";

const SETTLED_STATUSES = new Set(["FT", "TBD", "NS"]);

export type FixtureView = "schedule" | "live" | "scores";

export type RenderInput =
  | { kind: FixtureView; fixtures: Fixture[][] }
  | { kind: "standings"; standings: LeagueStandings[] };

export interface RenderContext {
  colors: ColorTable;
  paint: Painter;
  out: Output;
  timeZone?: string;
}

export function inProgressSuffix(statusShort: string): string {
  return SETTLED_STATUSES.has(statusShort) ? "" : "| In Progress";
}

function sides(fixture: Fixture, ctx: RenderContext): { away: string; home: string } {
  const { home, away } = fixture.teams;
  return {
    away: paintTeamName(away.name, away.id, ctx.colors, ctx.paint),
    home: paintTeamName(home.name, home.id, ctx.colors, ctx.paint)
  };
}

export function scheduleRow(fixture: Fixture, ctx: RenderContext): string {
  const { away, home } = sides(fixture, ctx);
  const row = `${away} at ${home} at ${formatTimeOfDay(fixture.timestamp, ctx.timeZone)}`;
  const suffix = inProgressSuffix(fixture.status.short);
  return suffix ? `${row} ${suffix}` : row;
}

/** Live fixtures must report both goal counts and the elapsed minute. */
export function liveScore(fixture: Fixture): { home: number; away: number; elapsed: number } {
  const { home, away } = fixture.goals;
  const { elapsed } = fixture.status;
  if (home === null) throw new MissingFieldError(`fixture ${fixture.id} goals.home`);
  if (away === null) throw new MissingFieldError(`fixture ${fixture.id} goals.away`);
  if (elapsed === null) throw new MissingFieldError(`fixture ${fixture.id} status.elapsed`);
  return { home, away, elapsed };
}

export function liveRow(fixture: Fixture, ctx: RenderContext): string {
  const score = liveScore(fixture);
  const { away, home } = sides(fixture, ctx);
  return `${away} ${home}: ${score.away} - ${score.home} in ${score.elapsed}'`;
}

export function scoresRow(fixture: Fixture, ctx: RenderContext): string {
  const { away, home } = sides(fixture, ctx);
  const awayGoals = fixture.goals.away ?? "-";
  const homeGoals = fixture.goals.home ?? "-";
  return `${away} ${home}: ${awayGoals} - ${homeGoals} on ${fixture.date.slice(5, 10)}`;
}

export function standingLines(standing: TeamStanding, ctx: RenderContext): string[] {
  const lines: string[] = [];
  if (standing.rank === 1 && standing.group) {
    lines.push(standing.group);
  }
  const name = paintTeamName(standing.team.name, standing.team.id, ctx.colors, ctx.paint);
  lines.push(`${standing.rank} ${name} ${standing.points} ${standing.form ?? "na"}`);
  return lines;
}

function leagueHeader(fixtures: Fixture[]): string | null {
  const [first] = fixtures;
  return first ? `${first.league.name} (${first.league.country})` : null;
}

const FIXTURE_ROWS: Record<FixtureView, (fixture: Fixture, ctx: RenderContext) => string> = {
  schedule: scheduleRow,
  live: liveRow,
  scores: scoresRow
};

/**
 * Every line is built before anything is written, so a fixture that fails
 * its row contract leaves the output untouched.
 */
export function render(input: RenderInput, ctx: RenderContext): void {
  const lines: string[] = [];

  if (input.kind === "standings") {
    for (const league of input.standings) {
      for (const group of league) {
        for (const standing of group) {
          lines.push(...standingLines(standing, ctx));
        }
      }
    }
  } else {
    const toRow = FIXTURE_ROWS[input.kind];
    for (const group of input.fixtures) {
      const header = input.kind === "schedule" ? leagueHeader(group) : null;
      if (header) {
        lines.push(header);
      }
      for (const fixture of group) {
        lines.push(toRow(fixture, ctx));
      }
    }
  }

  for (const line of lines) {
    ctx.out.log(line);
  }
}
