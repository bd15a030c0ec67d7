import { z } from "zod";
import type {
  Fixture,
  LeagueStandings,
  ScoreBreakdown,
  StandingStats,
  Team,
  TeamStanding,
  Venue
} from "../types";

const nullableInt = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? null);

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const TeamSchema: z.ZodType<Team, z.ZodTypeDef, unknown> = z.object({
  id: z.number().int(),
  name: z.string(),
  logo: z.string(),
  winner: z
    .boolean()
    .nullish()
    .transform((value) => value ?? null)
});

const VenueSchema: z.ZodType<Venue | null, z.ZodTypeDef, unknown> = z
  .object({
    id: nullableInt,
    name: nullableString,
    city: nullableString
  })
  .nullish()
  .transform((venue) => venue ?? null);

const ScoreLineSchema = z
  .object({
    home: nullableInt,
    away: nullableInt
  })
  .nullish()
  .transform((line) => line ?? { home: null, away: null });

const ScoreBreakdownSchema: z.ZodType<ScoreBreakdown | null, z.ZodTypeDef, unknown> = z
  .object({
    halftime: ScoreLineSchema,
    fulltime: ScoreLineSchema,
    extratime: ScoreLineSchema,
    penalty: ScoreLineSchema
  })
  .nullish()
  .transform((score) => score ?? null);

export const FixtureSchema: z.ZodType<Fixture, z.ZodTypeDef, unknown> = z
  .object({
    fixture: z.object({
      id: z.number().int(),
      referee: nullableString,
      timezone: z.string(),
      date: z.string(),
      timestamp: z.number().int().nonnegative(),
      periods: z
        .object({ first: nullableInt, second: nullableInt })
        .nullish()
        .transform((periods) => periods ?? { first: null, second: null }),
      venue: VenueSchema,
      status: z.object({
        long: z.string(),
        short: z.string(),
        elapsed: nullableInt
      })
    }),
    league: z.object({
      id: z.number().int(),
      name: z.string(),
      country: z.string(),
      logo: z.string(),
      flag: nullableString,
      season: z.number().int(),
      round: nullableString
    }),
    teams: z.object({
      home: TeamSchema,
      away: TeamSchema
    }),
    goals: ScoreLineSchema,
    score: ScoreBreakdownSchema
  })
  .transform(({ fixture, league, teams, goals, score }) => ({
    id: fixture.id,
    referee: fixture.referee,
    timezone: fixture.timezone,
    date: fixture.date,
    timestamp: fixture.timestamp,
    periods: fixture.periods,
    venue: fixture.venue,
    status: fixture.status,
    league,
    teams,
    goals,
    score
  }));

export const FixtureListSchema = z.array(FixtureSchema);

const StandingStatsSchema: z.ZodType<StandingStats, z.ZodTypeDef, unknown> = z
  .object({
    played: nullableInt,
    win: nullableInt,
    draw: nullableInt,
    lose: nullableInt,
    goals: z.object({
      for: nullableInt,
      against: nullableInt
    })
  })
  .transform((stats) => ({
    played: stats.played ?? 0,
    win: stats.win ?? 0,
    draw: stats.draw ?? 0,
    lose: stats.lose ?? 0,
    goalsFor: stats.goals.for ?? 0,
    goalsAgainst: stats.goals.against ?? 0
  }));

export const TeamStandingSchema: z.ZodType<TeamStanding, z.ZodTypeDef, unknown> = z.object({
  rank: z.number().int(),
  team: TeamSchema,
  points: z.number().int(),
  goalsDiff: z.number().int(),
  group: nullableString,
  form: nullableString,
  status: nullableString,
  description: nullableString,
  all: StandingStatsSchema,
  home: StandingStatsSchema,
  away: StandingStatsSchema
});

export const LeagueStandingsSchema: z.ZodType<LeagueStandings, z.ZodTypeDef, unknown> = z
  .object({
    league: z.object({
      id: z.number().int(),
      name: z.string(),
      standings: z.array(z.array(TeamStandingSchema))
    })
  })
  .transform((entry) => entry.league.standings);

export const TeamSearchSchema = z.array(
  z.object({
    team: z.object({
      id: z.number().int(),
      name: z.string()
    })
  })
);

export function describeIssue(error: z.ZodError, root: string): string {
  const issue = error.issues[0];
  if (!issue) {
    return `${root}: invalid value`;
  }
  const path = issue.path.reduce<string>(
    (acc, segment) => (typeof segment === "number" ? `${acc}[${segment}]` : `${acc}.${segment}`),
    root
  );
  return `${path}: ${issue.message}`;
}
