export const COMMAND_KINDS = ["schedule", "live", "scores", "teams", "standings"] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

export interface Team {
  id: number;
  name: string;
  logo: string;
  /** true = this side won, false = lost, null = draw or not decided yet */
  winner: boolean | null;
}

export interface Venue {
  id: number | null;
  name: string | null;
  city: string | null;
}

export interface FixtureStatus {
  long: string;
  short: string;
  elapsed: number | null;
}

export interface LeagueSummary {
  id: number;
  name: string;
  country: string;
  logo: string;
  flag: string | null;
  season: number;
  round: string | null;
}

export interface ScoreLine {
  home: number | null;
  away: number | null;
}

export interface ScoreBreakdown {
  halftime: ScoreLine;
  fulltime: ScoreLine;
  extratime: ScoreLine;
  penalty: ScoreLine;
}

export interface Fixture {
  id: number;
  referee: string | null;
  timezone: string;
  date: string;
  timestamp: number;
  periods: {
    first: number | null;
    second: number | null;
  };
  venue: Venue | null;
  status: FixtureStatus;
  league: LeagueSummary;
  teams: {
    home: Team;
    away: Team;
  };
  goals: ScoreLine;
  score: ScoreBreakdown | null;
}

export interface StandingStats {
  played: number;
  win: number;
  draw: number;
  lose: number;
  goalsFor: number;
  goalsAgainst: number;
}

export interface TeamStanding {
  rank: number;
  team: Team;
  points: number;
  goalsDiff: number;
  group: string | null;
  form: string | null;
  status: string | null;
  description: string | null;
  all: StandingStats;
  home: StandingStats;
  away: StandingStats;
}

/** One league's table, split into groups (a single group for a plain league). */
export type LeagueStandings = TeamStanding[][];

export interface RosterEntry {
  name: string;
  id: number;
}

export type Rgb = [number, number, number];

export interface Settings {
  preferredLeagues: number[];
  allLeagues: number[];
  defaultCommand: CommandKind;
  season: number;
  timeZone?: string;
}

export interface Output {
  log(line: string): void;
  error(line: string): void;
}
