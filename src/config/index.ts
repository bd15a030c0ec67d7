import dotenv from "dotenv";
import { z } from "zod";
import type { CommandKind, Settings } from "../types";
import { isValidTimeZone } from "../utils";

dotenv.config();

export const DEFAULT_API_HOST = "api-football-v1.p.rapidapi.com";
export const DEFAULT_ROSTER_PATH = "data/roster.csv";
export const DEFAULT_COLORS_PATH = "data/colors.csv";
export const DEFAULT_SEASON = 2024;

// Premier League, La Liga, Bundesliga, Serie A, Ligue 1
const PREFERRED_LEAGUES = [39, 140, 78, 135, 61];

// Champions League, Europa League, Conference League, Eredivisie, Primeira Liga, MLS
const EXTRA_LIVE_LEAGUES = [2, 3, 848, 88, 94, 253];

const DEFAULT_COMMAND: CommandKind = "schedule";

export const ROSTER_PATH_ENV = "FOOTY_ROSTER_PATH";

// Blank means unset.
const RosterPathSchema = z
  .string()
  .optional()
  .transform((value) => value?.trim() || DEFAULT_ROSTER_PATH);

const EnvSchema = z.object({
  RAPIDAPI_KEY: z.string().trim().min(1).optional(),
  RAPIDAPI_HOST: z.string().trim().min(1).default(DEFAULT_API_HOST),
  [ROSTER_PATH_ENV]: RosterPathSchema,
  FOOTY_COLORS_PATH: z.string().trim().min(1).default(DEFAULT_COLORS_PATH),
  FOOTY_SEASON: z.coerce.number().int().min(1900).default(DEFAULT_SEASON),
  FOOTY_TIMEZONE: z.string().trim().min(1).refine(isValidTimeZone, "is not a known time zone").optional()
});

export interface AppConfig {
  apiKey: string;
  apiHost: string;
  colorsPath: string;
  settings: Settings;
}

export function createSettings(overrides: Partial<Settings> = {}): Settings {
  const preferredLeagues = overrides.preferredLeagues ?? [...PREFERRED_LEAGUES];
  const allLeagues = overrides.allLeagues ?? [...PREFERRED_LEAGUES, ...EXTRA_LIVE_LEAGUES];
  return {
    preferredLeagues,
    allLeagues: [...allLeagues, ...preferredLeagues.filter((id) => !allLeagues.includes(id))],
    defaultCommand: overrides.defaultCommand ?? DEFAULT_COMMAND,
    season: overrides.season ?? DEFAULT_SEASON,
    timeZone: overrides.timeZone
  };
}

/** Read on every call, so a changed environment takes effect without a restart. */
export function resolveRosterPath(env: NodeJS.ProcessEnv = process.env): string {
  return RosterPathSchema.parse(env[ROSTER_PATH_ENV]);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid environment: ${issue.path.join(".")} ${issue.message}`);
  }

  const parsed = result.data;
  if (!parsed.RAPIDAPI_KEY) {
    throw new Error("RAPIDAPI_KEY is not configured");
  }

  return {
    apiKey: parsed.RAPIDAPI_KEY,
    apiHost: parsed.RAPIDAPI_HOST,
    colorsPath: parsed.FOOTY_COLORS_PATH,
    settings: createSettings({ season: parsed.FOOTY_SEASON, timeZone: parsed.FOOTY_TIMEZONE })
  };
}
