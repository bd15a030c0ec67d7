import type { AxiosRequestConfig } from "axios";
import { NotFoundError } from "../errors";
import { normalizeTeamSearch } from "../parsers/envelope";
import type { RosterEntry, Settings } from "../types";
import { fetchText, toIsoDate } from "../utils";

export type HttpGet = (url: string, config: AxiosRequestConfig) => Promise<string>;

export interface ApiFootballOptions {
  apiKey: string;
  host: string;
  get?: HttpGet;
}

export const TEAM_FIXTURE_COUNT = 2;

function baseUrl(host: string): string {
  return `https://${host}/v3`;
}

export function buildScheduleUrl(host: string, leagueId: number, season: number, date: string): string {
  return `${baseUrl(host)}/fixtures?league=${leagueId}&season=${season}&date=${date}`;
}

export function buildLiveUrl(host: string, leagueIds: number[]): string {
  return `${baseUrl(host)}/fixtures?live=${leagueIds.join("-")}`;
}

export function buildTeamFixturesUrl(host: string, teamId: number, season: number): string {
  return `${baseUrl(host)}/fixtures?season=${season}&team=${teamId}&last=${TEAM_FIXTURE_COUNT}`;
}

export function buildStandingsUrl(host: string, leagueId: number, season: number): string {
  return `${baseUrl(host)}/standings?league=${leagueId}&season=${season}`;
}

export function buildTeamSearchUrl(host: string, name: string): string {
  return `${baseUrl(host)}/teams?name=${encodeURIComponent(name)}`;
}

/** Single authenticated GET; any failure rejects with a TransportError. */
export async function fetchRawBody(url: string, options: ApiFootballOptions): Promise<string> {
  const config: AxiosRequestConfig = {
    headers: {
      "X-RapidAPI-KEY": options.apiKey,
      "X-RapidAPI-Host": options.host
    }
  };
  const get = options.get ?? fetchText;
  return get(url, config);
}

/**
 * Requests run one after another, in order. The first failure rejects the
 * whole batch and the remaining URLs are never requested.
 */
export async function fetchBatch(urls: string[], options: ApiFootballOptions): Promise<string[]> {
  const bodies: string[] = [];
  for (const url of urls) {
    bodies.push(await fetchRawBody(url, options));
  }
  return bodies;
}

export async function fetchScheduleBodies(
  settings: Settings,
  options: ApiFootballOptions,
  now: Date = new Date()
): Promise<string[]> {
  // one date for the whole batch, so calls straddling midnight agree
  const today = toIsoDate(now, settings.timeZone);
  const urls = settings.preferredLeagues.map((leagueId) =>
    buildScheduleUrl(options.host, leagueId, settings.season, today)
  );
  return fetchBatch(urls, options);
}

export async function fetchLiveBodies(settings: Settings, options: ApiFootballOptions): Promise<string[]> {
  return fetchBatch([buildLiveUrl(options.host, settings.allLeagues)], options);
}

export async function fetchTeamFixtureBodies(
  teamIds: number[],
  settings: Settings,
  options: ApiFootballOptions
): Promise<string[]> {
  const urls = teamIds.map((teamId) => buildTeamFixturesUrl(options.host, teamId, settings.season));
  return fetchBatch(urls, options);
}

export async function fetchStandingsBodies(settings: Settings, options: ApiFootballOptions): Promise<string[]> {
  const urls = settings.preferredLeagues.map((leagueId) => buildStandingsUrl(options.host, leagueId, settings.season));
  return fetchBatch(urls, options);
}

export async function lookupTeam(name: string, options: ApiFootballOptions): Promise<RosterEntry> {
  const body = await fetchRawBody(buildTeamSearchUrl(options.host, name), options);
  const [first] = normalizeTeamSearch(body);
  if (!first) {
    throw new NotFoundError(name);
  }
  return first;
}
