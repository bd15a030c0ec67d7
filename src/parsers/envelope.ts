import type { z } from "zod";
import { DeserializationError, MissingFieldError } from "../errors";
import type { Fixture, LeagueStandings, RosterEntry } from "../types";
import { FixtureListSchema, LeagueStandingsSchema, TeamSearchSchema, describeIssue } from "./api-schema";

function parseEnvelope(rawBody: string): object {
  let document: unknown;
  try {
    document = JSON.parse(rawBody);
  } catch (error) {
    throw new DeserializationError(error instanceof Error ? error.message : "body is not valid JSON");
  }

  if (!document || typeof document !== "object" || Array.isArray(document)) {
    throw new DeserializationError("expected a JSON object at the top level");
  }
  return document;
}

/** Unwraps the `response` member of an API envelope. */
export function extractResponse(rawBody: string): unknown {
  const envelope = parseEnvelope(rawBody);
  if (!("response" in envelope)) {
    throw new MissingFieldError("response");
  }
  return envelope.response;
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, root: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DeserializationError(describeIssue(result.error, root));
  }
  return result.data;
}

/**
 * One inner list per upstream call. An empty batch yields `[[]]`, the
 * "nothing to show" sentinel, which callers check with {@link isEmptyFixtureResult}.
 */
export function normalizeFixtures(rawBodies: string[]): Fixture[][] {
  if (rawBodies.length === 0) {
    return [[]];
  }
  return rawBodies.map((body) => decode(FixtureListSchema, extractResponse(body), "response"));
}

export function isEmptyFixtureResult(groups: Fixture[][]): boolean {
  return groups.length === 1 && groups[0].length === 0;
}

/** Per league, per group, per row. */
export function normalizeStandings(rawBodies: string[]): LeagueStandings[] {
  return rawBodies.map((body) => {
    const response = extractResponse(body);
    if (!Array.isArray(response) || response.length === 0) {
      throw new MissingFieldError("response[0]");
    }
    return decode(LeagueStandingsSchema, response[0], "response[0]");
  });
}

export function normalizeTeamSearch(rawBody: string): RosterEntry[] {
  const results = decode(TeamSearchSchema, extractResponse(rawBody), "response");
  return results.map(({ team }) => ({ name: team.name, id: team.id }));
}
