import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSettings } from "../../config";
import type { CommandContext } from "../../commands/context";
import { parseCommandKind, runCommand } from "../../commands/router";
import { TransportError } from "../../errors";
import { createPainter } from "../../render/painter";
import { RosterStore } from "../../store/roster";
import { apiFixture, apiStanding, envelope, standingsEnvelope } from "../support/apiPayloads";

const pad = (name: string) => name.padEnd(27);

interface Harness {
  ctx: CommandContext;
  stdout: string[];
  stderr: string[];
  urls: string[];
}

describe("commands", () => {
  let dir: string;
  let rosterFile: string;
  let colorsFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "footy-"));
    rosterFile = path.join(dir, "roster.csv");
    colorsFile = path.join(dir, "colors.csv");
    await fs.writeFile(rosterFile, "Liverpool,40\n");
    await fs.writeFile(colorsFile, '49,"(0, 35, 89)"\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function harness(respond: (url: string) => string, answers: string[] = []): Harness {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const urls: string[] = [];
    const pending = [...answers];
    const ctx: CommandContext = {
      settings: createSettings({ preferredLeagues: [39], allLeagues: [39, 2], season: 2023, timeZone: "America/Chicago" }),
      api: {
        apiKey: "test-secret",
        host: "api.example.test",
        get: async (url) => {
          urls.push(url);
          return respond(url);
        }
      },
      roster: new RosterStore({ path: rosterFile }),
      colorsPath: colorsFile,
      paint: createPainter(0),
      out: { log: (line) => stdout.push(line), error: (line) => stderr.push(line) },
      prompt: { ask: async () => pending.shift() ?? "" },
      now: () => new Date("2023-11-15T18:00:00Z")
    };
    return { ctx, stdout, stderr, urls };
  }

  describe("parseCommandKind", () => {
    it("falls back to the default kind without arguments", () => {
      expect(parseCommandKind([], "schedule")).toBe("schedule");
    });

    it("accepts every known command word", () => {
      expect(["schedule", "live", "scores", "teams", "standings"].map((word) => parseCommandKind([word], "live"))).toEqual([
        "schedule",
        "live",
        "scores",
        "teams",
        "standings"
      ]);
    });

    it("rejects unknown words", () => {
      expect(() => parseCommandKind(["fixtures"], "schedule")).toThrow("Invalid command type");
    });
  });

  it("renders today's schedule for the preferred leagues", async () => {
    const h = harness(() => envelope([apiFixture()]));
    await expect(runCommand("schedule", h.ctx)).resolves.toBe(0);
    expect(h.urls).toEqual(["https://api.example.test/v3/fixtures?league=39&season=2023&date=2023-11-15"]);
    expect(h.stdout).toEqual(["Premier League (England)", `${pad("Chelsea")} at ${pad("Liverpool")} at 19:03`]);
    expect(h.stderr).toEqual([]);
  });

  it("renders live fixtures from one aggregate call", async () => {
    const h = harness(() =>
      envelope([apiFixture({ status: { long: "Second Half", short: "2H", elapsed: 71 }, goals: { home: 1, away: 1 } })])
    );
    await expect(runCommand("live", h.ctx)).resolves.toBe(0);
    expect(h.urls).toEqual(["https://api.example.test/v3/fixtures?live=39-2"]);
    expect(h.stdout).toEqual([`${pad("Chelsea")} ${pad("Liverpool")}: 1 - 1 in 71'`]);
  });

  it("fetches recent fixtures for every roster team", async () => {
    await fs.writeFile(rosterFile, "Liverpool,40\nArsenal,42\n");
    const h = harness(() =>
      envelope([apiFixture({ status: { long: "Match Finished", short: "FT", elapsed: 90 }, goals: { home: 2, away: 0 } })])
    );
    await expect(runCommand("scores", h.ctx)).resolves.toBe(0);
    expect(h.urls).toEqual([
      "https://api.example.test/v3/fixtures?season=2023&team=40&last=2",
      "https://api.example.test/v3/fixtures?season=2023&team=42&last=2"
    ]);
    expect(h.stdout).toHaveLength(2);
  });

  it("reports the empty sentinel when the roster has no teams", async () => {
    await fs.writeFile(rosterFile, "");
    const h = harness(() => envelope([]));
    await expect(runCommand("scores", h.ctx)).resolves.toBe(0);
    expect(h.urls).toEqual([]);
    expect(h.stdout).toEqual(["No fixtures to show."]);
  });

  it("fails the scores command when the roster file is missing", async () => {
    await fs.rm(rosterFile);
    const h = harness(() => envelope([]));
    await expect(runCommand("scores", h.ctx)).resolves.toBe(1);
    expect(h.stderr).toHaveLength(1);
    expect(h.stderr[0].startsWith(`Could not access ${rosterFile}: ENOENT`)).toBe(true);
  });

  it("renders standings tables", async () => {
    const h = harness(() =>
      standingsEnvelope([[apiStanding({ rank: 1, team: { id: 40, name: "Liverpool" }, points: 28, group: "Premier League" })]])
    );
    await expect(runCommand("standings", h.ctx)).resolves.toBe(0);
    expect(h.urls).toEqual(["https://api.example.test/v3/standings?league=39&season=2023"]);
    expect(h.stdout).toEqual(["Premier League", `1 ${pad("Liverpool")} 28 na`]);
  });

  it("turns transport failures into one API error line", async () => {
    const h = harness((url) => {
      throw new TransportError(`HTTP 429 for ${url}`, url, 429);
    });
    await expect(runCommand("schedule", h.ctx)).resolves.toBe(1);
    expect(h.stdout).toEqual([]);
    expect(h.stderr).toEqual([
      "Error from the API: HTTP 429 for https://api.example.test/v3/fixtures?league=39&season=2023&date=2023-11-15"
    ]);
  });

  it("labels malformed fixture bodies", async () => {
    const h = harness(() => JSON.stringify({ message: "You are not subscribed to this API." }));
    await expect(runCommand("live", h.ctx)).resolves.toBe(1);
    expect(h.stderr).toEqual(["Error parsing fixtures: missing field `response`"]);
  });

  it("labels malformed standings bodies", async () => {
    const h = harness(() => envelope([]));
    await expect(runCommand("standings", h.ctx)).resolves.toBe(1);
    expect(h.stderr).toEqual(["Error parsing standings: missing field `response[0]`"]);
  });

  it("keeps running with white names when the color file is missing", async () => {
    await fs.rm(colorsFile);
    const h = harness(() => envelope([apiFixture()]));
    await expect(runCommand("schedule", h.ctx)).resolves.toBe(0);
    expect(h.stderr).toHaveLength(1);
    expect(h.stderr[0]).toContain("team colors disabled");
    expect(h.stdout).toHaveLength(2);
  });

  describe("roster editing", () => {
    it("adds the team found by the lookup", async () => {
      const h = harness(() => envelope([{ team: { id: 42, name: "Arsenal" } }]), ["a", "arsenal"]);
      await expect(runCommand("teams", h.ctx)).resolves.toBe(0);
      expect(h.urls).toEqual(["https://api.example.test/v3/teams?name=arsenal"]);
      expect(h.stdout).toEqual(["Added Arsenal (42) to your teams"]);
      expect(await fs.readFile(rosterFile, "utf-8")).toBe("Liverpool,40\nArsenal,42\n");
    });

    it("leaves the roster alone when the lookup finds nothing", async () => {
      const h = harness(() => envelope([]), ["add", "Nowhere FC"]);
      await expect(runCommand("teams", h.ctx)).resolves.toBe(0);
      expect(h.stderr).toEqual(["Nowhere FC is not a valid team"]);
      expect(await fs.readFile(rosterFile, "utf-8")).toBe("Liverpool,40\n");
    });

    it("fails with the API error line when the team lookup cannot reach the API", async () => {
      const h = harness((url) => {
        throw new TransportError(`HTTP 503 for ${url}`, url, 503);
      }, ["a", "Arsenal"]);
      await expect(runCommand("teams", h.ctx)).resolves.toBe(1);
      expect(h.stdout).toEqual([]);
      expect(h.stderr).toEqual(["Error from the API: HTTP 503 for https://api.example.test/v3/teams?name=Arsenal"]);
      expect(await fs.readFile(rosterFile, "utf-8")).toBe("Liverpool,40\n");
    });

    it("labels a malformed team search body", async () => {
      const h = harness(() => "not json", ["a", "Arsenal"]);
      await expect(runCommand("teams", h.ctx)).resolves.toBe(1);
      expect(h.stderr).toHaveLength(1);
      expect(h.stderr[0].startsWith("Error parsing teams: ")).toBe(true);
    });

    it("fails when the found team cannot be written to the roster", async () => {
      const missingDir = path.join(dir, "missing", "roster.csv");
      const h = harness(() => envelope([{ team: { id: 42, name: "Arsenal" } }]), ["a", "Arsenal"]);
      h.ctx.roster = new RosterStore({ path: missingDir });
      await expect(runCommand("teams", h.ctx)).resolves.toBe(1);
      expect(h.stdout).toEqual([]);
      expect(h.stderr).toHaveLength(1);
      expect(h.stderr[0].startsWith(`Could not access ${missingDir}: ENOENT`)).toBe(true);
    });

    it("lists the roster and removes the named team", async () => {
      const h = harness(() => envelope([]), ["r", "liverpool"]);
      await expect(runCommand("teams", h.ctx)).resolves.toBe(0);
      expect(h.stdout).toEqual(["Liverpool", "liverpool removed from your teams"]);
      expect(await fs.readFile(rosterFile, "utf-8")).toBe("");
    });

    it("confirms removal even for a name that is not on the roster", async () => {
      const h = harness(() => envelope([]), ["r", "Everton"]);
      await expect(runCommand("teams", h.ctx)).resolves.toBe(0);
      expect(h.stdout).toEqual(["Liverpool", "Everton removed from your teams"]);
      expect(await fs.readFile(rosterFile, "utf-8")).toBe("Liverpool,40\n");
    });

    it("rejects any other answer without retrying", async () => {
      const h = harness(() => envelope([]), ["x", "a"]);
      await expect(runCommand("teams", h.ctx)).resolves.toBe(0);
      expect(h.stderr).toEqual(["Invalid input"]);
      expect(h.urls).toEqual([]);
    });
  });
});
