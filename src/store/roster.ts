import { resolveRosterPath } from "../config";
import type { RosterEntry } from "../types";
import { appendCsvRow, parseId, readCsvRows, writeCsvRows } from "./csvFile";

export interface RosterStoreOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Favorite teams kept as headerless `name,id` CSV rows. Names are the key;
 * when a name repeats, the last row wins on read.
 */
export class RosterStore {
  private readonly fixedPath?: string;

  private readonly env: NodeJS.ProcessEnv;

  constructor({ path, env = process.env }: RosterStoreOptions = {}) {
    this.fixedPath = path;
    this.env = env;
  }

  /** Resolved on every call so the environment override is always current. */
  resolvePath(): string {
    return this.fixedPath ?? resolveRosterPath(this.env);
  }

  async readAll(): Promise<Map<string, number>> {
    const path = this.resolvePath();
    const rows = await readCsvRows(path);
    const roster = new Map<string, number>();
    for (const [name, id] of rows) {
      if (!name) continue;
      roster.set(name, parseId(path, id));
    }
    return roster;
  }

  async entries(): Promise<RosterEntry[]> {
    const roster = await this.readAll();
    return Array.from(roster, ([name, id]) => ({ name, id }));
  }

  async append(entry: RosterEntry): Promise<void> {
    await appendCsvRow(this.resolvePath(), [entry.name, String(entry.id)]);
  }

  /** Rewrites the file without any row whose name matches case-insensitively. */
  async removeByName(name: string): Promise<void> {
    const path = this.resolvePath();
    const rows = await readCsvRows(path);
    const target = name.trim().toLowerCase();
    const kept = rows.filter(([rowName]) => (rowName ?? "").toLowerCase() !== target);
    await writeCsvRows(path, kept);
  }
}
