import { ColorParseError } from "../errors";
import type { Rgb } from "../types";
import { parseId, readCsvRows } from "./csvFile";

export const WHITE: Rgb = [255, 255, 255];

/** team id → stored color value, e.g. `(0, 35, 89)`. */
export type ColorTable = Map<number, string>;

export async function loadColorTable(path: string): Promise<ColorTable> {
  const rows = await readCsvRows(path);
  const table: ColorTable = new Map();
  for (const [id, value] of rows) {
    table.set(parseId(path, id), value ?? "");
  }
  return table;
}

function parseComponent(component: string, raw: string): number {
  const trimmed = component.trim();
  const value = Number(trimmed);
  if (!/^\d{1,3}$/.test(trimmed) || value > 255) {
    throw new ColorParseError(raw);
  }
  return value;
}

/**
 * Values not wrapped in parentheses mark teams without a distinct color and
 * resolve to white, as do ids missing from the table.
 */
export function parseColor(raw: string): Rgb {
  const value = raw.trim();
  if (!value.startsWith("(") || !value.endsWith(")")) {
    return WHITE;
  }
  const components = value.slice(1, -1).split(",");
  if (components.length !== 3) {
    throw new ColorParseError(raw);
  }
  const [r, g, b] = components.map((component) => parseComponent(component, raw));
  return [r, g, b];
}

export function teamColor(table: ColorTable, teamId: number): Rgb {
  const raw = table.get(teamId);
  return raw === undefined ? WHITE : parseColor(raw);
}
