import chalk from "chalk";
import { ColorTable, teamColor } from "../store/colorTable";
import type { Rgb } from "../types";

export const NAME_WIDTH = 27;

export type ColorLevel = 0 | 1 | 2 | 3;

export type Painter = (text: string, rgb: Rgb) => string;

export function createPainter(level?: ColorLevel): Painter {
  const palette = level === undefined ? chalk : new chalk.Instance({ level });
  return (text, [r, g, b]) => palette.rgb(r, g, b)(text);
}

/**
 * Colors the name, then pads by the raw name length so the escape codes
 * never count toward the column width.
 */
export function paintTeamName(name: string, teamId: number, colors: ColorTable, paint: Painter): string {
  const padding = " ".repeat(Math.max(0, NAME_WIDTH - name.length));
  return `${paint(name, teamColor(colors, teamId))}${padding}`;
}
