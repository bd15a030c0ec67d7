import fs from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { FileError, describeError } from "../errors";

const RowsSchema = z.array(z.array(z.string()));

export type CsvRow = string[];

export async function readCsvRows(path: string): Promise<CsvRow[]> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    throw new FileError(path, describeError(error));
  }

  let records: unknown;
  try {
    records = parse(content, {
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (error) {
    throw new FileError(path, describeError(error));
  }

  const rows = RowsSchema.safeParse(records);
  if (!rows.success) {
    throw new FileError(path, "unexpected CSV layout");
  }
  return rows.data;
}

export function toCsv(rows: CsvRow[]): string {
  return stringify(rows);
}

export async function appendCsvRow(path: string, row: CsvRow): Promise<void> {
  try {
    await fs.appendFile(path, toCsv([row]), "utf-8");
  } catch (error) {
    throw new FileError(path, describeError(error));
  }
}

export async function writeCsvRows(path: string, rows: CsvRow[]): Promise<void> {
  try {
    await fs.writeFile(path, toCsv(rows), "utf-8");
  } catch (error) {
    throw new FileError(path, describeError(error));
  }
}

export function parseId(path: string, value: string | undefined): number {
  const id = Number(value);
  if (value === undefined || !/^\d+$/.test(value) || !Number.isSafeInteger(id)) {
    throw new FileError(path, `invalid team id ${value ?? "(missing)"}`);
  }
  return id;
}
