import axios, { AxiosRequestConfig } from "axios";
import { TransportError } from "./errors";

const TIME_PARTS: Intl.DateTimeFormatOptions = {
  hour: "2-digit",
  minute: "2-digit",
  hourCycle: "h23"
};

const ISO_DATE_PARTS: Intl.DateTimeFormatOptions = {
  year: "numeric",
  month: "2-digit",
  day: "2-digit"
};

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (_error) {
    return false;
  }
}

function pickParts(date: Date, options: Intl.DateTimeFormatOptions, timeZone?: string): Record<string, string> {
  const formatter = new Intl.DateTimeFormat("en-US", { ...options, timeZone });
  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

/** Unix seconds → `HH:MM` on a 24h clock. */
export function formatTimeOfDay(timestamp: number, timeZone?: string): string {
  const { hour, minute } = pickParts(new Date(timestamp * 1000), TIME_PARTS, timeZone);
  return `${hour}:${minute}`;
}

export function toIsoDate(date: Date, timeZone?: string): string {
  const { year, month, day } = pickParts(date, ISO_DATE_PARTS, timeZone);
  return `${year}-${month}-${day}`;
}

export async function fetchText(url: string, config: AxiosRequestConfig = {}): Promise<string> {
  try {
    const response = await axios.get<string>(url, {
      ...config,
      responseType: "text",
      transformResponse: (data: unknown) => data
    });
    return typeof response.data === "string" ? response.data : String(response.data);
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status ?? null;
      const reason = status !== null ? `HTTP ${status}` : error.message;
      throw new TransportError(`${reason} for ${url}`, url, status);
    }
    throw error;
  }
}
