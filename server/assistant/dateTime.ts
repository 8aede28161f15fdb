/**
 * Datetime helpers for the turn pipeline.
 *
 * Values without an explicit offset are wall-clock times in UTC, the same
 * zone the calendar provider writes events in. Every formatter here reads
 * UTC components for that reason.
 */

import { COMMAND_CONSTANTS } from "../config/constants";
import { DateTimeParseError } from "../utils/errorHandler";

const COMMAND_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const MODEL_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

const MONTH_NAMES = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

function buildUtcDate(parts: Array<string | undefined>): Date | null {
  const [year, month, day, hour = "0", minute = "0", second = "0"] = parts;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) return null;

  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  // Date.UTC rolls over impossible days (Feb 30 → Mar 2); reject those
  if (date.getUTCFullYear() !== y || date.getUTCMonth() !== mo - 1 || date.getUTCDate() !== d) {
    return null;
  }
  return date;
}

/**
 * Parses a datetime typed in an explicit command.
 * Accepts YYYY-MM-DD, YYYY-MM-DD HH:MM and YYYY-MM-DDTHH:MM (seconds optional).
 */
export function parseCommandDateTime(value: string): Date {
  const trimmed = value.trim();
  const match = COMMAND_DATETIME.exec(trimmed);
  const date = match ? buildUtcDate(match.slice(1)) : null;
  if (!date) {
    throw new DateTimeParseError(trimmed, COMMAND_CONSTANTS.ACCEPTED_DATETIME_FORMATS);
  }
  return date;
}

/**
 * Parses an ISO 8601 datetime produced by the language model.
 * Returns null for anything unusable.
 */
export function parseModelDateTime(value: unknown): Date | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  const match = MODEL_DATETIME.exec(trimmed);
  if (!match) return null;

  const wallClock = buildUtcDate(match.slice(1, 7));
  if (!wallClock) return null;

  // Fields are range-checked even when an offset follows
  const offset = match[7];
  if (offset) {
    const parsed = new Date(trimmed.replace(" ", "T"));
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return wallClock;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * YYYY-MM-DD of the given instant; used as the "today" anchor in prompts.
 */
export function toDateAnchor(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * YYYY-MM-DDTHH:MM:SS without an offset, e.g. 2025-11-15T00:00:00.
 */
export function formatIsoLocal(date: Date): string {
  return `${toDateAnchor(date)}T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * 3pm, 3:30pm, 12am.
 */
export function formatClockTime(date: Date): string {
  const hours = date.getUTCHours();
  const minutes = date.getUTCMinutes();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const suffix = hours < 12 ? "am" : "pm";
  return minutes === 0 ? `${hour12}${suffix}` : `${hour12}:${pad(minutes)}${suffix}`;
}

export function formatDayLabel(date: Date, now: Date): string {
  const day = toDateAnchor(date);
  if (day === toDateAnchor(now)) return "today";
  const tomorrow = new Date(now.getTime() + 24 * 60 * 60 * 1000);
  if (day === toDateAnchor(tomorrow)) return "tomorrow";
  return `${MONTH_NAMES[date.getUTCMonth()]} ${date.getUTCDate()}`;
}

/**
 * Human description of an event slot, e.g. "tomorrow, 11pm–12am".
 */
export function formatDateTimeRange(start: Date, end: Date, now: Date): string {
  return `${formatDayLabel(start, now)}, ${formatClockTime(start)}–${formatClockTime(end)}`;
}
