import { endOfDay, isValid, parseISO, startOfDay } from "date-fns";
import type { Logger } from "pino";

import { ValidationError } from "./errors.js";
import { logger as defaultLogger } from "./logger.js";
import { dateParseWarningsTotal } from "./metrics.js";
import type { CommentRecord, DateParseWarning } from "./types.js";

export type CalendarDateInput = string | Date;

export interface DateFilterResult {
  records: CommentRecord[];
  warnings: DateParseWarning[];
}

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

// Offset directly after a time of day; a bare date such as 2024-03-15 keeps its "-15".
const UTC_OFFSET_AFTER_TIME = /(\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?)(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

function normalizeBound(value: CalendarDateInput | null | undefined): CalendarDateInput | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" && value.trim().length === 0) return null;
  return value;
}

/** Wall-clock fields of `value` as a comparable number, ignoring the host time zone. */
function toWallClockMillis(value: Date): number {
  return Date.UTC(
    value.getFullYear(),
    value.getMonth(),
    value.getDate(),
    value.getHours(),
    value.getMinutes(),
    value.getSeconds(),
    value.getMilliseconds(),
  );
}

export function parseCalendarDate(value: CalendarDateInput, label = "date"): Date {
  if (value instanceof Date) {
    if (!isValid(value)) {
      throw new ValidationError(`${label} is not a valid date.`);
    }
    return startOfDay(value);
  }

  const trimmed = value.trim();
  const parsed = CALENDAR_DATE.test(trimmed) ? parseISO(trimmed) : new Date(Number.NaN);
  if (!isValid(parsed)) {
    throw new ValidationError(`${label} "${value}" is not a valid calendar date; expected YYYY-MM-DD.`);
  }
  return parsed;
}

/**
 * Parses an ISO-8601 timestamp as wall-clock time. A trailing `Z` or
 * `±hh:mm` offset is dropped rather than applied.
 */
export function parseWallClockTimestamp(value: string): number | null {
  const wallClock = value.trim().replace(UTC_OFFSET_AFTER_TIME, "$1");
  if (wallClock.length === 0) {
    return null;
  }
  const parsed = parseISO(wallClock);
  return isValid(parsed) ? toWallClockMillis(parsed) : null;
}

/**
 * Keeps the records published between `startDate` 00:00:00.000 and
 * `endDate` 23:59:59.999, both inclusive. An absent bound leaves that side
 * open; with no bounds at all the input array itself is returned.
 *
 * Records whose `published_at` is missing or unparseable are dropped and
 * reported one warning each.
 */
export function filterCommentsByDate(
  records: CommentRecord[],
  startDate?: CalendarDateInput | null,
  endDate?: CalendarDateInput | null,
  options: { logger?: Logger } = {},
): DateFilterResult {
  const start = normalizeBound(startDate);
  const end = normalizeBound(endDate);
  if (start === null && end === null) {
    return { records, warnings: [] };
  }

  const log = options.logger ?? defaultLogger;
  const lowerBound = start === null ? null : toWallClockMillis(parseCalendarDate(start, "startDate"));
  const upperBound = end === null ? null : toWallClockMillis(endOfDay(parseCalendarDate(end, "endDate")));

  const kept: CommentRecord[] = [];
  const warnings: DateParseWarning[] = [];

  for (const record of records) {
    const publishedAt = record.published_at === null ? null : parseWallClockTimestamp(record.published_at);

    if (publishedAt === null) {
      const warning: DateParseWarning = {
        commentId: record.comment_id,
        value: record.published_at,
        message:
          record.published_at === null
            ? "published_at is missing"
            : `published_at "${record.published_at}" is not a valid ISO-8601 timestamp`,
      };
      warnings.push(warning);
      log.warn({ commentId: warning.commentId, value: warning.value }, `Date parse error: ${warning.message}`);
      continue;
    }

    if (lowerBound !== null && publishedAt < lowerBound) continue;
    if (upperBound !== null && publishedAt > upperBound) continue;
    kept.push(record);
  }

  if (warnings.length > 0) {
    dateParseWarningsTotal.inc(warnings.length);
  }

  return { records: kept, warnings };
}
