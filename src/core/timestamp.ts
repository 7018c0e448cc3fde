/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * An instant that remembers the UTC offset it was written with.
 * Ordering and arithmetic use `epochMs`; calendar dates and rendering use the offset.
 */
export interface ZonedTimestamp {
  epochMs: number;
  offsetMinutes: number;
  text: string;
}

export const TIMESTAMP_SHAPE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:Z|[+-]\d{2}:?\d{2})$/;

const TIMESTAMP_PARTS =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:(Z)|([+-])(\d{2}):?(\d{2}))$/;

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

const isValidDate = (year: number, month: number, day: number): boolean =>
  year >= 1 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);

const utcMillis = (year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number => {
  const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second));
  date.setUTCFullYear(year);
  return date.getTime();
};

export const formatOffset = (offsetMinutes: number): string => {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
};

/**
 * Parses `YYYY-MM-DDTHH:MM:SS` followed by `Z`, `±HH:MM` or `±HHMM`.
 * Returns undefined when the text is not a real calendar instant.
 */
export function parseZonedTimestamp(text: string): ZonedTimestamp | undefined {
  const match = TIMESTAMP_PARTS.exec(text);
  if (!match) {
    return undefined;
  }
  const [, y, mo, d, h, mi, s, zulu, sign, oh, om] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (!isValidDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }

  let offsetMinutes = 0;
  if (!zulu) {
    const offsetHours = Number(oh);
    const offsetRest = Number(om);
    if (offsetHours > 23 || offsetRest > 59) {
      return undefined;
    }
    offsetMinutes = (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetRest);
  }

  const epochMs = utcMillis(year, month, day, hour, minute, second) - offsetMinutes * MS_PER_MINUTE;
  return {
    epochMs,
    offsetMinutes,
    text: `${y}-${mo}-${d}T${h}:${mi}:${s}${formatOffset(offsetMinutes)}`,
  };
}

/** Calendar date (`YYYY-MM-DD`) of the timestamp in its own offset. */
export function calendarDateOf(timestamp: ZonedTimestamp): string {
  return timestamp.text.slice(0, 10);
}

export const diffSeconds = (start: ZonedTimestamp, end: ZonedTimestamp): number =>
  Math.floor((end.epochMs - start.epochMs) / 1000);

export function isCalendarDate(text: string): boolean {
  const match = CALENDAR_DATE.exec(text);
  if (!match) {
    return false;
  }
  return isValidDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function addCalendarDays(date: string, days: number): string {
  const match = CALENDAR_DATE.exec(date);
  if (!match) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  const shifted = new Date(utcMillis(Number(match[1]), Number(match[2]), Number(match[3])) + days * MS_PER_DAY);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/** Local calendar date of a wall-clock `Date`. */
export function localCalendarDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
