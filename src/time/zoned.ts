// Wall-clock helpers for IANA time zones, built on Intl (no Temporal).

import type { Logger } from '../logger';

export const DEFAULT_TIME_ZONE = 'Europe/Moscow';

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

export interface LocalDate {
  year: number;
  month: number;
  day: number;
}

export interface ZonedParts extends LocalDate {
  hour: number;
  minute: number;
  second: number;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone }).format();
    return true;
  } catch {
    return false;
  }
}

/**
 * Picks the zone every schedule computation of this process uses. An absent
 * name silently means the default; an unknown one is reported and replaced.
 */
export function resolveTimeZone(name: string | undefined, logger: Logger): string {
  if (!name) return DEFAULT_TIME_ZONE;
  if (isValidTimeZone(name)) return name;
  logger.warn(`Invalid TIMEZONE '${name}', falling back to ${DEFAULT_TIME_ZONE}`);
  return DEFAULT_TIME_ZONE;
}

export function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const lookup: Partial<Record<Intl.DateTimeFormatPartTypes, number>> = {};
  for (const part of fmt.formatToParts(date)) {
    if (part.type !== 'literal') lookup[part.type] = Number(part.value);
  }
  return {
    year: lookup.year ?? 1970,
    month: lookup.month ?? 1,
    day: lookup.day ?? 1,
    hour: lookup.hour ?? 0,
    minute: lookup.minute ?? 0,
    second: lookup.second ?? 0,
  };
}

export function addDays(date: LocalDate, offset: number): LocalDate {
  // Noon UTC keeps the calendar date stable whatever the offset.
  const base = new Date(Date.UTC(date.year, date.month - 1, date.day, 12, 0, 0));
  base.setUTCDate(base.getUTCDate() + offset);
  return { year: base.getUTCFullYear(), month: base.getUTCMonth() + 1, day: base.getUTCDate() };
}

/** Day of week of a calendar date, Monday=0 … Sunday=6. */
export function dayOfWeek(date: LocalDate): number {
  return (new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay() + 6) % 7;
}

function dayNumber(date: LocalDate): number {
  return Date.UTC(date.year, date.month - 1, date.day) / MS_PER_DAY;
}

/**
 * The UTC instant at which the zone's clock shows the given local date and time.
 * A time that falls into a spring-forward gap resolves to a nearby instant.
 */
export function zonedLocalToUtc(params: LocalDate & { timeZone: string; hour: number; minute: number }): Date {
  let guess = Date.UTC(params.year, params.month - 1, params.day, params.hour, params.minute, 0);

  for (let i = 0; i < 4; i++) {
    const got = getZonedParts(new Date(guess), params.timeZone);
    const dayDiff = dayNumber(params) - dayNumber(got);
    const minuteDiff = params.hour * 60 + params.minute - (got.hour * 60 + got.minute);
    const totalDiffMinutes = dayDiff * 1440 + minuteDiff;
    if (totalDiffMinutes === 0) break;
    guess += totalDiffMinutes * MS_PER_MINUTE;
  }

  return new Date(guess);
}

export function formatZoned(date: Date, timeZone: string): string {
  const p = getZonedParts(date, timeZone);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}`;
}
