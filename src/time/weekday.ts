import { ConfigurationError } from '../errors';
import { dayOfWeek, getZonedParts } from './zoned';

/** Weekday labels as they appear in the data file, Monday first. */
export const WEEKDAYS = [
  'Понедельник',
  'Вторник',
  'Среда',
  'Четверг',
  'Пятница',
  'Суббота',
  'Воскресенье',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Monday=0 … Sunday=6. */
export function weekdayIndex(label: string): number {
  const trimmed = label.trim();
  const index = WEEKDAYS.findIndex((day) => day === trimmed);
  if (index < 0) {
    throw new ConfigurationError(`Unknown weekday label "${label}"`);
  }
  return index;
}

/** Label for an index; indexes outside 0…6 wrap around the week. */
export function weekdayLabel(index: number): Weekday {
  return WEEKDAYS[((index % 7) + 7) % 7];
}

export function weekdayAt(date: Date, timeZone: string): Weekday {
  return weekdayLabel(dayOfWeek(getZonedParts(date, timeZone)));
}
