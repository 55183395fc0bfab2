import { ConfigurationError, errorMessage } from '../errors';
import { Weekday, weekdayIndex, weekdayLabel } from '../time/weekday';
import { addDays, dayOfWeek, getZonedParts, zonedLocalToUtc } from '../time/zoned';
import { CompanyEvent } from '../types';

export const DAILY_DIGEST_JOB = 'daily_digest';
export const REMINDER_LEAD_MINUTES = 15;

const MINUTES_PER_DAY = 24 * 60;

export interface ClockTime {
  hour: number;
  minute: number;
}

export const DIGEST_TIME: ClockTime = { hour: 9, minute: 0 };

export type ScheduledTrigger =
  | { kind: 'daily'; name: string; fireTime: ClockTime }
  | { kind: 'weekly'; name: string; weekday: Weekday; fireTime: ClockTime; payload: CompanyEvent };

export interface SkippedEvent {
  event: CompanyEvent;
  reason: string;
}

/** Parses a 24-hour "HH:MM" (or "H:MM") clock string. */
export function parseClockTime(value: string): ClockTime {
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  const hour = match ? Number(match[1]) : NaN;
  const minute = match ? Number(match[2]) : NaN;
  if (!(hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59)) {
    throw new ConfigurationError(`Invalid time "${value}", expected HH:MM`);
  }
  return { hour, minute };
}

export function dailyDigestTrigger(): ScheduledTrigger {
  return { kind: 'daily', name: DAILY_DIGEST_JOB, fireTime: { ...DIGEST_TIME } };
}

/**
 * Weekly reminder fired REMINDER_LEAD_MINUTES before the event. When that
 * crosses midnight the reminder belongs to the previous weekday
 * (Monday 00:05 → Sunday 23:50).
 */
export function reminderTrigger(event: CompanyEvent): ScheduledTrigger {
  const eventDay = weekdayIndex(event.day);
  const eventTime = parseClockTime(event.time);

  let minutes = eventTime.hour * 60 + eventTime.minute - REMINDER_LEAD_MINUTES;
  let day = eventDay;
  if (minutes < 0) {
    minutes += MINUTES_PER_DAY;
    day -= 1;
  }

  return {
    kind: 'weekly',
    name: `reminder_${eventDay}_${event.time}`,
    weekday: weekdayLabel(day),
    fireTime: { hour: Math.floor(minutes / 60), minute: minutes % 60 },
    payload: { ...event },
  };
}

/**
 * Reminder triggers for every well-formed event. A malformed event is reported
 * in `skipped` and does not affect the others; duplicates are kept.
 */
export function buildReminderTriggers(events: CompanyEvent[]): {
  triggers: ScheduledTrigger[];
  skipped: SkippedEvent[];
} {
  const triggers: ScheduledTrigger[] = [];
  const skipped: SkippedEvent[] = [];

  for (const event of events) {
    try {
      triggers.push(reminderTrigger(event));
    } catch (error) {
      skipped.push({ event, reason: errorMessage(error) });
    }
  }

  return { triggers, skipped };
}

/** Five-field cron expression; cron counts days of week from Sunday=0. */
export function toCronExpression(trigger: ScheduledTrigger): string {
  const { hour, minute } = trigger.fireTime;
  if (trigger.kind === 'daily') {
    return `${minute} ${hour} * * *`;
  }
  const cronDay = (weekdayIndex(trigger.weekday) + 1) % 7;
  return `${minute} ${hour} * * ${cronDay}`;
}

/** First instant strictly after `from` at which the trigger fires on the zone's wall clock. */
export function nextFireTime(trigger: ScheduledTrigger, timeZone: string, from: Date): Date {
  const today = getZonedParts(from, timeZone);

  for (let offset = 0; offset <= 7; offset++) {
    const date = addDays(today, offset);
    if (trigger.kind === 'weekly' && dayOfWeek(date) !== weekdayIndex(trigger.weekday)) continue;

    const at = zonedLocalToUtc({ timeZone, ...date, ...trigger.fireTime });
    if (at.getTime() > from.getTime()) return at;
  }

  throw new Error(`No fire time found for ${trigger.name} within a week of ${from.toISOString()}`);
}
