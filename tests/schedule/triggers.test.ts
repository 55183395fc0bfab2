import { ConfigurationError } from '../../src/errors';
import {
  buildReminderTriggers,
  dailyDigestTrigger,
  nextFireTime,
  parseClockTime,
  reminderTrigger,
  toCronExpression,
} from '../../src/schedule/triggers';
import { getZonedParts } from '../../src/time/zoned';
import { CompanyEvent } from '../../src/types';

const event = (day: string, time: string, title = 'Встреча'): CompanyEvent => ({
  day,
  time,
  title,
  description: 'Описание',
});

describe('Clock times', () => {
  test('parses HH:MM and H:MM', () => {
    expect(parseClockTime('09:10')).toEqual({ hour: 9, minute: 10 });
    expect(parseClockTime('9:05')).toEqual({ hour: 9, minute: 5 });
    expect(parseClockTime('23:59')).toEqual({ hour: 23, minute: 59 });
  });

  test.each(['24:00', '12:60', 'noon', '12:5', '', '12:30:00'])('rejects "%s"', (value) => {
    expect(() => parseClockTime(value)).toThrow(ConfigurationError);
  });
});

describe('Trigger derivation', () => {
  test('daily digest fires at 09:00 every day', () => {
    const trigger = dailyDigestTrigger();
    expect(trigger).toEqual({ kind: 'daily', name: 'daily_digest', fireTime: { hour: 9, minute: 0 } });
    expect(toCronExpression(trigger)).toBe('0 9 * * *');
  });

  test('reminder fires 15 minutes before a Friday 09:10 event', () => {
    const trigger = reminderTrigger(event('Пятница', '09:10', 'Ретро'));

    expect(trigger).toEqual({
      kind: 'weekly',
      name: 'reminder_4_09:10',
      weekday: 'Пятница',
      fireTime: { hour: 8, minute: 55 },
      payload: event('Пятница', '09:10', 'Ретро'),
    });
    expect(toCronExpression(trigger)).toBe('55 8 * * 5');
  });

  test('reminder for Monday 00:05 moves to Sunday 23:50', () => {
    const trigger = reminderTrigger(event('Понедельник', '00:05'));

    expect(trigger.kind).toBe('weekly');
    if (trigger.kind !== 'weekly') return;
    expect(trigger.weekday).toBe('Воскресенье');
    expect(trigger.fireTime).toEqual({ hour: 23, minute: 50 });
    expect(trigger.name).toBe('reminder_0_00:05');
    expect(toCronExpression(trigger)).toBe('50 23 * * 0');
  });

  test('reminder exactly at midnight stays on the event day', () => {
    const trigger = reminderTrigger(event('Понедельник', '00:15'));

    if (trigger.kind !== 'weekly') throw new Error('expected a weekly trigger');
    expect(trigger.weekday).toBe('Понедельник');
    expect(trigger.fireTime).toEqual({ hour: 0, minute: 0 });
    expect(toCronExpression(trigger)).toBe('0 0 * * 1');
  });

  test('reminder crossing midnight on Wednesday lands on Tuesday', () => {
    const trigger = reminderTrigger(event('Среда', '0:10'));

    if (trigger.kind !== 'weekly') throw new Error('expected a weekly trigger');
    expect(trigger.weekday).toBe('Вторник');
    expect(trigger.fireTime).toEqual({ hour: 23, minute: 55 });
  });

  test('skips malformed events and keeps the rest, duplicates included', () => {
    const events = [
      event('Пятница', '09:10'),
      event('Funday', '10:00'),
      event('Среда', '25:00'),
      event('Пятница', '09:10'),
    ];

    const { triggers, skipped } = buildReminderTriggers(events);

    expect(triggers.map((t) => t.name)).toEqual(['reminder_4_09:10', 'reminder_4_09:10']);
    expect(skipped).toEqual([
      { event: events[1], reason: 'Unknown weekday label "Funday"' },
      { event: events[2], reason: 'Invalid time "25:00", expected HH:MM' },
    ]);
  });

  test('no events means no reminders', () => {
    expect(buildReminderTriggers([])).toEqual({ triggers: [], skipped: [] });
  });
});

describe('Next fire time', () => {
  test('daily digest stays at 09:00 local when New York springs forward', () => {
    const trigger = dailyDigestTrigger();

    const saturday = nextFireTime(trigger, 'America/New_York', new Date('2024-03-09T12:00:00Z'));
    const sunday = nextFireTime(trigger, 'America/New_York', new Date('2024-03-09T15:00:00Z'));
    const monday = nextFireTime(trigger, 'America/New_York', new Date('2024-03-10T13:30:00Z'));

    expect(saturday.toISOString()).toBe('2024-03-09T14:00:00.000Z');
    expect(sunday.toISOString()).toBe('2024-03-10T13:00:00.000Z');
    expect(monday.toISOString()).toBe('2024-03-11T13:00:00.000Z');
    for (const at of [saturday, sunday, monday]) {
      const local = getZonedParts(at, 'America/New_York');
      expect([local.hour, local.minute]).toEqual([9, 0]);
    }
  });

  test('daily digest stays at 09:00 local when Berlin falls back', () => {
    const at = nextFireTime(dailyDigestTrigger(), 'Europe/Berlin', new Date('2024-10-26T08:00:00Z'));
    expect(at.toISOString()).toBe('2024-10-27T08:00:00.000Z');
  });

  test('daily digest in Moscow is 06:00 UTC', () => {
    const at = nextFireTime(dailyDigestTrigger(), 'Europe/Moscow', new Date('2024-01-01T00:00:00Z'));
    expect(at.toISOString()).toBe('2024-01-01T06:00:00.000Z');
  });

  test('weekly reminder waits for its weekday', () => {
    const friday = reminderTrigger(event('Пятница', '09:10'));
    const at = nextFireTime(friday, 'Europe/Moscow', new Date('2024-01-01T00:00:00Z'));
    expect(at.toISOString()).toBe('2024-01-05T05:55:00.000Z');
  });

  test('shifted reminder fires on the previous Sunday evening', () => {
    const monday = reminderTrigger(event('Понедельник', '00:05'));
    const at = nextFireTime(monday, 'Europe/Moscow', new Date('2024-01-01T00:00:00Z'));
    expect(at.toISOString()).toBe('2024-01-07T20:50:00.000Z');
  });

  test('weekly reminder already past today moves to next week', () => {
    const friday = reminderTrigger(event('Пятница', '09:10'));
    const at = nextFireTime(friday, 'Europe/Moscow', new Date('2024-01-05T06:00:00Z'));
    expect(at.toISOString()).toBe('2024-01-12T05:55:00.000Z');
  });
});
