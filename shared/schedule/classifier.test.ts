import { describe, expect, it } from 'vitest';
import type { Activity } from './types';
import {
  ScheduleContractError,
  classify,
  sortActivities,
  summarizeSchedule,
  timeRemainingCurrent,
  timeUntilNext,
} from './classifier';

const UTC = 'UTC';
const MINUTE = 60_000;

const at = (time: string, date = '2024-01-01') => Date.parse(`${date}T${time}:00Z`);

const activity = (id: string, start: string, end: string, description = id, date = '2024-01-01'): Activity => ({
  id,
  date,
  start: `${start}:00`,
  end: `${end}:00`,
  description,
});

const dayPlan = [activity('a', '08:00', '09:00', 'A'), activity('b', '09:00', '10:00', 'B'), activity('c', '10:00', '11:00', 'C')];

describe('classify', () => {
  it('marks the running activity and the one after it', () => {
    const rows = classify(dayPlan, at('08:30'), UTC);
    expect(rows.map((row) => row.status)).toEqual(['in_progress', 'next', 'future']);
  });

  it('completes activities whose end has passed', () => {
    const rows = classify(dayPlan, at('09:30'), UTC);
    expect(rows.map((row) => row.status)).toEqual(['completed', 'in_progress', 'next']);
  });

  it('treats the end instant as completed and the start instant as in progress', () => {
    const rows = classify(dayPlan, at('09:00'), UTC);
    expect(rows.map((row) => row.status)).toEqual(['completed', 'in_progress', 'next']);
  });

  it('returns an empty list for an empty schedule', () => {
    expect(classify([], at('12:00'), UTC)).toEqual([]);
  });

  it('sorts by date then start before classifying', () => {
    const shuffled = [
      activity('late', '07:00', '08:00', 'Late', '2024-01-02'),
      activity('b', '09:00', '10:00'),
      activity('a', '08:00', '09:00'),
    ];
    const rows = classify(shuffled, at('07:00'), UTC);
    expect(rows.map((row) => row.activity.id)).toEqual(['a', 'b', 'late']);
    expect(rows.map((row) => row.status)).toEqual(['next', 'future', 'future']);
  });

  it('breaks start-time ties by insertion order', () => {
    const tied = [activity('first', '10:00', '11:00'), activity('second', '10:00', '10:30')];
    const rows = classify(tied, at('09:00'), UTC);
    expect(rows.map((row) => [row.activity.id, row.status])).toEqual([
      ['first', 'next'],
      ['second', 'future'],
    ]);
  });

  it('marks every overlapping activity as in progress', () => {
    const overlapping = [activity('a', '09:00', '10:00'), activity('b', '09:30', '10:30')];
    const rows = classify(overlapping, at('09:45'), UTC);
    expect(rows.map((row) => row.status)).toEqual(['in_progress', 'in_progress']);
  });

  it('reports instants and duration of each activity', () => {
    const [row] = classify([activity('a', '08:00', '09:30')], at('07:00'), UTC);
    expect(row.startsAt).toBe(at('08:00'));
    expect(row.endsAt).toBe(at('09:30'));
    expect(row.durationMs).toBe(90 * MINUTE);
  });

  it('interprets wall-clock times in the schedule time zone', () => {
    // Brasília is UTC-3 all year.
    const [row] = classify([activity('a', '08:00', '09:00')], Date.parse('2024-01-01T11:30:00Z'), 'America/Sao_Paulo');
    expect(row.startsAt).toBe(Date.parse('2024-01-01T11:00:00Z'));
    expect(row.status).toBe('in_progress');
  });

  it('classifies an activity that runs into a skipped hour', () => {
    const night = activity('n', '01:30', '02:15', 'Night stint', '2024-03-10');
    const summary = summarizeSchedule([night], Date.parse('2024-03-10T06:45:00Z'), 'America/New_York');
    expect(summary.rows[0].status).toBe('in_progress');
    expect(summary.rows[0].durationMs).toBe(30 * MINUTE);
    expect(summary.timeRemainingCurrentMs).toBe(15 * MINUTE);
    expect(summary.currentProgress).toBe(0.5);
  });

  it('accepts a Date as the reference time', () => {
    const rows = classify(dayPlan, new Date(at('10:15')), UTC);
    expect(rows.map((row) => row.status)).toEqual(['completed', 'completed', 'in_progress']);
  });

  it('does not mutate its input and gives the same answer twice', () => {
    const input = [dayPlan[2], dayPlan[0], dayPlan[1]];
    const copy = input.map((item) => ({ ...item }));
    const first = classify(input, at('09:10'), UTC);
    const second = classify(input, at('09:10'), UTC);
    expect(second).toEqual(first);
    expect(input).toEqual(copy);
  });

  it('rejects activities that skipped ingestion', () => {
    const broken: Activity = { id: 'x', date: '2024-01-01', start: '10:00:00', end: '09:00:00', description: 'X' };
    expect(() => classify([broken], at('08:00'), UTC)).toThrow(ScheduleContractError);

    const unparsable: Activity = { id: 'y', date: '01/01/2024', start: '10:00:00', end: '11:00:00', description: 'Y' };
    expect(() => classify([unparsable], at('08:00'), UTC)).toThrow('Activity y (Y): unparsable date or time');
  });
});

describe('countdowns', () => {
  it('measures the current activity and the next one', () => {
    expect(timeUntilNext(dayPlan, at('08:30'), UTC)).toBe(30 * MINUTE);
    expect(timeRemainingCurrent(dayPlan, at('08:30'), UTC)).toBe(30 * MINUTE);
  });

  it('uses the soonest-ending activity when several overlap', () => {
    const overlapping = [activity('a', '09:00', '10:00', 'A'), activity('b', '09:30', '10:30', 'B')];
    expect(timeRemainingCurrent(overlapping, at('09:45'), UTC)).toBe(15 * MINUTE);
    expect(timeUntilNext(overlapping, at('09:45'), UTC)).toBeNull();
  });

  it('is absent for an empty schedule', () => {
    expect(timeRemainingCurrent([], at('09:00'), UTC)).toBeNull();
    expect(timeUntilNext([], at('09:00'), UTC)).toBeNull();
  });

  it('is absent once everything is over', () => {
    const rows = classify(dayPlan, at('12:00'), UTC);
    expect(rows.every((row) => row.status === 'completed')).toBe(true);
    expect(timeRemainingCurrent(dayPlan, at('12:00'), UTC)).toBeNull();
    expect(timeUntilNext(dayPlan, at('12:00'), UTC)).toBeNull();
  });

  it('has no current activity in a gap between activities', () => {
    const gapped = [activity('a', '08:00', '09:00'), activity('b', '10:00', '11:00')];
    expect(timeRemainingCurrent(gapped, at('09:20'), UTC)).toBeNull();
    expect(timeUntilNext(gapped, at('09:20'), UTC)).toBe(40 * MINUTE);
  });
});

describe('summarizeSchedule', () => {
  it('collects metrics for one refresh', () => {
    const summary = summarizeSchedule(dayPlan, at('09:15'), UTC);
    expect(summary.now).toBe(at('09:15'));
    expect(summary.current?.activity.id).toBe('b');
    expect(summary.next?.activity.id).toBe('c');
    expect(summary.timeRemainingCurrentMs).toBe(45 * MINUTE);
    expect(summary.timeUntilNextMs).toBe(45 * MINUTE);
    expect(summary.completedCount).toBe(1);
    expect(summary.total).toBe(3);
    expect(summary.currentProgress).toBe(0.25);
  });

  it('picks the soonest-ending overlapping activity as current', () => {
    const overlapping = [activity('long', '09:00', '11:00'), activity('short', '09:30', '10:00')];
    const summary = summarizeSchedule(overlapping, at('09:40'), UTC);
    expect(summary.current?.activity.id).toBe('short');
    expect(summary.timeRemainingCurrentMs).toBe(20 * MINUTE);
  });

  it('is empty for an empty schedule', () => {
    expect(summarizeSchedule([], at('09:00'), UTC)).toEqual({
      now: at('09:00'),
      rows: [],
      current: null,
      next: null,
      timeRemainingCurrentMs: null,
      timeUntilNextMs: null,
      completedCount: 0,
      total: 0,
      currentProgress: null,
    });
  });
});

describe('sortActivities', () => {
  it('returns a new array', () => {
    const input = [activity('b', '09:00', '10:00'), activity('a', '08:00', '09:00')];
    const sorted = sortActivities(input);
    expect(sorted).not.toBe(input);
    expect(sorted.map((item) => item.id)).toEqual(['a', 'b']);
    expect(input.map((item) => item.id)).toEqual(['b', 'a']);
  });
});
