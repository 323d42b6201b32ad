import type { Activity, ClassifiedActivity, ScheduleStatus, ScheduleSummary } from './types';
import { DEFAULT_TIME_ZONE } from './types';
import { zonedDateTimeToInstant } from './time';

/**
 * Raised when an activity that never went through ingestion reaches the classifier.
 */
export class ScheduleContractError extends Error {
  readonly activityId: string;

  constructor(activity: Activity, reason: string) {
    super(`Activity ${activity.id} (${activity.description}): ${reason}`);
    this.name = 'ScheduleContractError';
    this.activityId = activity.id;
  }
}

type TimedActivity = Omit<ClassifiedActivity, 'status'>;

const toMillis = (now: Date | number): number => (typeof now === 'number' ? now : now.getTime());

/**
 * Sorts by (date, start). Array#sort is stable, so equal keys keep insertion order.
 */
export const sortActivities = <T extends Pick<Activity, 'date' | 'start'>>(activities: readonly T[]): T[] =>
  [...activities].sort((a, b) => {
    if (a.date !== b.date) {
      return a.date < b.date ? -1 : 1;
    }
    if (a.start !== b.start) {
      return a.start < b.start ? -1 : 1;
    }
    return 0;
  });

const resolveTimes = (activity: Activity, timeZone: string): TimedActivity => {
  const startsAt = zonedDateTimeToInstant(activity.date, activity.start, timeZone);
  const endsAt = zonedDateTimeToInstant(activity.date, activity.end, timeZone);
  if (startsAt === null || endsAt === null) {
    throw new ScheduleContractError(activity, 'unparsable date or time');
  }
  if (endsAt <= startsAt) {
    throw new ScheduleContractError(activity, 'end is not after start');
  }
  return { activity, startsAt, endsAt, durationMs: endsAt - startsAt };
};

const statusAt = (timed: TimedActivity, now: number): Exclude<ScheduleStatus, 'next'> => {
  if (now >= timed.endsAt) {
    return 'completed';
  }
  if (timed.startsAt <= now) {
    return 'in_progress';
  }
  return 'future';
};

export const classify = (
  activities: readonly Activity[],
  now: Date | number,
  timeZone: string = DEFAULT_TIME_ZONE,
): ClassifiedActivity[] => {
  const instant = toMillis(now);
  let nextAssigned = false;

  return sortActivities(activities)
    .map((activity) => resolveTimes(activity, timeZone))
    .map((timed): ClassifiedActivity => {
      const status = statusAt(timed, instant);
      if (status === 'future' && !nextAssigned) {
        nextAssigned = true;
        return { ...timed, status: 'next' };
      }
      return { ...timed, status };
    });
};

const findCurrent = (rows: readonly ClassifiedActivity[]): ClassifiedActivity | null =>
  rows.reduce<ClassifiedActivity | null>((soonest, row) => {
    if (row.status !== 'in_progress') {
      return soonest;
    }
    return soonest === null || row.endsAt < soonest.endsAt ? row : soonest;
  }, null);

const findNext = (rows: readonly ClassifiedActivity[]): ClassifiedActivity | null =>
  rows.find((row) => row.status === 'next') ?? null;

/**
 * Time left in the soonest-ending in-progress activity, in milliseconds.
 */
export const timeRemainingCurrent = (
  activities: readonly Activity[],
  now: Date | number,
  timeZone: string = DEFAULT_TIME_ZONE,
): number | null => {
  const current = findCurrent(classify(activities, now, timeZone));
  return current ? current.endsAt - toMillis(now) : null;
};

export const timeUntilNext = (
  activities: readonly Activity[],
  now: Date | number,
  timeZone: string = DEFAULT_TIME_ZONE,
): number | null => {
  const next = findNext(classify(activities, now, timeZone));
  return next ? next.startsAt - toMillis(now) : null;
};

/**
 * Everything one refresh of the board needs, from a single classification pass.
 */
export const summarizeSchedule = (
  activities: readonly Activity[],
  now: Date | number,
  timeZone: string = DEFAULT_TIME_ZONE,
): ScheduleSummary => {
  const instant = toMillis(now);
  const rows = classify(activities, instant, timeZone);
  const current = findCurrent(rows);
  const next = findNext(rows);

  let currentProgress: number | null = null;
  if (current) {
    const elapsed = instant - current.startsAt;
    currentProgress = Math.max(0, Math.min(1, elapsed / current.durationMs));
  }

  return {
    now: instant,
    rows,
    current,
    next,
    timeRemainingCurrentMs: current ? current.endsAt - instant : null,
    timeUntilNextMs: next ? next.startsAt - instant : null,
    completedCount: rows.filter((row) => row.status === 'completed').length,
    total: rows.length,
    currentProgress,
  };
};
