import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { Activity, ActivityDraft, IngestionIssue } from '../../shared/schedule';
import { DEFAULT_TIME_ZONE, IngestionError, sortActivities, validateActivityInput } from '../../shared/schedule';

export interface StoredSchedule {
  activities: Activity[];
  updatedAt: string;
}

export interface ScheduleSnapshot {
  readonly activities: readonly Activity[];
  readonly updatedAt: string;
}

export interface ActivityEntry extends ActivityDraft {
  id?: string;
}

export interface ScheduleStore {
  init(): Promise<void>;
  read(): Promise<ScheduleSnapshot>;
  add(draft: ActivityDraft): Promise<Activity>;
  replace(id: string, draft: ActivityDraft): Promise<Activity | null>;
  remove(id: string): Promise<boolean>;
  replaceAll(entries: readonly ActivityEntry[]): Promise<ScheduleSnapshot>;
}

const EMPTY_UPDATED_AT = new Date(0).toISOString();

const freezeSnapshot = (activities: readonly Activity[], updatedAt: string): ScheduleSnapshot =>
  Object.freeze({
    activities: Object.freeze(sortActivities(activities).map((activity) => Object.freeze({ ...activity }))),
    updatedAt,
  });

const requireValid = (draft: ActivityDraft, timeZone: string): ActivityDraft => {
  const result = validateActivityInput(draft, null, timeZone);
  if (!result.ok) {
    throw new IngestionError([result.issue]);
  }
  return result.draft;
};

const sanitizeActivities = (input: unknown, timeZone: string): Activity[] => {
  if (!Array.isArray(input)) {
    return [];
  }

  const seenIds = new Set<string>();
  const result: Activity[] = [];

  input.forEach((value: unknown, index) => {
    if (!value || typeof value !== 'object') {
      console.warn(`⚠️ [STORE] Dropping stored entry #${index}: not an object`);
      return;
    }

    const entry = value as Partial<Record<keyof Activity, unknown>>;
    const id = typeof entry.id === 'string' ? entry.id.trim() : '';
    if (!id || seenIds.has(id)) {
      console.warn(`⚠️ [STORE] Dropping stored entry #${index}: missing or duplicate id`);
      return;
    }

    const validated = validateActivityInput(entry, null, timeZone);
    if (!validated.ok) {
      console.warn(`⚠️ [STORE] Dropping stored entry #${index} (${id}): ${validated.issue.message}`);
      return;
    }

    seenIds.add(id);
    result.push({ id, ...validated.draft });
  });

  return result;
};

const sanitizeSchedule = (input: unknown, timeZone: string): StoredSchedule => {
  if (!input || typeof input !== 'object') {
    return { activities: [], updatedAt: EMPTY_UPDATED_AT };
  }

  const source = input as Partial<Record<keyof StoredSchedule, unknown>>;
  return {
    activities: sanitizeActivities(source.activities, timeZone),
    updatedAt: typeof source.updatedAt === 'string' ? source.updatedAt : EMPTY_UPDATED_AT,
  };
};

/**
 * Keeps the schedule in one JSON file. Writes go through a single queue and are
 * published by rename, so readers only ever see a complete snapshot. Activities are
 * validated against `timeZone`, the zone the board classifies them in.
 */
export const createScheduleStore = (filePath: string, timeZone: string = DEFAULT_TIME_ZONE): ScheduleStore => {
  let current: ScheduleSnapshot | null = null;
  let queue: Promise<unknown> = Promise.resolve();

  const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
    const run = queue.then(task, task);
    // A failed write rejects `run` for its caller; the queue itself moves on.
    queue = run.catch(() => undefined);
    return run;
  };

  const ensureDataDir = async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
  };

  const load = async (): Promise<ScheduleSnapshot> => {
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      const stored = sanitizeSchedule(JSON.parse(raw), timeZone);
      console.log(`📂 [STORE] Loaded ${stored.activities.length} activities from ${filePath}`);
      return freezeSnapshot(stored.activities, stored.updatedAt);
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException)?.code === 'ENOENT') {
        console.log(`📂 [STORE] ${filePath} not found, starting with an empty schedule`);
        return freezeSnapshot([], EMPTY_UPDATED_AT);
      }
      throw error;
    }
  };

  const snapshot = async (): Promise<ScheduleSnapshot> => {
    if (!current) {
      current = await load();
    }
    return current;
  };

  const publish = async (activities: readonly Activity[]): Promise<ScheduleSnapshot> => {
    await ensureDataDir();

    const next = freezeSnapshot(activities, new Date().toISOString());
    const stored: StoredSchedule = { activities: [...next.activities], updatedAt: next.updatedAt };
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;

    await fs.writeFile(tempPath, JSON.stringify(stored, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);

    current = next;
    console.log(`💾 [STORE] Saved ${next.activities.length} activities`);
    return next;
  };

  return {
    init: async () => {
      await ensureDataDir();
      await enqueue(snapshot);
    },

    read: () => enqueue(snapshot),

    add: (draft) =>
      enqueue(async () => {
        const activity: Activity = { id: randomUUID(), ...requireValid(draft, timeZone) };
        const { activities } = await snapshot();
        await publish([...activities, activity]);
        return activity;
      }),

    replace: (id, draft) =>
      enqueue(async () => {
        const valid = requireValid(draft, timeZone);
        const { activities } = await snapshot();
        if (!activities.some((activity) => activity.id === id)) {
          return null;
        }
        const replacement: Activity = { id, ...valid };
        await publish(activities.map((activity) => (activity.id === id ? replacement : activity)));
        return replacement;
      }),

    remove: (id) =>
      enqueue(async () => {
        const { activities } = await snapshot();
        const remaining = activities.filter((activity) => activity.id !== id);
        if (remaining.length === activities.length) {
          return false;
        }
        await publish(remaining);
        return true;
      }),

    replaceAll: (entries) =>
      enqueue(async () => {
        const issues: IngestionIssue[] = [];
        const activities: Activity[] = [];
        const usedIds = new Set<string>();

        entries.forEach((entry, index) => {
          const result = validateActivityInput(entry, index + 1, timeZone);
          if (!result.ok) {
            issues.push(result.issue);
            return;
          }
          const id = entry.id && !usedIds.has(entry.id) ? entry.id : randomUUID();
          usedIds.add(id);
          activities.push({ id, ...result.draft });
        });

        if (issues.length > 0) {
          throw new IngestionError(issues);
        }
        return publish(activities);
      }),
  };
};
