import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import path from 'path';
import {
  IngestionError,
  formatDuration,
  formatZonedDateTime,
  parseScheduleCsv,
  serializeScheduleCsv,
  summarizeSchedule,
  validateActivityBatch,
  validateActivityInput,
} from '../shared/schedule';
import type { ActivityInput, IngestionIssue } from '../shared/schedule';
import type { AppConfig } from './config';
import type { ActivityEntry, ScheduleStore } from './storage/scheduleStore';

const API_BASE_PATH = '/api';
const CSV_FILE_NAME = 'schedule.csv';
// Largest magnitude a Date can hold.
const MAX_DATE_MS = 8.64e15;

export interface AppDependencies {
  config: AppConfig;
  store: ScheduleStore;
  clock?: () => number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toActivityInput = (value: unknown): ActivityInput & { id?: string } => {
  if (!isRecord(value)) {
    return {};
  }
  return {
    id: typeof value.id === 'string' ? value.id : undefined,
    date: value.date,
    start: value.start,
    end: value.end,
    description: value.description,
  };
};

const parseNow = (raw: unknown, fallback: number): number | null => {
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return null;
  }
  const trimmed = raw.trim();
  const value = /^-?\d+$/.test(trimmed) ? Number(trimmed) : Date.parse(trimmed);
  return Number.isFinite(value) && Math.abs(value) <= MAX_DATE_MS ? value : null;
};

const sendIssues = (res: Response, error: string, issues: IngestionIssue[]) => {
  res.status(400).json({ error, issues });
};

export const createApp = ({ config, store, clock = Date.now }: AppDependencies) => {
  const app = express();

  app.use(
    cors({
      origin: true,
    }),
  );

  app.use(
    express.json({
      limit: '1mb',
    }),
  );

  app.use(API_BASE_PATH, (_req, res, next) => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  app.get(`${API_BASE_PATH}/health`, (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get(`${API_BASE_PATH}/config`, (_req, res) => {
    res.json({ timeZone: config.timeZone, refreshIntervalMs: config.refreshIntervalMs });
  });

  app.get(`${API_BASE_PATH}/schedule`, async (_req, res) => {
    try {
      const snapshot = await store.read();
      res.json(snapshot);
    } catch (error) {
      console.error('❌ [API] Failed to read schedule:', error);
      res.status(500).json({ error: 'Failed to read schedule' });
    }
  });

  app.get(`${API_BASE_PATH}/schedule/status`, async (req, res) => {
    const now = parseNow(req.query.now, clock());
    if (now === null) {
      res.status(400).json({ error: 'Invalid "now" parameter' });
      return;
    }

    try {
      const { activities } = await store.read();
      const summary = summarizeSchedule(activities, now, config.timeZone);
      res.json({
        ...summary,
        timeZone: config.timeZone,
        nowLabel: formatZonedDateTime(now, config.timeZone),
        timeRemainingCurrentLabel:
          summary.timeRemainingCurrentMs === null ? null : formatDuration(summary.timeRemainingCurrentMs),
        timeUntilNextLabel: summary.timeUntilNextMs === null ? null : formatDuration(summary.timeUntilNextMs),
      });
    } catch (error) {
      console.error('❌ [API] Failed to classify schedule:', error);
      res.status(500).json({ error: 'Failed to classify schedule' });
    }
  });

  app.post(`${API_BASE_PATH}/schedule/activities`, async (req, res) => {
    const result = validateActivityInput(toActivityInput(req.body), null, config.timeZone);
    if (!result.ok) {
      sendIssues(res, 'Invalid activity', [result.issue]);
      return;
    }

    try {
      const activity = await store.add(result.draft);
      console.log(`➕ [API] Added activity ${activity.id}: ${activity.description}`);
      res.status(201).json(activity);
    } catch (error) {
      console.error('❌ [API] Failed to add activity:', error);
      res.status(500).json({ error: 'Failed to add activity' });
    }
  });

  app.put(`${API_BASE_PATH}/schedule/activities/:id`, async (req, res) => {
    const result = validateActivityInput(toActivityInput(req.body), null, config.timeZone);
    if (!result.ok) {
      sendIssues(res, 'Invalid activity', [result.issue]);
      return;
    }

    try {
      const activity = await store.replace(req.params.id, result.draft);
      if (!activity) {
        res.status(404).json({ error: 'Activity not found' });
        return;
      }
      console.log(`✏️ [API] Replaced activity ${activity.id}`);
      res.json(activity);
    } catch (error) {
      console.error('❌ [API] Failed to replace activity:', error);
      res.status(500).json({ error: 'Failed to replace activity' });
    }
  });

  app.delete(`${API_BASE_PATH}/schedule/activities/:id`, async (req, res) => {
    try {
      const removed = await store.remove(req.params.id);
      if (!removed) {
        res.status(404).json({ error: 'Activity not found' });
        return;
      }
      console.log(`🗑️ [API] Removed activity ${req.params.id}`);
      res.status(204).end();
    } catch (error) {
      console.error('❌ [API] Failed to remove activity:', error);
      res.status(500).json({ error: 'Failed to remove activity' });
    }
  });

  // Bulk editor save: every row must be valid or nothing is written.
  app.put(`${API_BASE_PATH}/schedule`, async (req, res) => {
    const rawActivities: unknown = isRecord(req.body) ? req.body.activities : undefined;
    if (!Array.isArray(rawActivities)) {
      res.status(400).json({ error: 'Body must contain an "activities" array' });
      return;
    }

    const inputs = rawActivities.map((value: unknown) => toActivityInput(value));
    const { drafts, issues } = validateActivityBatch(inputs, config.timeZone);
    if (issues.length > 0) {
      sendIssues(res, 'Schedule has invalid rows', issues);
      return;
    }

    const entries: ActivityEntry[] = drafts.map((draft, index) => ({ ...draft, id: inputs[index].id }));

    try {
      const snapshot = await store.replaceAll(entries);
      console.log(`💾 [API] Schedule saved from editor (${snapshot.activities.length} activities)`);
      res.json(snapshot);
    } catch (error) {
      if (error instanceof IngestionError) {
        sendIssues(res, 'Schedule has invalid rows', error.issues);
        return;
      }
      console.error('❌ [API] Failed to save schedule:', error);
      res.status(500).json({ error: 'Failed to save schedule' });
    }
  });

  app.post(
    `${API_BASE_PATH}/schedule/import`,
    express.text({ type: ['text/csv', 'text/plain'], limit: '1mb' }),
    async (req, res) => {
      if (typeof req.body !== 'string') {
        res.status(400).json({ error: 'CSV body is required (text/csv)' });
        return;
      }

      const { drafts, rejected } = parseScheduleCsv(req.body, config.timeZone);
      if (drafts.length === 0 && rejected.length > 0) {
        console.warn(`⚠️ [API] CSV import rejected entirely (${rejected.length} issues)`);
        sendIssues(res, 'No valid rows in CSV', rejected);
        return;
      }

      try {
        const snapshot = await store.replaceAll(drafts);
        console.log(`📥 [API] Imported ${drafts.length} activities, rejected ${rejected.length} rows`);
        res.json({ ...snapshot, rejected });
      } catch (error) {
        console.error('❌ [API] Failed to import schedule:', error);
        res.status(500).json({ error: 'Failed to import schedule' });
      }
    },
  );

  app.get(`${API_BASE_PATH}/schedule/export`, async (_req, res) => {
    try {
      const { activities } = await store.read();
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${CSV_FILE_NAME}"`);
      res.send(serializeScheduleCsv(activities));
    } catch (error) {
      console.error('❌ [API] Failed to export schedule:', error);
      res.status(500).json({ error: 'Failed to export schedule' });
    }
  });

  app.use(API_BASE_PATH, (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(express.static(config.miniappDistDir));

  app.get('*', (_req, res) => {
    res.sendFile(path.join(config.miniappDistDir, 'index.html'), (error) => {
      if (error) {
        res.status(404).send('Dashboard is not built');
      }
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      isRecord(error) && typeof error.status === 'number' && error.status >= 400 && error.status < 500
        ? error.status
        : 500;
    if (status === 500) {
      console.error('❌ [API] Unhandled error:', error);
    }
    res.status(status).json({ error: status === 500 ? 'Internal server error' : 'Malformed request body' });
  });

  return app;
};
