import type { Activity, ActivityDraft, IngestionIssue } from '../../../shared/schedule';
import type { DashboardConfig, ImportResult, ScheduleSnapshot } from '../types';
import { buildApiUrl } from './api';

/**
 * A non-2xx answer from the API. `issues` lists rejected rows when the server sent them.
 */
export class ApiRequestError extends Error {
  readonly status: number;
  readonly issues: IngestionIssue[];

  constructor(message: string, status: number, issues: IngestionIssue[] = []) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.issues = issues;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readError = async (response: Response): Promise<ApiRequestError> => {
  let message = `Request failed with status ${response.status}`;
  let issues: IngestionIssue[] = [];
  try {
    const payload: unknown = await response.json();
    if (isRecord(payload)) {
      if (typeof payload.error === 'string') {
        message = payload.error;
      }
      if (Array.isArray(payload.issues)) {
        issues = payload.issues;
      }
    }
  } catch (error) {
    console.warn('Failed to read API error body:', error);
  }
  return new ApiRequestError(message, response.status, issues);
};

const handleResponse = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw await readError(response);
  }
  const payload: T = await response.json();
  return payload;
};

const sendJson = (path: string, method: string, body: unknown) =>
  fetch(buildApiUrl(path), {
    method,
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(body),
  });

export const scheduleExportUrl = (): string => buildApiUrl('/api/schedule/export');

export const fetchDashboardConfig = async (): Promise<DashboardConfig> => {
  const response = await fetch(buildApiUrl('/api/config'));
  return handleResponse<DashboardConfig>(response);
};

export const fetchSchedule = async (): Promise<ScheduleSnapshot> => {
  const response = await fetch(buildApiUrl('/api/schedule'));
  return handleResponse<ScheduleSnapshot>(response);
};

export const createActivity = async (draft: ActivityDraft): Promise<Activity> => {
  const response = await sendJson('/api/schedule/activities', 'POST', draft);
  return handleResponse<Activity>(response);
};

/**
 * Bulk save from the editor. The server writes every row or none of them.
 */
export const saveSchedule = async (
  activities: ReadonlyArray<ActivityDraft & { id?: string }>,
): Promise<ScheduleSnapshot> => {
  const response = await sendJson('/api/schedule', 'PUT', { activities });
  return handleResponse<ScheduleSnapshot>(response);
};

export const importScheduleCsv = async (csv: string): Promise<ImportResult> => {
  const response = await fetch(buildApiUrl('/api/schedule/import'), {
    method: 'POST',
    headers: {
      'Content-Type': 'text/csv',
    },
    body: csv,
  });
  return handleResponse<ImportResult>(response);
};
