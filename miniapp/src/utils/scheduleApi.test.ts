import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiRequestError, createActivity, fetchSchedule, importScheduleCsv, scheduleExportUrl } from './scheduleApi';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('scheduleApi', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.stubEnv('MINIAPP_API_BASE', 'http://schedule.test/');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('builds URLs against the configured API base', () => {
    expect(scheduleExportUrl()).toBe('http://schedule.test/api/schedule/export');
  });

  it('fetches the schedule snapshot', async () => {
    const snapshot = { activities: [], updatedAt: '2024-01-01T00:00:00.000Z' };
    fetchMock.mockResolvedValue(jsonResponse(snapshot));

    await expect(fetchSchedule()).resolves.toEqual(snapshot);
    expect(fetchMock).toHaveBeenCalledWith('http://schedule.test/api/schedule');
  });

  it('turns a rejected activity into an ApiRequestError carrying the issues', async () => {
    const issue = { kind: 'InvariantViolation', row: null, field: 'end', message: 'End 09:00:00 must be after start 10:00:00' };
    fetchMock.mockResolvedValue(jsonResponse({ error: 'Invalid activity', issues: [issue] }, 400));

    const failure = createActivity({ date: '2024-01-01', start: '10:00:00', end: '09:00:00', description: 'Backwards' });
    await expect(failure).rejects.toBeInstanceOf(ApiRequestError);
    await expect(failure).rejects.toMatchObject({ message: 'Invalid activity', status: 400, issues: [issue] });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://schedule.test/api/schedule/activities');
    expect(init).toMatchObject({ method: 'POST', headers: { 'Content-Type': 'application/json' } });
  });

  it('falls back to the status code when the error body is not JSON', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    fetchMock.mockResolvedValue(new Response('gateway down', { status: 502 }));

    await expect(fetchSchedule()).rejects.toMatchObject({ message: 'Request failed with status 502', issues: [] });
  });

  it('posts CSV text as text/csv', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ activities: [], updatedAt: 'x', rejected: [] }));

    await importScheduleCsv('Date,Start,End,Activity\n');

    expect(fetchMock).toHaveBeenCalledWith('http://schedule.test/api/schedule/import', {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body: 'Date,Start,End,Activity\n',
    });
  });
});
