/**
 * One scheduled item on the track.
 */
export interface Activity {
  id: string;
  date: string; // YYYY-MM-DD
  start: string; // HH:MM:SS
  end: string; // HH:MM:SS
  description: string;
}

export type ActivityDraft = Omit<Activity, 'id'>;

export const SCHEDULE_STATUSES = ['completed', 'in_progress', 'next', 'future'] as const;

export type ScheduleStatus = (typeof SCHEDULE_STATUSES)[number];

export interface ClassifiedActivity {
  activity: Activity;
  status: ScheduleStatus;
  startsAt: number;
  endsAt: number;
  durationMs: number;
}

export interface ScheduleSummary {
  now: number;
  rows: ClassifiedActivity[];
  current: ClassifiedActivity | null;
  next: ClassifiedActivity | null;
  timeRemainingCurrentMs: number | null;
  timeUntilNextMs: number | null;
  completedCount: number;
  total: number;
  currentProgress: number | null;
}

export type ActivityField = 'date' | 'start' | 'end' | 'description';

export type IngestionIssueKind = 'ParseError' | 'InvariantViolation';

export interface IngestionIssue {
  kind: IngestionIssueKind;
  row: number | null;
  field: ActivityField | null;
  message: string;
}

export const DEFAULT_TIME_ZONE = 'America/Sao_Paulo';
