import type { Activity, IngestionIssue, ScheduleStatus } from '../../../shared/schedule';

export type Page = 'board' | 'edit';

/**
 * Settings the server hands to the dashboard on start.
 */
export interface DashboardConfig {
  timeZone: string;
  refreshIntervalMs: number;
}

export interface ScheduleSnapshot {
  activities: Activity[];
  updatedAt: string;
}

export interface ImportResult extends ScheduleSnapshot {
  rejected: IngestionIssue[];
}

/**
 * An editor row. `id` is absent for rows the server has not seen yet.
 */
export interface EditableActivity {
  key: string;
  id?: string;
  date: string;
  start: string;
  end: string;
  description: string;
}

/**
 * Row colors of the status table
 */
export const STATUS_COLORS: Record<ScheduleStatus, string> = {
  completed: '#c8f7c5',
  in_progress: '#58d68d',
  next: '#f9e79f',
  future: '#ecf0f1',
};

/**
 * Status names shown on the board
 */
export const STATUS_LABELS: Record<ScheduleStatus, string> = {
  completed: 'Completed',
  in_progress: 'In progress',
  next: 'Next',
  future: 'Upcoming',
};

export const EMPTY_METRIC = '--';
