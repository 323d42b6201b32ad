import type { ActivityDraft, ActivityField, IngestionIssue } from './types';
import { DEFAULT_TIME_ZONE } from './types';
import { formatIsoDate, formatTimeOfDay, parseIsoDate, parseTimeOfDay, zonedDateTimeToInstant } from './time';

/**
 * Raw activity values as they arrive from a form, a CSV row or a JSON body.
 */
export interface ActivityInput {
  date?: unknown;
  start?: unknown;
  end?: unknown;
  description?: unknown;
}

export type ValidationResult =
  | { ok: true; draft: ActivityDraft }
  | { ok: false; issue: IngestionIssue };

export interface BatchValidationResult {
  drafts: ActivityDraft[];
  issues: IngestionIssue[];
}

const FIELD_ORDER: ActivityField[] = ['date', 'start', 'end', 'description'];

const FIELD_LABELS: Record<ActivityField, string> = {
  date: 'Date',
  start: 'Start',
  end: 'End',
  description: 'Activity',
};

/**
 * Thrown where invalid drafts reach a write path that cannot skip them.
 */
export class IngestionError extends Error {
  readonly issues: IngestionIssue[];

  constructor(issues: IngestionIssue[]) {
    super(issues.map((issue) => issue.message).join('; ') || 'Invalid activity');
    this.name = 'IngestionError';
    this.issues = issues;
  }
}

const asText = (value: unknown): string => {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
};

const parseError = (row: number | null, field: ActivityField, message: string): ValidationResult => ({
  ok: false,
  issue: { kind: 'ParseError', row, field, message },
});

const invariantViolation = (row: number | null, message: string): ValidationResult => ({
  ok: false,
  issue: { kind: 'InvariantViolation', row, field: 'end', message },
});

/**
 * Checks run in order and the first failure wins: empty fields, date, start, end,
 * then `start < end` on the wall clock and again on the instants in `timeZone`.
 */
export const validateActivityInput = (
  input: ActivityInput,
  row: number | null = null,
  timeZone: string = DEFAULT_TIME_ZONE,
): ValidationResult => {
  const values: Record<ActivityField, string> = {
    date: asText(input.date),
    start: asText(input.start),
    end: asText(input.end),
    description: asText(input.description),
  };

  const emptyField = FIELD_ORDER.find((field) => values[field].length === 0);
  if (emptyField) {
    return parseError(row, emptyField, `${FIELD_LABELS[emptyField]} is empty`);
  }

  const date = parseIsoDate(values.date);
  if (!date) {
    return parseError(row, 'date', `Invalid date "${values.date}" (use YYYY-MM-DD)`);
  }

  const start = parseTimeOfDay(values.start);
  if (start === null) {
    return parseError(row, 'start', `Invalid start time "${values.start}" (use HH:MM:SS)`);
  }

  const end = parseTimeOfDay(values.end);
  if (end === null) {
    return parseError(row, 'end', `Invalid end time "${values.end}" (use HH:MM:SS)`);
  }

  const startLabel = formatTimeOfDay(start);
  const endLabel = formatTimeOfDay(end);
  if (end <= start) {
    return invariantViolation(row, `End ${endLabel} must be after start ${startLabel}`);
  }

  // A forward clock change can collapse both ends onto the same instant.
  const isoDate = formatIsoDate(date);
  const startsAt = zonedDateTimeToInstant(isoDate, startLabel, timeZone);
  const endsAt = zonedDateTimeToInstant(isoDate, endLabel, timeZone);
  if (startsAt === null || endsAt === null || endsAt <= startsAt) {
    return invariantViolation(
      row,
      `End ${endLabel} must be after start ${startLabel} in ${timeZone} (clock change on ${isoDate})`,
    );
  }

  return {
    ok: true,
    draft: {
      date: isoDate,
      start: startLabel,
      end: endLabel,
      description: values.description,
    },
  };
};

/**
 * Validates every entry; rows are numbered from 1 in input order.
 */
export const validateActivityBatch = (
  inputs: readonly ActivityInput[],
  timeZone: string = DEFAULT_TIME_ZONE,
): BatchValidationResult => {
  const drafts: ActivityDraft[] = [];
  const issues: IngestionIssue[] = [];

  inputs.forEach((input, index) => {
    const result = validateActivityInput(input, index + 1, timeZone);
    if (result.ok) {
      drafts.push(result.draft);
    } else {
      issues.push(result.issue);
    }
  });

  return { drafts, issues };
};

export const describeIssue = (issue: IngestionIssue): string =>
  issue.row === null ? issue.message : `Row ${issue.row}: ${issue.message}`;
