import type { ActivityDraft, IngestionIssue } from './types';
import { DEFAULT_TIME_ZONE } from './types';
import { sortActivities } from './classifier';
import { validateActivityInput } from './ingestion';

export const CSV_COLUMNS = ['Date', 'Start', 'End', 'Activity'] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export interface CsvLoadResult {
  drafts: ActivityDraft[];
  rejected: IngestionIssue[];
}

interface CsvRecord {
  line: number;
  fields: string[];
  unterminated: boolean;
}

const isBlankRecord = (fields: string[]) => fields.length === 1 && fields[0].trim().length === 0;

// RFC 4180 reader; quoted fields may hold separators, doubled quotes and line breaks.
// A quote only opens a quoted field as its first character; elsewhere it is literal text.
const readRecords = (text: string): CsvRecord[] => {
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;
  let touched = false;
  let line = 1;
  let recordLine = 1;

  const endField = () => {
    fields.push(field);
    field = '';
    fieldStarted = false;
  };

  const endRecord = (unterminated = false) => {
    endField();
    if (touched && !isBlankRecord(fields)) {
      records.push({ line: recordLine, fields, unterminated });
    }
    fields = [];
    touched = false;
  };

  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];

    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') {
          line += 1;
        }
        field += ch;
      }
      continue;
    }

    if (ch === '"' && !fieldStarted) {
      inQuotes = true;
      fieldStarted = true;
      touched = true;
    } else if (ch === ',') {
      endField();
      touched = true;
    } else if (ch === '\r' && source[i + 1] === '\n') {
      continue;
    } else if (ch === '\n' || ch === '\r') {
      endRecord();
      line += 1;
      recordLine = line;
    } else {
      field += ch;
      fieldStarted = true;
      touched = true;
    }
  }

  if (touched) {
    endRecord(inQuotes);
  }

  return records;
};

/**
 * Loads `Date,Start,End,Activity` rows. Bad rows are reported and skipped; the rest load.
 */
export const parseScheduleCsv = (text: string, timeZone: string = DEFAULT_TIME_ZONE): CsvLoadResult => {
  const [header, ...rows] = readRecords(text);
  if (!header) {
    return { drafts: [], rejected: [] };
  }

  const names = header.fields.map((name) => name.trim());
  const missing = CSV_COLUMNS.filter((column) => !names.includes(column));
  if (missing.length > 0) {
    return {
      drafts: [],
      rejected: [
        {
          kind: 'ParseError',
          row: header.line,
          field: null,
          message: `Missing column${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
        },
      ],
    };
  }

  const drafts: ActivityDraft[] = [];
  const rejected: IngestionIssue[] = [];

  for (const record of rows) {
    if (record.unterminated) {
      rejected.push({
        kind: 'ParseError',
        row: record.line,
        field: null,
        message: 'Quoted field is never closed',
      });
      continue;
    }

    if (record.fields.length !== names.length) {
      rejected.push({
        kind: 'ParseError',
        row: record.line,
        field: null,
        message: `Expected ${names.length} fields, found ${record.fields.length}`,
      });
      continue;
    }

    const valueOf = (column: CsvColumn) => record.fields[names.indexOf(column)];
    const result = validateActivityInput(
      {
        date: valueOf('Date'),
        start: valueOf('Start'),
        end: valueOf('End'),
        description: valueOf('Activity'),
      },
      record.line,
      timeZone,
    );

    if (result.ok) {
      drafts.push(result.draft);
    } else {
      rejected.push(result.issue);
    }
  }

  return { drafts, rejected };
};

const escapeField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

/**
 * Writes the set sorted by (date, start), `\n`-terminated.
 */
export const serializeScheduleCsv = (activities: readonly ActivityDraft[]): string => {
  const lines = [
    CSV_COLUMNS.join(','),
    ...sortActivities(activities).map((activity) =>
      [activity.date, activity.start, activity.end, activity.description].map(escapeField).join(','),
    ),
  ];
  return `${lines.join('\n')}\n`;
};
