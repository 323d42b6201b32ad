import React, { useEffect, useState } from 'react';
import './ScheduleEditor.css';
import { describeIssue, validateActivityBatch } from '../../../shared/schedule';
import type { Activity, ActivityDraft, IngestionIssue } from '../../../shared/schedule';
import type { EditableActivity } from '../types';
import { ApiRequestError } from '../utils/scheduleApi';

interface ScheduleEditorProps {
  activities: readonly Activity[];
  timeZone: string;
  onSave: (entries: Array<ActivityDraft & { id?: string }>) => Promise<void>;
}

type EditableField = Exclude<keyof EditableActivity, 'key' | 'id'>;

const FIELDS: Array<{ field: EditableField; label: string }> = [
  { field: 'date', label: 'Date' },
  { field: 'start', label: 'Start' },
  { field: 'end', label: 'End' },
  { field: 'description', label: 'Activity' },
];

const toEditable = (activities: readonly Activity[]): EditableActivity[] =>
  activities.map((activity) => ({ key: activity.id, ...activity }));

/**
 * Edits the whole schedule at once. Nothing is sent until every row validates,
 * and the server applies the save all-or-nothing as well.
 */
const ScheduleEditor: React.FC<ScheduleEditorProps> = ({ activities, timeZone, onSave }) => {
  const [rows, setRows] = useState<EditableActivity[]>(() => toEditable(activities));
  const [isDirty, setIsDirty] = useState(false);
  const [issues, setIssues] = useState<IngestionIssue[]>([]);
  const [error, setError] = useState<string | null>(null);
  const [isSaving, setIsSaving] = useState(false);

  useEffect(() => {
    if (!isDirty) {
      setRows(toEditable(activities));
    }
  }, [activities, isDirty]);

  const updateRow = (key: string, field: EditableField, value: string) => {
    setRows((current) => current.map((row) => (row.key === key ? { ...row, [field]: value } : row)));
    setIsDirty(true);
  };

  const removeRow = (key: string) => {
    setRows((current) => current.filter((row) => row.key !== key));
    setIsDirty(true);
  };

  const discard = () => {
    setRows(toEditable(activities));
    setIssues([]);
    setError(null);
    setIsDirty(false);
  };

  const handleSave = async () => {
    const { drafts, issues: found } = validateActivityBatch(rows, timeZone);
    setIssues(found);
    setError(null);
    if (found.length > 0) {
      return;
    }

    setIsSaving(true);
    try {
      await onSave(drafts.map((draft, index) => ({ ...draft, id: rows[index].id })));
      setIsDirty(false);
    } catch (saveError) {
      if (saveError instanceof ApiRequestError && saveError.issues.length > 0) {
        setIssues(saveError.issues);
      } else {
        setError(saveError instanceof Error ? saveError.message : 'Failed to save schedule');
      }
    } finally {
      setIsSaving(false);
    }
  };

  if (rows.length === 0 && !isDirty) {
    return <div className="schedule-editor-empty">Nothing to edit yet.</div>;
  }

  return (
    <div className="schedule-editor">
      <table className="schedule-editor-table">
        <thead>
          <tr>
            <th>#</th>
            {FIELDS.map(({ field, label }) => (
              <th key={field}>{label}</th>
            ))}
            <th />
          </tr>
        </thead>
        <tbody>
          {rows.map((row, index) => (
            <tr key={row.key}>
              <td>{index + 1}</td>
              {FIELDS.map(({ field, label }) => (
                <td key={field}>
                  <input
                    aria-label={`${label} ${index + 1}`}
                    value={row[field]}
                    onChange={(event) => updateRow(row.key, field, event.target.value)}
                  />
                </td>
              ))}
              <td>
                <button
                  type="button"
                  className="schedule-editor-remove"
                  aria-label={`Remove row ${index + 1}`}
                  onClick={() => removeRow(row.key)}
                >
                  ✕
                </button>
              </td>
            </tr>
          ))}
        </tbody>
      </table>

      {issues.length > 0 && (
        <ul className="schedule-editor-issues" role="alert">
          {issues.map((issue) => (
            <li key={`${issue.row}-${issue.field}`}>{describeIssue(issue)}</li>
          ))}
        </ul>
      )}
      {error && (
        <div className="schedule-editor-error" role="alert">
          {error}
        </div>
      )}

      <div className="schedule-editor-actions">
        <button type="button" onClick={() => void handleSave()} disabled={!isDirty || isSaving}>
          {isSaving ? 'Saving…' : 'Save changes'}
        </button>
        <button type="button" onClick={discard} disabled={!isDirty || isSaving}>
          Discard
        </button>
      </div>
    </div>
  );
};

export default ScheduleEditor;
