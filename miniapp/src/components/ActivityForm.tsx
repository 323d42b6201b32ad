import React, { useState } from 'react';
import './ActivityForm.css';
import { getZonedIsoDate, validateActivityInput } from '../../../shared/schedule';
import type { ActivityDraft } from '../../../shared/schedule';

interface ActivityFormProps {
  timeZone: string;
  onSubmit: (draft: ActivityDraft) => Promise<void>;
}

const ActivityForm: React.FC<ActivityFormProps> = ({ timeZone, onSubmit }) => {
  const [date, setDate] = useState(() => getZonedIsoDate(Date.now(), timeZone));
  const [start, setStart] = useState('');
  const [end, setEnd] = useState('');
  const [description, setDescription] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [isSubmitting, setIsSubmitting] = useState(false);

  const handleSubmit = async (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();

    const result = validateActivityInput({ date, start, end, description }, null, timeZone);
    if (!result.ok) {
      setError(result.issue.message);
      return;
    }

    setError(null);
    setIsSubmitting(true);
    try {
      await onSubmit(result.draft);
      setStart(result.draft.end);
      setEnd('');
      setDescription('');
    } catch (submitError) {
      setError(submitError instanceof Error ? submitError.message : 'Failed to add activity');
    } finally {
      setIsSubmitting(false);
    }
  };

  return (
    <form className="activity-form" onSubmit={(event) => void handleSubmit(event)} noValidate>
      <label className="activity-form-field">
        <span>Date</span>
        <input type="date" value={date} onChange={(event) => setDate(event.target.value)} />
      </label>
      <label className="activity-form-field">
        <span>Start</span>
        <input type="time" step={1} value={start} onChange={(event) => setStart(event.target.value)} />
      </label>
      <label className="activity-form-field">
        <span>End</span>
        <input type="time" step={1} value={end} onChange={(event) => setEnd(event.target.value)} />
      </label>
      <label className="activity-form-field activity-form-field--wide">
        <span>Activity</span>
        <input
          type="text"
          value={description}
          placeholder="e.g. Qualifying session"
          onChange={(event) => setDescription(event.target.value)}
        />
      </label>

      {error && (
        <div className="activity-form-error" role="alert">
          {error}
        </div>
      )}

      <button type="submit" className="activity-form-submit" disabled={isSubmitting}>
        {isSubmitting ? 'Adding…' : 'Add activity'}
      </button>
    </form>
  );
};

export default ActivityForm;
