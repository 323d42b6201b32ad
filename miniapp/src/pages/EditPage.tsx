import React from 'react';
import './EditPage.css';
import type { Activity, ActivityDraft } from '../../../shared/schedule';
import ActivityForm from '../components/ActivityForm';
import CsvPanel from '../components/CsvPanel';
import ScheduleEditor from '../components/ScheduleEditor';
import type { ImportResult } from '../types';

interface EditPageProps {
  activities: readonly Activity[];
  timeZone: string;
  isPaused: boolean;
  onTogglePause: (paused: boolean) => void;
  onAdd: (draft: ActivityDraft) => Promise<void>;
  onSave: (entries: Array<ActivityDraft & { id?: string }>) => Promise<void>;
  onImport: (csv: string) => Promise<ImportResult>;
}

const EditPage: React.FC<EditPageProps> = ({
  activities,
  timeZone,
  isPaused,
  onTogglePause,
  onAdd,
  onSave,
  onImport,
}) => {
  return (
    <div className="page edit-page">
      <label className="edit-page-pause">
        <input type="checkbox" checked={isPaused} onChange={(event) => onTogglePause(event.target.checked)} />
        <span>Pause refresh while editing</span>
      </label>

      <section className="edit-page-section">
        <h2>New activity</h2>
        <ActivityForm timeZone={timeZone} onSubmit={onAdd} />
      </section>

      <section className="edit-page-section">
        <h2>Activities</h2>
        <ScheduleEditor activities={activities} timeZone={timeZone} onSave={onSave} />
      </section>

      <section className="edit-page-section">
        <h2>Save / load</h2>
        <CsvPanel onImport={onImport} />
      </section>
    </div>
  );
};

export default EditPage;
