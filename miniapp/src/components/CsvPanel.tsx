import React, { useState } from 'react';
import { describeIssue } from '../../../shared/schedule';
import type { IngestionIssue } from '../../../shared/schedule';
import type { ImportResult } from '../types';
import { ApiRequestError, scheduleExportUrl } from '../utils/scheduleApi';

interface CsvPanelProps {
  onImport: (csv: string) => Promise<ImportResult>;
}

const CsvPanel: React.FC<CsvPanelProps> = ({ onImport }) => {
  const [rejected, setRejected] = useState<IngestionIssue[]>([]);
  const [message, setMessage] = useState<string | null>(null);
  const [isImporting, setIsImporting] = useState(false);

  const handleFile = async (event: React.ChangeEvent<HTMLInputElement>) => {
    const input = event.currentTarget;
    const file = input.files?.[0];
    if (!file) {
      return;
    }

    setIsImporting(true);
    setMessage(null);
    try {
      const result = await onImport(await file.text());
      setRejected(result.rejected);
      setMessage(`Loaded ${result.activities.length} activities from ${file.name}`);
    } catch (error) {
      if (error instanceof ApiRequestError) {
        setRejected(error.issues);
      }
      setMessage(error instanceof Error ? error.message : 'Failed to import CSV');
    } finally {
      setIsImporting(false);
      input.value = '';
    }
  };

  return (
    <div className="csv-panel">
      <a className="csv-panel-download" href={scheduleExportUrl()} download="schedule.csv">
        Download CSV
      </a>
      <label className="csv-panel-upload">
        <span>{isImporting ? 'Importing…' : 'Load CSV'}</span>
        <input type="file" accept=".csv,text/csv" onChange={(event) => void handleFile(event)} disabled={isImporting} />
      </label>

      {message && <div className="csv-panel-message">{message}</div>}
      {rejected.length > 0 && (
        <ul className="csv-panel-rejected">
          {rejected.map((issue) => (
            <li key={`${issue.row}-${issue.field}-${issue.message}`}>{describeIssue(issue)}</li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default CsvPanel;
