import React from 'react';
import './StatusTable.css';
import { formatDisplayDate, formatDuration } from '../../../shared/schedule';
import type { ClassifiedActivity } from '../../../shared/schedule';
import { STATUS_COLORS, STATUS_LABELS } from '../types';

interface StatusTableProps {
  rows: readonly ClassifiedActivity[];
}

const COLUMNS = ['Date', 'Start', 'End', 'Activity', 'Duration', 'Status'];

const StatusTable: React.FC<StatusTableProps> = ({ rows }) => {
  if (rows.length === 0) {
    return <div className="status-table-empty">No activities scheduled yet.</div>;
  }

  return (
    <table className="status-table">
      <thead>
        <tr>
          {COLUMNS.map((column) => (
            <th key={column}>{column}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {rows.map(({ activity, status, durationMs }) => (
          <tr
            key={activity.id}
            className={`status-row status-row--${status}`}
            style={{ backgroundColor: STATUS_COLORS[status] }}
          >
            <td>{formatDisplayDate(activity.date)}</td>
            <td>{activity.start}</td>
            <td>{activity.end}</td>
            <td>{activity.description}</td>
            <td>{formatDuration(durationMs)}</td>
            <td>{STATUS_LABELS[status]}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

export default StatusTable;
