import React from 'react';
import './CountdownPanel.css';
import { formatDuration, formatZonedDateTime } from '../../../shared/schedule';
import type { ScheduleSummary } from '../../../shared/schedule';
import { EMPTY_METRIC } from '../types';

interface CountdownPanelProps {
  summary: ScheduleSummary;
  timeZone: string;
}

const formatCountdown = (ms: number | null): string => (ms === null ? EMPTY_METRIC : formatDuration(ms));

const CountdownPanel: React.FC<CountdownPanelProps> = ({ summary, timeZone }) => {
  const metrics = [
    { id: 'now', label: 'Now', value: formatZonedDateTime(summary.now, timeZone) },
    { id: 'remaining', label: 'Time remaining', value: formatCountdown(summary.timeRemainingCurrentMs) },
    { id: 'next', label: 'Time to next', value: formatCountdown(summary.timeUntilNextMs) },
    { id: 'completed', label: 'Completed', value: `${summary.completedCount}/${summary.total}` },
  ];

  const percent = summary.currentProgress === null ? null : Math.floor(summary.currentProgress * 100);

  return (
    <section className="countdown-panel">
      <div className="countdown-metrics">
        {metrics.map((metric) => (
          <div key={metric.id} className="countdown-metric" data-testid={`metric-${metric.id}`}>
            <span className="countdown-metric-label">{metric.label}</span>
            <span className="countdown-metric-value">{metric.value}</span>
          </div>
        ))}
      </div>

      {summary.current && percent !== null && (
        <div className="countdown-progress">
          <div
            className="countdown-progress-track"
            role="progressbar"
            aria-valuemin={0}
            aria-valuemax={100}
            aria-valuenow={percent}
          >
            <div className="countdown-progress-fill" style={{ width: `${percent}%` }} />
          </div>
          <span className="countdown-progress-label">
            In progress: {summary.current.activity.description} ({percent}%)
          </span>
        </div>
      )}
    </section>
  );
};

export default CountdownPanel;
