import React from 'react';
import type { ScheduleSummary } from '../../../shared/schedule';
import CountdownPanel from '../components/CountdownPanel';
import StatusTable from '../components/StatusTable';

interface BoardPageProps {
  summary: ScheduleSummary;
  timeZone: string;
}

const BoardPage: React.FC<BoardPageProps> = ({ summary, timeZone }) => {
  return (
    <div className="page board-page">
      <CountdownPanel summary={summary} timeZone={timeZone} />
      <StatusTable rows={summary.rows} />
    </div>
  );
};

export default BoardPage;
