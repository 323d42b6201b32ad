import React, { useCallback, useEffect, useMemo, useState } from 'react';
import './App.css';
import { DEFAULT_TIME_ZONE, summarizeSchedule } from '../../shared/schedule';
import type { Activity, ActivityDraft } from '../../shared/schedule';
import Navigation from './components/Navigation';
import SyncStatusBadge from './components/SyncStatusBadge';
import BoardPage from './pages/BoardPage';
import EditPage from './pages/EditPage';
import type { DashboardConfig, ImportResult, Page } from './types';
import {
  createActivity,
  fetchDashboardConfig,
  fetchSchedule,
  importScheduleCsv,
  saveSchedule,
} from './utils/scheduleApi';

const DEFAULT_CONFIG: DashboardConfig = {
  timeZone: DEFAULT_TIME_ZONE,
  refreshIntervalMs: 1000,
};

const App: React.FC = () => {
  const [currentPage, setCurrentPage] = useState<Page>('board');
  const [config, setConfig] = useState<DashboardConfig>(DEFAULT_CONFIG);
  const [activities, setActivities] = useState<readonly Activity[]>([]);
  const [now, setNow] = useState(() => Date.now());
  const [isPaused, setIsPaused] = useState(false);
  const [isLoading, setIsLoading] = useState(true);
  const [isSyncing, setIsSyncing] = useState(false);
  const [syncError, setSyncError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;

    const load = async () => {
      try {
        const [loadedConfig, snapshot] = await Promise.all([fetchDashboardConfig(), fetchSchedule()]);
        if (cancelled) {
          return;
        }
        setConfig(loadedConfig);
        setActivities(Object.freeze(snapshot.activities));
        setSyncError(null);
      } catch (error) {
        console.error('❌ Failed to load schedule:', error);
        if (!cancelled) {
          setSyncError('Could not load the schedule from the server.');
        }
      } finally {
        if (!cancelled) {
          setIsLoading(false);
        }
      }
    };

    void load();
    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    if (isPaused) {
      return undefined;
    }
    setNow(Date.now());
    const timer = window.setInterval(() => setNow(Date.now()), config.refreshIntervalMs);
    return () => window.clearInterval(timer);
  }, [isPaused, config.refreshIntervalMs]);

  const summary = useMemo(
    () => summarizeSchedule(activities, now, config.timeZone),
    [activities, now, config.timeZone],
  );

  const runSync = useCallback(async <T,>(task: () => Promise<T>): Promise<T> => {
    setIsSyncing(true);
    setSyncError(null);
    try {
      return await task();
    } catch (error) {
      console.error('❌ Failed to sync schedule:', error);
      setSyncError(error instanceof Error ? error.message : 'Failed to save changes');
      throw error;
    } finally {
      setIsSyncing(false);
    }
  }, []);

  const handleAdd = useCallback(
    async (draft: ActivityDraft) => {
      const activity = await runSync(() => createActivity(draft));
      setActivities((current) => Object.freeze([...current, activity]));
    },
    [runSync],
  );

  const handleSave = useCallback(
    async (entries: Array<ActivityDraft & { id?: string }>) => {
      const snapshot = await runSync(() => saveSchedule(entries));
      setActivities(Object.freeze(snapshot.activities));
    },
    [runSync],
  );

  const handleImport = useCallback(
    async (csv: string): Promise<ImportResult> => {
      const result = await runSync(() => importScheduleCsv(csv));
      setActivities(Object.freeze(result.activities));
      return result;
    },
    [runSync],
  );

  return (
    <div className="app">
      <header className="app-header">
        <h1 className="app-title">Track schedule</h1>
        <Navigation currentPage={currentPage} onNavigate={setCurrentPage} />
      </header>

      <SyncStatusBadge isSyncing={isSyncing} error={syncError} />

      <main className="app-content">
        {isLoading ? (
          <div className="app-loading">Loading schedule…</div>
        ) : currentPage === 'board' ? (
          <BoardPage summary={summary} timeZone={config.timeZone} />
        ) : (
          <EditPage
            activities={activities}
            timeZone={config.timeZone}
            isPaused={isPaused}
            onTogglePause={setIsPaused}
            onAdd={handleAdd}
            onSave={handleSave}
            onImport={handleImport}
          />
        )}
      </main>
    </div>
  );
};

export default App;
