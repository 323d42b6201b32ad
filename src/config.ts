import path from 'path';
import { DEFAULT_TIME_ZONE, isValidTimeZone } from '../shared/schedule';

export interface AppConfig {
  port: number;
  host: string;
  timeZone: string;
  dataFile: string;
  refreshIntervalMs: number;
  miniappDistDir: string;
}

const DEFAULT_PORT = 3000;
const DEFAULT_REFRESH_INTERVAL_MS = 1_000;
const MIN_REFRESH_INTERVAL_MS = 250;

const readString = (env: NodeJS.ProcessEnv, name: string): string | null => {
  const value = (env[name] ?? '').trim();
  return value.length > 0 ? value : null;
};

const readInteger = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
};

/**
 * Reads settings from the environment. Relative paths resolve against `cwd`.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig => {
  const port = readInteger(env, 'PORT', DEFAULT_PORT);
  if (port < 0 || port > 65535) {
    throw new Error(`PORT must be between 0 and 65535, got ${port}`);
  }

  const timeZone = readString(env, 'SCHEDULE_TIMEZONE') ?? DEFAULT_TIME_ZONE;
  if (!isValidTimeZone(timeZone)) {
    throw new Error(`SCHEDULE_TIMEZONE "${timeZone}" is not a known IANA time zone`);
  }

  const refreshIntervalMs = Math.max(
    MIN_REFRESH_INTERVAL_MS,
    readInteger(env, 'REFRESH_INTERVAL_MS', DEFAULT_REFRESH_INTERVAL_MS),
  );

  return {
    port,
    host: readString(env, 'HOST') ?? '0.0.0.0',
    timeZone,
    dataFile: path.resolve(cwd, readString(env, 'SCHEDULE_DATA_FILE') ?? 'data/schedule.json'),
    refreshIntervalMs,
    miniappDistDir: path.resolve(cwd, readString(env, 'MINIAPP_DIST_DIR') ?? 'miniapp/dist'),
  };
};
