import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

const CWD = path.resolve('/srv/track-board');

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, CWD)).toEqual({
      port: 3000,
      host: '0.0.0.0',
      timeZone: 'America/Sao_Paulo',
      dataFile: path.join(CWD, 'data', 'schedule.json'),
      refreshIntervalMs: 1000,
      miniappDistDir: path.join(CWD, 'miniapp', 'dist'),
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        PORT: '8080',
        HOST: '127.0.0.1',
        SCHEDULE_TIMEZONE: 'Europe/Lisbon',
        SCHEDULE_DATA_FILE: 'var/board.json',
        REFRESH_INTERVAL_MS: '5000',
      },
      CWD,
    );
    expect(config.port).toBe(8080);
    expect(config.host).toBe('127.0.0.1');
    expect(config.timeZone).toBe('Europe/Lisbon');
    expect(config.dataFile).toBe(path.join(CWD, 'var', 'board.json'));
    expect(config.refreshIntervalMs).toBe(5000);
  });

  it('clamps the refresh interval', () => {
    expect(loadConfig({ REFRESH_INTERVAL_MS: '10' }, CWD).refreshIntervalMs).toBe(250);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' }, CWD)).toThrow('PORT must be an integer, got "eighty"');
    expect(() => loadConfig({ PORT: '70000' }, CWD)).toThrow('PORT must be between 0 and 65535, got 70000');
    expect(() => loadConfig({ SCHEDULE_TIMEZONE: 'Nowhere/Special' }, CWD)).toThrow(
      'SCHEDULE_TIMEZONE "Nowhere/Special" is not a known IANA time zone',
    );
  });
});
