import { describe, expect, it } from 'vitest';
import { DEFAULT_DB_PATH, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8787,
      dbPath: DEFAULT_DB_PATH,
      categoryPolicy: {
        mode: 'closed',
        categories: ['Food', 'Transport', 'Utilities', 'Entertainment', 'Health', 'Education', 'Other'],
      },
      bcryptRounds: 10,
      trendWindowMonths: 6,
      recentLoginLimit: 5,
      sessionIdleMinutes: 30,
      maxSessions: 10_000,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      LEDGER_DB_PATH: '/tmp/ledger-test.db',
      LEDGER_CATEGORY_MODE: 'open',
      LEDGER_CATEGORIES: 'Rent, Food ,,Travel',
      TREND_WINDOW_MONTHS: '12',
      SESSION_IDLE_MINUTES: '90',
    });
    expect(config.port).toBe(9000);
    expect(config.dbPath).toBe('/tmp/ledger-test.db');
    expect(config.categoryPolicy).toEqual({ mode: 'open', categories: ['Rent', 'Food', 'Travel'] });
    expect(config.trendWindowMonths).toBe(12);
    expect(config.sessionIdleMinutes).toBe(90);
  });

  it('throws on malformed values', () => {
    expect(() => loadConfig({ LEDGER_CATEGORY_MODE: 'loose' }))
      .toThrow('LEDGER_CATEGORY_MODE must be "closed" or "open", got "loose"');
    expect(() => loadConfig({ BCRYPT_ROUNDS: '2' }))
      .toThrow('BCRYPT_ROUNDS must be an integer between 4 and 15, got "2"');
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/PORT must be an integer/);
  });
});
