import path from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_CATEGORIES, type CategoryPolicy } from '../../src/domain/validation.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export interface Config {
  port: number;
  dbPath: string;
  categoryPolicy: CategoryPolicy;
  bcryptRounds: number;
  trendWindowMonths: number;
  recentLoginLimit: number;
  sessionIdleMinutes: number;
  maxSessions: number;
}

export const DEFAULT_DB_PATH = path.join(__dirname, '../data/ledger.db');

function intFrom(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function categoryPolicyFrom(env: NodeJS.ProcessEnv): CategoryPolicy {
  const mode = env.LEDGER_CATEGORY_MODE ?? 'closed';
  if (mode !== 'closed' && mode !== 'open') {
    throw new Error(`LEDGER_CATEGORY_MODE must be "closed" or "open", got "${mode}"`);
  }
  const categories = env.LEDGER_CATEGORIES
    ? env.LEDGER_CATEGORIES.split(',').map((c) => c.trim()).filter((c) => c !== '')
    : [...DEFAULT_CATEGORIES];
  if (categories.length === 0) {
    throw new Error('LEDGER_CATEGORIES must name at least one category');
  }
  return { mode, categories };
}

/** Read settings from the environment; throws on malformed values */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: intFrom(env, 'PORT', 8787, 0, 65535),
    dbPath: env.LEDGER_DB_PATH || DEFAULT_DB_PATH,
    categoryPolicy: categoryPolicyFrom(env),
    bcryptRounds: intFrom(env, 'BCRYPT_ROUNDS', 10, 4, 15),
    trendWindowMonths: intFrom(env, 'TREND_WINDOW_MONTHS', 6, 1, 120),
    recentLoginLimit: intFrom(env, 'RECENT_LOGIN_LIMIT', 5, 1, 100),
    sessionIdleMinutes: intFrom(env, 'SESSION_IDLE_MINUTES', 30, 1, 10_080),
    maxSessions: intFrom(env, 'MAX_SESSIONS', 10_000, 1, 1_000_000),
  };
}
