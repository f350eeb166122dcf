import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { err, storageUnavailable, type Result, type StorageUnavailable } from '../../src/domain/types.js';

export type Db = Database.Database;

/**
 * Open (or create) the ledger database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);

  // WAL: readers only ever see committed writes
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  migrate(db);
  return db;
}

function migrate(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      username TEXT PRIMARY KEY,
      password_hash TEXT NOT NULL,
      email TEXT DEFAULT NULL,
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS expenses (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL REFERENCES users(username),
      category TEXT NOT NULL,
      amount REAL NOT NULL CHECK (amount >= 0),
      date TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_expenses_owner_date ON expenses(username, date)`);

  db.exec(`
    CREATE TABLE IF NOT EXISTS incomes (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL REFERENCES users(username),
      amount REAL NOT NULL CHECK (amount >= 0),
      date TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_incomes_owner_date ON incomes(username, date)`);

  // One budget per (user, category, month, year)
  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL REFERENCES users(username),
      category TEXT NOT NULL,
      month INTEGER NOT NULL CHECK (month BETWEEN 1 AND 12),
      year INTEGER NOT NULL,
      amount REAL NOT NULL CHECK (amount >= 0),
      UNIQUE(username, category, month, year)
    )
  `);

  // Append-only
  db.exec(`
    CREATE TABLE IF NOT EXISTS logins (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL,
      ts TEXT NOT NULL
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_logins_owner_ts ON logins(username, ts)`);
}

/** Opaque row id for expenses, incomes and budgets */
export function generateId(): string {
  return randomUUID();
}

/**
 * Run a storage operation; a thrown driver error becomes StorageUnavailable.
 * Transactions started inside fn have already rolled back by then.
 */
export function guard<T, E>(context: string, fn: () => Result<T, E>): Result<T, E | StorageUnavailable> {
  try {
    return fn();
  } catch (error) {
    console.error(`Error ${context}:`, error);
    const message = error instanceof Error ? error.message : String(error);
    return err(storageUnavailable(`Storage failure while ${context}: ${message}`));
  }
}

// --- Row types (as stored) ---

export interface UserRow {
  username: string;
  password_hash: string;
  email: string | null;
  created_at: string;
}

export interface ExpenseRow {
  id: string;
  username: string;
  category: string;
  amount: number;
  date: string;
  description: string;
  created_at: string;
}

export interface IncomeRow {
  id: string;
  username: string;
  amount: number;
  date: string;
  description: string;
  created_at: string;
}

export interface BudgetRow {
  id: string;
  username: string;
  category: string;
  month: number;
  year: number;
  amount: number;
}

export interface LoginRow {
  ts: string;
}
