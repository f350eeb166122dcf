import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CATEGORIES } from '../../src/domain/validation.js';
import type { Result } from '../../src/domain/types.js';
import { openDatabase, type Db } from './db.js';
import { LedgerStore } from './ledger.js';

function seedUser(db: Db, username: string): void {
  db.prepare<[string]>(`INSERT INTO users (username, password_hash) VALUES (?, 'x')`).run(username);
}

function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw new Error(`expected ok, got ${JSON.stringify(result.error)}`);
  return result.value;
}

function countRows(db: Db, table: string): number {
  return db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? -1;
}

describe('LedgerStore', () => {
  let db: Db;
  let ledger: LedgerStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    seedUser(db, 'alice');
    seedUser(db, 'bob');
    ledger = new LedgerStore(db, { mode: 'closed', categories: DEFAULT_CATEGORIES });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (db.open) db.close();
  });

  describe('expenses', () => {
    it('returns an added expense exactly once with the submitted fields', () => {
      const id = unwrap(ledger.addExpense('alice', {
        category: 'Food', amount: 12.5, date: '2024-05-01', description: 'groceries',
      }));
      const rows = unwrap(ledger.listExpenses('alice'));
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        id,
        index: 1,
        username: 'alice',
        category: 'Food',
        amount: 12.5,
        date: '2024-05-01',
        description: 'groceries',
      });
    });

    it('lists ascending by date with a display index', () => {
      unwrap(ledger.addExpense('alice', { category: 'Food', amount: 3, date: '2024-05-03' }));
      unwrap(ledger.addExpense('alice', { category: 'Food', amount: 1, date: '2024-05-01' }));
      unwrap(ledger.addExpense('alice', { category: 'Food', amount: 2, date: '2024-05-02' }));
      const rows = unwrap(ledger.listExpenses('alice'));
      expect(rows.map((r) => [r.index, r.date, r.amount])).toEqual([
        [1, '2024-05-01', 1],
        [2, '2024-05-02', 2],
        [3, '2024-05-03', 3],
      ]);
    });

    it('filters an inclusive date range', () => {
      for (const date of ['2024-04-30', '2024-05-01', '2024-05-31', '2024-06-01']) {
        unwrap(ledger.addExpense('alice', { category: 'Food', amount: 1, date }));
      }
      const rows = unwrap(ledger.listExpenses('alice', { from: '2024-05-01', to: '2024-05-31' }));
      expect(rows.map((r) => r.date)).toEqual(['2024-05-01', '2024-05-31']);
    });

    it('rejects a malformed range bound', () => {
      const result = ledger.listExpenses('alice', { from: 'May' });
      expect(result.ok ? undefined : result.error.code).toBe('InvalidDate');
    });

    it('skips rows whose stored date does not parse', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      unwrap(ledger.addExpense('alice', { category: 'Food', amount: 5, date: '2024-05-01' }));
      db.prepare(`
        INSERT INTO expenses (id, username, category, amount, date, description)
        VALUES ('legacy', 'alice', 'Food', 9, '05/02/2024', '')
      `).run();
      const rows = unwrap(ledger.listExpenses('alice'));
      expect(rows.map((r) => r.amount)).toEqual([5]);
      expect(warn).toHaveBeenCalledWith('Skipping expenses row legacy with unparseable date "05/02/2024"');
    });

    it('rejects negative amounts and unknown categories before writing', () => {
      const negative = ledger.addExpense('alice', { category: 'Food', amount: -5, date: '2024-05-01' });
      expect(negative.ok ? undefined : negative.error.code).toBe('InvalidAmount');
      const unknown = ledger.addExpense('alice', { category: 'Pets', amount: 5, date: '2024-05-01' });
      expect(unknown.ok ? undefined : unknown.error.code).toBe('InvalidCategory');
      expect(countRows(db, 'expenses')).toBe(0);
    });

    it('accepts free-form categories in open mode', () => {
      const openLedger = new LedgerStore(db, { mode: 'open', categories: DEFAULT_CATEGORIES });
      unwrap(openLedger.addExpense('alice', { category: 'Pets', amount: 5, date: '2024-05-01' }));
      expect(unwrap(openLedger.listExpenses('alice')).map((r) => r.category)).toEqual(['Pets']);
    });

    it('rewrites every field on update', () => {
      const id = unwrap(ledger.addExpense('alice', { category: 'Food', amount: 5, date: '2024-05-01', description: 'a' }));
      expect(ledger.updateExpense('alice', id, {
        category: 'Health', amount: 7, date: '2024-05-09', description: 'b',
      })).toEqual({ ok: true, value: undefined });
      expect(unwrap(ledger.getExpense('alice', id))).toMatchObject({
        category: 'Health', amount: 7, date: '2024-05-09', description: 'b',
      });
    });

    it("does not update another user's expense", () => {
      const id = unwrap(ledger.addExpense('alice', { category: 'Food', amount: 5, date: '2024-05-01' }));
      const result = ledger.updateExpense('bob', id, { category: 'Food', amount: 500, date: '2024-05-01' });
      expect(result.ok ? undefined : result.error.type).toBe('NotFoundError');
      expect(unwrap(ledger.getExpense('alice', id)).amount).toBe(5);
    });

    it("does not delete another user's expense", () => {
      const id = unwrap(ledger.addExpense('alice', { category: 'Food', amount: 5, date: '2024-05-01' }));
      unwrap(ledger.addExpense('bob', { category: 'Food', amount: 6, date: '2024-05-01' }));
      const result = ledger.deleteExpense('bob', id);
      expect(result).toEqual({
        ok: false,
        error: { type: 'NotFoundError', code: 'NotFound', message: `No expenses row ${id}` },
      });
      expect(countRows(db, 'expenses')).toBe(2);
      expect(unwrap(ledger.listExpenses('alice')).map((r) => r.id)).toEqual([id]);
    });

    it('deletes its own expense and reports a second delete as not found', () => {
      const id = unwrap(ledger.addExpense('alice', { category: 'Food', amount: 5, date: '2024-05-01' }));
      expect(ledger.deleteExpense('alice', id)).toEqual({ ok: true, value: undefined });
      expect(ledger.deleteExpense('alice', id).ok).toBe(false);
      expect(ledger.getExpense('alice', id).ok).toBe(false);
    });

    it('gives distinct ids to entries added in the same millisecond', () => {
      vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      vi.spyOn(Math, 'random').mockReturnValue(0.5);
      const first = unwrap(ledger.addExpense('alice', { category: 'Food', amount: 1, date: '2024-05-01' }));
      const second = unwrap(ledger.addExpense('alice', { category: 'Food', amount: 2, date: '2024-05-01' }));
      expect(first).not.toBe(second);
      expect(countRows(db, 'expenses')).toBe(2);
    });

    it("never lists another user's rows", () => {
      unwrap(ledger.addExpense('bob', { category: 'Food', amount: 6, date: '2024-05-01' }));
      expect(unwrap(ledger.listExpenses('alice'))).toEqual([]);
    });
  });

  describe('incomes', () => {
    it('adds, lists, updates and deletes', () => {
      const id = unwrap(ledger.addIncome('alice', { amount: 3000, date: '2024-05-25', description: 'salary' }));
      expect(unwrap(ledger.listIncomes('alice'))).toEqual([
        expect.objectContaining({ id, index: 1, amount: 3000, date: '2024-05-25', description: 'salary' }),
      ]);
      unwrap(ledger.updateIncome('alice', id, { amount: 3100, date: '2024-05-26' }));
      expect(unwrap(ledger.getIncome('alice', id))).toMatchObject({ amount: 3100, date: '2024-05-26', description: '' });
      unwrap(ledger.deleteIncome('alice', id));
      expect(unwrap(ledger.listIncomes('alice'))).toEqual([]);
    });

    it('keeps incomes owner-scoped', () => {
      const id = unwrap(ledger.addIncome('alice', { amount: 10, date: '2024-05-01' }));
      expect(ledger.deleteIncome('bob', id).ok).toBe(false);
      expect(ledger.getIncome('bob', id).ok).toBe(false);
      expect(unwrap(ledger.listIncomes('alice'))).toHaveLength(1);
    });

    it('rejects a negative amount', () => {
      const result = ledger.addIncome('alice', { amount: -1, date: '2024-05-01' });
      expect(result.ok ? undefined : result.error.code).toBe('InvalidAmount');
    });
  });

  describe('budgets', () => {
    it('keeps one row per category and month, with the latest amount', () => {
      unwrap(ledger.setBudget('alice', { category: 'Food', month: 5, year: 2024, amount: 150 }));
      const second = unwrap(ledger.setBudget('alice', { category: 'Food', month: 5, year: 2024, amount: 175 }));
      const budgets = unwrap(ledger.listBudgets('alice', 5, 2024));
      expect(budgets).toEqual([
        { id: second, username: 'alice', category: 'Food', month: 5, year: 2024, amount: 175 },
      ]);
      expect(countRows(db, 'budgets')).toBe(1);
    });

    it('keeps budgets of other months and users apart', () => {
      unwrap(ledger.setBudget('alice', { category: 'Food', month: 5, year: 2024, amount: 150 }));
      unwrap(ledger.setBudget('alice', { category: 'Food', month: 6, year: 2024, amount: 160 }));
      unwrap(ledger.setBudget('bob', { category: 'Food', month: 5, year: 2024, amount: 999 }));
      expect(unwrap(ledger.listBudgets('alice', 5, 2024)).map((b) => b.amount)).toEqual([150]);
      expect(unwrap(ledger.listBudgets('bob', 5, 2024)).map((b) => b.amount)).toEqual([999]);
    });

    it('orders by category', () => {
      unwrap(ledger.setBudget('alice', { category: 'Utilities', month: 5, year: 2024, amount: 1 }));
      unwrap(ledger.setBudget('alice', { category: 'Food', month: 5, year: 2024, amount: 2 }));
      expect(unwrap(ledger.listBudgets('alice', 5, 2024)).map((b) => b.category)).toEqual(['Food', 'Utilities']);
    });

    it('rolls back the delete when the insert fails', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      unwrap(ledger.setBudget('alice', { category: 'Food', month: 5, year: 2024, amount: 150 }));
      db.exec(`
        CREATE TRIGGER reject_amount BEFORE INSERT ON budgets
        WHEN NEW.amount = 13
        BEGIN SELECT RAISE(ABORT, 'rejected by trigger'); END
      `);
      const result = ledger.setBudget('alice', { category: 'Food', month: 5, year: 2024, amount: 13 });
      expect(result.ok ? undefined : result.error.type).toBe('StorageUnavailable');
      expect(unwrap(ledger.listBudgets('alice', 5, 2024)).map((b) => b.amount)).toEqual([150]);
    });

    it('rejects an invalid month', () => {
      const result = ledger.setBudget('alice', { category: 'Food', month: 13, year: 2024, amount: 1 });
      expect(result.ok ? undefined : result.error.code).toBe('InvalidMonth');
      const listed = ledger.listBudgets('alice', 0, 2024);
      expect(listed.ok ? undefined : listed.error.code).toBe('InvalidMonth');
    });

    it('deletes only its own budget', () => {
      const id = unwrap(ledger.setBudget('alice', { category: 'Food', month: 5, year: 2024, amount: 1 }));
      expect(ledger.deleteBudget('bob', id).ok).toBe(false);
      expect(ledger.deleteBudget('alice', id).ok).toBe(true);
      expect(countRows(db, 'budgets')).toBe(0);
    });
  });

  it('exposes the configured categories', () => {
    expect(ledger.categories()).toEqual({ mode: 'closed', categories: [...DEFAULT_CATEGORIES] });
  });

  it('reports a closed database as StorageUnavailable', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    db.close();
    const result = ledger.addExpense('alice', { category: 'Food', amount: 1, date: '2024-05-01' });
    expect(result).toMatchObject({ ok: false, error: { type: 'StorageUnavailable', retryable: true } });
  });
});
