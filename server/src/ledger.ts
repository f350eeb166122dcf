import {
  err,
  notFound,
  ok,
  type Budget,
  type BudgetId,
  type BudgetInput,
  type DateRange,
  type Expense,
  type ExpenseId,
  type ExpenseInput,
  type Income,
  type IncomeId,
  type IncomeInput,
  type Listed,
  type NotFoundError,
  type Result,
  type StorageUnavailable,
  type ValidationError,
} from '../../src/domain/types.js';
import {
  checkDate,
  checkMonth,
  checkYear,
  isIsoDate,
  validateBudget,
  validateExpense,
  validateIncome,
  type CategoryPolicy,
} from '../../src/domain/validation.js';
import {
  generateId,
  guard,
  type BudgetRow,
  type Db,
  type ExpenseRow,
  type IncomeRow,
} from './db.js';

type EntryTable = 'expenses' | 'incomes';

export type WriteError = ValidationError | NotFoundError | StorageUnavailable;

/**
 * Expenses, incomes and budgets. Every call is scoped to the authenticated
 * username passed first; rows owned by anyone else are invisible.
 */
export class LedgerStore {
  constructor(
    private readonly db: Db,
    private readonly policy: CategoryPolicy,
  ) {}

  categories(): CategoryPolicy {
    return { mode: this.policy.mode, categories: [...this.policy.categories] };
  }

  // --- Expenses ---

  addExpense(user: string, input: ExpenseInput): Result<ExpenseId, ValidationError | StorageUnavailable> {
    const valid = validateExpense(input, this.policy);
    if (!valid.ok) return valid;
    const { category, amount, date, description } = valid.value;

    return guard<ExpenseId, never>('adding expense', () => {
      const id = generateId();
      this.db.prepare<[string, string, string, number, string, string]>(`
        INSERT INTO expenses (id, username, category, amount, date, description)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(id, user, category, amount, date, description);
      return ok(id);
    });
  }

  listExpenses(user: string, range: DateRange = {}): Result<Listed<Expense>[], ValidationError | StorageUnavailable> {
    return this.listEntries<ExpenseRow, Expense>('expenses', user, range, toExpense);
  }

  getExpense(user: string, id: ExpenseId): Result<Expense, NotFoundError | StorageUnavailable> {
    return guard<Expense, NotFoundError>('fetching expense', () => {
      const row = this.db.prepare<[string, string], ExpenseRow>(
        'SELECT * FROM expenses WHERE id = ? AND username = ?',
      ).get(id, user);
      return row ? ok(toExpense(row)) : err(notFound(`Expense not found: ${id}`));
    });
  }

  /** Rewrites category, amount, date and description in one statement */
  updateExpense(user: string, id: ExpenseId, fields: ExpenseInput): Result<void, WriteError> {
    const valid = validateExpense(fields, this.policy);
    if (!valid.ok) return valid;
    const { category, amount, date, description } = valid.value;

    return guard<void, NotFoundError>('updating expense', () => {
      const result = this.db.prepare<[string, number, string, string, string, string]>(`
        UPDATE expenses SET category = ?, amount = ?, date = ?, description = ?
        WHERE id = ? AND username = ?
      `).run(category, amount, date, description, id, user);
      return result.changes === 1 ? ok(undefined) : err(notFound(`Expense not found: ${id}`));
    });
  }

  deleteExpense(user: string, id: ExpenseId): Result<void, NotFoundError | StorageUnavailable> {
    return this.deleteEntry('expenses', user, id);
  }

  // --- Incomes ---

  addIncome(user: string, input: IncomeInput): Result<IncomeId, ValidationError | StorageUnavailable> {
    const valid = validateIncome(input);
    if (!valid.ok) return valid;
    const { amount, date, description } = valid.value;

    return guard<IncomeId, never>('adding income', () => {
      const id = generateId();
      this.db.prepare<[string, string, number, string, string]>(`
        INSERT INTO incomes (id, username, amount, date, description)
        VALUES (?, ?, ?, ?, ?)
      `).run(id, user, amount, date, description);
      return ok(id);
    });
  }

  listIncomes(user: string, range: DateRange = {}): Result<Listed<Income>[], ValidationError | StorageUnavailable> {
    return this.listEntries<IncomeRow, Income>('incomes', user, range, toIncome);
  }

  getIncome(user: string, id: IncomeId): Result<Income, NotFoundError | StorageUnavailable> {
    return guard<Income, NotFoundError>('fetching income', () => {
      const row = this.db.prepare<[string, string], IncomeRow>(
        'SELECT * FROM incomes WHERE id = ? AND username = ?',
      ).get(id, user);
      return row ? ok(toIncome(row)) : err(notFound(`Income not found: ${id}`));
    });
  }

  updateIncome(user: string, id: IncomeId, fields: IncomeInput): Result<void, WriteError> {
    const valid = validateIncome(fields);
    if (!valid.ok) return valid;
    const { amount, date, description } = valid.value;

    return guard<void, NotFoundError>('updating income', () => {
      const result = this.db.prepare<[number, string, string, string, string]>(`
        UPDATE incomes SET amount = ?, date = ?, description = ?
        WHERE id = ? AND username = ?
      `).run(amount, date, description, id, user);
      return result.changes === 1 ? ok(undefined) : err(notFound(`Income not found: ${id}`));
    });
  }

  deleteIncome(user: string, id: IncomeId): Result<void, NotFoundError | StorageUnavailable> {
    return this.deleteEntry('incomes', user, id);
  }

  // --- Budgets ---

  /** Replaces any budget for the same category and month (delete, then insert) */
  setBudget(user: string, input: BudgetInput): Result<BudgetId, ValidationError | StorageUnavailable> {
    const valid = validateBudget(input, this.policy);
    if (!valid.ok) return valid;
    const { category, month, year, amount } = valid.value;

    return guard<BudgetId, never>('setting budget', () => {
      const deleteStmt = this.db.prepare<[string, string, number, number]>(
        'DELETE FROM budgets WHERE username = ? AND category = ? AND month = ? AND year = ?',
      );
      const insertStmt = this.db.prepare<[string, string, string, number, number, number]>(`
        INSERT INTO budgets (id, username, category, month, year, amount)
        VALUES (?, ?, ?, ?, ?, ?)
      `);

      const replace = this.db.transaction((): BudgetId => {
        deleteStmt.run(user, category, month, year);
        const id = generateId();
        insertStmt.run(id, user, category, month, year, amount);
        return id;
      });

      return ok(replace());
    });
  }

  listBudgets(user: string, month: number, year: number): Result<Budget[], ValidationError | StorageUnavailable> {
    const m = checkMonth(month);
    if (!m.ok) return m;
    const y = checkYear(year);
    if (!y.ok) return y;

    return guard<Budget[], never>('fetching budgets', () => {
      const rows = this.db.prepare<[string, number, number], BudgetRow>(`
        SELECT * FROM budgets WHERE username = ? AND month = ? AND year = ?
        ORDER BY category ASC
      `).all(user, month, year);
      return ok(rows.map(toBudget));
    });
  }

  deleteBudget(user: string, id: BudgetId): Result<void, NotFoundError | StorageUnavailable> {
    return guard<void, NotFoundError>('deleting budget', () => {
      const result = this.db.prepare<[string, string]>('DELETE FROM budgets WHERE id = ? AND username = ?')
        .run(id, user);
      return result.changes === 1 ? ok(undefined) : err(notFound(`Budget not found: ${id}`));
    });
  }

  // --- shared ---

  /**
   * Rows ascending by date, then insertion order. Stored dates that don't
   * parse are skipped with a warning.
   */
  private listEntries<Row extends { id: string; date: string }, T>(
    table: EntryTable,
    user: string,
    range: DateRange,
    convert: (row: Row) => T,
  ): Result<Listed<T>[], ValidationError | StorageUnavailable> {
    for (const bound of [range.from, range.to]) {
      if (bound === undefined) continue;
      const date = checkDate(bound);
      if (!date.ok) return date;
    }

    return guard<Listed<T>[], never>(`fetching ${table}`, () => {
      const rows = this.db.prepare<[string, string | null, string | null, string | null, string | null], Row>(`
        SELECT * FROM ${table}
        WHERE username = ?
          AND (? IS NULL OR date >= ?)
          AND (? IS NULL OR date <= ?)
        ORDER BY date ASC, rowid ASC
      `).all(user, range.from ?? null, range.from ?? null, range.to ?? null, range.to ?? null);

      const listed: Listed<T>[] = [];
      for (const row of rows) {
        if (!isIsoDate(row.date)) {
          console.warn(`Skipping ${table} row ${row.id} with unparseable date "${row.date}"`);
          continue;
        }
        listed.push({ ...convert(row), index: listed.length + 1 });
      }
      return ok(listed);
    });
  }

  private deleteEntry(table: EntryTable, user: string, id: string): Result<void, NotFoundError | StorageUnavailable> {
    return guard<void, NotFoundError>(`deleting from ${table}`, () => {
      const result = this.db.prepare<[string, string]>(`DELETE FROM ${table} WHERE id = ? AND username = ?`)
        .run(id, user);
      return result.changes === 1 ? ok(undefined) : err(notFound(`No ${table} row ${id}`));
    });
  }
}

// --- Row → entity ---

function toExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    username: row.username,
    category: row.category,
    amount: row.amount,
    date: row.date,
    description: row.description,
    createdAt: row.created_at,
  };
}

function toIncome(row: IncomeRow): Income {
  return {
    id: row.id,
    username: row.username,
    amount: row.amount,
    date: row.date,
    description: row.description,
    createdAt: row.created_at,
  };
}

function toBudget(row: BudgetRow): Budget {
  return {
    id: row.id,
    username: row.username,
    category: row.category,
    month: row.month,
    year: row.year,
    amount: row.amount,
  };
}
