import { randomUUID } from 'crypto';
import {
  budgetProgress,
  forMonth,
  incomeVsExpenseSeries,
  monthSummary,
  partitionTopCategories,
  trendSeries,
  yearMonthKey,
} from '../../src/domain/computations.js';
import {
  err,
  ok,
  type AuthenticationError,
  type BudgetProgress,
  type CategoryPartition,
  type IncomeExpensePoint,
  type MonthSummary,
  type RegistrationError,
  type Result,
  type StorageUnavailable,
  type TrendPoint,
  type ValidationError,
} from '../../src/domain/types.js';
import { checkMonth, checkYear } from '../../src/domain/validation.js';
import type { Config } from './config.js';
import type { CredentialStore } from './credentials.js';
import type { LedgerStore } from './ledger.js';
import type { LoginJournal } from './loginJournal.js';

export interface Period {
  year: number;
  month: number;               // 1–12
}

export interface Dashboard {
  period: string;              // YYYY-MM
  summary: MonthSummary;
  budgets: BudgetProgress[];
  categories: CategoryPartition;
  trend: TrendPoint[];
  incomeVsExpenses: IncomeExpensePoint[];
  recentLogins: string[];
}

/** An authenticated user and the reporting period they are looking at */
export class Session {
  private selected: Period;

  constructor(readonly username: string, period: Period) {
    this.selected = period;
  }

  get period(): Period {
    return { ...this.selected };
  }

  selectPeriod(year: number, month: number): Result<Period, ValidationError> {
    const y = checkYear(year);
    if (!y.ok) return y;
    const m = checkMonth(month);
    if (!m.ok) return m;
    this.selected = { year, month };
    return ok(this.period);
  }
}

export interface SessionFacadeDeps {
  credentials: CredentialStore;
  ledger: LedgerStore;
  journal: LoginJournal;
  config: Pick<Config, 'trendWindowMonths' | 'recentLoginLimit'>;
  now?: () => Date;
}

/**
 * Entry point for callers that hold a login. Ties the stores together and
 * derives the reporting views.
 */
export class SessionFacade {
  readonly credentials: CredentialStore;
  readonly ledger: LedgerStore;
  readonly journal: LoginJournal;
  private readonly config: SessionFacadeDeps['config'];
  private readonly now: () => Date;

  constructor(deps: SessionFacadeDeps) {
    this.credentials = deps.credentials;
    this.ledger = deps.ledger;
    this.journal = deps.journal;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  register(username: string, password: string, email?: string): Promise<Result<void, RegistrationError>> {
    return this.credentials.register(username, password, email);
  }

  /** Authenticate, journal the login, and open a session on the current month */
  async login(username: string, password: string): Promise<Result<Session, AuthenticationError>> {
    if (!(await this.credentials.authenticate(username, password))) {
      const error: AuthenticationError = {
        type: 'AuthenticationError',
        code: 'InvalidCredentials',
        message: 'Invalid username or password',
      };
      return err(error);
    }
    this.journal.recordLogin(username);
    const today = this.now();
    return ok(new Session(username, { year: today.getFullYear(), month: today.getMonth() + 1 }));
  }

  recentLogins(session: Session, limit: number = this.config.recentLoginLimit): Result<string[], StorageUnavailable> {
    return this.journal.recentLogins(session.username, limit);
  }

  dashboard(session: Session): Result<Dashboard, ValidationError | StorageUnavailable> {
    const { username } = session;
    const { year, month } = session.period;

    const expenses = this.ledger.listExpenses(username);
    if (!expenses.ok) return expenses;
    const incomes = this.ledger.listIncomes(username);
    if (!incomes.ok) return incomes;
    const budgets = this.ledger.listBudgets(username, month, year);
    if (!budgets.ok) return budgets;
    const logins = this.recentLogins(session);
    if (!logins.ok) return logins;

    const key = yearMonthKey(year, month);
    const monthExpenses = forMonth(expenses.value, key);

    return ok({
      period: key,
      summary: monthSummary(incomes.value, expenses.value, year, month),
      budgets: budgetProgress(budgets.value, monthExpenses),
      categories: partitionTopCategories(monthExpenses),
      trend: trendSeries(expenses.value, this.now(), this.config.trendWindowMonths),
      incomeVsExpenses: incomeVsExpenseSeries(incomes.value, expenses.value),
      recentLogins: logins.value,
    });
  }
}

export interface SessionRegistryOptions {
  idleMs?: number;
  maxSessions?: number;
  now?: () => number;
}

interface Entry {
  session: Session;
  lastSeen: number;
}

/**
 * Opaque bearer tokens for HTTP callers, held in memory.
 * A token lapses after idleMs without use. When maxSessions is reached the
 * least recently used token is dropped.
 */
export class SessionRegistry {
  // Insertion order doubles as recency order: get() moves a token to the end
  private readonly entries = new Map<string, Entry>();
  private readonly idleMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.idleMs = options.idleMs ?? 30 * 60 * 1000;
    this.maxSessions = Math.max(1, options.maxSessions ?? 10_000);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  open(session: Session): string {
    this.prune();
    for (const token of this.entries.keys()) {
      if (this.entries.size < this.maxSessions) break;
      this.entries.delete(token);
    }
    const token = randomUUID();
    this.entries.set(token, { session, lastSeen: this.now() });
    return token;
  }

  get(token: string): Session | undefined {
    const entry = this.entries.get(token);
    if (!entry) return undefined;
    this.entries.delete(token);
    const now = this.now();
    if (now - entry.lastSeen >= this.idleMs) return undefined;
    entry.lastSeen = now;
    this.entries.set(token, entry);
    return entry.session;
  }

  close(token: string): boolean {
    return this.entries.delete(token);
  }

  /** Drop every token of a user except `keep`; returns how many went */
  closeUser(username: string, keep?: string): number {
    let closed = 0;
    for (const [token, entry] of this.entries) {
      if (entry.session.username === username && token !== keep) {
        this.entries.delete(token);
        closed += 1;
      }
    }
    return closed;
  }

  private prune(): void {
    const now = this.now();
    for (const [token, entry] of this.entries) {
      if (now - entry.lastSeen < this.idleMs) break;
      this.entries.delete(token);
    }
  }
}
