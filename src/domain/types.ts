/**
 * Domain types for the ledger.
 * Pure data — no DB, no HTTP, no IO.
 */

/** YYYY-MM-DD calendar date */
export type IsoDate = string;

/** YYYY-MM string */
export type Month = string;

export type ExpenseId = string;
export type IncomeId = string;
export type BudgetId = string;

export interface Expense {
  id: ExpenseId;
  username: string;
  category: string;
  amount: number;              // non-negative
  date: IsoDate;
  description: string;
  createdAt: string;           // ISO timestamp
}

export interface Income {
  id: IncomeId;
  username: string;
  amount: number;              // non-negative
  date: IsoDate;
  description: string;
  createdAt: string;
}

/** Per-category spending cap for one calendar month */
export interface Budget {
  id: BudgetId;
  username: string;
  category: string;
  month: number;               // 1–12
  year: number;
  amount: number;
}

export interface LoginEvent {
  username: string;
  ts: string;                  // UTC ISO timestamp
}

/** A listed row plus its 1-based position in the listing (display only) */
export type Listed<T> = T & { index: number };

export interface ExpenseInput {
  category: string;
  amount: number;
  date: IsoDate;
  description?: string;
}

export interface IncomeInput {
  amount: number;
  date: IsoDate;
  description?: string;
}

export interface BudgetInput {
  category: string;
  month: number;
  year: number;
  amount: number;
}

/** Inclusive on both ends; either bound may be left open */
export interface DateRange {
  from?: IsoDate;
  to?: IsoDate;
}

export type CategoryMode = 'closed' | 'open';

// --- Results & errors ---

export type Result<T, E = LedgerError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type ValidationCode =
  | 'InvalidAmount'
  | 'InvalidCategory'
  | 'InvalidDate'
  | 'InvalidMonth'
  | 'InvalidYear'
  | 'InvalidUsername'
  | 'InvalidEmail'
  | 'InvalidDescription'
  | 'WeakPassword';

export interface ValidationError {
  type: 'ValidationError';
  code: ValidationCode;
  message: string;
}

export interface NotFoundError {
  type: 'NotFoundError';
  code: 'NotFound';
  message: string;
}

export interface ConflictError {
  type: 'ConflictError';
  code: 'DuplicateUsername';
  message: string;
}

export interface AuthenticationError {
  type: 'AuthenticationError';
  code: 'IncorrectCurrentPassword' | 'InvalidCredentials';
  message: string;
}

export interface StorageUnavailable {
  type: 'StorageUnavailable';
  code: 'StorageUnavailable';
  message: string;
  retryable: true;
}

export type LedgerError =
  | ValidationError
  | NotFoundError
  | ConflictError
  | AuthenticationError
  | StorageUnavailable;

export type RegistrationError = ValidationError | ConflictError | StorageUnavailable;
export type PasswordChangeError = ValidationError | AuthenticationError | StorageUnavailable;

export function validationError(code: ValidationCode, message: string): ValidationError {
  return { type: 'ValidationError', code, message };
}

export function notFound(message: string): NotFoundError {
  return { type: 'NotFoundError', code: 'NotFound', message };
}

export function storageUnavailable(message: string): StorageUnavailable {
  return { type: 'StorageUnavailable', code: 'StorageUnavailable', message, retryable: true };
}

// --- Analytics outputs ---

export interface CategoryTotal {
  category: string;
  total: number;
}

export interface CategoryPartition {
  top: CategoryTotal[];
  rest: CategoryTotal | null;  // remaining categories under OTHERS_BUCKET
}

export interface BudgetProgress {
  category: string;
  budgetAmount: number;
  spentAmount: number;
  ratio: number;               // clamped to [0, 1]
}

export interface TrendPoint {
  yearMonth: Month;
  total: number;
}

export interface IncomeExpensePoint {
  yearMonth: Month;
  income: number;
  expenses: number;
  net: number;
}

/** What the email collaborator receives for one month */
export interface MonthSummary {
  month: Month;
  totalSpent: number;
  totalIncome: number;
  netSavings: number;
  topCategory: string;         // 'none' when nothing was spent
}
