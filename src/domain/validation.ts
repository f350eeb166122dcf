/**
 * Input rules shared by the stores. Everything is checked before a write.
 */
import {
  err,
  ok,
  validationError,
  type BudgetInput,
  type CategoryMode,
  type ExpenseInput,
  type IncomeInput,
  type Result,
  type ValidationError,
} from './types.js';

export const DEFAULT_CATEGORIES = [
  'Food',
  'Transport',
  'Utilities',
  'Entertainment',
  'Health',
  'Education',
  'Other',
] as const;

export const PASSWORD_SYMBOLS = `@#$%&*!^()_-+={}[]:;"'<>,.?/\\|`;

// bcrypt ignores everything past the first 72 bytes
export const MAX_PASSWORD_BYTES = 72;
const MAX_USERNAME_LENGTH = 100;
const MAX_DESCRIPTION_LENGTH = 255;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface CategoryPolicy {
  mode: CategoryMode;
  categories: readonly string[];
}

/** True when bcrypt would silently cut the password short */
export function tooLongToHash(password: string): boolean {
  return new TextEncoder().encode(password).length > MAX_PASSWORD_BYTES;
}

/**
 * Password policy, applied to both registration and password change:
 * 8+ characters, at most MAX_PASSWORD_BYTES of UTF-8, with a lowercase
 * letter, an uppercase letter, a digit and one of PASSWORD_SYMBOLS.
 */
export function passwordValid(password: string): boolean {
  if (password.length < 8) return false;
  if (tooLongToHash(password)) return false;
  if (!/[a-z]/.test(password)) return false;
  if (!/[A-Z]/.test(password)) return false;
  if (!/\d/.test(password)) return false;
  return Array.from(password).some((ch) => PASSWORD_SYMBOLS.includes(ch));
}

export function checkPassword(password: string): Result<string, ValidationError> {
  if (!passwordValid(password)) {
    return err(validationError(
      'WeakPassword',
      `Password needs 8+ characters (at most ${MAX_PASSWORD_BYTES} bytes) with upper and lower case letters, a digit and a symbol`,
    ));
  }
  return ok(password);
}

export function checkUsername(username: string): Result<string, ValidationError> {
  if (username.length === 0 || username.length > MAX_USERNAME_LENGTH || username.trim() !== username) {
    return err(validationError('InvalidUsername', `Username must be 1-${MAX_USERNAME_LENGTH} characters without surrounding spaces`));
  }
  return ok(username);
}

export function checkEmail(email: string): Result<string, ValidationError> {
  if (!EMAIL.test(email)) {
    return err(validationError('InvalidEmail', `Not an email address: ${email}`));
  }
  return ok(email);
}

export function checkAmount(amount: number): Result<number, ValidationError> {
  if (!Number.isFinite(amount) || amount < 0) {
    return err(validationError('InvalidAmount', 'Amount must be a non-negative number'));
  }
  return ok(amount);
}

/** True for a real calendar date written as YYYY-MM-DD */
export function isIsoDate(value: string): boolean {
  const m = ISO_DATE.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export function checkDate(date: string): Result<string, ValidationError> {
  if (!isIsoDate(date)) {
    return err(validationError('InvalidDate', `Date must be YYYY-MM-DD: ${date}`));
  }
  return ok(date);
}

export function checkMonth(month: number): Result<number, ValidationError> {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return err(validationError('InvalidMonth', 'Month must be an integer from 1 to 12'));
  }
  return ok(month);
}

export function checkYear(year: number): Result<number, ValidationError> {
  if (!Number.isInteger(year) || year < 1900 || year > 9999) {
    return err(validationError('InvalidYear', 'Year must be an integer from 1900 to 9999'));
  }
  return ok(year);
}

/**
 * Closed mode only accepts the configured names (exact match);
 * open mode accepts any non-blank text, trimmed.
 */
export function checkCategory(category: string, policy: CategoryPolicy): Result<string, ValidationError> {
  const trimmed = category.trim();
  if (trimmed === '') {
    return err(validationError('InvalidCategory', 'Category is required'));
  }
  if (policy.mode === 'closed' && !policy.categories.includes(trimmed)) {
    return err(validationError('InvalidCategory', `Unknown category: ${trimmed}`));
  }
  return ok(trimmed);
}

export function checkDescription(description: string | undefined): Result<string, ValidationError> {
  const text = description ?? '';
  if (text.length > MAX_DESCRIPTION_LENGTH) {
    return err(validationError('InvalidDescription', `Description is limited to ${MAX_DESCRIPTION_LENGTH} characters`));
  }
  return ok(text);
}

// --- Whole-payload checks ---

export function validateExpense(
  input: ExpenseInput,
  policy: CategoryPolicy,
): Result<Required<ExpenseInput>, ValidationError> {
  const category = checkCategory(input.category, policy);
  if (!category.ok) return category;
  const income = validateIncome(input);
  if (!income.ok) return income;
  return ok({ ...income.value, category: category.value });
}

export function validateIncome(input: IncomeInput): Result<Required<IncomeInput>, ValidationError> {
  const amount = checkAmount(input.amount);
  if (!amount.ok) return amount;
  const date = checkDate(input.date);
  if (!date.ok) return date;
  const description = checkDescription(input.description);
  if (!description.ok) return description;
  return ok({ amount: amount.value, date: date.value, description: description.value });
}

export function validateBudget(
  input: BudgetInput,
  policy: CategoryPolicy,
): Result<BudgetInput, ValidationError> {
  const category = checkCategory(input.category, policy);
  if (!category.ok) return category;
  const month = checkMonth(input.month);
  if (!month.ok) return month;
  const year = checkYear(input.year);
  if (!year.ok) return year;
  const amount = checkAmount(input.amount);
  if (!amount.ok) return amount;
  return ok({ category: category.value, month: month.value, year: year.value, amount: amount.value });
}
