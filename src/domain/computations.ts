/**
 * Pure analytics over ledger records.
 * No DB, no IO — only data in, data out. Same input, same output.
 */
import type {
  Budget,
  BudgetProgress,
  CategoryPartition,
  CategoryTotal,
  DateRange,
  Expense,
  Income,
  IncomeExpensePoint,
  Month,
  MonthSummary,
  TrendPoint,
} from './types.js';

/** Number of categories highlighted before the rest are grouped */
export const TOP_CATEGORY_COUNT = 3;

/** Label of the catch-all bucket in a category partition */
export const OTHERS_BUCKET = 'Others';

/** Returned by topCategory when there is nothing to rank */
export const NO_CATEGORY = 'none';

interface Dated {
  date: string;
  amount: number;
}

/** Round to cents so sums of decimals don't drift (0.1 + 0.2) */
export function roundAmount(value: number): number {
  return Math.round(value * 100) / 100;
}

function sumAmounts(records: readonly Dated[]): number {
  return roundAmount(records.reduce((sum, r) => sum + r.amount, 0));
}

/** Format year + month (1–12) as YYYY-MM */
export function yearMonthKey(year: number, month: number): Month {
  return `${year}-${String(month).padStart(2, '0')}`;
}

/** Filter records to a single month (YYYY-MM) */
export function forMonth<T extends Dated>(records: readonly T[], month: Month): T[] {
  return records.filter((r) => r.date.startsWith(`${month}-`));
}

/** Filter records to an inclusive date range */
export function forRange<T extends Dated>(records: readonly T[], range: DateRange): T[] {
  return records.filter((r) =>
    (range.from === undefined || r.date >= range.from) &&
    (range.to === undefined || r.date <= range.to));
}

/** Sum of amounts dated inside the given calendar month */
export function monthlyTotal(records: readonly Dated[], year: number, month: number): number {
  return sumAmounts(forMonth(records, yearMonthKey(year, month)));
}

/** Income minus spending. Negative when overspent. */
export function netSavings(incomeTotal: number, expenseTotal: number): number {
  return roundAmount(incomeTotal - expenseTotal);
}

/** category → summed amount, keys in category order */
export function categoryBreakdown(expenses: readonly Expense[]): Record<string, number> {
  // fromEntries defines own keys, so a category named "__proto__" stays a key
  return Object.fromEntries(
    sortByCategory(totalsByCategory(expenses)).map(({ category, total }): [string, number] => [category, total]),
  );
}

/**
 * Category totals, largest first. Equal totals are ordered by category name,
 * so the ranking never depends on the order the records came in.
 */
export function categoryRanking(expenses: readonly Expense[]): CategoryTotal[] {
  return sortByCategory(totalsByCategory(expenses))
    .sort((a, b) => b.total - a.total);
}

/** Category with the largest spend; alphabetical on ties */
export function topCategory(expenses: readonly Expense[]): string {
  const [first] = categoryRanking(expenses);
  return first ? first.category : NO_CATEGORY;
}

/**
 * First n ranked categories, the remainder summed under OTHERS_BUCKET.
 * rest is null when nothing is left over.
 */
export function partitionTopCategories(
  expenses: readonly Expense[],
  n: number = TOP_CATEGORY_COUNT,
): CategoryPartition {
  const ranked = categoryRanking(expenses);
  const count = Math.max(0, Math.floor(n));
  const top = ranked.slice(0, count);
  const remainder = ranked.slice(count);
  if (remainder.length === 0) {
    return { top, rest: null };
  }
  return {
    top,
    rest: {
      category: OTHERS_BUCKET,
      total: roundAmount(remainder.reduce((sum, c) => sum + c.total, 0)),
    },
  };
}

/**
 * Spend against each budget. ratio = spent / budget clamped to [0, 1];
 * a zero budget gives ratio 0. Categories without a budget are left out.
 */
export function budgetProgress(
  budgets: readonly Budget[],
  expensesForPeriod: readonly Expense[],
): BudgetProgress[] {
  const spentByCategory = new Map<string, number>();
  for (const { category, total } of totalsByCategory(expensesForPeriod)) {
    spentByCategory.set(category, total);
  }

  return [...budgets]
    .sort((a, b) => compareText(a.category, b.category))
    .map((budget) => {
      const spent = spentByCategory.get(budget.category) ?? 0;
      return {
        category: budget.category,
        budgetAmount: budget.amount,
        spentAmount: spent,
        ratio: budget.amount > 0 ? clamp(spent / budget.amount, 0, 1) : 0,
      };
    });
}

/**
 * Monthly spend over the trailing window ending at now's month, oldest first.
 * Dense: months without spending are present with total 0.
 */
export function trendSeries(
  expenses: readonly Expense[],
  now: Date,
  windowMonths: number,
): TrendPoint[] {
  const months = lastNMonths(windowMonths, now);
  const totals = new Map<Month, number>(months.map((m) => [m, 0]));
  for (const e of expenses) {
    const key = e.date.slice(0, 7);
    const current = totals.get(key);
    if (current !== undefined) totals.set(key, current + e.amount);
  }
  return months.map((yearMonth) => ({
    yearMonth,
    total: roundAmount(totals.get(yearMonth) ?? 0),
  }));
}

/**
 * Income, expenses and net per month, for months with any activity.
 * Sparse, oldest first.
 */
export function incomeVsExpenseSeries(
  incomes: readonly Income[],
  expenses: readonly Expense[],
): IncomeExpensePoint[] {
  const buckets = new Map<Month, { income: number; expenses: number }>();
  const bucket = (date: string) => {
    const key = date.slice(0, 7);
    let b = buckets.get(key);
    if (!b) {
      b = { income: 0, expenses: 0 };
      buckets.set(key, b);
    }
    return b;
  };
  for (const i of incomes) bucket(i.date).income += i.amount;
  for (const e of expenses) bucket(e.date).expenses += e.amount;

  return Array.from(buckets.entries())
    .sort((a, b) => compareText(a[0], b[0]))
    .map(([yearMonth, b]) => ({
      yearMonth,
      income: roundAmount(b.income),
      expenses: roundAmount(b.expenses),
      net: netSavings(b.income, b.expenses),
    }));
}

/** Totals for one month, as handed to the summary email */
export function monthSummary(
  incomes: readonly Income[],
  expenses: readonly Expense[],
  year: number,
  month: number,
): MonthSummary {
  const key = yearMonthKey(year, month);
  const monthExpenses = forMonth(expenses, key);
  const totalSpent = sumAmounts(monthExpenses);
  const totalIncome = monthlyTotal(incomes, year, month);
  return {
    month: key,
    totalSpent,
    totalIncome,
    netSavings: netSavings(totalIncome, totalSpent),
    topCategory: topCategory(monthExpenses),
  };
}

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): Month {
  return yearMonthKey(now.getFullYear(), now.getMonth() + 1);
}

/**
 * Get the last N months (including the reference month) as YYYY-MM labels.
 */
export function lastNMonths(count: number, from: Date = new Date()): Month[] {
  if (count <= 0) return [];

  return Array.from({ length: count }, (_, index) => {
    const d = new Date(from.getFullYear(), from.getMonth() - (count - 1 - index), 1);
    return yearMonthKey(d.getFullYear(), d.getMonth() + 1);
  });
}

// --- helpers ---

function totalsByCategory(expenses: readonly Expense[]): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const e of expenses) {
    map.set(e.category, (map.get(e.category) ?? 0) + e.amount);
  }
  return Array.from(map.entries())
    .map(([category, total]) => ({ category, total: roundAmount(total) }));
}

function sortByCategory(totals: CategoryTotal[]): CategoryTotal[] {
  return totals.sort((a, b) => compareText(a.category, b.category));
}

/** Code-unit order, independent of locale */
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
