import { Expense } from '../../data/expense/expense';
import { currentMonthKey, MonthKey } from '../date/date';

export type CategoryTotal = {
  category: string;
  amount: number;
};

export type ShareSlices = {
  labels: string[];
  values: number[];
};

export const OTHERS_LABEL = 'Others';
export const NO_DATA_LABEL = 'No data';
export const SHARE_SLICE_LIMIT = 6;

function addTo<K>(totals: Map<K, number>, key: K, amount: number) {
  totals.set(key, (totals.get(key) ?? 0) + amount);
}

/**
 * All-time total per category, in first-seen order
 */
export function totalsByCategory(expenses: Expense[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const expense of expenses) {
    addTo(totals, expense.categoryLabel, expense.value);
  }
  return totals;
}

/**
 * Total per month. Rows whose date cannot be read count toward `fallbackMonth`.
 */
export function totalsByMonth(expenses: Expense[], fallbackMonth: MonthKey = currentMonthKey()): Map<MonthKey, number> {
  const totals = new Map<MonthKey, number>();
  for (const expense of expenses) {
    addTo(totals, expense.month ?? fallbackMonth, expense.value);
  }
  return totals;
}

/**
 * Per-month category totals, keyed the same way as {@link totalsByMonth}
 */
export function totalsByMonthAndCategory(
  expenses: Expense[],
  fallbackMonth: MonthKey = currentMonthKey(),
): Map<MonthKey, Map<string, number>> {
  const totals = new Map<MonthKey, Map<string, number>>();
  for (const expense of expenses) {
    const month = expense.month ?? fallbackMonth;
    let categories = totals.get(month);
    if (!categories) {
      categories = new Map();
      totals.set(month, categories);
    }
    addTo(categories, expense.categoryLabel, expense.value);
  }
  return totals;
}

/**
 * Rows whose date reads as the given month. Unreadable dates never match.
 */
export function expensesForMonth(expenses: Expense[], month: MonthKey): Expense[] {
  return expenses.filter((expense) => expense.month === month);
}

/**
 * Category totals of one month, counting only rows dated in that month
 */
export function monthCategoryTotals(expenses: Expense[], month: MonthKey): Map<string, number> {
  return totalsByCategory(expensesForMonth(expenses, month));
}

/**
 * Orders totals by amount, largest first. Equal amounts keep first-seen order.
 */
export function rankTotals(totals: Map<string, number>): CategoryTotal[] {
  // Array.prototype.sort is stable
  return [...totals.entries()]
    .map(([category, amount]) => ({ category, amount }))
    .sort((a, b) => b.amount - a.amount);
}

/**
 * The `n` largest categories of the given rows
 */
export function topCategories(n: number, expenses: Expense[]): CategoryTotal[] {
  return rankTotals(totalsByCategory(expenses)).slice(0, Math.max(0, n));
}

/**
 * Pie-chart slices: the `limit` largest categories, then one "Others" slice
 * holding the sum of the rest.
 *
 * When everything sums to zero a single "No data" slice of 1 is returned so
 * the chart has something to draw. Use this only for charts, never for totals.
 */
export function shareSlices(ranked: CategoryTotal[], limit: number = SHARE_SLICE_LIMIT): ShareSlices {
  const top = ranked.slice(0, limit);
  const labels = top.map((entry) => entry.category);
  const values = top.map((entry) => entry.amount);
  if (ranked.length > limit) {
    labels.push(OTHERS_LABEL);
    values.push(ranked.slice(limit).reduce((sum, entry) => sum + entry.amount, 0));
  }
  if (values.reduce((sum, value) => sum + value, 0) === 0) {
    return { labels: [NO_DATA_LABEL], values: [1] };
  }
  return { labels, values };
}
