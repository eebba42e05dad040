import { Expense } from '../../data/expense/expense';
import { EXPENSE_HEADERS } from '../../data/expense/types';
import { appendCsv, readCsv, writeCsv } from './csv';

export const EXPENSES_FILE = 'expenses.csv';

/**
 * Reads every expense row in file order.
 *
 * Creates the file with its header when missing. Fields are trimmed; a
 * missing amount reads as "0".
 */
export function readExpenses(): Expense[] {
  return readCsv(EXPENSES_FILE, EXPENSE_HEADERS).map(
    (record) =>
      new Expense({
        date: (record.Date || '').trim(),
        category: (record.Category || '').trim(),
        amount: (record.Amount || '0').trim(),
        note: (record.Note || '').trim(),
      }),
  );
}

/**
 * Replaces the file with the given rows, in the given order
 */
export async function writeExpenses(expenses: Expense[]) {
  await writeCsv(
    EXPENSES_FILE,
    EXPENSE_HEADERS,
    expenses.map((expense) => expense.toRow()),
  );
}

/**
 * Appends one row to the end of the file
 */
export async function appendExpense(expense: Expense) {
  await appendCsv(EXPENSES_FILE, EXPENSE_HEADERS, [expense.toRow()]);
}
