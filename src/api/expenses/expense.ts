import { Request } from 'express';
import { IndexedExpenseData } from '../../data/expense/types';
import { readExpenses, writeExpenses } from '../../utils/io/expenses';
import { queueWrite } from '../../utils/io/queue';
import { log } from '../../utils/log/logger';
import { ViewRegistry } from '../../utils/views/registry';
import { ApiError, ROW_UNAVAILABLE } from '../errors';
import { getBody, rowIndex, textField } from '../request';

/**
 * @throws ApiError 404 when no row is stored at the index
 */
export function getExpense(request: Request): IndexedExpenseData {
  const index = rowIndex(request);
  const expense = readExpenses()[index];
  if (!expense) {
    throw new ApiError(ROW_UNAVAILABLE, 404);
  }
  return expense.serializeWithIndex(index);
}

/**
 * Overwrites the row at the index. The amount text is kept as typed.
 *
 * The file is re-read first, so an index that no longer exists is reported
 * rather than written past the end.
 *
 * @throws ApiError 400 when date, category or amount is blank
 * @throws ApiError 404 when no row is stored at the index
 */
export async function updateExpense(request: Request, views: ViewRegistry): Promise<IndexedExpenseData> {
  const index = rowIndex(request);
  const body = getBody(request);
  const date = textField(body, 'date');
  const category = textField(body, 'category');
  const amount = textField(body, 'amount');
  if (!date || !category || !amount) {
    throw new ApiError('Date, Category and Amount are required.', 400);
  }

  const note = textField(body, 'note');

  const updated = await queueWrite(async () => {
    const expenses = readExpenses();
    const expense = expenses[index];
    if (!expense) {
      throw new ApiError(ROW_UNAVAILABLE, 404);
    }
    expense.date = date;
    expense.category = category;
    expense.amount = amount;
    expense.note = note;
    await writeExpenses(expenses);
    return expense.serializeWithIndex(index);
  });
  log('Updated expense', { index, date, category, amount });

  views.broadcastRefresh();
  return updated;
}

/**
 * Removes the row at the index; later rows move up by one
 *
 * @throws ApiError 404 when no row is stored at the index
 */
export async function deleteExpense(request: Request, views: ViewRegistry): Promise<{ success: boolean }> {
  const index = rowIndex(request);
  const removed = await queueWrite(async () => {
    const expenses = readExpenses();
    if (index >= expenses.length) {
      throw new ApiError(ROW_UNAVAILABLE, 404);
    }
    const [row] = expenses.splice(index, 1);
    await writeExpenses(expenses);
    return row;
  });
  log('Deleted expense', { index, date: removed.date, category: removed.category });

  views.broadcastRefresh();
  return { success: true };
}
