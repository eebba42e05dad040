import { Request } from 'express';
import { Expense } from '../../data/expense/expense';
import { IndexedExpenseData } from '../../data/expense/types';
import { formatAmount, parseNumber } from '../../utils/amount/amount';
import { isDateString, todayDateString } from '../../utils/date/date';
import { appendExpense, EXPENSES_FILE, readExpenses } from '../../utils/io/expenses';
import { checkExists, dataPath } from '../../utils/io/io';
import { queueWrite } from '../../utils/io/queue';
import { loadPreferences } from '../../utils/io/preferences';
import { log } from '../../utils/log/logger';
import { openWithDefaultApp } from '../../utils/system/openFile';
import { ViewRegistry } from '../../utils/views/registry';
import { ENTRY_VIEW, EntryView } from '../../views/entry';
import { ApiError } from '../errors';
import { getBody, textField } from '../request';

/**
 * Every stored row, in file order, with its position
 */
export function getExpenses(_request: Request): IndexedExpenseData[] {
  return readExpenses().map((expense, index) => expense.serializeWithIndex(index));
}

/**
 * The date new rows get when the request names none: the entry view's date
 * picker when that view is open, otherwise today
 */
function defaultDate(views: ViewRegistry): string {
  const entry = views.get(ENTRY_VIEW);
  return entry instanceof EntryView ? entry.selectedDate : todayDateString();
}

/**
 * Adds a row to the end of the file.
 *
 * The amount must be a finite number and is stored with the chosen currency
 * symbol and two decimals, e.g. `₹250.00`.
 *
 * @throws ApiError 400 when the category or amount is missing or invalid
 */
export async function addExpense(request: Request, views: ViewRegistry): Promise<IndexedExpenseData> {
  const body = getBody(request);
  const category = textField(body, 'category');
  const amountText = textField(body, 'amount');
  const date = textField(body, 'date') || defaultDate(views);

  if (!category || !amountText) {
    throw new ApiError('Please enter Category and Amount.', 400);
  }
  const amount = parseNumber(amountText);
  if (amount === null) {
    throw new ApiError('Please enter a valid numeric amount.', 400);
  }
  if (!isDateString(date)) {
    throw new ApiError('Date must be a valid YYYY-MM-DD date.', 400);
  }
  const currency = textField(body, 'currency') || loadPreferences().currency_symbol;

  const expense = new Expense({
    date,
    category,
    amount: formatAmount(currency, amount),
    note: textField(body, 'note'),
  });
  const index = await queueWrite(async () => {
    await appendExpense(expense);
    return readExpenses().length - 1;
  });
  log('Added expense', { date, category, amount: expense.amount });

  views.broadcastRefresh();
  return expense.serializeWithIndex(index);
}

/**
 * Opens the expense file with the operating system's default application
 *
 * @throws ApiError 404 when no expense has been saved yet
 */
export async function openExpensesFile(_request: Request): Promise<{ path: string }> {
  if (!checkExists(EXPENSES_FILE)) {
    throw new ApiError(`File '${EXPENSES_FILE}' not found. Add at least one expense to create it.`, 404);
  }
  const filePath = dataPath(EXPENSES_FILE);
  await openWithDefaultApp(filePath);
  log('Opened expense file', { path: filePath });
  return { path: filePath };
}
