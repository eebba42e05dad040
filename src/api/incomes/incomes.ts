import { Request } from 'express';
import { formatAmount, parseNumber } from '../../utils/amount/amount';
import { isDateString, isMonthKey, MonthKey } from '../../utils/date/date';
import { readIncomes, setIncomeForMonth } from '../../utils/io/incomes';
import { loadPreferences } from '../../utils/io/preferences';
import { log } from '../../utils/log/logger';
import { ViewRegistry } from '../../utils/views/registry';
import { selectedMonth } from '../../views/suggestions';
import { ApiError } from '../errors';
import { getBody, textField } from '../request';

export type IncomeResponse = {
  month: MonthKey;
  amount: number;
  message: string;
  incomes: Record<MonthKey, number>;
};

export function getIncomes(_request: Request): Record<MonthKey, number> {
  return Object.fromEntries(readIncomes());
}

function resolveMonth(month: string, date: string, views: ViewRegistry): MonthKey {
  if (month) {
    if (!isMonthKey(month)) {
      throw new ApiError('Month must be written as YYYY-MM.', 400);
    }
    return month;
  }
  if (date) {
    if (!isDateString(date)) {
      throw new ApiError('Date must be a valid YYYY-MM-DD date.', 400);
    }
    return date.slice(0, 7);
  }
  return selectedMonth(views);
}

/**
 * Sets the income of one month, replacing any earlier figure.
 *
 * The month is taken from `month`, then from `date`, then from the entry
 * view's date picker.
 *
 * @throws ApiError 400 when the amount is missing, not numeric or negative
 */
export async function setIncome(request: Request, views: ViewRegistry): Promise<IncomeResponse> {
  const body = getBody(request);
  const amountText = textField(body, 'amount');
  if (!amountText) {
    throw new ApiError('Please enter an income amount.', 400);
  }
  const amount = parseNumber(amountText);
  if (amount === null) {
    throw new ApiError('Income must be numeric.', 400);
  }
  if (amount < 0) {
    throw new ApiError('Income cannot be negative.', 400);
  }
  const month = resolveMonth(textField(body, 'month'), textField(body, 'date'), views);

  const incomes = await setIncomeForMonth(month, amount);
  log('Set income', { month, amount });

  views.broadcastRefresh();
  return {
    month,
    amount,
    message: `Income for ${month} saved: ${formatAmount(loadPreferences().currency_symbol, amount)}`,
    incomes: Object.fromEntries(incomes),
  };
}
