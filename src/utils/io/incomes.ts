import { IncomeMap, INCOME_HEADERS } from '../../data/income/types';
import { MonthKey } from '../date/date';
import { parseNumber, plainDecimal } from '../amount/amount';
import { readCsv, writeCsv } from './csv';
import { queueWrite } from './queue';

export const INCOME_FILE = 'income.csv';

/**
 * Reads monthly incomes in file order. An unreadable figure counts as 0.
 */
export function readIncomes(): IncomeMap {
  const incomes: IncomeMap = new Map();
  for (const record of readCsv(INCOME_FILE, INCOME_HEADERS)) {
    const month = (record.Month || '').trim();
    incomes.set(month, parseNumber((record.Income || '0').trim()) ?? 0);
  }
  return incomes;
}

export async function writeIncomes(incomes: IncomeMap) {
  const rows = [...incomes.entries()].map(([month, amount]) => [month, plainDecimal(amount)]);
  await writeCsv(INCOME_FILE, INCOME_HEADERS, rows);
}

/**
 * Sets (or replaces) the income of one month
 */
export function setIncomeForMonth(month: MonthKey, amount: number): Promise<IncomeMap> {
  return queueWrite(async () => {
    const incomes = readIncomes();
    incomes.set(month, amount);
    await writeIncomes(incomes);
    return incomes;
  });
}
