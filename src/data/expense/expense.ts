import { ExpenseData, IndexedExpenseData, UNCATEGORIZED } from './types';
import { readAmount } from '../../utils/amount/amount';
import { monthKey, MonthKey } from '../../utils/date/date';
import { debug } from '../../utils/log/logger';

/**
 * One row of the expense file.
 *
 * Rows have no identifier of their own; they are addressed by their position
 * in the file, which is also the order they are kept in.
 */
export class Expense {
  date: string;
  category: string;
  amount: string;
  note: string;

  constructor(data: ExpenseData) {
    this.date = data.date;
    this.category = data.category;
    this.amount = data.amount;
    this.note = data.note || '';
  }

  /**
   * Category used for grouping; a blank category is "Uncategorized"
   */
  get categoryLabel(): string {
    return this.category || UNCATEGORIZED;
  }

  /**
   * Numeric value of the stored amount text
   */
  get value(): number {
    const value = readAmount(this.amount);
    if (value === null) {
      debug('Unreadable amount counted as 0', { amount: this.amount, category: this.category });
      return 0;
    }
    return value;
  }

  /**
   * Month key of the row's date, or null if the date cannot be read
   */
  get month(): MonthKey | null {
    const month = monthKey(this.date);
    if (month === null) {
      debug('Unreadable date', { date: this.date, category: this.category });
    }
    return month;
  }

  toRow(): string[] {
    return [this.date, this.category, this.amount, this.note];
  }

  serialize(): Required<ExpenseData> {
    return {
      date: this.date,
      category: this.category,
      amount: this.amount,
      note: this.note,
    };
  }

  serializeWithIndex(index: number): IndexedExpenseData {
    return { index, ...this.serialize() };
  }
}
