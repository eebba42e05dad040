import { IndexedExpenseData } from '../data/expense/types';
import { isDateString, MonthKey, todayDateString } from '../utils/date/date';
import { readExpenses } from '../utils/io/expenses';
import { ViewHandle } from '../utils/views/registry';

export const ENTRY_VIEW = 'entry';

export type EntrySnapshot = {
  id: string;
  selectedDate: string;
  selectedMonth: MonthKey;
  rows: IndexedExpenseData[];
};

/**
 * The expense table and the date picker used when adding rows
 */
export class EntryView implements ViewHandle<EntrySnapshot> {
  readonly id = ENTRY_VIEW;
  selectedDate: string;
  rows: IndexedExpenseData[] = [];

  constructor(now: () => Date = () => new Date()) {
    this.selectedDate = todayDateString(now());
    this.refresh();
  }

  get selectedMonth(): MonthKey {
    return this.selectedDate.slice(0, 7);
  }

  /**
   * Moves the date picker. Only `YYYY-MM-DD` dates are accepted.
   */
  setDate(date: string): boolean {
    if (!isDateString(date)) {
      return false;
    }
    this.selectedDate = date;
    return true;
  }

  refresh() {
    this.rows = readExpenses().map((expense, index) => expense.serializeWithIndex(index));
  }

  snapshot(): EntrySnapshot {
    return {
      id: this.id,
      selectedDate: this.selectedDate,
      selectedMonth: this.selectedMonth,
      rows: this.rows,
    };
  }
}
