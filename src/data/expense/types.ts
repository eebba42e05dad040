export type ExpenseData = {
  date: string;
  category: string;
  // Display text as stored, e.g. "₹500.00"; re-parse with normalizeAmount for arithmetic
  amount: string;
  note?: string;
};

export type IndexedExpenseData = Required<ExpenseData> & {
  index: number;
};

export const EXPENSE_HEADERS = ['Date', 'Category', 'Amount', 'Note'] as const;

export const UNCATEGORIZED = 'Uncategorized';
