import { Expense } from '../../data/expense/expense';
import { IncomeMap } from '../../data/income/types';
import { MonthKey } from '../date/date';
import { formatAmount } from '../amount/amount';
import { CategoryTotal, monthCategoryTotals, rankTotals, totalsByMonth } from '../aggregate/aggregate';

export const SAVINGS_THRESHOLD = 1000;
export const SUGGESTION_TOP_CATEGORIES = 6;

export const QUICK_ACTIONS = [
  "Click 'Start SIP' for investment calculator",
  'Set income in Entry window',
  'Generate PDF reports monthly',
];

export type Suggestion = {
  month: MonthKey;
  income: number;
  expenditure: number;
  balance: number;
  noIncome: boolean;
  topCategories: CategoryTotal[];
  overspend: { amount: number } | null;
  savings: { amount: number } | null;
  tips: string[];
};

/**
 * Summarises one month: income against spending, the month's largest
 * categories, and either an overspend warning or a savings note.
 *
 * Spending counts rows with an unreadable date toward `month`; the category
 * list only counts rows actually dated in `month`.
 */
export function buildSuggestion(month: MonthKey, expenses: Expense[], incomes: IncomeMap): Suggestion {
  const income = incomes.get(month) ?? 0;
  const expenditure = totalsByMonth(expenses, month).get(month) ?? 0;
  const balance = income - expenditure;

  let overspend: Suggestion['overspend'] = null;
  let savings: Suggestion['savings'] = null;
  if (income > 0 && expenditure > income) {
    overspend = { amount: expenditure - income };
  } else if (balance >= SAVINGS_THRESHOLD) {
    // Absolute threshold in stored units, whatever the currency
    savings = { amount: balance };
  }

  return {
    month,
    income,
    expenditure,
    balance,
    noIncome: income === 0,
    topCategories: rankTotals(monthCategoryTotals(expenses, month)).slice(0, SUGGESTION_TOP_CATEGORIES),
    overspend,
    savings,
    tips: [...QUICK_ACTIONS],
  };
}

/**
 * Renders a suggestion as the plain-text block shown in the suggestions view
 */
export function renderSuggestionText(suggestion: Suggestion, symbol: string): string {
  const money = (amount: number) => formatAmount(symbol, amount);
  let text = `Month: ${suggestion.month}\n`;
  text += `Income: ${money(suggestion.income)}\n`;
  text += `Expenditure: ${money(suggestion.expenditure)}\n`;
  text += `Balance: ${money(suggestion.balance)}\n\n`;

  if (suggestion.noIncome) {
    text += 'No income set for this month.\nSet monthly income to enable better insights.\n\n';
  }

  if (suggestion.topCategories.length > 0) {
    text += "This month's top categories:\n";
    for (const { category, amount } of suggestion.topCategories) {
      text += `  • ${category}: ${money(amount)}\n`;
    }
  }

  if (suggestion.overspend) {
    text += '\nYou have spent too much!\n';
    text += `Expenditure exceeds income by ${money(suggestion.overspend.amount)}\n`;
    text += 'Review top spending categories above and cut back where possible.\n\n';
  } else if (suggestion.savings) {
    text += `\nGreat! ${money(suggestion.savings.amount)} available to save.\n`;
    text += 'Consider automated SIP investments.\n\n';
  }

  text += 'Quick Actions:\n';
  for (const tip of suggestion.tips) {
    text += `• ${tip}\n`;
  }
  return text;
}
