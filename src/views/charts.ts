import {
  NO_DATA_LABEL,
  rankTotals,
  shareSlices,
  ShareSlices,
  totalsByCategory,
  totalsByMonth,
} from '../utils/aggregate/aggregate';
import { currentMonthKey, MonthKey } from '../utils/date/date';
import { readExpenses } from '../utils/io/expenses';
import { readIncomes } from '../utils/io/incomes';
import { ViewHandle } from '../utils/views/registry';

export const CHARTS_VIEW = 'charts';
export const TOP_CATEGORY_BARS = 10;

export type ChartData = {
  incomeVsExpenditure: {
    months: MonthKey[];
    income: number[];
    expenditure: number[];
  };
  topCategories: {
    labels: string[];
    values: number[];
  };
  share: ShareSlices;
};

/**
 * Builds the dashboard charts from every stored row and income entry
 */
export function buildChartData(now: Date = new Date()): ChartData {
  const expenses = readExpenses();
  const incomes = readIncomes();
  const current = currentMonthKey(now);

  const monthTotals = totalsByMonth(expenses, current);
  const months = [...new Set([...monthTotals.keys(), ...incomes.keys()])].sort();
  if (months.length === 0) {
    months.push(current);
  }

  const ranked = rankTotals(totalsByCategory(expenses));
  const top = ranked.slice(0, TOP_CATEGORY_BARS);

  return {
    incomeVsExpenditure: {
      months,
      income: months.map((month) => incomes.get(month) ?? 0),
      expenditure: months.map((month) => monthTotals.get(month) ?? 0),
    },
    topCategories:
      top.length > 0
        ? { labels: top.map((entry) => entry.category), values: top.map((entry) => entry.amount) }
        : { labels: [NO_DATA_LABEL], values: [0] },
    share: shareSlices(ranked),
  };
}

export class ChartsView implements ViewHandle<ChartData & { id: string }> {
  readonly id = CHARTS_VIEW;
  data: ChartData;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.data = buildChartData(this.now());
  }

  refresh() {
    this.data = buildChartData(this.now());
  }

  snapshot() {
    return { id: this.id, ...this.data };
  }
}
