import type { MonthKey } from '../../utils/date/date';

/**
 * Monthly income keyed by `YYYY-MM`, in file order
 */
export type IncomeMap = Map<MonthKey, number>;

export const INCOME_HEADERS = ['Month', 'Income'] as const;
