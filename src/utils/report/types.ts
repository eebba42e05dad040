import { Expense } from '../../data/expense/expense';
import { ShareSlices } from '../aggregate/aggregate';
import { MonthKey } from '../date/date';

export type MonthlyReport = {
  month: MonthKey;
  title: string;
  income: number;
  expenditure: number;
  summary: string[];
  share: ShareSlices;
  topLines: string[];
  rows: Expense[];
};

export type ReportExport = {
  mode: 'pdf' | 'fallback';
  month: MonthKey;
  files: string[];
  notice: string;
};
