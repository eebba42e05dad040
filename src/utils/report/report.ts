import fs from 'fs';
import path from 'path';
import { Expense } from '../../data/expense/expense';
import { EXPENSE_HEADERS } from '../../data/expense/types';
import { IncomeMap } from '../../data/income/types';
import { expensesForMonth, rankTotals, shareSlices, totalsByCategory } from '../aggregate/aggregate';
import { formatAmount } from '../amount/amount';
import { MonthKey } from '../date/date';
import { formatCsv } from '../io/csv';
import { renderPieSvg } from './chart';
import { loadPdfKit, PdfLoader, writePdfReport } from './pdf';
import { MonthlyReport, ReportExport } from './types';

export const REPORT_TOP_EXPENSES = 10;

export const chartTitle = (month: MonthKey) => `Category share — ${month}`;

/**
 * Collects everything a month's report shows. Null when the month has no rows.
 *
 * Expenditure here only counts rows dated in the month.
 */
export function buildMonthlyReport(
  month: MonthKey,
  expenses: Expense[],
  incomes: IncomeMap,
  symbol: string,
): MonthlyReport | null {
  const rows = expensesForMonth(expenses, month);
  if (rows.length === 0) {
    return null;
  }
  const ranked = rankTotals(totalsByCategory(rows));
  const income = incomes.get(month) ?? 0;
  const expenditure = rows.reduce((sum, row) => sum + row.value, 0);
  return {
    month,
    title: `Monthly Expense Report — ${month}`,
    income,
    expenditure,
    summary: [`Income: ${formatAmount(symbol, income)}`, `Expenditure: ${formatAmount(symbol, expenditure)}`],
    share: shareSlices(ranked),
    topLines: ranked
      .slice(0, REPORT_TOP_EXPENSES)
      .map((entry, i) => `${i + 1}. ${entry.category}: ${formatAmount(symbol, entry.amount)}`),
    rows,
  };
}

/**
 * Forces a `.pdf` extension onto the requested path
 */
export function reportPath(requested: string): string {
  return requested.toLowerCase().endsWith('.pdf') ? requested : `${requested}.pdf`;
}

/**
 * Writes the report as a PDF, or as an SVG chart plus a CSV of the month's
 * rows when no PDF library can be loaded
 */
export async function exportReport(
  report: MonthlyReport,
  requestedPath: string,
  loadPdf: PdfLoader = loadPdfKit,
): Promise<ReportExport> {
  const pdfPath = reportPath(requestedPath);
  fs.mkdirSync(path.dirname(pdfPath), { recursive: true });

  const factory = await loadPdf();
  if (factory) {
    await writePdfReport(factory, report, pdfPath);
    return { mode: 'pdf', month: report.month, files: [pdfPath], notice: `PDF report saved to ${pdfPath}` };
  }

  const base = pdfPath.slice(0, -'.pdf'.length);
  const svgPath = `${base}.svg`;
  const csvPath = `${base}.csv`;
  fs.writeFileSync(svgPath, renderPieSvg(report.share, chartTitle(report.month)), 'utf8');
  const csv = await formatCsv([[...EXPENSE_HEADERS], ...report.rows.map((row) => row.toRow())]);
  fs.writeFileSync(csvPath, csv, 'utf8');
  return {
    mode: 'fallback',
    month: report.month,
    files: [svgPath, csvPath],
    notice: `PDF output is unavailable; saved the chart and rows instead:\n${svgPath}\n${csvPath}`,
  };
}
