import { Request } from 'express';
import path from 'path';
import { getConfig } from '../../utils/config/config';
import { isMonthKey, MonthKey } from '../../utils/date/date';
import { readExpenses } from '../../utils/io/expenses';
import { readIncomes } from '../../utils/io/incomes';
import { loadPreferences } from '../../utils/io/preferences';
import { err, log } from '../../utils/log/logger';
import { PdfLoader } from '../../utils/report/pdf';
import { buildMonthlyReport, exportReport } from '../../utils/report/report';
import { ReportExport } from '../../utils/report/types';
import { ViewRegistry } from '../../utils/views/registry';
import { selectedMonth } from '../../views/suggestions';
import { ApiError } from '../errors';
import { getBody, textField } from '../request';

/**
 * Resolves the requested output path against the report directory. Paths
 * that leave the directory are refused.
 *
 * @throws ApiError 400 when the path points outside the report directory
 */
function reportTarget(requested: string, reportDir: string, month: MonthKey): string {
  if (!requested) {
    return path.join(reportDir, `report-${month}.pdf`);
  }
  const target = path.resolve(reportDir, requested);
  const relative = path.relative(reportDir, target);
  if (!relative || relative.split(path.sep)[0] === '..' || path.isAbsolute(relative)) {
    throw new ApiError('Report path must stay inside the report directory.', 400);
  }
  return target;
}

/**
 * Exports one month's report.
 *
 * The month is `month`, or the entry view's month. The file goes to `path`,
 * taken relative to the report directory, or to `report-<month>.pdf` there.
 *
 * @throws ApiError 400 when the month is malformed or the path leaves the report directory
 * @throws ApiError 404 when the month has no expenses
 * @throws ApiError 500 when the report cannot be written
 */
export async function createReport(request: Request, views: ViewRegistry, loadPdf?: PdfLoader): Promise<ReportExport> {
  const body = getBody(request);
  const requestedMonth = textField(body, 'month');
  if (requestedMonth && !isMonthKey(requestedMonth)) {
    throw new ApiError('Month must be written as YYYY-MM.', 400);
  }
  const month = requestedMonth || selectedMonth(views);

  const report = buildMonthlyReport(month, readExpenses(), readIncomes(), loadPreferences().currency_symbol);
  if (!report) {
    throw new ApiError(`No expenses found for ${month}`, 404);
  }

  const target = reportTarget(textField(body, 'path'), getConfig().reportDir, month);
  try {
    const result = await exportReport(report, target, loadPdf);
    log('Exported report', { month, mode: result.mode, files: result.files.join(', ') });
    return result;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    err('Report export failed', { month, target, error: reason });
    throw new ApiError(`Failed to create report: ${reason}`, 500);
  }
}
