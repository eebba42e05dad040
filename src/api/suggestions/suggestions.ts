import { Request } from 'express';
import { isMonthKey } from '../../utils/date/date';
import { ViewRegistry } from '../../utils/views/registry';
import { selectedMonth, suggestFor, SuggestionsSnapshot } from '../../views/suggestions';
import { ApiError } from '../errors';
import { queryField } from '../request';

/**
 * Suggestions for `?month=YYYY-MM`, or for the entry view's month when the
 * query names none
 *
 * @throws ApiError 400 when the month is malformed
 */
export function getSuggestions(request: Request, views: ViewRegistry): Omit<SuggestionsSnapshot, 'id'> {
  const month = queryField(request, 'month');
  if (month && !isMonthKey(month)) {
    throw new ApiError('Month must be written as YYYY-MM.', 400);
  }
  return suggestFor(month || selectedMonth(views));
}
