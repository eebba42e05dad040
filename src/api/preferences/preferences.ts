import { Request } from 'express';
import { CURRENCY_OPTIONS, DEFAULT_CURRENCY_SYMBOL, PreferencesData } from '../../data/preferences/types';
import { parseNumber } from '../../utils/amount/amount';
import { loadPreferences, savePreferences } from '../../utils/io/preferences';
import { log } from '../../utils/log/logger';
import { ViewRegistry } from '../../utils/views/registry';
import { ApiError } from '../errors';
import { getBody, textField } from '../request';

export type PreferencesResponse = PreferencesData & {
  currency_options: string[];
};

export function getPreferences(_request: Request): PreferencesResponse {
  return { ...loadPreferences(), currency_options: [...CURRENCY_OPTIONS] };
}

/**
 * Saves the currency symbol and monthly budget target.
 *
 * A blank symbol is stored as the default one. A missing budget is kept as
 * it was.
 *
 * @throws ApiError 400 when the budget is not numeric
 */
export function savePreferencesHandler(request: Request, views: ViewRegistry): PreferencesResponse {
  const body = getBody(request);
  const current = loadPreferences();
  const budget =
    body.default_monthly_budget === undefined
      ? current.default_monthly_budget
      : parseNumber(textField(body, 'default_monthly_budget'));
  if (budget === null) {
    throw new ApiError('Budget must be numeric.', 400);
  }

  const preferences: PreferencesData = {
    currency_symbol: textField(body, 'currency_symbol') || DEFAULT_CURRENCY_SYMBOL,
    default_monthly_budget: budget,
  };
  savePreferences(preferences);
  log('Saved preferences', { ...preferences });

  views.broadcastRefresh();
  return { ...preferences, currency_options: [...CURRENCY_OPTIONS] };
}
