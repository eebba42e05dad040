import { checkExists, load, save } from './io';
import { DEFAULT_PREFERENCES, PreferencesData } from '../../data/preferences/types';
import { warn } from '../log/logger';

export const PREFERENCES_FILE = 'preferences.json';

function sanitize(data: unknown): PreferencesData {
  if (typeof data !== 'object' || data === null) {
    return { ...DEFAULT_PREFERENCES };
  }
  const symbol: unknown = Reflect.get(data, 'currency_symbol');
  const budget: unknown = Reflect.get(data, 'default_monthly_budget');
  return {
    currency_symbol: typeof symbol === 'string' && symbol !== '' ? symbol : DEFAULT_PREFERENCES.currency_symbol,
    default_monthly_budget:
      typeof budget === 'number' && Number.isFinite(budget) ? budget : DEFAULT_PREFERENCES.default_monthly_budget,
  };
}

/**
 * Loads preferences, writing the defaults on first run.
 *
 * An unreadable or corrupt file yields the defaults instead of failing.
 */
export function loadPreferences(): PreferencesData {
  if (!checkExists(PREFERENCES_FILE)) {
    const defaults = { ...DEFAULT_PREFERENCES };
    savePreferences(defaults);
    return defaults;
  }
  try {
    return sanitize(load<unknown>(PREFERENCES_FILE));
  } catch (error) {
    warn('Could not read preferences, using defaults', { error: error instanceof Error ? error.message : error });
    return { ...DEFAULT_PREFERENCES };
  }
}

export function savePreferences(preferences: PreferencesData) {
  save<PreferencesData>(preferences, PREFERENCES_FILE);
}
