// Keys are snake_case to match preferences.json on disk
export type PreferencesData = {
  currency_symbol: string;
  default_monthly_budget: number;
};

export const DEFAULT_CURRENCY_SYMBOL = '₹';

export const DEFAULT_PREFERENCES: PreferencesData = {
  currency_symbol: DEFAULT_CURRENCY_SYMBOL,
  default_monthly_budget: 0,
};

export const CURRENCY_OPTIONS = ['₹', '$', '€', '£', '¥', 'AED', 'AUD', 'CAD', 'SGD'] as const;
