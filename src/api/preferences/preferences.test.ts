import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { useTempDataDir } from '../../utils/test/dataDir';
import { createMockRequest } from '../../utils/test/mockData';
import { ViewRegistry } from '../../utils/views/registry';
import { getPreferences, savePreferencesHandler } from './preferences';

const OPTIONS = ['₹', '$', '€', '£', '¥', 'AED', 'AUD', 'CAD', 'SGD'];

describe('preference handlers', () => {
  let dir: string;
  let cleanup: () => void;
  let views: ViewRegistry;

  const readStored = (): unknown => JSON.parse(fs.readFileSync(path.join(dir, 'preferences.json'), 'utf8'));

  beforeEach(() => {
    ({ dir, cleanup } = useTempDataDir());
    views = new ViewRegistry();
    vi.spyOn(views, 'broadcastRefresh');
  });

  afterEach(() => {
    cleanup();
  });

  it('should return the defaults on first run', () => {
    expect(getPreferences(createMockRequest())).toEqual({
      currency_symbol: '₹',
      default_monthly_budget: 0,
      currency_options: OPTIONS,
    });
    expect(readStored()).toEqual({ currency_symbol: '₹', default_monthly_budget: 0 });
  });

  it('should save the symbol and budget', () => {
    const result = savePreferencesHandler(
      createMockRequest({ body: { currency_symbol: ' $ ', default_monthly_budget: '1500' } }),
      views,
    );

    expect(result).toEqual({ currency_symbol: '$', default_monthly_budget: 1500, currency_options: OPTIONS });
    expect(readStored()).toEqual({ currency_symbol: '$', default_monthly_budget: 1500 });
    expect(views.broadcastRefresh).toHaveBeenCalledTimes(1);
  });

  it('should store a blank symbol as the default one', () => {
    const result = savePreferencesHandler(
      createMockRequest({ body: { currency_symbol: '  ', default_monthly_budget: 10 } }),
      views,
    );
    expect(result.currency_symbol).toBe('₹');
  });

  it('should keep the budget when none is sent', () => {
    fs.writeFileSync(
      path.join(dir, 'preferences.json'),
      JSON.stringify({ currency_symbol: '£', default_monthly_budget: 900 }),
    );

    const result = savePreferencesHandler(createMockRequest({ body: { currency_symbol: 'AED' } }), views);

    expect(result.default_monthly_budget).toBe(900);
  });

  it('should reject a budget that is not numeric', () => {
    expect(() =>
      savePreferencesHandler(
        createMockRequest({ body: { currency_symbol: '$', default_monthly_budget: 'plenty' } }),
        views,
      ),
    ).toThrow('Budget must be numeric.');
    expect(views.broadcastRefresh).not.toHaveBeenCalled();
  });
});
