import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadPreferences, savePreferences, PREFERENCES_FILE } from './preferences';
import { useTempDataDir } from '../test/dataDir';

describe('Preferences store', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = useTempDataDir());
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  const filePath = () => path.join(dir, PREFERENCES_FILE);

  it('should write and return defaults on first run', () => {
    expect(loadPreferences()).toEqual({ currency_symbol: '₹', default_monthly_budget: 0 });
    expect(JSON.parse(fs.readFileSync(filePath(), 'utf8'))).toEqual({
      currency_symbol: '₹',
      default_monthly_budget: 0,
    });
  });

  it('should round-trip saved preferences', () => {
    savePreferences({ currency_symbol: '$', default_monthly_budget: 2500 });

    expect(loadPreferences()).toEqual({ currency_symbol: '$', default_monthly_budget: 2500 });
    expect(fs.readFileSync(filePath(), 'utf8')).toBe(
      '{\n  "currency_symbol": "$",\n  "default_monthly_budget": 2500\n}',
    );
  });

  it('should fall back to defaults for a corrupt file', () => {
    fs.writeFileSync(filePath(), '{not json');

    expect(loadPreferences()).toEqual({ currency_symbol: '₹', default_monthly_budget: 0 });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should replace fields of the wrong type', () => {
    fs.writeFileSync(filePath(), JSON.stringify({ currency_symbol: 5, default_monthly_budget: 'lots' }));

    expect(loadPreferences()).toEqual({ currency_symbol: '₹', default_monthly_budget: 0 });
  });

  it('should keep valid fields of a partial file', () => {
    fs.writeFileSync(filePath(), JSON.stringify({ currency_symbol: '£' }));

    expect(loadPreferences()).toEqual({ currency_symbol: '£', default_monthly_budget: 0 });
  });
});
