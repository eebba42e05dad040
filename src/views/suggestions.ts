import { currentMonthKey, MonthKey } from '../utils/date/date';
import { readExpenses } from '../utils/io/expenses';
import { readIncomes } from '../utils/io/incomes';
import { loadPreferences } from '../utils/io/preferences';
import { buildSuggestion, renderSuggestionText, Suggestion } from '../utils/suggestions/suggestions';
import { ViewHandle, ViewRegistry } from '../utils/views/registry';
import { ENTRY_VIEW, EntryView } from './entry';

export const SUGGESTIONS_VIEW = 'suggestions';

export type SuggestionsSnapshot = {
  id: string;
  summary: Suggestion;
  text: string;
};

/**
 * The month the other views act on: the entry view's date when it is open,
 * otherwise the current month
 */
export function selectedMonth(views: ViewRegistry, now: Date = new Date()): MonthKey {
  const entry = views.get(ENTRY_VIEW);
  return entry instanceof EntryView ? entry.selectedMonth : currentMonthKey(now);
}

/**
 * Suggestion summary and its rendered text for one month
 */
export function suggestFor(month: MonthKey): Omit<SuggestionsSnapshot, 'id'> {
  const summary = buildSuggestion(month, readExpenses(), readIncomes());
  return { summary, text: renderSuggestionText(summary, loadPreferences().currency_symbol) };
}

export class SuggestionsView implements ViewHandle<SuggestionsSnapshot> {
  readonly id = SUGGESTIONS_VIEW;
  private current: Omit<SuggestionsSnapshot, 'id'>;

  constructor(
    private readonly views: ViewRegistry,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.current = suggestFor(selectedMonth(this.views, this.now()));
  }

  get summary(): Suggestion {
    return this.current.summary;
  }

  get text(): string {
    return this.current.text;
  }

  refresh() {
    this.current = suggestFor(selectedMonth(this.views, this.now()));
  }

  snapshot(): SuggestionsSnapshot {
    return { id: this.id, ...this.current };
  }
}
