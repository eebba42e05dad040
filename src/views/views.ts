import { ViewHandle, ViewRegistry } from '../utils/views/registry';
import { CHARTS_VIEW, ChartsView } from './charts';
import { ENTRY_VIEW, EntryView } from './entry';
import { SUGGESTIONS_VIEW, SuggestionsView } from './suggestions';

export const VIEW_IDS = [ENTRY_VIEW, CHARTS_VIEW, SUGGESTIONS_VIEW] as const;

export type ViewId = (typeof VIEW_IDS)[number];

export function isViewId(id: string): id is ViewId {
  return VIEW_IDS.some((viewId) => viewId === id);
}

/**
 * Opens a view, or returns it if it is already open
 */
export function openView(views: ViewRegistry, id: ViewId, now: () => Date = () => new Date()): ViewHandle {
  return views.getOrCreate(id, () => {
    switch (id) {
      case ENTRY_VIEW:
        return new EntryView(now);
      case CHARTS_VIEW:
        return new ChartsView(now);
      case SUGGESTIONS_VIEW:
        return new SuggestionsView(views, now);
    }
  });
}

/**
 * The open entry view, opening it first if needed
 */
export function openEntryView(views: ViewRegistry, now?: () => Date): EntryView {
  const view = openView(views, ENTRY_VIEW, now);
  if (!(view instanceof EntryView)) {
    throw new Error(`View "${ENTRY_VIEW}" is registered with the wrong type`);
  }
  return view;
}
