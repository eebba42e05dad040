import { Request } from 'express';
import { log } from '../../utils/log/logger';
import { ViewRegistry } from '../../utils/views/registry';
import { EntrySnapshot } from '../../views/entry';
import { isViewId, openEntryView, openView } from '../../views/views';
import { ApiError } from '../errors';
import { getBody, textField } from '../request';

export function getOpenViews(_request: Request, views: ViewRegistry): { views: string[] } {
  return { views: views.list() };
}

function viewId(request: Request) {
  const { id } = request.params;
  if (!isViewId(id)) {
    throw new ApiError(`Unknown view: ${id}`, 404);
  }
  return id;
}

/**
 * Opens the view if needed and returns what it currently shows
 *
 * @throws ApiError 404 for an unknown view id
 */
export function getView(request: Request, views: ViewRegistry): unknown {
  const id = viewId(request);
  const opened = !views.has(id);
  const view = openView(views, id);
  if (opened) {
    log('Opened view', { id });
  }
  return view.snapshot();
}

/**
 * @throws ApiError 404 for an unknown view id
 */
export function closeView(request: Request, views: ViewRegistry): { closed: boolean } {
  const id = viewId(request);
  const closed = views.unregister(id);
  if (closed) {
    log('Closed view', { id });
  }
  return { closed };
}

/**
 * Moves the entry view's date picker, opening the view if needed. Views that
 * follow the selected month are refreshed.
 *
 * @throws ApiError 400 when the date is not a valid `YYYY-MM-DD` date
 */
export function setEntryDate(request: Request, views: ViewRegistry): EntrySnapshot {
  const date = textField(getBody(request), 'date');
  const entry = openEntryView(views);
  if (!entry.setDate(date)) {
    throw new ApiError('Date must be a valid YYYY-MM-DD date.', 400);
  }
  views.broadcastRefresh();
  return entry.snapshot();
}

export function refreshViews(_request: Request, views: ViewRegistry): { refreshed: string[] } {
  views.broadcastRefresh();
  return { refreshed: views.list() };
}
