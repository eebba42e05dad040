import { err } from '../log/logger';

/**
 * An open view: something holding derived state that goes stale when the
 * stored records change
 */
export interface ViewHandle<T = unknown> {
  readonly id: string;
  refresh(): void;
  snapshot(): T;
}

/**
 * The set of open views, keyed by id. At most one view per id.
 */
export class ViewRegistry {
  private views = new Map<string, ViewHandle>();

  register(id: string, handle: ViewHandle) {
    this.views.set(id, handle);
  }

  /**
   * @returns Whether a view was open under the id
   */
  unregister(id: string): boolean {
    return this.views.delete(id);
  }

  get(id: string): ViewHandle | undefined {
    return this.views.get(id);
  }

  has(id: string): boolean {
    return this.views.has(id);
  }

  list(): string[] {
    return [...this.views.keys()];
  }

  /**
   * Returns the open view, or opens one with `factory`
   */
  getOrCreate(id: string, factory: () => ViewHandle): ViewHandle {
    const existing = this.views.get(id);
    if (existing) {
      return existing;
    }
    const created = factory();
    this.register(id, created);
    return created;
  }

  /**
   * Refreshes every open view. One view failing does not stop the others.
   */
  broadcastRefresh() {
    for (const [id, view] of [...this.views.entries()]) {
      try {
        view.refresh();
      } catch (error) {
        err('View refresh failed', { id, error: error instanceof Error ? error.message : String(error) });
      }
    }
  }
}
