let tail: Promise<void> = Promise.resolve();

/**
 * Runs file mutations one at a time, in the order they were queued.
 *
 * A read-modify-write of the data files must go through here, so that a
 * second request cannot read the file while the first is still writing it.
 * A failed task rejects its own promise and does not block later tasks.
 */
export function queueWrite<T>(task: () => T | Promise<T>): Promise<T> {
  const result = tail.then(task);
  tail = result.then(
    () => undefined,
    () => undefined,
  );
  return result;
}
