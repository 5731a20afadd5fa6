export interface BestEffortFailure<T> {
  item: T;
  error: unknown;
}

/**
 * Runs `action` for every item in order. A failing item never stops the
 * remaining ones; failures are reported through `onFailure` and returned.
 */
export async function bestEffort<T>(
  items: Iterable<T>,
  action: (item: T) => Promise<void>,
  onFailure?: (failure: BestEffortFailure<T>) => void
): Promise<BestEffortFailure<T>[]> {
  const failures: BestEffortFailure<T>[] = [];
  for (const item of items) {
    try {
      await action(item);
    } catch (error) {
      const failure = { item, error };
      failures.push(failure);
      onFailure?.(failure);
    }
  }
  return failures;
}
