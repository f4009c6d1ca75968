export interface ParallelResult {
  completed: number;
  failed: number;
  errors: Array<{ id: string; error: Error }>;
}

/**
 * Execute tasks in parallel with at most `concurrency` running at once.
 * A task that throws is counted and collected; the others carry on.
 */
export async function runParallel<T>(
  items: readonly T[],
  getId: (item: T) => string,
  execute: (item: T) => Promise<void>,
  options: { concurrency?: number } = {}
): Promise<ParallelResult> {
  const { concurrency = 16 } = options;

  const queue = [...items];
  const errors: Array<{ id: string; error: Error }> = [];
  let completed = 0;
  let failed = 0;
  let running = 0;

  return new Promise((resolve) => {
    function tryStartNext(): void {
      while (running < concurrency) {
        const item = queue.shift();
        if (item === undefined) break;
        const id = getId(item);
        running++;

        execute(item)
          .then(() => {
            completed++;
          })
          .catch((err: unknown) => {
            failed++;
            errors.push({ id, error: err instanceof Error ? err : new Error(String(err)) });
          })
          .finally(() => {
            running--;
            tryStartNext();

            if (running === 0 && queue.length === 0) {
              resolve({ completed, failed, errors });
            }
          });
      }
    }

    if (items.length === 0) {
      resolve({ completed: 0, failed: 0, errors: [] });
      return;
    }

    tryStartNext();
  });
}
