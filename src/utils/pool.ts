/**
 * Bounded-concurrency helpers
 * Workers pull the next index from a shared counter, so at most `concurrency`
 * tasks are in flight and results keep their input order.
 */

export const DEFAULT_CONCURRENCY = 4;

/**
 * Map over a fixed list with at most `concurrency` tasks running
 * The first failure rejects the whole call.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let idx = 0;

  const run = async (): Promise<void> => {
    while (idx < items.length) {
      const j = idx++;
      results[j] = await fn(items[j], j);
    }
  };

  const workers: Promise<void>[] = [];
  for (let w = 0; w < Math.min(Math.max(1, concurrency), items.length); w++) {
    workers.push(run());
  }
  await Promise.all(workers);

  return results;
}

/**
 * Drain a queue that grows while it is processed (a graph walk)
 *
 * `worker` receives an `enqueue` callback for follow-up items. Deduplication is
 * the caller's job; JavaScript runs the check-and-insert on a shared Set
 * without interleaving, so a synchronous `if (!seen.has(x)) { seen.add(x); enqueue(x) }`
 * is safe across workers.
 */
export function drainQueue<T>(
  initial: readonly T[],
  concurrency: number,
  worker: (item: T, enqueue: (item: T) => void) => Promise<void>
): Promise<void> {
  const queue = [...initial];
  const limit = Math.max(1, concurrency);
  let active = 0;
  let failed = false;

  return new Promise((resolve, reject) => {
    const enqueue = (item: T): void => {
      queue.push(item);
    };

    const pump = (): void => {
      if (failed) return;
      if (queue.length === 0 && active === 0) {
        resolve();
        return;
      }

      while (active < limit && queue.length > 0) {
        const item = queue.shift();
        if (item === undefined) break;
        active++;
        worker(item, enqueue).then(
          () => {
            active--;
            pump();
          },
          (error: unknown) => {
            failed = true;
            reject(error);
          }
        );
      }
    };

    pump();
  });
}
