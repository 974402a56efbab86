import pLimit from 'p-limit';
import logger from '../logger';

export interface PoolOptions {
  concurrency: number;
  /** Wall-clock ceiling for the whole pool; unset means wait for every task. */
  deadlineMs?: number;
}

export interface PoolResult<T> {
  /** Results in completion order. */
  results: T[];
  failed: number;
  /** Tasks still running, or never started, when the deadline fired. */
  abandoned: number;
}

/**
 * Run `count` invocations of `task` through a fixed-size pool.
 *
 * Tasks that throw are counted as failed. When the deadline fires, tasks in
 * flight are abandoned (their results are ignored) and queued tasks are never
 * started. Abandoned tasks see `signal` aborted and must not start new work;
 * what they already have in flight is left to finish on its own.
 */
export async function runPool<T>(
  count: number,
  task: (index: number, signal: AbortSignal) => Promise<T>,
  opts: PoolOptions,
): Promise<PoolResult<T>> {
  const limit = pLimit(Math.max(1, opts.concurrency));
  const abandon = new AbortController();
  const results: T[] = [];
  let failed = 0;
  let settled = 0;
  let closed = false;

  const runs = Array.from({ length: count }, (_, i) =>
    limit(async () => {
      if (closed) return;
      try {
        const value = await task(i, abandon.signal);
        if (!closed) results.push(value);
      } catch (err) {
        if (!closed) failed++;
        logger.debug({ err, index: i }, 'pool task failed');
      } finally {
        if (!closed) settled++;
      }
    }),
  );

  const all = Promise.all(runs).then(() => 'done' as const);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const outcome =
    opts.deadlineMs === undefined
      ? await all
      : await Promise.race([
          all,
          new Promise<'deadline'>((resolve) => {
            timer = setTimeout(() => resolve('deadline'), opts.deadlineMs);
          }),
        ]);
  if (timer) clearTimeout(timer);

  closed = true;
  if (outcome === 'deadline') abandon.abort();
  const abandoned = outcome === 'deadline' ? count - settled : 0;
  if (abandoned > 0) {
    logger.warn({ abandoned, completed: settled, deadlineMs: opts.deadlineMs }, 'pool deadline reached, abandoning outstanding tasks');
  }
  return { results: results.slice(), failed, abandoned };
}

/**
 * Apply `fn` to every item with bounded concurrency, preserving input order.
 */
export async function mapPool<I, O>(items: I[], fn: (item: I) => Promise<O>, concurrency: number): Promise<O[]> {
  const limit = pLimit(Math.max(1, concurrency));
  return Promise.all(items.map((item) => limit(() => fn(item))));
}

export default runPool;
