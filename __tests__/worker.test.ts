import { mapPool, runPool } from '../lib/net/worker';
import { scrapeSource } from '../lib/sources/scrape';
import { fetchHttpSource, fetchSource } from '../lib/sources/fetchSource';
import type { HttpSource, SourceDescriptor } from '../lib/types';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('runPool', () => {
  test('runs every task with bounded concurrency', async () => {
    let active = 0;
    let peak = 0;
    const { results, failed, abandoned } = await runPool(
      12,
      async (i) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(2);
        active--;
        return i;
      },
      { concurrency: 3 },
    );

    expect(results.sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    expect(peak).toBe(3);
    expect(failed).toBe(0);
    expect(abandoned).toBe(0);
  });

  test('counts failed tasks', async () => {
    const { results, failed } = await runPool(
      4,
      async (i) => {
        if (i % 2) throw new Error('bad attempt');
        return i;
      },
      { concurrency: 2 },
    );
    expect(results.sort()).toEqual([0, 2]);
    expect(failed).toBe(2);
  });

  test('abandons outstanding work at the deadline and starts nothing new', async () => {
    const started: number[] = [];
    const { results, abandoned } = await runPool(
      5,
      async (i) => {
        started.push(i);
        if (i === 0) return i;
        await sleep(200);
        return i;
      },
      { concurrency: 2, deadlineMs: 50 },
    );

    expect(results).toEqual([0]);
    expect(abandoned).toBe(4);
    // slot freed by task 0 picks up task 2; tasks 3 and 4 never run
    await sleep(300);
    expect(started.sort()).toEqual([0, 1, 2]);
  });

  test('aborts the signal handed to abandoned tasks', async () => {
    const signals: AbortSignal[] = [];
    const { abandoned } = await runPool(
      2,
      async (_i, signal) => {
        signals.push(signal);
        await sleep(100);
      },
      { concurrency: 2, deadlineMs: 20 },
    );

    expect(abandoned).toBe(2);
    expect(signals).toHaveLength(2);
    expect(signals.every((s) => s.aborted)).toBe(true);
  });

  test('leaves the signal alone when every task finishes', async () => {
    let seen: AbortSignal | undefined;
    await runPool(1, async (_i, signal) => {
      seen = signal;
    }, { concurrency: 1, deadlineMs: 1000 });
    expect(seen?.aborted).toBe(false);
  });
});

describe('mapPool', () => {
  test('preserves input order', async () => {
    const out = await mapPool([30, 10, 20], async (ms) => {
      await sleep(ms);
      return ms * 2;
    }, 3);
    expect(out).toEqual([60, 20, 40]);
  });
});

describe('scrapeSource', () => {
  const source: SourceDescriptor = { id: 'scrape', src: 'https://scrape.test/api', type: 'json', scrape: true };

  test('keeps non-empty payloads from every attempt', async () => {
    let n = 0;
    const fetchOnce = jest.fn(async () => {
      n++;
      if (n % 3 === 0) return null;
      if (n % 3 === 1) return Buffer.from(`{"email":"u${n}@d${n}.test"}`);
      return Buffer.alloc(0);
    });

    const payloads = await scrapeSource(source, fetchOnce, { attempts: 9, workers: 3 });

    expect(fetchOnce).toHaveBeenCalledTimes(9);
    expect(payloads).toHaveLength(3);
  });

  test('attempts abandoned at the deadline release their host slots', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockImplementation((input, init) => {
      if (String(input).endsWith('/page')) return Promise.resolve(new Response('ok.com'));
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () =>
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })),
        );
      });
    });
    const api: HttpSource = { id: 'api', src: 'https://shared-host.test/api', type: 'json', scrape: true, timeoutMs: 50 };
    const page: HttpSource = { id: 'page', src: 'https://shared-host.test/page', type: 'list', timeoutMs: 50 };

    try {
      const payloads = await scrapeSource(api, (s, signal) => fetchSource(s, { maxRetries: 1000, signal }), {
        attempts: 20,
        workers: 10,
        deadlineMs: 150,
      });
      expect(payloads).toEqual([]);

      const body = await fetchHttpSource(page, { maxRetries: 0 });
      expect(body?.toString('utf-8')).toBe('ok.com');
    } finally {
      fetchSpy.mockRestore();
    }
  });
});
