import { runPool } from '../net/worker';
import logger from '../logger';
import { CONFIG } from '../config';
import type { SourceDescriptor } from '../types';

export interface ScrapeOptions {
  attempts?: number;
  workers?: number;
  deadlineMs?: number;
}

/**
 * Fetch a scrape source many times concurrently; each response may carry a
 * different random subset. Returns the non-empty payloads that arrived before
 * the deadline, in completion order. Attempts still running at the deadline
 * get an aborted `signal` and stop retrying.
 */
export async function scrapeSource(
  source: SourceDescriptor,
  fetchOnce: (source: SourceDescriptor, signal: AbortSignal) => Promise<Buffer | null>,
  opts?: ScrapeOptions,
): Promise<Buffer[]> {
  const attempts = opts?.attempts ?? CONFIG.SCRAPE.ATTEMPTS;
  const { results, failed, abandoned } = await runPool(attempts, (_, signal) => fetchOnce(source, signal), {
    concurrency: opts?.workers ?? CONFIG.SCRAPE.WORKERS,
    deadlineMs: opts?.deadlineMs ?? CONFIG.SCRAPE.DEADLINE_MS,
  });

  const payloads = results.filter((b): b is Buffer => b !== null && b.length > 0);
  logger.info({ source: source.id, attempts, payloads: payloads.length, failed, abandoned }, 'scrape finished');
  return payloads;
}
