/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `disposable_sources_total{status}` (Counter)
 * - `disposable_domains_added_total` (Counter)
 * - `disposable_fetch_retries_total` (Counter)
 * - `disposable_dns_verifications_total{outcome}` (Counter)
 * - `disposable_dns_cache_hit_ratio` (Gauge)
 * - `disposable_source_fetch_seconds` (Histogram)
 *
 * The CLI dumps `register.metrics()` next to the output files when asked.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';
import type { MxOutcome, SourceStatus } from './types';

export const sourcesTotal = new Counter({
  name: 'disposable_sources_total',
  help: 'Sources processed, by final status',
  labelNames: ['status'] as const,
});

export const domainsAddedTotal = new Counter({
  name: 'disposable_domains_added_total',
  help: 'Domains newly added to the aggregated set',
});

export const fetchRetriesTotal = new Counter({
  name: 'disposable_fetch_retries_total',
  help: 'HTTP fetch attempts retried after a timeout',
});

export const dnsVerificationsTotal = new Counter({
  name: 'disposable_dns_verifications_total',
  help: 'Domains verified over DNS, by outcome',
  labelNames: ['outcome'] as const,
});

export const dnsCacheHitRatio = new Gauge({
  name: 'disposable_dns_cache_hit_ratio',
  help: 'Resolver cache hit ratio (0.0 - 1.0)',
});

export const sourceFetchSeconds = new Histogram({
  name: 'disposable_source_fetch_seconds',
  help: 'Time spent fetching a single source',
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60, 300],
});

export function incSources(status: SourceStatus): void {
  sourcesTotal.inc({ status });
}

export function incDomainsAdded(count = 1): void {
  if (count > 0) domainsAddedTotal.inc(count);
}

export function incFetchRetries(count = 1): void {
  fetchRetriesTotal.inc(count);
}

export function incDnsVerification(outcome: MxOutcome['kind']): void {
  dnsVerificationsTotal.inc({ outcome });
}

/**
 * Set cache hit ratio (0..1). Use `null` to indicate unknown/no-op.
 */
export function setCacheHitRatio(ratio: number | null): void {
  if (ratio == null || Number.isNaN(ratio)) return;
  dnsCacheHitRatio.set(Math.max(0, Math.min(1, ratio)));
}

export function observeSourceFetch(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  sourceFetchSeconds.observe(seconds);
}

export { register };
