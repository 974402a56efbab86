import { fetchSource, type FetchSourceOptions } from './sources/fetchSource';
import { scrapeSource, type ScrapeOptions } from './sources/scrape';
import { decodePayload, normalize } from './normalizer';
import { cleanDomain, extractDomainsFromText, isValidDomain } from './domain';
import { AggregationStore, isWhitelistSource } from './store';
import { createResolverQuery, verifyDomain, type DnsQuery } from './dns';
import { mapPool } from './net/worker';
import { MalformedPayloadError, SourceUnusableError } from './errors';
import { incDomainsAdded, incSources, observeSourceFetch } from './metrics';
import logger from './logger';
import { CONFIG } from './config';
import type { RunOptions, RunResult, SourceDescriptor, SourceReport, VerificationSummary, VerifyResult } from './types';

export type SourceFetcher = (source: SourceDescriptor, opts?: FetchSourceOptions) => Promise<Buffer | null>;

export interface RunDependencies {
  fetch?: SourceFetcher;
  /** DNS query function; built from the run options when absent. */
  query?: DnsQuery;
  scrape?: ScrapeOptions;
}

// Reserved names that never carry mail; excluded from the whitelist sanity check.
const SANITY_CHECK_EXEMPT = new Set(['example.com', 'example.net', 'example.org', 'localhost']);

export function selectSources(sources: SourceDescriptor[], onlySource?: string): SourceDescriptor[] {
  if (!onlySource) return sources;
  return sources.filter((s) => isWhitelistSource(s) || s.id.includes(onlySource) || s.src.includes(onlySource));
}

/**
 * Validated domains of a candidate list, falling back to a loose re-scan of
 * the raw text when nothing in the list survives validation.
 */
export function validateCandidates(candidates: string[], rawText: () => string): string[] {
  const valid = new Set<string>();
  for (const c of candidates) {
    const d = cleanDomain(c);
    if (isValidDomain(d)) valid.add(d);
  }
  if (valid.size > 0) return Array.from(valid);
  return extractDomainsFromText(rawText());
}

function isTolerantFile(source: SourceDescriptor): boolean {
  return (source.type === 'file' || source.type === 'whitelist_file') && source.ignoreMissing === true;
}

async function retrievePayloads(
  source: SourceDescriptor,
  fetch: SourceFetcher,
  fetchOpts: FetchSourceOptions,
  scrape?: ScrapeOptions,
): Promise<Buffer[] | null> {
  if (source.scrape) {
    const payloads = await scrapeSource(source, (s, signal) => fetch(s, { ...fetchOpts, signal }), scrape);
    return payloads.length ? payloads : null;
  }
  const raw = await fetch(source, fetchOpts);
  return raw === null ? null : [raw];
}

async function processSource(
  store: AggregationStore,
  source: SourceDescriptor,
  options: RunOptions,
  deps: RunDependencies,
): Promise<SourceReport> {
  const fetch = deps.fetch ?? fetchSource;
  const started = Date.now();
  const payloads = await retrievePayloads(source, fetch, { maxRetries: options.maxRetries }, deps.scrape);
  observeSourceFetch((Date.now() - started) / 1000);

  const report: SourceReport = { id: source.id, type: source.type, status: 'failed', added: 0, total: store.size };
  if (payloads === null) {
    report.reason = 'no payload retrieved';
    return report;
  }
  if (isTolerantFile(source) && payloads.every((p) => p.length === 0)) {
    report.status = 'skipped';
    report.reason = 'file absent';
    return report;
  }

  let reason: string | undefined;
  for (const raw of payloads) {
    const result = normalize(source, raw);
    switch (result.kind) {
      case 'unusable':
        reason = result.reason;
        break;
      case 'hashes':
        report.added += store.addHashes(result.hashes);
        if (report.status !== 'ok') report.status = 'hashes';
        break;
      case 'domains': {
        const validated = validateCandidates(result.candidates, () => decodePayload(raw, source.encoding));
        if (!validated.length) {
          reason = 'no valid domains';
          break;
        }
        const absorbed = store.absorb(source, validated);
        if (absorbed.kind === 'whitelist') {
          report.status = 'whitelist';
          report.added += validated.length;
        } else {
          report.status = 'ok';
          report.added += absorbed.added;
          incDomainsAdded(absorbed.added);
        }
        break;
      }
    }
  }

  report.total = store.size;
  if (report.status === 'failed') {
    report.status = 'unusable';
    report.reason = reason ?? 'no usable result';
  }
  return report;
}

function summarize(results: VerifyResult[]): VerificationSummary {
  const summary: VerificationSummary = { mailCapable: [], notMailCapable: [], indeterminate: [] };
  for (const r of results) {
    if (r.outcome.kind === 'mail-capable') summary.mailCapable.push(r.domain);
    else if (r.outcome.kind === 'indeterminate') summary.indeterminate.push(r.domain);
    else summary.notMailCapable.push(r.domain);
  }
  return summary;
}

async function checkWhitelist(whitelist: string[], query: DnsQuery, threads: number): Promise<void> {
  const checked = whitelist.filter((d) => !SANITY_CHECK_EXEMPT.has(d));
  const results = await mapPool(checked, (d) => verifyDomain(d, query), threads);
  for (const r of results) {
    if (!r.mailCapable) logger.warn({ domain: r.domain, outcome: r.outcome }, 'whitelisted domain does not accept mail');
  }
}

/**
 * Run every source through fetch, normalize, validate and absorb, subtract
 * the whitelist, then optionally verify the survivors over DNS.
 */
export async function runAggregation(
  sources: SourceDescriptor[],
  options: RunOptions = {},
  deps: RunDependencies = {},
): Promise<RunResult> {
  const store = new AggregationStore(options.previous);
  const reports: SourceReport[] = [];

  for (const source of selectSources(sources, options.onlySource)) {
    const report = await processSource(store, source, options, deps);
    reports.push(report);
    incSources(report.status);

    if (report.status === 'failed' || report.status === 'unusable') {
      const reason = report.reason ?? report.status;
      if (options.strict) {
        const cause = report.status === 'unusable' ? new MalformedPayloadError(source.id, reason) : undefined;
        throw new SourceUnusableError(source.id, reason, cause);
      }
      logger.warn({ source: source.id, status: report.status, reason }, 'source yielded no usable result');
    } else {
      logger.info({ source: source.id, status: report.status, added: report.added, total: report.total }, 'source processed');
    }
  }

  const removed = store.excludeWhitelist();
  logger.info({ removed, whitelist: store.whitelist().length }, 'whitelist excluded');

  let verification: VerificationSummary | undefined;
  if (options.verifyDns) {
    const threads = options.dnsThreads ?? CONFIG.DNS.THREADS;
    const query =
      deps.query ??
      createResolverQuery({
        nameservers: options.dnsNameservers,
        port: options.dnsPort,
        timeoutMs: options.dnsTimeoutMs,
        lifetimeMs: options.dnsLifetimeMs,
      });

    await checkWhitelist(store.whitelist(), query, threads);
    const results = await mapPool(store.snapshot().domains, (d) => verifyDomain(d, query), threads);
    verification = summarize(results);
    logger.info(
      {
        mailCapable: verification.mailCapable.length,
        notMailCapable: verification.notMailCapable.length,
        indeterminate: verification.indeterminate.length,
      },
      'dns verification finished',
    );
    if (options.listNoMx) {
      for (const r of results) {
        if (!r.mailCapable) logger.info({ domain: r.domain, outcome: r.outcome }, 'no usable mail exchanger');
      }
    }
  }

  const diff = store.diff();
  logger.info({ added: diff.addedDomains.length, removed: diff.removedDomains.length }, 'run finished');
  return { snapshot: store.snapshot(), reports, diff, verification };
}
