import { promises as dnsPromises } from 'dns';
import { z } from 'zod';
import { withTimeout } from './net/timeout';
import { createDefaultCache, type CacheAdapter } from './cache';
import { isUsableAddressSet } from './ip';
import { incDnsVerification } from './metrics';
import logger from './logger';
import { CONFIG } from './config';
import { ConfigError } from './errors';
import type { DnsAnswer, DnsFailure, DnsRecordType, MxOutcome, VerifyResult } from './types';

/** The slice of `dns.promises.Resolver` the verifier needs. */
export interface DnsResolverLike {
  resolveMx(hostname: string): Promise<{ exchange: string; priority: number }[]>;
  resolve4(hostname: string): Promise<string[]>;
}

export type DnsQuery = (hostname: string, type: DnsRecordType) => Promise<DnsAnswer>;

const FAILURE_BY_CODE: Record<string, DnsFailure> = {
  ENOTFOUND: 'nxdomain',
  ENODATA: 'no-answer',
  EREFUSED: 'refused',
  ESERVFAIL: 'refused',
  ECONNREFUSED: 'refused',
  ETIMEOUT: 'timeout',
  ETIMEDOUT: 'timeout',
};

export function classifyDnsError(err: unknown): DnsFailure {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return FAILURE_BY_CODE[err.code] ?? 'unresolved';
  }
  return 'unresolved';
}

const dnsAnswerSchema = z.union([
  z.object({ status: z.literal('ok'), records: z.array(z.string()) }),
  z.object({ status: z.enum(['nxdomain', 'refused', 'no-answer', 'timeout', 'unresolved']) }),
]);

export function decodeDnsAnswer(stored: unknown): DnsAnswer | undefined {
  const parsed = dnsAnswerSchema.safeParse(stored);
  return parsed.success ? parsed.data : undefined;
}

/**
 * The failure of an answer that may change on retry. A missing name or an
 * empty record set settles the question and is not one.
 */
function transientFailure(answer: DnsAnswer): DnsFailure | undefined {
  switch (answer.status) {
    case 'refused':
    case 'timeout':
    case 'unresolved':
      return answer.status;
    default:
      return undefined;
  }
}

let sharedCache: CacheAdapter<DnsAnswer> | undefined;

/** Process-wide answer cache shared by every query function built without an explicit one. */
function defaultAnswerCache(): CacheAdapter<DnsAnswer> {
  if (!sharedCache) sharedCache = createDefaultCache(decodeDnsAnswer);
  return sharedCache;
}

const MAX_TRIES = 10;

function serverAddress(ns: string, port: number): string {
  if (port === 53) return ns;
  return ns.includes(':') ? `[${ns}]:${port}` : `${ns}:${port}`;
}

export interface ResolverQueryOptions {
  nameservers?: string[];
  port?: number;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Ceiling on one query including its retries. */
  lifetimeMs?: number;
  cache?: CacheAdapter<DnsAnswer>;
  /** Injected resolver; defaults to a `dns.promises.Resolver` built from the options. */
  resolver?: DnsResolverLike;
}

/**
 * Build the memoized query function. Cache keys carry the resolver identity
 * so answers from different nameserver sets never mix.
 */
export function createResolverQuery(opts: ResolverQueryOptions = {}): DnsQuery {
  const nameservers = opts.nameservers ?? CONFIG.DNS.NAMESERVERS;
  const port = opts.port ?? CONFIG.DNS.PORT;
  const timeoutMs = opts.timeoutMs ?? CONFIG.DNS.TIMEOUT_MS;
  const lifetimeMs = opts.lifetimeMs ?? CONFIG.DNS.LIFETIME_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) throw new ConfigError(`DNS timeout must be a positive integer, got ${timeoutMs}`);
  if (!Number.isInteger(lifetimeMs) || lifetimeMs <= 0) throw new ConfigError(`DNS lifetime must be a positive integer, got ${lifetimeMs}`);
  const cache = opts.cache ?? defaultAnswerCache();

  let resolver = opts.resolver;
  if (!resolver) {
    const native = new dnsPromises.Resolver({
      timeout: timeoutMs,
      tries: Math.min(MAX_TRIES, Math.max(1, Math.floor(lifetimeMs / timeoutMs))),
    });
    if (nameservers.length) native.setServers(nameservers.map((ns) => serverAddress(ns, port)));
    resolver = native;
  }
  const backend = resolver;
  const identity = `${nameservers.length ? nameservers.join(',') : 'system'}:${port}`;

  async function lookup(hostname: string, type: DnsRecordType): Promise<DnsAnswer> {
    try {
      const records =
        type === 'MX'
          ? (await withTimeout(backend.resolveMx(hostname), lifetimeMs)).map((r) => r.exchange)
          : await withTimeout(backend.resolve4(hostname), lifetimeMs);
      return { status: 'ok', records };
    } catch (err) {
      const status = classifyDnsError(err);
      logger.debug({ hostname, type, status }, 'dns query failed');
      return { status };
    }
  }

  return async (hostname, type) => {
    const key = `dns:${identity}:${type}:${hostname}`;
    const cached = await cache.get(key);
    if (cached) return cached;
    const answer = await lookup(hostname, type);
    if (transientFailure(answer) === undefined) await cache.set(key, answer);
    return answer;
  };
}

function normalizeExchange(exchange: string): string {
  return exchange.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Decide whether a domain accepts mail: MX first, then A records of every
 * exchange (or of the domain itself when it has no MX). The first exchange
 * with an all-public A answer makes the domain mail capable.
 */
export async function verifyDomain(domain: string, query: DnsQuery): Promise<VerifyResult> {
  const outcome = await resolveMailOutcome(domain, query);
  incDnsVerification(outcome.kind);
  return { domain, mailCapable: outcome.kind === 'mail-capable', outcome };
}

async function resolveMailOutcome(domain: string, query: DnsQuery): Promise<MxOutcome> {
  const worklist: { hostname: string; type: DnsRecordType }[] = [{ hostname: domain, type: 'MX' }];
  const queued = new Set<string>([`MX:${domain}`]);
  let failure: DnsFailure | undefined;

  const enqueueA = (hostname: string) => {
    if (queued.has(`A:${hostname}`)) return;
    queued.add(`A:${hostname}`);
    worklist.push({ hostname, type: 'A' });
  };

  let next = worklist.shift();
  while (next) {
    const { hostname, type } = next;
    const answer = await query(hostname, type);
    failure = transientFailure(answer) ?? failure;

    if (type === 'MX') {
      if (answer.status !== 'ok' || answer.records.length === 0) {
        enqueueA(domain);
      } else {
        const exchanges = answer.records.map(normalizeExchange);
        if (exchanges.some((x) => x === '' || x === 'localhost')) {
          return { kind: 'not-mail-capable', reason: 'null-mx' };
        }
        for (const x of exchanges) enqueueA(x);
      }
    } else if (answer.status === 'ok' && isUsableAddressSet(answer.records)) {
      return { kind: 'mail-capable' };
    }
    next = worklist.shift();
  }

  return failure ? { kind: 'indeterminate', reason: failure } : { kind: 'not-mail-capable', reason: 'no-valid-address' };
}
