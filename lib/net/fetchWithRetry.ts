import pLimit from 'p-limit';
import { CONFIG } from '../config';
import logger from '../logger';
import { incFetchRetries } from '../metrics';

const hostLimitMap = new Map<string, ReturnType<typeof pLimit>>();

function getHostFromUrl(url: string): string {
  try {
    const u = new URL(url);
    return u.host;
  } catch (e) {
    return 'default';
  }
}

function getLimitForHost(host: string) {
  let limit = hostLimitMap.get(host);
  if (!limit) {
    limit = pLimit(CONFIG.FETCH.HOST_CONCURRENCY);
    hostLimitMap.set(host, limit);
  }
  return limit;
}

export interface FetchRetryOptions {
  retries?: number; // retries after the first attempt
  backoffMs?: number; // fixed delay between attempts
  timeoutMs?: number; // per-request timeout, body included
  /** Once aborted, no further attempt starts; the attempt in flight runs to its own timeout. */
  signal?: AbortSignal;
}

export interface FetchedResponse {
  url: string;
  status: number;
  ok: boolean;
  headers: Headers;
  body: Buffer;
}

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

/**
 * Timeout-class failures are the only ones worth retrying; anything else
 * (DNS failure, TLS error, refused connection) aborts immediately.
 */
export function isTimeoutError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'AbortError' || err.name === 'TimeoutError') return true;
  const code = errorCode(err) ?? errorCode(err.cause);
  return code !== undefined && TIMEOUT_CODES.has(code);
}

export class RequestAbandonedError extends Error {
  constructor(readonly url: string) {
    super(`request to ${url} abandoned`);
    this.name = 'RequestAbandonedError';
  }
}

function ensureActive(url: string, signal?: AbortSignal): void {
  if (signal?.aborted) throw new RequestAbandonedError(url);
}

export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<FetchedResponse> {
  const retries = opts?.retries ?? CONFIG.FETCH.MAX_RETRIES;
  const backoffMs = opts?.backoffMs ?? CONFIG.FETCH.RETRY_BACKOFF_MS;
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
  const signal = opts?.signal;
  const limit = getLimitForHost(getHostFromUrl(url));

  ensureActive(url, signal);
  return limit(() => execWithRetry(url, init, { retries, backoffMs, timeoutMs, signal }));
}

async function execWithRetry(
  url: string,
  init: RequestInit | undefined,
  cfg: { retries: number; backoffMs: number; timeoutMs: number; signal?: AbortSignal },
): Promise<FetchedResponse> {
  let attempt = 0;
  while (true) {
    // also covers time spent queued behind the host limiter
    ensureActive(url, cfg.signal);
    attempt++;
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), cfg.timeoutMs);
    try {
      const res = await fetch(url, { ...(init || {}), signal: controller.signal });
      const body = Buffer.from(await res.arrayBuffer());
      return { url, status: res.status, ok: res.ok, headers: res.headers, body };
    } catch (err) {
      if (!isTimeoutError(err) || attempt > cfg.retries) throw err;
      ensureActive(url, cfg.signal);
      logger.debug({ url, attempt, delay: cfg.backoffMs }, 'fetchWithRetry timed out, retrying');
      incFetchRetries();
      await delayMs(cfg.backoffMs);
    } finally {
      clearTimeout(id);
    }
  }
}

export function delayMs(ms: number) {
  return new Promise<void>((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}
