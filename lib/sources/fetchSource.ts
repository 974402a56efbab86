import { promises as fs } from 'fs';
import { fetchWithRetry } from '../net/fetchWithRetry';
import { fetchWebSocket } from './websocket';
import logger from '../logger';
import { CONFIG } from '../config';
import { MissingSourceFileError } from '../errors';
import type { FileSource, HttpSource, SourceDescriptor } from '../types';

const JSON_HEADERS = {
  Accept: 'application/json, text/javascript, */*; q=0.01',
  'X-Requested-With': 'XMLHttpRequest',
};

export interface FetchSourceOptions {
  maxRetries?: number;
  /** Set by the scrape pool; an aborted signal stops further retries. */
  signal?: AbortSignal;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a local list. A missing file is an empty payload for tolerant sources
 * and a fatal configuration error otherwise.
 */
export async function readSourceFile(source: FileSource): Promise<Buffer> {
  try {
    return await fs.readFile(source.src);
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    if (source.ignoreMissing) {
      logger.debug({ source: source.id }, 'optional source file absent');
      return Buffer.alloc(0);
    }
    throw new MissingSourceFileError(source.src, err);
  }
}

/**
 * GET a remote source with a browser-like User-Agent. Timeouts are retried by
 * `fetchWithRetry`; any other failure or a non-2xx status yields `null`.
 */
export async function fetchHttpSource(source: HttpSource, opts?: FetchSourceOptions): Promise<Buffer | null> {
  const headers: Record<string, string> = {
    'User-Agent': CONFIG.USER_AGENT,
    ...(source.type === 'json' ? JSON_HEADERS : {}),
    ...(source.headers ?? {}),
  };

  try {
    const res = await fetchWithRetry(source.src, { headers }, {
      retries: opts?.maxRetries ?? CONFIG.FETCH.MAX_RETRIES,
      timeoutMs: source.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS,
      signal: opts?.signal,
    });
    if (!res.ok) {
      logger.warn({ source: source.id, status: res.status }, 'source responded with an error status');
      return null;
    }
    return res.body;
  } catch (err) {
    if (opts?.signal?.aborted) logger.debug({ source: source.id }, 'source fetch abandoned');
    else logger.warn({ err, source: source.id }, 'source fetch failed');
    return null;
  }
}

/**
 * Retrieve the raw payload of one source. `null` means the source produced
 * nothing this run; only a missing required file throws.
 */
export async function fetchSource(source: SourceDescriptor, opts?: FetchSourceOptions): Promise<Buffer | null> {
  switch (source.type) {
    case 'file':
    case 'whitelist_file':
      return readSourceFile(source);
    case 'ws':
      return fetchWebSocket(source.src, {
        messages: CONFIG.WS.MESSAGES,
        timeoutMs: source.timeoutMs ?? CONFIG.WS.TIMEOUT_MS,
        headers: source.headers,
      });
    case 'custom':
      return source.adapter.fetch({
        timeoutMs: source.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS,
        maxRetries: opts?.maxRetries ?? CONFIG.FETCH.MAX_RETRIES,
        signal: opts?.signal,
      });
    default:
      return fetchHttpSource(source, opts);
  }
}

export default fetchSource;
