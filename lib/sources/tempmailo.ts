/**
 * tempmailo.com hands out one address per session. Getting one needs the
 * anti-forgery token from the landing page plus the session cookies it sets,
 * both replayed on the follow-up request.
 */

import { fetchWithRetry } from '../net/fetchWithRetry';
import logger from '../logger';
import { CONFIG } from '../config';
import type { AdapterContext, CustomAdapter } from '../types';

const PAGE_URL = 'https://tempmailo.com/';
const CHANGE_URL = 'https://tempmailo.com/changemail';
const TOKEN_PATTERN = /name="__RequestVerificationToken"[^>]*value="([^"]+)"/;

export function extractToken(html: string): string | null {
  const m = TOKEN_PATTERN.exec(html);
  return m ? m[1] : null;
}

/**
 * `name=value` pairs of every Set-Cookie header, ready for a Cookie header.
 */
export function extractCookies(headers: Headers): string {
  return headers
    .getSetCookie()
    .map((c) => c.split(';')[0].trim())
    .filter((pair) => pair.includes('='))
    .join('; ');
}

async function fetchAddress(ctx: AdapterContext): Promise<Buffer | null> {
  const retry = { retries: ctx.maxRetries, timeoutMs: ctx.timeoutMs, signal: ctx.signal };

  const page = await fetchWithRetry(PAGE_URL, { headers: { 'User-Agent': CONFIG.USER_AGENT } }, retry);
  if (!page.ok) {
    logger.warn({ adapter: 'tempmailo', status: page.status }, 'landing page request failed');
    return null;
  }

  const token = extractToken(page.body.toString('utf-8'));
  const cookie = extractCookies(page.headers);
  if (!token || !cookie) {
    logger.warn({ adapter: 'tempmailo', token: Boolean(token), cookie: Boolean(cookie) }, 'session handshake incomplete');
    return null;
  }

  const res = await fetchWithRetry(CHANGE_URL, {
    method: 'POST',
    headers: {
      'User-Agent': CONFIG.USER_AGENT,
      Cookie: cookie,
      RequestVerificationToken: token,
      'X-Requested-With': 'XMLHttpRequest',
      Accept: 'application/json',
    },
  }, retry);
  if (!res.ok) {
    logger.warn({ adapter: 'tempmailo', status: res.status }, 'authenticated request failed');
    return null;
  }
  return res.body;
}

export const tempmailo: CustomAdapter = {
  name: 'tempmailo',
  async fetch(ctx) {
    try {
      return await fetchAddress(ctx);
    } catch (err) {
      logger.warn({ err, adapter: 'tempmailo' }, 'custom adapter failed');
      return null;
    }
  },
};

export default tempmailo;
