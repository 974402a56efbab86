// Centralized runtime configuration for timeouts, retries, pools and paths.
// Values are read from env with sane defaults and can be overridden per run.

import path from 'path';

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function envList(name: string): string[] {
  const v = process.env[name];
  if (!v) return [];
  return v.split(',').map((s) => s.trim()).filter(Boolean);
}

// Compiled code runs from dist/lib, sources from lib; data/ sits at the package root.
const PACKAGE_ROOT = path.resolve(__dirname, __dirname.split(path.sep).includes('dist') ? '../..' : '..');
const DATA_DIR = path.join(PACKAGE_ROOT, 'data');

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 20_000),
  USER_AGENT:
    process.env.HTTP_USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',

  FETCH: {
    MAX_RETRIES: envInt('FETCH_MAX_RETRIES', 150),
    RETRY_BACKOFF_MS: envInt('FETCH_RETRY_BACKOFF_MS', 1000),
    HOST_CONCURRENCY: envInt('FETCH_HOST_CONCURRENCY', 10),
  },

  SCRAPE: {
    ATTEMPTS: envInt('SCRAPE_ATTEMPTS', 80),
    WORKERS: envInt('SCRAPE_WORKERS', 10),
    DEADLINE_MS: envInt('SCRAPE_DEADLINE_MS', 5 * 60 * 1000),
  },

  WS: {
    MESSAGES: envInt('WS_MESSAGES', 3),
    TIMEOUT_MS: envInt('WS_TIMEOUT_MS', 20_000),
  },

  DNS: {
    TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 5000),
    LIFETIME_MS: envInt('DNS_LIFETIME_MS', 15_000),
    THREADS: envInt('DNS_THREADS', 1),
    NAMESERVERS: envList('DNS_NAMESERVERS'),
    PORT: envInt('DNS_PORT', 53),
    CACHE_MAX: envInt('DNS_CACHE_MAX', 100_000),
    CACHE_TTL_MS: envInt('DNS_CACHE_TTL_MS', 1000 * 60 * 60 * 6), // 6h
  },

  CACHE_KEY_PREFIX: process.env.CACHE_KEY_PREFIX || 'dda:',

  PATHS: {
    SOURCES: process.env.SOURCES_FILE || path.join(DATA_DIR, 'sources.json'),
    WHITELIST: process.env.WHITELIST_FILE || path.join(DATA_DIR, 'whitelist.txt'),
    CUSTOM: process.env.CUSTOM_FILE || path.join(DATA_DIR, 'custom.txt'),
    OUTPUT: process.env.OUTPUT_DIR || path.resolve(process.cwd(), 'output'),
  },
};

export default CONFIG;
