/**
 * Turns a source's raw payload into candidate domain strings (or, for SHA1
 * feeds, content hashes) according to the payload format the source declares.
 *
 * Candidates are returned as found: case, validity and duplicates are the
 * validator's and the store's concern.
 */

import { TextDecoder } from 'util';
import { decode as decodeEntities } from 'html-entities';
import logger from './logger';
import { errorMessage } from './errors';
import type { NormalizeResult, PayloadFormat, SourceDescriptor } from './types';

/** `<option value="domain">... (PW)` entries, as rendered by temp-mail domain pickers. */
export const DEFAULT_HTML_PATTERN = String.raw`<option[^>]*value=["']([^"']+)["'][^>]*>[^<]*\(PW\)`;

const SHA1_LINE = /^[0-9a-f]{40}/;
const WS_DOMAINS_MARKER = 'D';

export function payloadFormat(source: SourceDescriptor): PayloadFormat {
  return source.type === 'custom' ? source.format : source.type;
}

function unusable(reason: string): NormalizeResult {
  return { kind: 'unusable', reason };
}

export function decodePayload(raw: Buffer, encoding = 'utf-8'): string {
  return new TextDecoder(encoding).decode(raw);
}

/**
 * Split into trimmed lines, dropping blanks and `#` comments.
 */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeJson(text: string): NormalizeResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return unusable(`invalid JSON: ${errorMessage(err)}`);
  }

  if (isRecord(data)) {
    if ('domains' in data) {
      data = data.domains;
    } else if ('email' in data) {
      const m = typeof data.email === 'string' ? /@([^@\s]+)$/.exec(data.email) : null;
      data = m ? [m[1]] : null;
    }
  }
  if (!Array.isArray(data)) return unusable('JSON payload is not an array');

  const candidates = data.filter((v): v is string => typeof v === 'string' && v.length > 0);
  return { kind: 'domains', candidates };
}

/**
 * Run the regex cascade: every stage's matches (first capture group when the
 * pattern has one, else the whole match) become the text of the next stage.
 */
export function extractWithStages(text: string, stages: string[]): string[] {
  let input = text;
  let matches: string[] = [];
  for (const stage of stages) {
    const re = new RegExp(stage, 'gi');
    matches = [];
    for (const m of input.matchAll(re)) {
      const value = m.length > 1 && m[1] !== undefined ? m[1] : m[0];
      if (value) matches.push(value);
    }
    input = matches.join('\n');
  }
  return matches;
}

export function normalizeHtml(text: string, stages?: string[]): NormalizeResult {
  const cascade = stages && stages.length ? stages : [DEFAULT_HTML_PATTERN];
  let matches: string[];
  try {
    matches = extractWithStages(text, cascade);
  } catch (err) {
    return unusable(`bad extraction pattern: ${errorMessage(err)}`);
  }
  return { kind: 'domains', candidates: matches.map((m) => decodeEntities(m)) };
}

export function normalizeSha1(text: string, sourceId: string): NormalizeResult {
  const hashes: string[] = [];
  let rejected = 0;
  for (const line of text.split(/\r?\n/)) {
    const lower = line.trim().toLowerCase();
    if (!lower) continue;
    const m = SHA1_LINE.exec(lower);
    if (m) hashes.push(m[0]);
    else rejected++;
  }
  // still a hash feed when nothing survives; it never falls through to the domain path
  if (hashes.length === 0) logger.warn({ source: sourceId, rejected }, 'sha1 source contained no valid hashes');
  return { kind: 'hashes', hashes, rejected };
}

/**
 * Websocket feeds answer with framed lines; the one starting with `D` carries
 * the comma-separated domain list.
 */
export function normalizeWebSocket(text: string): NormalizeResult {
  for (const line of text.split(/\r?\n/)) {
    if (!line.startsWith(WS_DOMAINS_MARKER)) continue;
    const candidates = line
      .slice(WS_DOMAINS_MARKER.length)
      .split(',')
      .map((d) => d.trim())
      .filter(Boolean);
    return { kind: 'domains', candidates };
  }
  return unusable('no domain frame in websocket response');
}

export function normalize(source: SourceDescriptor, raw: Buffer): NormalizeResult {
  if (raw.length === 0) return unusable('empty payload');

  let text: string;
  try {
    text = decodePayload(raw, source.encoding);
  } catch (err) {
    return unusable(`cannot decode as ${source.encoding}: ${errorMessage(err)}`);
  }

  const format = payloadFormat(source);
  switch (format) {
    case 'list':
    case 'file':
    case 'whitelist':
    case 'whitelist_file':
      return { kind: 'domains', candidates: splitLines(text) };
    case 'json':
      return normalizeJson(text);
    case 'html':
      return normalizeHtml(text, source.regex);
    case 'sha1':
      return normalizeSha1(text, source.id);
    case 'ws':
      return normalizeWebSocket(text);
  }
}
