import { createHash } from 'crypto';
import { toASCII } from 'punycode';
import { parse as parsePublicSuffix } from 'psl';
import { IdnaEncodingError } from './errors';

// One registrable label (letters, digits, hyphen) followed by suffix labels of letters/hyphen.
const HOSTNAME_PATTERN = /^[a-z0-9-]{1,63}(\.[a-z-]{2,63})+$/;

/**
 * Lowercase and strip surrounding whitespace, dots, commas and `@`.
 */
export function cleanDomain(input: string): string {
  return input.toLowerCase().replace(/^[\s.,@]+|[\s.,@]+$/g, '');
}

/**
 * True when the input is a registrable hostname under a listed public suffix.
 * Bare suffixes (`com`, `co.uk`) and malformed strings are rejected. Never throws.
 */
export function isValidDomain(input: string): boolean {
  if (typeof input !== 'string') return false;
  const host = cleanDomain(input);
  if (!HOSTNAME_PATTERN.test(host)) return false;

  try {
    const parsed = parsePublicSuffix(host);
    if (!('domain' in parsed)) return false;
    // psl falls back to the "*" rule for unknown TLDs; require a listed suffix
    return Boolean(parsed.domain) && Boolean(parsed.tld) && parsed.listed;
  } catch {
    return false;
  }
}

/**
 * ASCII-compatible (IDNA) form of a domain.
 */
export function toIdna(domain: string): string {
  let ascii: string;
  try {
    ascii = toASCII(domain);
  } catch (err) {
    throw new IdnaEncodingError(domain, err);
  }
  if (!ascii || ascii.length > 253) throw new IdnaEncodingError(domain);
  for (const label of ascii.split('.')) {
    if (label.length === 0 || label.length > 63) throw new IdnaEncodingError(domain);
  }
  return ascii;
}

/**
 * Content hash published in place of the domain: SHA1 hex of its IDNA encoding.
 */
export function contentHash(domain: string): string {
  return createHash('sha1').update(toIdna(domain)).digest('hex');
}

/**
 * Last-resort extraction of domain-like tokens wrapped in quotes, brackets or
 * whitespace from an arbitrary payload. Results are cleaned and validated.
 */
export function extractDomainsFromText(text: string): string[] {
  if (!text || typeof text !== 'string') return [];

  const domainPattern = /(?:^|["'\s[(<>,;])([a-z0-9][a-z0-9-]{0,62}(?:\.[a-z-]{2,63})+)(?=$|["'\s\])<>,;])/gim;
  const matches = new Set<string>();
  let m: RegExpExecArray | null;
  while ((m = domainPattern.exec(text))) {
    const host = cleanDomain(m[1]);
    if (isValidDomain(host)) matches.add(host);
  }
  return Array.from(matches);
}
