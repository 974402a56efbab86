// ── CIDR types ──

export interface CIDRRange {
  /** Network address as 32-bit integer */
  network: number;
  /** Subnet mask as 32-bit integer */
  mask: number;
}

// ── IPv4 helpers ──

const OCTET = '(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';
const IPV4_PATTERN = new RegExp(`^${OCTET}\\.${OCTET}\\.${OCTET}\\.${OCTET}$`);

/** Dotted quad with four decimal octets in 0..255 and no leading zeros. */
export function isWellFormedIPv4(ip: string): boolean {
  return IPV4_PATTERN.test(ip);
}

export function ipv4ToInt(ip: string): number {
  const parts = ip.split('.');
  if (parts.length !== 4) return 0;
  return parts.reduce((acc, octet) => (acc << 8) + (parseInt(octet, 10) & 0xff), 0) >>> 0;
}

export function parseCIDR(cidr: string): CIDRRange | null {
  const slash = cidr.indexOf('/');
  if (slash === -1) {
    // bare IP → /32
    const trimmed = cidr.trim();
    if (!isWellFormedIPv4(trimmed)) return null;
    return { network: ipv4ToInt(trimmed), mask: 0xffffffff };
  }
  const ipPart = cidr.slice(0, slash).trim();
  const bits = parseInt(cidr.slice(slash + 1).trim(), 10);
  if (isNaN(bits) || bits < 0 || bits > 32) return null;
  if (!isWellFormedIPv4(ipPart)) return null;
  const ip = ipv4ToInt(ipPart);
  const mask = bits === 0 ? 0 : (~0 << (32 - bits)) >>> 0;
  return { network: (ip & mask) >>> 0, mask };
}

export function isIPInRanges(ip: string, ranges: CIDRRange[]): boolean {
  if (!isWellFormedIPv4(ip)) return false;
  const ipInt = ipv4ToInt(ip);
  for (const r of ranges) {
    if (((ipInt & r.mask) >>> 0) === r.network) return true;
  }
  return false;
}

// Private, loopback, link-local, shared, documentation, benchmarking, multicast and reserved space.
export const NON_PUBLIC_RANGES: CIDRRange[] = [
  '0.0.0.0/8',
  '10.0.0.0/8',
  '100.64.0.0/10',
  '127.0.0.0/8',
  '169.254.0.0/16',
  '172.16.0.0/12',
  '192.0.0.0/24',
  '192.0.2.0/24',
  '192.88.99.0/24',
  '192.168.0.0/16',
  '198.18.0.0/15',
  '198.51.100.0/24',
  '203.0.113.0/24',
  '224.0.0.0/4',
  '240.0.0.0/4',
].flatMap((cidr) => {
  const r = parseCIDR(cidr);
  return r ? [r] : [];
});

/**
 * True for a well-formed IPv4 address that is routable on the public internet.
 */
export function isPublicIPv4(ip: string): boolean {
  return isWellFormedIPv4(ip) && !isIPInRanges(ip, NON_PUBLIC_RANGES);
}

/**
 * An A answer is usable only if it is non-empty and every address in it is a
 * well-formed public address; one bad address invalidates the whole answer.
 */
export function isUsableAddressSet(addresses: string[]): boolean {
  return addresses.length > 0 && addresses.every(isPublicIPv4);
}
