import { contentHash } from './domain';
import { IdnaEncodingError } from './errors';
import logger from './logger';
import type { AbsorbResult, PreviousOutput, RunDiff, SourceDescriptor, StoreSnapshot } from './types';

export function isWhitelistSource(source: SourceDescriptor): boolean {
  return source.type === 'whitelist' || source.type === 'whitelist_file';
}

function sorted(values: Iterable<string>): string[] {
  return Array.from(values).sort();
}

/**
 * Canonical state of one aggregation run. Only the orchestrator mutates it,
 * and only between pool joins.
 */
export class AggregationStore {
  private readonly domains = new Set<string>();
  private readonly hashes = new Set<string>();
  private readonly skip = new Set<string>();
  // every domain ever absorbed this run, whitelisted ones included
  private readonly legacy = new Set<string>();
  private readonly scrape = new Set<string>();
  private readonly provenance = new Map<string, Set<string>>();
  private readonly previousDomains: Set<string>;
  private readonly previousHashes: Set<string>;
  private hashFailures = 0;

  constructor(previous?: PreviousOutput) {
    this.previousDomains = new Set(previous?.domains ?? []);
    this.previousHashes = new Set(previous?.hashes ?? []);
  }

  get size(): number {
    return this.domains.size;
  }

  has(domain: string): boolean {
    return this.domains.has(domain);
  }

  /**
   * Merge validated domains from one source. Whitelist sources only feed the
   * skip set. Scrape sources report (and record as provenance) just the
   * domains the previous run did not publish.
   */
  absorb(source: SourceDescriptor, validated: string[]): AbsorbResult {
    if (isWhitelistSource(source)) {
      for (const d of validated) this.skip.add(d);
      return { kind: 'whitelist', accepted: validated.length > 0 };
    }

    let added = 0;
    const contributed: string[] = [];
    for (const d of validated) {
      this.legacy.add(d);
      if (!this.domains.has(d)) {
        this.domains.add(d);
        added++;
        this.addHashOf(d);
      }
      if (!source.scrape) {
        contributed.push(d);
      } else if (!this.previousDomains.has(d) && !this.scrape.has(d)) {
        this.scrape.add(d);
        contributed.push(d);
      }
    }

    this.recordProvenance(source.id, contributed);
    return { kind: 'counted', added: source.scrape ? contributed.length : added, total: this.domains.size };
  }

  /** Hashes published directly by a feed. Returns how many were new. */
  addHashes(hashes: Iterable<string>): number {
    const before = this.hashes.size;
    for (const h of hashes) this.hashes.add(h);
    return this.hashes.size - before;
  }

  /**
   * Drop every whitelisted domain and its hash. Returns the number of domains removed.
   */
  excludeWhitelist(): number {
    let removed = 0;
    for (const d of this.skip) {
      if (this.domains.delete(d)) removed++;
      const hash = this.hashOf(d);
      if (hash) this.hashes.delete(hash);
      for (const contributed of this.provenance.values()) contributed.delete(d);
    }
    return removed;
  }

  diff(): RunDiff {
    return {
      addedDomains: sorted(Array.from(this.domains).filter((d) => !this.previousDomains.has(d))),
      removedDomains: sorted(Array.from(this.previousDomains).filter((d) => !this.domains.has(d))),
      addedHashes: Array.from(this.hashes).filter((h) => !this.previousHashes.has(h)).length,
      removedHashes: Array.from(this.previousHashes).filter((h) => !this.hashes.has(h)).length,
    };
  }

  whitelist(): string[] {
    return sorted(this.skip);
  }

  snapshot(): StoreSnapshot {
    const provenance: Record<string, string[]> = {};
    for (const [id, contributed] of this.provenance) provenance[id] = sorted(contributed);
    return {
      domains: sorted(this.domains),
      hashes: sorted(this.hashes),
      skip: sorted(this.skip),
      legacy: sorted(this.legacy),
      provenance,
      hashFailures: this.hashFailures,
    };
  }

  private recordProvenance(sourceId: string, contributed: string[]): void {
    let entry = this.provenance.get(sourceId);
    if (!entry) {
      entry = new Set();
      this.provenance.set(sourceId, entry);
    }
    for (const d of contributed) entry.add(d);
  }

  private hashOf(domain: string): string | null {
    try {
      return contentHash(domain);
    } catch (err) {
      if (err instanceof IdnaEncodingError) return null;
      throw err;
    }
  }

  private addHashOf(domain: string): void {
    try {
      this.hashes.add(contentHash(domain));
    } catch (err) {
      if (!(err instanceof IdnaEncodingError)) throw err;
      this.hashFailures++;
      logger.warn({ domain, code: err.code }, 'skipping content hash for domain without IDNA form');
    }
  }
}

export default AggregationStore;
