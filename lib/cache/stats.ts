import { setCacheHitRatio } from '../metrics';

/**
 * Hit/miss bookkeeping; every lookup also refreshes the resolver cache gauge.
 */
export class CacheStats {
  hits = 0;
  misses = 0;

  record(hit: boolean): void {
    if (hit) this.hits++;
    else this.misses++;
    setCacheHitRatio(this.ratio);
  }

  get ratio(): number {
    const total = this.hits + this.misses;
    return total ? this.hits / total : 0;
  }
}
