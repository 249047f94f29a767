import type { PricePoint } from '@epo/types';
import { OracleError } from '@epo/types';

/**
 * Append-only timestamp -> price map with a "latest" pointer.
 * A timestamp can be written once; the pointer only moves forward.
 */
export class PriceLedger {
  private readonly prices = new Map<bigint, bigint>();
  private latestPrice = 0n;
  private latestTimestamp = 0n;

  /** Fails DuplicateTimestamp without touching anything if `timestampMs` exists */
  assertInsertable(timestampMs: bigint): void {
    if (this.prices.has(timestampMs)) {
      throw new OracleError(
        'DuplicateTimestamp',
        `A price is already recorded at timestamp ${timestampMs}`,
      );
    }
  }

  /**
   * Record a price. Returns true when it became the latest.
   */
  insert(timestampMs: bigint, price: bigint): boolean {
    this.assertInsertable(timestampMs);
    this.prices.set(timestampMs, price);

    if (timestampMs > this.latestTimestamp) {
      this.latestPrice = price;
      this.latestTimestamp = timestampMs;
      return true;
    }
    return false;
  }

  has(timestampMs: bigint): boolean {
    return this.prices.has(timestampMs);
  }

  get(timestampMs: bigint): bigint {
    const price = this.prices.get(timestampMs);
    if (price === undefined) {
      throw new OracleError('NoPriceAtTimestamp', `No price recorded at timestamp ${timestampMs}`);
    }
    return price;
  }

  getLatest(): PricePoint {
    if (this.latestTimestamp === 0n) {
      throw new OracleError('NoPriceAvailable', 'No price has been recorded yet');
    }
    return { price: this.latestPrice, timestampMs: this.latestTimestamp };
  }

  /** 0 until the first price is recorded */
  getLatestTimestamp(): bigint {
    return this.latestTimestamp;
  }

  get size(): number {
    return this.prices.size;
  }

  /** All recorded prices in ascending timestamp order */
  list(): PricePoint[] {
    return [...this.prices.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([timestampMs, price]) => ({ price, timestampMs }));
  }
}
