import type { GateRule, GateEvaluation, PriceUpdateContext } from '@epo/types';
import { MAX_PRICE_AGE_MS } from '@epo/types';

/**
 * Accepts timestamps in [currentTime - maxAge, currentTime], both ends
 * inclusive. Future timestamps are stale too.
 */
export class FreshnessRule implements GateRule {
  readonly type = 'freshness' as const;
  readonly name: string;
  private readonly maxAgeMs: bigint;

  constructor(maxAgeMs: bigint = MAX_PRICE_AGE_MS, name?: string) {
    this.name = name ?? 'freshness';
    this.maxAgeMs = maxAgeMs;
  }

  evaluate(context: PriceUpdateContext): GateEvaluation {
    const { timestampMs, currentTimeMs } = context;

    if (timestampMs > currentTimeMs) {
      return {
        verdict: 'deny',
        reason: `Price timestamp ${timestampMs} is ahead of current time ${currentTimeMs}`,
        ruleName: this.name,
        code: 'StalePrice',
      };
    }

    const age = currentTimeMs - timestampMs;
    if (age > this.maxAgeMs) {
      return {
        verdict: 'deny',
        reason: `Price is ${age}ms old, limit is ${this.maxAgeMs}ms`,
        ruleName: this.name,
        code: 'StalePrice',
      };
    }

    return { verdict: 'allow', reason: 'Within staleness window', ruleName: this.name };
  }
}
