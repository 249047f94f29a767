import type {
  GateRule,
  GateEvaluation,
  GateRuleConfig,
  PriceUpdateContext,
  RegistryReader,
} from '@epo/types';
import { MAX_PRICE_AGE_MS } from '@epo/types';
import type { SignatureVerifier } from '@epo/tee-core';
import { InitializedRule } from './rules/initialized-rule.js';
import { FreshnessRule } from './rules/freshness-rule.js';
import { PcrMatchRule } from './rules/pcr-match-rule.js';
import { SignatureRule } from './rules/signature-rule.js';

/** Rules every oracle runs, in order */
export function defaultGateConfig(maxAgeMs: bigint = MAX_PRICE_AGE_MS): GateRuleConfig[] {
  return [
    { type: 'initialized' },
    { type: 'freshness', maxAgeMs },
    { type: 'pcr-match' },
    { type: 'signature' },
  ];
}

export interface TrustGateDependencies {
  readonly registry: RegistryReader;
  readonly verifier?: SignatureVerifier;
}

/**
 * Trust gate in front of every price update.
 * Rules run in insertion order; the first denial decides the outcome.
 */
export class TrustGate {
  private readonly rules: GateRule[] = [];

  addRule(rule: GateRule): void {
    this.rules.push(rule);
  }

  getRules(): readonly GateRule[] {
    return this.rules;
  }

  /**
   * Evaluate all rules. Returns the first denial, or an allow verdict.
   */
  evaluate(context: PriceUpdateContext): GateEvaluation {
    for (const rule of this.rules) {
      const result = rule.evaluate(context);
      if (result.verdict === 'deny') {
        return result;
      }
    }

    return {
      verdict: 'allow',
      reason: 'All trust checks passed',
      ruleName: 'gate',
    };
  }

  /**
   * Create a TrustGate from a list of rule configurations.
   */
  static fromConfig(configs: GateRuleConfig[], deps: TrustGateDependencies): TrustGate {
    const gate = new TrustGate();

    for (const config of configs) {
      switch (config.type) {
        case 'initialized':
          gate.addRule(new InitializedRule());
          break;
        case 'freshness':
          gate.addRule(new FreshnessRule(config.maxAgeMs));
          break;
        case 'pcr-match':
          gate.addRule(new PcrMatchRule(deps.registry));
          break;
        case 'signature':
          gate.addRule(new SignatureRule(deps.verifier, config.intentScope));
          break;
      }
    }

    return gate;
  }
}
