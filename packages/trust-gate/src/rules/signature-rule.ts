import type { GateRule, GateEvaluation, PriceUpdateContext } from '@epo/types';
import { PRICE_INTENT_SCOPE } from '@epo/types';
import { SignatureVerifier } from '@epo/tee-core';

export class SignatureRule implements GateRule {
  readonly type = 'signature' as const;
  readonly name: string;
  private readonly intentScope: number;

  constructor(
    private readonly verifier: SignatureVerifier = new SignatureVerifier(),
    intentScope: number = PRICE_INTENT_SCOPE,
    name?: string,
  ) {
    this.name = name ?? 'signature';
    this.intentScope = intentScope;
  }

  evaluate(context: PriceUpdateContext): GateEvaluation {
    const valid = this.verifier.verify(
      context.signature,
      context.enclavePublicKey,
      this.intentScope,
      context.timestampMs,
      { price: context.price },
    );

    if (!valid) {
      return {
        verdict: 'deny',
        reason: 'Signature does not verify against the enclave key',
        ruleName: this.name,
        code: 'InvalidSignature',
      };
    }

    return { verdict: 'allow', reason: 'Signature is valid', ruleName: this.name };
  }
}
