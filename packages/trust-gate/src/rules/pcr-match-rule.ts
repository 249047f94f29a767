import { bytesToHex } from '@noble/hashes/utils';
import type { GateRule, GateEvaluation, PriceUpdateContext, RegistryReader } from '@epo/types';
import { diffPcrs } from '@epo/registry';

/**
 * The submitting enclave must be registered, and its attested PCRs must
 * equal the oracle's expected PCRs field for field. Looked up on every
 * evaluation.
 */
export class PcrMatchRule implements GateRule {
  readonly type = 'pcr-match' as const;
  readonly name: string;

  constructor(
    private readonly registry: RegistryReader,
    name?: string,
  ) {
    this.name = name ?? 'pcr-match';
  }

  evaluate(context: PriceUpdateContext): GateEvaluation {
    const attested = this.registry.findPcrs(context.enclavePublicKey);
    if (!attested) {
      return {
        verdict: 'deny',
        reason: `Enclave key not registered: ${bytesToHex(context.enclavePublicKey)}`,
        ruleName: this.name,
        code: 'NotRegistered',
      };
    }

    const mismatched = diffPcrs(attested, context.expectedPcrs);
    if (mismatched.length > 0) {
      return {
        verdict: 'deny',
        reason: `Attested PCRs differ from expected: ${mismatched.join(', ')}`,
        ruleName: this.name,
        code: 'InvalidPCRs',
      };
    }

    return { verdict: 'allow', reason: 'Attested PCRs match', ruleName: this.name };
  }
}
