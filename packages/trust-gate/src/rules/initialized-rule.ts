import type { GateRule, GateEvaluation, PriceUpdateContext } from '@epo/types';

export class InitializedRule implements GateRule {
  readonly type = 'initialized' as const;
  readonly name: string;

  constructor(name?: string) {
    this.name = name ?? 'pcrs-initialized';
  }

  evaluate(context: PriceUpdateContext): GateEvaluation {
    if (context.pcrsInitialized) {
      return { verdict: 'allow', reason: 'Expected PCRs are configured', ruleName: this.name };
    }
    return {
      verdict: 'deny',
      reason: 'Oracle has no expected PCRs configured yet',
      ruleName: this.name,
      code: 'PcrsNotInitialized',
    };
  }
}
