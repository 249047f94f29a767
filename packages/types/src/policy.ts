import type { PcrQuadruple } from './attestation.js';
import type { OracleErrorCode } from './errors.js';

export interface GateAllow {
  readonly verdict: 'allow';
  readonly reason: string;
  readonly ruleName: string;
}

export interface GateDeny {
  readonly verdict: 'deny';
  readonly reason: string;
  readonly ruleName: string;
  /** The error the caller must raise */
  readonly code: OracleErrorCode;
}

export type GateEvaluation = GateAllow | GateDeny;

/** Everything the trust gate looks at for one price update */
export interface PriceUpdateContext {
  readonly pcrsInitialized: boolean;
  readonly expectedPcrs: PcrQuadruple;
  readonly currentTimeMs: bigint;
  readonly enclavePublicKey: Uint8Array;
  readonly price: bigint;
  readonly timestampMs: bigint;
  readonly signature: Uint8Array;
}

export type GateRuleType = 'initialized' | 'freshness' | 'pcr-match' | 'signature';

export interface GateRule {
  readonly type: GateRuleType;
  readonly name: string;
  evaluate(context: PriceUpdateContext): GateEvaluation;
}

export interface InitializedRuleConfig {
  readonly type: 'initialized';
}

export interface FreshnessRuleConfig {
  readonly type: 'freshness';
  readonly maxAgeMs: bigint;
}

export interface PcrMatchRuleConfig {
  readonly type: 'pcr-match';
}

export interface SignatureRuleConfig {
  readonly type: 'signature';
  readonly intentScope?: number;
}

export type GateRuleConfig =
  | InitializedRuleConfig
  | FreshnessRuleConfig
  | PcrMatchRuleConfig
  | SignatureRuleConfig;
