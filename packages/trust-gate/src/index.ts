export { TrustGate, defaultGateConfig, type TrustGateDependencies } from './engine.js';
export { InitializedRule } from './rules/initialized-rule.js';
export { FreshnessRule } from './rules/freshness-rule.js';
export { PcrMatchRule } from './rules/pcr-match-rule.js';
export { SignatureRule } from './rules/signature-rule.js';
