export {
  INTENT_MESSAGE_LAYOUT_VERSION,
  PRICE_INTENT_MESSAGE_LENGTH,
  serializeIntentMessage,
  assertU8,
  assertU64,
} from './intent-message.js';
export { SignatureVerifier, intentDigest, COMPACT_SIGNATURE_LENGTH } from './signature-verifier.js';
export { systemClock, ManualClock, type Clock } from './clock.js';
export type { IEnclaveSigner } from './enclave.js';
