export { normalizePublicKey } from './key-normalizer.js';
export {
  zeroPcrs,
  pcrsFromEntries,
  copyPcrs,
  bytesEqual,
  pcrsEqual,
  diffPcrs,
  pcrsToHex,
} from './pcrs.js';
export { AttestationRegistry, type AttestationRegistryOptions } from './registry.js';
