export {
  SimulatedEnclave,
  type SimulatedEnclaveOptions,
  type KeyEncoding,
} from './simulated-enclave.js';
export { SimulatedAttestationDocument } from './simulated-attestation.js';
export { simulatePcrs, SIMULATED_PCR_INDICES, DEFAULT_MEASUREMENT } from './measurement.js';
