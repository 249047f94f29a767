import type { SignedPriceReport, VerifiedAttestationDocument } from '@epo/types';

/**
 * Contract an enclave price signer fulfils.
 *
 * Prices are fixed-point integers scaled by 10^6, timestamps are Unix
 * milliseconds, and the signature covers the canonical intent message with
 * intent scope 0.
 */
export interface IEnclaveSigner {
  /** Public key as the enclave reports it (any supported encoding) */
  getPublicKey(): Uint8Array;

  /** Attestation document binding the key to the enclave's PCRs */
  getAttestationDocument(): VerifiedAttestationDocument;

  /** Sign one price observation */
  signPrice(price: bigint, timestampMs: bigint): SignedPriceReport;
}
