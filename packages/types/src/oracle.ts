/** Intent scope of price updates signed by enclaves */
export const PRICE_INTENT_SCOPE = 0;

/** Staleness window for price updates: one hour */
export const MAX_PRICE_AGE_MS = 3_600_000n;

export interface PriceUpdatePayload {
  readonly price: bigint;
}

/** Ephemeral message an enclave signs; never stored */
export interface IntentMessage<T> {
  readonly intentScope: number;
  readonly timestampMs: bigint;
  readonly payload: T;
}

export interface PricePoint {
  readonly price: bigint;
  readonly timestampMs: bigint;
}

/** What an enclave hands back for one price observation */
export interface SignedPriceReport extends PricePoint {
  readonly signature: Uint8Array;
}

export interface PriceUpdateRequest {
  readonly currentTimeMs: bigint;
  readonly enclavePublicKey: Uint8Array;
  readonly price: bigint;
  readonly timestampMs: bigint;
  readonly signature: Uint8Array;
}
