export interface OracleCreatedEvent {
  readonly type: 'oracle-created';
  readonly oracleId: string;
  readonly capabilityId: string;
}

export interface RegistryEntryCreatedEvent {
  readonly type: 'registry-entry-created';
  readonly publicKey: string;
  readonly pcrs: HexPcrs;
}

export interface ExpectedPcrsChangedEvent {
  readonly type: 'expected-pcrs-changed';
  readonly oracleId: string;
  readonly pcrs: HexPcrs;
}

export interface PriceUpdatedEvent {
  readonly type: 'price-updated';
  readonly oracleId: string;
  readonly enclavePublicKey: string;
  readonly price: bigint;
  readonly timestampMs: bigint;
}

export type OracleEvent =
  | OracleCreatedEvent
  | RegistryEntryCreatedEvent
  | ExpectedPcrsChangedEvent
  | PriceUpdatedEvent;

export type OracleEventType = OracleEvent['type'];

/** PCR values rendered as hex, for observers */
export interface HexPcrs {
  readonly pcr0: string;
  readonly pcr1: string;
  readonly pcr2: string;
  readonly pcr16: string;
}

export interface EventSink {
  emit(event: OracleEvent): void;
}
