import { randomUUID } from 'node:crypto';
import { bytesToHex } from '@noble/hashes/utils';
import type {
  EventSink,
  OracleErrorCode,
  OracleEvent,
  PcrQuadruple,
  PricePoint,
  PriceUpdateRequest,
  RegistryReader,
} from '@epo/types';
import { MAX_PRICE_AGE_MS, OracleError } from '@epo/types';
import { createLogger, type Logger } from '@epo/shared';
import { SignatureVerifier, assertU64 } from '@epo/tee-core';
import { copyPcrs, zeroPcrs, pcrsToHex } from '@epo/registry';
import { TrustGate, defaultGateConfig } from '@epo/trust-gate';
import { AdminCapability, mintAdminCapability } from './admin-capability.js';
import { PriceLedger } from './price-ledger.js';

export interface PriceOracleOptions {
  /** Staleness window; one hour when omitted */
  readonly maxAgeMs?: bigint;
  readonly verifier?: SignatureVerifier;
  readonly events?: EventSink;
  readonly logger?: Logger;
}

export interface CreatedOracle {
  readonly oracle: PriceOracle;
  /** Hand this to whoever may reconfigure the oracle */
  readonly capability: AdminCapability;
}

export type OracleState = 'uninitialized' | 'configured';

/**
 * Price oracle that accepts an update only from a registered enclave whose
 * attested PCRs equal the oracle's expected PCRs, with a fresh timestamp and
 * a valid signature.
 *
 * Every mutating call is synchronous: all checks run before the first write,
 * and a failing check throws an OracleError with nothing changed.
 */
export class PriceOracle {
  readonly id: string;
  private readonly capabilityId: string;
  private expectedPcrs: PcrQuadruple = zeroPcrs();
  private pcrsInitialized = false;
  private readonly ledger = new PriceLedger();
  private readonly maxAgeMs: bigint;
  private readonly verifier: SignatureVerifier;
  private readonly events?: EventSink;
  private readonly logger: Logger;

  private constructor(id: string, capability: AdminCapability, options: PriceOracleOptions) {
    this.id = id;
    this.capabilityId = capability.id;
    this.maxAgeMs = options.maxAgeMs ?? MAX_PRICE_AGE_MS;
    this.verifier = options.verifier ?? new SignatureVerifier();
    this.events = options.events;
    this.logger = options.logger ?? createLogger('oracle');
  }

  /**
   * Create an oracle in the uninitialized state together with its one
   * admin capability.
   */
  static create(options: PriceOracleOptions = {}): CreatedOracle {
    const id = randomUUID();
    const capability = mintAdminCapability(id);
    const oracle = new PriceOracle(id, capability, options);

    oracle.logger.info('Oracle created', { oracleId: id });
    oracle.notify({ type: 'oracle-created', oracleId: id, capabilityId: capability.id });

    return { oracle, capability };
  }

  get state(): OracleState {
    return this.pcrsInitialized ? 'configured' : 'uninitialized';
  }

  /**
   * Replace all four expected PCRs and mark the oracle configured.
   */
  updateExpectedPcrs(
    capability: AdminCapability,
    pcr0: Uint8Array,
    pcr1: Uint8Array,
    pcr2: Uint8Array,
    pcr16: Uint8Array,
  ): void {
    if (!this.isAuthorized(capability)) {
      this.logger.warn('Rejected PCR update', { oracleId: this.id, code: 'InvalidCapability' });
      throw new OracleError('InvalidCapability', 'Capability does not authorize this oracle');
    }

    this.expectedPcrs = copyPcrs({ pcr0, pcr1, pcr2, pcr16 });
    this.pcrsInitialized = true;

    const pcrs = pcrsToHex(this.expectedPcrs);
    this.logger.info('Expected PCRs updated', { oracleId: this.id, ...pcrs });
    this.notify({ type: 'expected-pcrs-changed', oracleId: this.id, pcrs });
  }

  getExpectedPcrs(): PcrQuadruple {
    return copyPcrs(this.expectedPcrs);
  }

  isPcrsInitialized(): boolean {
    return this.pcrsInitialized;
  }

  /**
   * Run the trust gate against `registry` and, if it passes, record the
   * price. The timestamp must not already be recorded.
   */
  updatePrice(registry: RegistryReader, request: PriceUpdateRequest): PricePoint {
    const { currentTimeMs, enclavePublicKey, price, timestampMs, signature } = request;
    assertU64(price, 'price');
    assertU64(timestampMs, 'timestampMs');

    const gate = TrustGate.fromConfig(defaultGateConfig(this.maxAgeMs), {
      registry,
      verifier: this.verifier,
    });
    const result = gate.evaluate({
      pcrsInitialized: this.pcrsInitialized,
      expectedPcrs: this.expectedPcrs,
      currentTimeMs,
      enclavePublicKey,
      price,
      timestampMs,
      signature,
    });

    if (result.verdict === 'deny') {
      throw this.reject(result.code, result.reason, result.ruleName, timestampMs);
    }
    if (this.ledger.has(timestampMs)) {
      throw this.reject(
        'DuplicateTimestamp',
        `A price is already recorded at timestamp ${timestampMs}`,
        'ledger',
        timestampMs,
      );
    }

    this.ledger.insert(timestampMs, price);

    const enclaveKeyHex = bytesToHex(enclavePublicKey);
    this.logger.info('Price updated', {
      oracleId: this.id,
      enclave: enclaveKeyHex,
      price: price.toString(),
      timestampMs: timestampMs.toString(),
    });
    this.notify({
      type: 'price-updated',
      oracleId: this.id,
      enclavePublicKey: enclaveKeyHex,
      price,
      timestampMs,
    });

    return { price, timestampMs };
  }

  getLatestPrice(): PricePoint {
    return this.ledger.getLatest();
  }

  getLatestTimestamp(): bigint {
    return this.ledger.getLatestTimestamp();
  }

  getPriceAtTimestamp(timestampMs: bigint): bigint {
    return this.ledger.get(timestampMs);
  }

  hasPriceAtTimestamp(timestampMs: bigint): boolean {
    return this.ledger.has(timestampMs);
  }

  getPriceCount(): number {
    return this.ledger.size;
  }

  listPrices(): PricePoint[] {
    return this.ledger.list();
  }

  private reject(
    code: OracleErrorCode,
    reason: string,
    rule: string,
    timestampMs: bigint,
  ): OracleError {
    this.logger.warn('Rejected price update', {
      oracleId: this.id,
      rule,
      code,
      timestampMs: timestampMs.toString(),
    });
    return new OracleError(code, reason);
  }

  private isAuthorized(capability: AdminCapability): boolean {
    return (
      AdminCapability.isGenuine(capability) &&
      capability.id === this.capabilityId &&
      capability.oracleId === this.id
    );
  }

  /** Notifications never undo a committed change */
  private notify(event: OracleEvent): void {
    if (!this.events) return;
    try {
      this.events.emit(event);
    } catch (err) {
      this.logger.error('Event sink failed', {
        type: event.type,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
