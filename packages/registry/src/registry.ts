import type {
  EventSink,
  OracleEvent,
  PcrQuadruple,
  RegistryEntry,
  RegistryReader,
  VerifiedAttestationDocument,
} from '@epo/types';
import { OracleError, createPublicKey, publicKeyToHex } from '@epo/types';
import { createLogger, type Logger } from '@epo/shared';
import { systemClock, type Clock } from '@epo/tee-core';
import { normalizePublicKey } from './key-normalizer.js';
import { copyPcrs, pcrsFromEntries, pcrsToHex } from './pcrs.js';

export interface AttestationRegistryOptions {
  readonly events?: EventSink;
  readonly logger?: Logger;
  /** Stamps `registeredAt`; wall clock when omitted */
  readonly clock?: Clock;
}

/**
 * Permissionless, append-only map from canonical enclave public key to the
 * PCRs its attestation proved. An entry is written once and never changed
 * or removed.
 */
export class AttestationRegistry implements RegistryReader {
  private readonly entriesByKey = new Map<string, RegistryEntry>();
  private readonly events?: EventSink;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: AttestationRegistryOptions = {}) {
    this.events = options.events;
    this.logger = options.logger ?? createLogger('registry');
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Record the key and PCRs of a pre-verified attestation document.
   * Fails if the document carries no key, the key cannot be normalized, or
   * the canonical key is already registered (whatever its PCRs).
   */
  register(doc: VerifiedAttestationDocument): RegistryEntry {
    const rawKey = doc.publicKey();
    if (!rawKey) {
      throw new OracleError('NoPublicKey', 'Attestation document carries no public key');
    }

    const publicKey = normalizePublicKey(rawKey);
    const keyHex = publicKeyToHex(publicKey);

    if (this.entriesByKey.has(keyHex)) {
      throw new OracleError('AlreadyRegistered', `Enclave key already registered: ${keyHex}`);
    }

    const entry: RegistryEntry = {
      publicKey,
      pcrs: pcrsFromEntries(doc.pcrs()),
      registeredAt: Number(this.clock.now()),
    };
    this.entriesByKey.set(keyHex, entry);

    this.logger.info('Enclave registered', { publicKey: keyHex });
    this.notify({
      type: 'registry-entry-created',
      publicKey: keyHex,
      pcrs: pcrsToHex(entry.pcrs),
    });

    return copyEntry(entry);
  }

  isRegistered(publicKey: Uint8Array): boolean {
    return this.entriesByKey.has(publicKeyToHex(publicKey));
  }

  getPcrs(publicKey: Uint8Array): PcrQuadruple {
    const pcrs = this.findPcrs(publicKey);
    if (!pcrs) {
      throw new OracleError(
        'NotRegistered',
        `Enclave key not registered: ${publicKeyToHex(publicKey)}`,
      );
    }
    return pcrs;
  }

  findPcrs(publicKey: Uint8Array): PcrQuadruple | undefined {
    const entry = this.entriesByKey.get(publicKeyToHex(publicKey));
    return entry ? copyPcrs(entry.pcrs) : undefined;
  }

  /** Full entry for a canonical key, or NotRegistered */
  getEntry(publicKey: Uint8Array): RegistryEntry {
    const entry = this.entriesByKey.get(publicKeyToHex(publicKey));
    if (!entry) {
      throw new OracleError(
        'NotRegistered',
        `Enclave key not registered: ${publicKeyToHex(publicKey)}`,
      );
    }
    return copyEntry(entry);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  /** Registered entries in registration order */
  entries(): RegistryEntry[] {
    return [...this.entriesByKey.values()].map(copyEntry);
  }

  /** A failing sink never undoes a registration */
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

function copyEntry(entry: RegistryEntry): RegistryEntry {
  return {
    publicKey: createPublicKey(entry.publicKey.slice()),
    pcrs: copyPcrs(entry.pcrs),
    registeredAt: entry.registeredAt,
  };
}
