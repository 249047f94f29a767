import { describe, it, expect, beforeEach } from 'vitest';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { SimulatedEnclave } from '@epo/tee-simulator';
import { AttestationRegistry } from '@epo/registry';
import { createLogger } from '@epo/shared';
import { isOracleError, type OracleErrorCode, type PcrQuadruple } from '@epo/types';
import { PriceOracle } from './price-oracle.js';
import { AdminCapability } from './admin-capability.js';
import { EventLog } from './event-log.js';

const T0 = 1700000000000n;
const HOUR = 3_600_000n;

function expectCode(fn: () => unknown, code: OracleErrorCode): void {
  try {
    fn();
    expect.unreachable(`expected ${code}`);
  } catch (err) {
    expect(isOracleError(err, code)).toBe(true);
  }
}

function configure(oracle: PriceOracle, capability: AdminCapability, pcrs: PcrQuadruple): void {
  oracle.updateExpectedPcrs(capability, pcrs.pcr0, pcrs.pcr1, pcrs.pcr2, pcrs.pcr16);
}

describe('PriceOracle', () => {
  const logger = createLogger('oracle-test', { level: 'silent' });
  let events: EventLog;
  let registry: AttestationRegistry;
  let enclave: SimulatedEnclave;
  let oracle: PriceOracle;
  let capability: AdminCapability;

  function submit(report: { price: bigint; timestampMs: bigint; signature: Uint8Array }, now = T0) {
    return oracle.updatePrice(registry, {
      currentTimeMs: now,
      enclavePublicKey: enclave.getCompressedPublicKey(),
      ...report,
    });
  }

  beforeEach(() => {
    events = new EventLog({ logger });
    registry = new AttestationRegistry({ events, logger });
    enclave = new SimulatedEnclave({
      measurement: 'price-enclave-v1',
      privateKey: hexToBytes('5a'.repeat(32)),
    });
    registry.register(enclave.getAttestationDocument());
    ({ oracle, capability } = PriceOracle.create({ events, logger }));
  });

  describe('creation and configuration', () => {
    it('should start uninitialized with placeholder PCRs', () => {
      expect(oracle.state).toBe('uninitialized');
      expect(oracle.isPcrsInitialized()).toBe(false);
      expect(oracle.getExpectedPcrs().pcr0).toEqual(new Uint8Array(48));
      expect(capability.oracleId).toBe(oracle.id);
      expect(events.list('oracle-created')).toEqual([
        { type: 'oracle-created', oracleId: oracle.id, capabilityId: capability.id },
      ]);
    });

    it('should reject updates before PCRs are configured', () => {
      expectCode(() => submit(enclave.signPrice(1250000n, T0)), 'PcrsNotInitialized');
    });

    it('should overwrite all four PCRs and become configured', () => {
      configure(oracle, capability, enclave.getPcrs());

      expect(oracle.state).toBe('configured');
      expect(oracle.getExpectedPcrs()).toEqual(enclave.getPcrs());
      expect(events.list('expected-pcrs-changed')).toHaveLength(1);
    });

    it('should reject a capability minted for another oracle', () => {
      const other = PriceOracle.create({ logger });

      expectCode(() => configure(oracle, other.capability, enclave.getPcrs()), 'InvalidCapability');
      expect(oracle.isPcrsInitialized()).toBe(false);
    });

    it('should reject a copied capability', () => {
      const forged = Object.create(AdminCapability.prototype, {
        id: { value: capability.id },
        oracleId: { value: capability.oracleId },
      });

      expectCode(() => configure(oracle, forged, enclave.getPcrs()), 'InvalidCapability');
      expect(AdminCapability.isGenuine({ ...capability })).toBe(false);
    });

    it('should not let the caller mutate expected PCRs afterwards', () => {
      const pcrs = enclave.getPcrs();
      configure(oracle, capability, pcrs);
      pcrs.pcr0[0] = (pcrs.pcr0[0] ?? 0) ^ 0xff;

      expect(oracle.getExpectedPcrs()).toEqual(enclave.getPcrs());
    });
  });

  describe('updatePrice', () => {
    beforeEach(() => {
      configure(oracle, capability, enclave.getPcrs());
    });

    it('should fail NoPriceAvailable before any update', () => {
      expectCode(() => oracle.getLatestPrice(), 'NoPriceAvailable');
      expect(oracle.getLatestTimestamp()).toBe(0n);
    });

    it('should record a valid update as the latest price', () => {
      submit(enclave.signPrice(1250000n, T0));

      expect(oracle.getLatestPrice()).toEqual({ price: 1250000n, timestampMs: T0 });
      expect(oracle.getLatestTimestamp()).toBe(T0);
      expect(oracle.getPriceAtTimestamp(T0)).toBe(1250000n);
      expect(oracle.hasPriceAtTimestamp(T0)).toBe(true);
      expect(events.list('price-updated')).toEqual([
        {
          type: 'price-updated',
          oracleId: oracle.id,
          enclavePublicKey: bytesToHex(enclave.getCompressedPublicKey()),
          price: 1250000n,
          timestampMs: T0,
        },
      ]);
    });

    it('should accept a price exactly one hour old', () => {
      submit(enclave.signPrice(1n, T0), T0 + HOUR);
      expect(oracle.hasPriceAtTimestamp(T0)).toBe(true);
    });

    it('should reject a price older than one hour', () => {
      expectCode(() => submit(enclave.signPrice(1n, T0), T0 + HOUR + 1n), 'StalePrice');
    });

    it('should reject a price from the future', () => {
      expectCode(() => submit(enclave.signPrice(1n, T0 + 1n), T0), 'StalePrice');
    });

    it('should honour a configured staleness window', () => {
      const strict = PriceOracle.create({ maxAgeMs: 1000n, logger });
      configure(strict.oracle, strict.capability, enclave.getPcrs());
      const report = enclave.signPrice(1n, T0);
      const request = {
        currentTimeMs: T0 + 1001n,
        enclavePublicKey: enclave.getCompressedPublicKey(),
        ...report,
      };

      expectCode(() => strict.oracle.updatePrice(registry, request), 'StalePrice');
      strict.oracle.updatePrice(registry, { ...request, currentTimeMs: T0 + 1000n });
      expect(strict.oracle.getLatestTimestamp()).toBe(T0);
    });

    it('should run every trust check whatever the staleness window', () => {
      const lenient = PriceOracle.create({ maxAgeMs: 2n ** 63n, logger });
      const unsigned = {
        currentTimeMs: T0,
        enclavePublicKey: new Uint8Array(33),
        price: 999n,
        timestampMs: 1n,
        signature: new Uint8Array(64),
      };

      expectCode(() => lenient.oracle.updatePrice(registry, unsigned), 'PcrsNotInitialized');
      configure(lenient.oracle, lenient.capability, enclave.getPcrs());
      expectCode(() => lenient.oracle.updatePrice(registry, unsigned), 'NotRegistered');
      expect(lenient.oracle.getPriceCount()).toBe(0);
    });

    it.each(['pcr0', 'pcr1', 'pcr2', 'pcr16'] as const)(
      'should reject when expected %s differs',
      (field) => {
        const pcrs = enclave.getPcrs();
        pcrs[field][0] = (pcrs[field][0] ?? 0) ^ 0x01;
        configure(oracle, capability, pcrs);

        expectCode(() => submit(enclave.signPrice(1250000n, T0)), 'InvalidPCRs');
      },
    );

    it('should reject an unregistered enclave', () => {
      const rogue = new SimulatedEnclave({ measurement: 'price-enclave-v1' });
      const report = rogue.signPrice(1250000n, T0);

      expectCode(
        () =>
          oracle.updatePrice(registry, {
            currentTimeMs: T0,
            enclavePublicKey: rogue.getCompressedPublicKey(),
            ...report,
          }),
        'NotRegistered',
      );
    });

    it('should reject a price altered after signing', () => {
      const report = enclave.signPrice(1250000n, T0);

      expectCode(() => submit({ ...report, price: 1250001n }), 'InvalidSignature');
    });

    it('should reject an all-zero signature as InvalidSignature', () => {
      const report = enclave.signPrice(1250000n, T0);

      expectCode(() => submit({ ...report, signature: new Uint8Array(64) }), 'InvalidSignature');
    });

    it('should reject a signature from a registered enclave with other PCRs', () => {
      const other = new SimulatedEnclave({ measurement: 'price-enclave-v2' });
      registry.register(other.getAttestationDocument());
      const report = other.signPrice(1n, T0);

      expectCode(
        () =>
          oracle.updatePrice(registry, {
            currentTimeMs: T0,
            enclavePublicKey: other.getCompressedPublicKey(),
            ...report,
          }),
        'InvalidPCRs',
      );
    });

    it('should reject a second price at the same timestamp', () => {
      submit(enclave.signPrice(100n, T0));

      expectCode(() => submit(enclave.signPrice(200n, T0)), 'DuplicateTimestamp');
      expect(oracle.getPriceAtTimestamp(T0)).toBe(100n);
    });

    it('should store older prices without moving the latest pointer', () => {
      submit(enclave.signPrice(300n, T0));
      submit(enclave.signPrice(200n, T0 - 1000n));

      expect(oracle.getPriceAtTimestamp(T0 - 1000n)).toBe(200n);
      expect(oracle.getLatestPrice()).toEqual({ price: 300n, timestampMs: T0 });

      submit(enclave.signPrice(400n, T0 + 1000n), T0 + 1000n);
      expect(oracle.getLatestPrice()).toEqual({ price: 400n, timestampMs: T0 + 1000n });
      expect(oracle.listPrices().map((p) => p.price)).toEqual([200n, 300n, 400n]);
    });

    it('should leave no trace of a rejected update', () => {
      submit(enclave.signPrice(100n, T0));
      const before = events.list().length;

      expectCode(() => submit({ ...enclave.signPrice(1n, T0 + 5n), price: 2n }, T0 + 5n), 'InvalidSignature');

      expect(oracle.getPriceCount()).toBe(1);
      expect(oracle.hasPriceAtTimestamp(T0 + 5n)).toBe(false);
      expect(oracle.getLatestPrice()).toEqual({ price: 100n, timestampMs: T0 });
      expect(events.list()).toHaveLength(before);
    });

    it('should reject prices that do not fit a u64', () => {
      expectCode(() => submit({ ...enclave.signPrice(1n, T0), price: -1n }), 'ValueOutOfRange');
    });

    it('should re-read registry PCRs on every update', () => {
      submit(enclave.signPrice(1n, T0));
      configure(oracle, capability, new SimulatedEnclave({ measurement: 'v3' }).getPcrs());

      expectCode(() => submit(enclave.signPrice(2n, T0 + 1n), T0 + 1n), 'InvalidPCRs');
    });

    it('should keep the committed update when an event sink throws', () => {
      const broken = PriceOracle.create({
        logger,
        events: {
          emit: () => {
            throw new Error('sink down');
          },
        },
      });
      configure(broken.oracle, broken.capability, enclave.getPcrs());

      broken.oracle.updatePrice(registry, {
        currentTimeMs: T0,
        enclavePublicKey: enclave.getCompressedPublicKey(),
        ...enclave.signPrice(7n, T0),
      });

      expect(broken.oracle.getLatestPrice()).toEqual({ price: 7n, timestampMs: T0 });
    });
  });
});
