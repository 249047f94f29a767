import { AttestationRegistry } from '@epo/registry';
import { PriceOracle, EventLog, type AdminCapability } from '@epo/oracle';
import { systemClock, type Clock } from '@epo/tee-core';
import { SimulatedEnclave } from '@epo/tee-simulator';
import { createLogger, type Logger } from '@epo/shared';
import type { AppConfig } from './config.js';

/**
 * Long-lived registry and oracle instances owned by this process.
 *
 * Registry and oracle writes are synchronous, so once a handler has parsed
 * its request the whole check-then-write sequence runs without yielding to
 * the event loop: calls are serialized per instance without a lock.
 */
export interface OracleServices {
  readonly config: AppConfig;
  readonly registry: AttestationRegistry;
  readonly oracle: PriceOracle;
  /** Held by the host; admin requests act with it after authentication */
  readonly capability: AdminCapability;
  readonly events: EventLog;
  readonly clock: Clock;
  readonly logger: Logger;
  /** Present when the host runs a simulated enclave for local use */
  readonly enclave?: SimulatedEnclave;
}

export interface OracleServicesOptions {
  readonly clock?: Clock;
  readonly enclave?: SimulatedEnclave;
}

export function createOracleServices(
  config: AppConfig,
  options: OracleServicesOptions = {},
): OracleServices {
  const clock = options.clock ?? systemClock;
  const logger = createLogger('api', { level: config.logLevel });
  const events = new EventLog({ logger: createLogger('events', { level: config.logLevel }) });
  const registry = new AttestationRegistry({
    events,
    logger: createLogger('registry', { level: config.logLevel }),
    clock,
  });
  const { oracle, capability } = PriceOracle.create({
    maxAgeMs: config.maxPriceAgeMs,
    events,
    logger: createLogger('oracle', { level: config.logLevel }),
  });

  let enclave = options.enclave;
  if (!enclave && config.simulatedEnclave) {
    enclave = new SimulatedEnclave({ measurement: 'epo-local-enclave-v1' });
  }
  if (enclave) {
    registry.register(enclave.getAttestationDocument());
    logger.info('Simulated enclave registered', { measurement: enclave.measurement });
  }

  return {
    config,
    registry,
    oracle,
    capability,
    events,
    clock,
    logger,
    enclave,
  };
}
