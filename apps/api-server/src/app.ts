import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { Clock } from '@epo/tee-core';
import type { SimulatedEnclave } from '@epo/tee-simulator';
import { loadConfig, type AppConfig } from './config.js';
import { createOracleServices, type OracleServices } from './oracle-host.js';
import { createErrorHandler } from './middleware/errors.js';
import { createRegistryRouter } from './routes/registry.js';
import { createOracleRouter } from './routes/oracle.js';

export interface CreateAppOptions {
  /** Read from the environment when omitted */
  config?: AppConfig;
  clock?: Clock;
  enclave?: SimulatedEnclave;
}

export function createApp(options: CreateAppOptions = {}): { app: Hono; services: OracleServices } {
  const config = options.config ?? loadConfig();
  const services = createOracleServices(config, {
    clock: options.clock,
    enclave: options.enclave,
  });
  const app = new Hono();

  // Middleware
  app.use('*', logger((message) => services.logger.info(message)));
  app.onError(createErrorHandler(services.logger));

  // Health check
  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      oracleState: services.oracle.state,
      registeredEnclaves: services.registry.size,
    }),
  );

  // Routes
  app.route('/registry', createRegistryRouter(services));
  app.route('/oracle', createOracleRouter(services));

  return { app, services };
}
