import { serve } from '@hono/node-server';
import { bytesToHex } from '@noble/hashes/utils';
import { loadConfig } from './config.js';
import { createApp } from './app.js';

function main() {
  const config = loadConfig();

  const { app, services } = createApp({ config });
  const log = services.logger;

  log.info('Oracle created', { oracleId: services.oracle.id, maxPriceAgeMs: config.maxPriceAgeMs.toString() });
  if (services.enclave) {
    log.info('Simulated enclave key', { publicKey: bytesToHex(services.enclave.getCompressedPublicKey()) });
  }
  if (!config.adminToken) {
    log.warn('ADMIN_TOKEN is not set; expected PCRs cannot be configured over HTTP');
  }

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info('Server running', { url: `http://localhost:${info.port}` });
  });
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
