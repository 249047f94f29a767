import { Hono } from 'hono';
import type { VerifiedAttestationDocument } from '@epo/types';
import { normalizePublicKey } from '@epo/registry';
import type { OracleServices } from '../oracle-host.js';
import { verifierAuth } from '../middleware/auth.js';
import { HexBytes, RegisterEnclaveSchema } from './schemas.js';
import { entryToJson } from './serialize.js';

export function createRegistryRouter(services: OracleServices) {
  const router = new Hono();
  const { registry } = services;

  // POST /registry/enclaves - Record a verified attestation
  router.post('/enclaves', verifierAuth(services.config.verifierToken), async (c) => {
    const body = await c.req.json();
    const parsed = RegisterEnclaveSchema.safeParse(body);

    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { publicKey, pcrs } = parsed.data;
    const document: VerifiedAttestationDocument = {
      publicKey: () => publicKey,
      pcrs: () => pcrs,
    };

    const entry = registry.register(document);
    return c.json(entryToJson(entry), 201);
  });

  // GET /registry/enclaves - List registered enclaves
  router.get('/enclaves', (c) => {
    return c.json({ enclaves: registry.entries().map(entryToJson) });
  });

  // GET /registry/enclaves/:publicKey - Look up by key in any accepted encoding
  router.get('/enclaves/:publicKey', (c) => {
    const parsed = HexBytes.safeParse(c.req.param('publicKey'));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const entry = registry.getEntry(normalizePublicKey(parsed.data));
    return c.json(entryToJson(entry));
  });

  return router;
}
