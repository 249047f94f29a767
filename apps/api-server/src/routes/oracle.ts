import { Hono } from 'hono';
import { pcrsToHex } from '@epo/registry';
import type { OracleServices } from '../oracle-host.js';
import { adminAuth } from '../middleware/auth.js';
import { EventTypeSchema, ExpectedPcrsSchema, PriceUpdateSchema, UnsignedInteger } from './schemas.js';
import { eventToJson, pricePointToJson } from './serialize.js';

export function createOracleRouter(services: OracleServices) {
  const router = new Hono();
  const { oracle, registry, events, clock } = services;

  // GET /oracle - Configuration and ledger summary
  router.get('/', (c) => {
    return c.json({
      id: oracle.id,
      state: oracle.state,
      expectedPcrs: oracle.isPcrsInitialized() ? pcrsToHex(oracle.getExpectedPcrs()) : null,
      priceCount: oracle.getPriceCount(),
      latestTimestampMs: oracle.getLatestTimestamp().toString(),
    });
  });

  // PUT /oracle/pcrs - Replace the expected PCRs (admin)
  router.put('/pcrs', adminAuth(services.config.adminToken), async (c) => {
    const body = await c.req.json();
    const parsed = ExpectedPcrsSchema.safeParse(body);

    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { pcr0, pcr1, pcr2, pcr16 } = parsed.data;
    oracle.updateExpectedPcrs(services.capability, pcr0, pcr1, pcr2, pcr16);
    return c.json({ state: oracle.state, expectedPcrs: pcrsToHex(oracle.getExpectedPcrs()) });
  });

  // POST /oracle/prices - Submit a signed price report
  router.post('/prices', async (c) => {
    const body = await c.req.json();
    const parsed = PriceUpdateSchema.safeParse(body);

    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const point = oracle.updatePrice(registry, {
      currentTimeMs: clock.now(),
      ...parsed.data,
    });
    return c.json(pricePointToJson(point), 201);
  });

  // GET /oracle/prices - Full history, oldest first
  router.get('/prices', (c) => {
    return c.json({ prices: oracle.listPrices().map(pricePointToJson) });
  });

  // GET /oracle/prices/latest
  router.get('/prices/latest', (c) => {
    return c.json(pricePointToJson(oracle.getLatestPrice()));
  });

  // GET /oracle/prices/:timestampMs
  router.get('/prices/:timestampMs', (c) => {
    const parsed = UnsignedInteger.safeParse(c.req.param('timestampMs'));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const price = oracle.getPriceAtTimestamp(parsed.data);
    return c.json(pricePointToJson({ price, timestampMs: parsed.data }));
  });

  // GET /oracle/events?type= - Recent notifications
  router.get('/events', (c) => {
    const parsed = EventTypeSchema.safeParse(c.req.query('type'));
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    return c.json({ events: events.list(parsed.data).map(eventToJson) });
  });

  return router;
}
