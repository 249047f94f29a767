import { timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented, 'utf-8');
  const b = Buffer.from(expected, 'utf-8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Requests carrying the configured admin token act with the oracle's admin
 * capability. Without a configured token, admin routes are closed.
 */
export function adminAuth(adminToken: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    const presented = c.req.header('x-admin-token');

    if (!adminToken || !presented || !tokensMatch(presented, adminToken)) {
      return c.json(
        { error: 'InvalidCapability', message: 'Missing or invalid x-admin-token header' },
        403,
      );
    }

    await next();
  };
}

/**
 * Registrations are accepted only from the upstream attestation verifier
 * when a verifier token is configured; otherwise they are open.
 */
export function verifierAuth(verifierToken: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (verifierToken) {
      const presented = c.req.header('x-verifier-token');
      if (!presented || !tokensMatch(presented, verifierToken)) {
        return c.json({ error: 'Unauthorized', message: 'Missing or invalid x-verifier-token header' }, 401);
      }
    }

    await next();
  };
}
