import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { isOracleError, type ErrorCategory, type OracleError } from '@epo/types';
import type { Logger } from '@epo/shared';

type ErrorStatus = 400 | 403 | 404 | 409 | 422;

const STATUS_BY_CATEGORY: Readonly<Record<ErrorCategory, ErrorStatus>> = {
  input: 400,
  state: 409,
  trust: 422,
  freshness: 422,
  capability: 403,
  'not-found': 404,
};

export function statusForError(err: OracleError): ErrorStatus {
  // An unknown enclave key is a missing resource, not a workflow conflict
  if (err.code === 'NotRegistered') return 404;
  return STATUS_BY_CATEGORY[err.category];
}

/** One error shape for every route: `{ error, message }` */
export function createErrorHandler(logger: Logger) {
  return (err: Error, c: Context) => {
    if (isOracleError(err)) {
      return c.json({ error: err.code, message: err.message }, statusForError(err));
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    if (err instanceof SyntaxError) {
      return c.json({ error: 'Invalid request', message: 'Malformed JSON body' }, 400);
    }

    logger.error('Unhandled error', { path: c.req.path, error: err.message });
    return c.json({ error: 'Internal error', message: 'Unexpected server error' }, 500);
  };
}
