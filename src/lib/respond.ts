import { ZodError } from 'zod';
import { BriefingError, type BriefingErrorCode, errorMessage } from '@/lib/errors';
import type { Logger } from '@/lib/logger';

const HEADERS = { 'content-type': 'application/json', 'cache-control': 'no-store' };

const STATUS: Record<BriefingErrorCode, number> = {
  OUT_OF_RANGE: 422,
  MALFORMED_TABLE: 500,
  WEATHER_UNAVAILABLE: 502,
  STALE_WEATHER: 422,
  AIRPORT_NOT_FOUND: 404,
  RUNWAY_NOT_FOUND: 404,
  UPSTREAM: 502,
  CONFIG: 500,
};

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: HEADERS });
}

/** Error -> `{ error, code }` with the status its kind maps to. */
export function errorResponse(e: unknown, logger?: Logger): Response {
  if (e instanceof ZodError) {
    return json({ error: e.issues.map(i => i.message).join('; '), code: 'BAD_REQUEST' }, 400);
  }
  if (e instanceof BriefingError) {
    const status = STATUS[e.code];
    if (status >= 500) logger?.error(e.message);
    else logger?.warn(e.message);
    return json({ error: e.message, code: e.code }, status);
  }
  logger?.error('unhandled', e);
  return json({ error: errorMessage(e), code: 'INTERNAL' }, 500);
}
