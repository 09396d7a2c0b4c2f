import { timingSafeEqual } from 'crypto';
import type { Context, MiddlewareHandler, Next } from 'hono';
import { logger } from './logger.js';

/**
 * Extract client IP from request headers
 */
function getClientIp(c: Context): string {
  const forwardedFor = c.req.header('x-forwarded-for');
  const realIp = c.req.header('x-real-ip');
  return forwardedFor?.split(',')[0]?.trim() || realIp?.trim() || 'unknown';
}

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Requires the `x-api-key` header to equal `apiKey`. With no key configured
 * every request is let through.
 */
export function requireApiKey(apiKey: string | null): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    if (apiKey === null) {
      await next();
      return;
    }

    const given = c.req.header('x-api-key');
    if (given === undefined || !sameKey(given, apiKey)) {
      logger.warn('API key authentication failed', {
        clientIp: getClientIp(c),
        path: c.req.path,
        reason: given === undefined ? 'missing key' : 'invalid key',
      });
      return c.json({ error: 'Unauthorized' }, 401);
    }

    await next();
  };
}
