import type { Context } from 'hono';
import { logger, toError } from './logger.js';

const ERROR_STATUSES = [400, 401, 403, 404, 409, 500, 502, 503] as const;

export type ErrorStatus = (typeof ERROR_STATUSES)[number];

const isProduction = () => process.env.NODE_ENV === 'production';

/**
 * Sanitize error message for client response
 * In production, returns generic messages to prevent information disclosure
 */
export function sanitizeErrorMessage(error: unknown, defaultMessage: string = 'An error occurred'): string {
  if (isProduction() && getErrorStatusCode(error) >= 500) {
    return defaultMessage;
  }
  return toError(error).message;
}

/**
 * Get HTTP status code from error
 */
export function getErrorStatusCode(error: unknown): ErrorStatus {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    return ERROR_STATUSES.find((known) => known === status) ?? 500;
  }
  return 500;
}

/**
 * Handle error and return appropriate response
 */
export function handleError(error: unknown, c: Context): Response {
  const statusCode = getErrorStatusCode(error);

  logger[statusCode >= 500 ? 'error' : 'warn']('Request error', {
    path: c.req.path,
    method: c.req.method,
    statusCode,
    error: isProduction() ? toError(error).message : toError(error),
  });

  return c.json({ error: sanitizeErrorMessage(error) }, statusCode);
}
