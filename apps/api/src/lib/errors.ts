import { AuthError } from '@payflow/auth';
import { isDomainError, type DomainErrorCode } from '@payflow/core';
import { logger } from '@payflow/observability';
import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { AppBindings } from '../types/context.js';
import { failure, type ValidationIssue } from './responses.js';

/**
 * Raised by the zod validator hook; rendered as 400 with the issue list
 */
export class RequestValidationError extends Error {
  constructor(readonly issues: ValidationIssue[]) {
    super('Request validation failed');
    this.name = 'RequestValidationError';
  }
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Hook for `zValidator(target, schema, throwOnInvalid)`
 */
export function throwOnInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw new RequestValidationError(toValidationIssues(result.error));
  }
}

export const DOMAIN_ERROR_STATUS = {
  validation_error: 400,
  invalid_amount: 400,
  self_transfer: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  insufficient_funds: 422,
} as const satisfies Record<DomainErrorCode, number>;

/**
 * Single error boundary installed with `app.onError`
 */
export function handleError(err: Error, c: Context<AppBindings>) {
  if (err instanceof RequestValidationError) {
    return c.json(failure('validation_error', err.message, err.issues), 400);
  }

  if (isDomainError(err)) {
    return c.json(failure(err.code, err.message), DOMAIN_ERROR_STATUS[err.code]);
  }

  if (err instanceof AuthError) {
    return c.json(failure(err.code, err.message), err.code === 'unauthorized' ? 401 : 403);
  }

  // Malformed JSON bodies surface from hono's validator as HTTPException(400)
  if (err instanceof HTTPException && err.status < 500) {
    const code = err.status === 400 ? 'validation_error' : 'http_error';
    return c.json(failure(code, err.message), err.status);
  }

  logger.error(
    {
      err,
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
    },
    'Unhandled error'
  );
  return c.json(failure('internal_error', 'Internal server error'), 500);
}

export function handleNotFound(c: Context<AppBindings>) {
  return c.json(failure('not_found', `Route not found: ${c.req.method} ${c.req.path}`), 404);
}
