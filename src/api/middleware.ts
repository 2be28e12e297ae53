/**
 * API Middleware — tenant resolution, request parsing and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { ZodTypeAny, output } from 'zod';
import {
  SovereigntyError,
  TypedError,
  apiError,
  authError,
  createTypedError,
  validationError,
} from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ component: 'http' });

export const TENANT_HEADER = 'x-tenant-id';
export const CORRELATION_HEADER = 'x-correlation-id';

/** Request with the resolved tenant. */
export interface TenantRequest extends Request {
  tenantId?: string;
}

/** Reject requests without a tenant header. */
export function tenantMiddleware() {
  return (req: TenantRequest, res: Response, next: NextFunction) => {
    const tenantId = req.header(TENANT_HEADER)?.trim();
    if (!tenantId) {
      res.status(401).json(apiError(authError(`Missing ${TENANT_HEADER} header`)));
      return;
    }
    req.tenantId = tenantId;
    next();
  };
}

/** The tenant bound by tenantMiddleware. */
export function tenantOf(req: TenantRequest): string {
  if (!req.tenantId) {
    throw new SovereigntyError(authError(`Missing ${TENANT_HEADER} header`));
  }
  return req.tenantId;
}

export function correlationIdOf(req: Request): string | undefined {
  return req.header(CORRELATION_HEADER) || undefined;
}

/** Parse a request part with a zod schema; failures become VALIDATION.SCHEMA. */
export function parseWith<S extends ZodTypeAny>(schema: S, value: unknown): output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new SovereigntyError(
      validationError('Request validation failed', {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      }),
    );
  }
  return parsed.data;
}

export function getHttpStatus(error: TypedError): number {
  if (error.code === 'AUTH.UNAUTHENTICATED') return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code === 'VALIDATION.NOT_FOUND') return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('CONFIGURATION.')) return 400;
  if (error.code.startsWith('STATE.')) return 409;
  if (error.code.startsWith('CONFLICT.')) return 409;
  if (error.code.startsWith('LIMIT.')) return 422;
  if (error.code.startsWith('ROUTING.')) return 422;
  if (error.code.startsWith('DEPENDENCY.')) return 503;
  return 500;
}

/** Write a thrown error as a typed API error response. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof SovereigntyError) {
    const status = getHttpStatus(err.typedError);
    if (status >= 500) {
      log.error('Request failed', { code: err.code, status, message: err.message });
    } else {
      log.warn('Request error', { code: err.code, status });
    }
    res.status(status).json(apiError(err.typedError));
    return;
  }

  log.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: err instanceof Error ? err.message : 'Internal server error',
        retryable: false,
      }),
    ),
  );
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(validationError('Malformed JSON body')));
    return;
  }
  sendError(res, err);
}
