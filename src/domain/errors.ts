/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the policy core surfaces carries a TypedError payload:
 * a namespaced code, a retryability flag, and optional remediation hints.
 * Thrown errors are SovereigntyError subclasses wrapping that payload, so
 * the HTTP layer and callers can branch on `code` without string matching
 * on messages.
 */

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "CONFIGURATION.REDIRECT_TARGET"). */
  code: string;
  message: string;
  /** Whether re-reading state and retrying is expected to succeed. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class for every error thrown by the policy core. */
export class SovereigntyError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'SovereigntyError';
  }

  get code(): string {
    return this.typedError.code;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

/** Malformed rule or policy. Not retryable. */
export class ConfigurationError extends SovereigntyError {
  constructor(message: string, reason = 'INVALID', details?: Record<string, unknown>, fixes?: SuggestedFix[]) {
    super(
      createTypedError({
        code: `CONFIGURATION.${reason}`,
        message,
        retryable: false,
        details,
        suggestedFixes: fixes,
      }),
    );
    this.name = 'ConfigurationError';
  }
}

/** Request body or argument failed validation. */
export class ValidationError extends SovereigntyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'VALIDATION.SCHEMA', message, retryable: false, details }));
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends SovereigntyError {
  constructor(resourceType: string, resourceId: string) {
    super(
      createTypedError({
        code: 'VALIDATION.NOT_FOUND',
        message: `${resourceType} not found: ${resourceId}`,
        retryable: false,
        details: { resourceType, resourceId },
      }),
    );
    this.name = 'NotFoundError';
  }
}

/** Attempted an illegal lifecycle change. State is left untouched. */
export class InvalidStateTransitionError extends SovereigntyError {
  constructor(entity: string, from: string, to: string, validTargets: string[]) {
    super(
      createTypedError({
        code: 'STATE.INVALID_TRANSITION',
        message: `Invalid ${entity} state transition: ${from} -> ${to}`,
        retryable: false,
        details: { entity, from, to, validTargets },
      }),
    );
    this.name = 'InvalidStateTransitionError';
  }
}

/** Quota breach, kept distinct from validation failures. */
export class LimitExceededError extends SovereigntyError {
  constructor(resource: string, limit: number, tenantId: string) {
    super(
      createTypedError({
        code: 'LIMIT.EXCEEDED',
        message: `${resource} limit of ${limit} reached for tenant ${tenantId}`,
        retryable: false,
        details: { resource, limit, tenantId },
        suggestedFixes: [
          {
            type: 'DEACTIVATE_OR_RAISE_LIMIT',
            params: { limit },
            description: 'Remove unused entries or raise the configured ceiling.',
          },
        ],
      }),
    );
    this.name = 'LimitExceededError';
  }
}

/** Concurrent mutation detected by an optimistic version check. Re-read and re-evaluate. */
export class ConflictError extends SovereigntyError {
  constructor(resourceType: string, resourceId: string, expectedVersion: number, actualVersion: number) {
    super(
      createTypedError({
        code: 'CONFLICT.VERSION',
        message: `${resourceType} ${resourceId} was modified concurrently (expected version ${expectedVersion}, found ${actualVersion})`,
        retryable: true,
        details: { resourceType, resourceId, expectedVersion, actualVersion },
        suggestedFixes: [{ type: 'REREAD_AND_REEVALUATE', params: {} }],
      }),
    );
    this.name = 'ConflictError';
  }
}

/** A repository or health view could not be reached. Callers retry with backoff. */
export class DependencyUnavailableError extends SovereigntyError {
  constructor(dependency: string, cause?: unknown) {
    super(
      createTypedError({
        code: 'DEPENDENCY.UNAVAILABLE',
        message: `Dependency unavailable: ${dependency}`,
        retryable: true,
        details: {
          dependency,
          cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
        },
        suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 1000 } }],
      }),
    );
    this.name = 'DependencyUnavailableError';
  }
}

/** A decision could not be durably queued for audit. Always fatal. */
export class AuditEnqueueError extends SovereigntyError {
  constructor(kind: string, cause: unknown) {
    super(
      createTypedError({
        code: 'AUDIT.ENQUEUE_FAILED',
        message: `Failed to enqueue ${kind} audit record`,
        retryable: false,
        details: { kind, cause: cause instanceof Error ? cause.message : String(cause) },
      }),
    );
    this.name = 'AuditEnqueueError';
  }
}

// --- Typed error factories for non-thrown outcomes ---

export function authError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message,
    retryable: false,
  });
}

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

/** Routing found nothing usable. Returned alongside the decision, never thrown. */
export function noCompliantTargetError(jurisdiction: string, strategy: string): TypedError {
  return createTypedError({
    code: 'ROUTING.NO_COMPLIANT_TARGET',
    message: `No active deployment with an approved model is available in ${jurisdiction}`,
    retryable: false,
    details: { jurisdiction, strategy },
    suggestedFixes: [
      { type: 'APPROVE_MODEL', params: { jurisdiction }, description: 'Approve the model for this jurisdiction.' },
      { type: 'RESTORE_DEPLOYMENT', params: { jurisdiction }, description: 'Bring a deployment in this jurisdiction back to active.' },
    ],
  });
}

/**
 * Wrap an unknown failure from a collaborator. Typed errors pass through;
 * anything else becomes DependencyUnavailableError so nothing downstream
 * can mistake it for a decision.
 */
export function toSovereigntyError(err: unknown, dependency: string): SovereigntyError {
  if (err instanceof SovereigntyError) return err;
  return new DependencyUnavailableError(dependency, err);
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
