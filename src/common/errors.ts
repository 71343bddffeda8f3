export type ErrorCode =
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'NOT_PUBLISHED'
  | 'INVALID_STATE_TRANSITION'
  | 'ATTEMPT_EXPIRED'
  | 'INVALID_REFERENCE'
  | 'VALIDATION_FAILED'
  | 'UNAUTHENTICATED'
  | 'TENANT_SCOPE';

export class DomainError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly statusCode: number,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toResponse() {
    return { error: this.message, code: this.code, ...this.details };
  }
}

export class NotFoundError extends DomainError {
  constructor() {
    super('Not found', 'NOT_FOUND', 404);
  }
}

/**
 * Rendered exactly like {@link NotFoundError} so callers cannot tell a denied
 * course from one that does not exist.
 */
export class AccessDeniedError extends NotFoundError {}

export class ForbiddenError extends DomainError {
  constructor(message = 'Forbidden') {
    super(message, 'FORBIDDEN', 403);
  }
}

export class NotPublishedError extends DomainError {
  constructor(assessmentId: string) {
    super('Assessment is not published', 'NOT_PUBLISHED', 409, { assessmentId });
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(message = 'Attempt is already completed') {
    super(message, 'INVALID_STATE_TRANSITION', 409);
  }
}

export class AttemptExpiredError extends DomainError {
  constructor(attemptId: string, score: number | null) {
    super('Attempt time limit exceeded', 'ATTEMPT_EXPIRED', 409, { attemptId, score });
  }
}

export class InvalidReferenceError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_REFERENCE', 400);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_FAILED', 400);
  }
}

export class AuthError extends DomainError {
  constructor(message: string, statusCode = 401) {
    super(message, 'UNAUTHENTICATED', statusCode);
  }
}

export class TenantError extends DomainError {
  constructor(message: string, statusCode = 400) {
    super(message, 'TENANT_SCOPE', statusCode);
  }
}
