/**
 * Custom error hierarchy for RemedyOps
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'AUTHORIZATION'
  | 'COLLABORATOR'
  | 'VERIFICATION'
  | 'DATABASE'
  | 'STATE_MACHINE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  incidentId?: string;
  [key: string]: unknown;
}

/**
 * Base error class for RemedyOps
 */
export class RemedyOpsError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'RemedyOpsError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Validation errors (bad action, unknown incident, malformed input)
 */
export class ValidationError extends RemedyOpsError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Actor's role is below the level the incident's approval severity requires
 */
export class AuthorizationError extends RemedyOpsError {
  public readonly requiredRole: string;
  public readonly actorRole: string | null;

  constructor(requiredRole: string, actorRole: string | null, context: Partial<ErrorContext> = {}) {
    super(
      `Insufficient role: ${actorRole ?? 'unregistered'} cannot perform this action, minimum required role is ${requiredRole}`,
      'E1002',
      {
        category: 'AUTHORIZATION',
        severity: 'LOW',
        retryable: false,
        ...context,
      }
    );
    this.name = 'AuthorizationError';
    this.requiredRole = requiredRole;
    this.actorRole = actorRole;
  }
}

/**
 * External collaborator failures (reasoning engine, sandbox, speech, remote safety)
 */
export class TransientCollaboratorError extends RemedyOpsError {
  public readonly collaborator: string;

  constructor(collaborator: string, message: string, context: Partial<ErrorContext> = {}) {
    super(`${collaborator}: ${message}`, 'E2001', {
      category: 'COLLABORATOR',
      severity: 'MEDIUM',
      retryable: true,
      ...context,
    });
    this.name = 'TransientCollaboratorError';
    this.collaborator = collaborator;
  }
}

export class ReasoningEngineError extends TransientCollaboratorError {
  public readonly reason: string;

  constructor(message: string, reason: string, context: Partial<ErrorContext> = {}) {
    super('reasoning-engine', message, context);
    this.name = 'ReasoningEngineError';
    this.reason = reason;
  }
}

/**
 * Apply-and-verify ran out of health attempts
 */
export class RetryExhaustedError extends RemedyOpsError {
  public readonly attempts: number;
  public readonly lastError: string;

  constructor(attempts: number, lastError: string, context: Partial<ErrorContext> = {}) {
    super(`Fix applied but still unhealthy after ${attempts} attempts: ${lastError}`, 'E4001', {
      category: 'VERIFICATION',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * State machine errors
 */
export class StateMachineError extends RemedyOpsError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'STATE_MACHINE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'StateMachineError';
  }
}

export class InvalidTransitionError extends StateMachineError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5001', {
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

export class InvariantViolationError extends StateMachineError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E5002', {
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'InvariantViolationError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends RemedyOpsError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Database errors
 */
export class DatabaseError extends RemedyOpsError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E7001', {
      category: 'DATABASE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'DatabaseError';
  }
}

/**
 * Map an error onto the HTTP status the API answers with
 */
export function httpStatusForError(error: unknown): number {
  if (error instanceof ValidationError) {
    return error.context.notFound === true ? 404 : 400;
  }
  if (error instanceof AuthorizationError) return 403;
  if (error instanceof StateMachineError) return 409;
  return 500;
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
