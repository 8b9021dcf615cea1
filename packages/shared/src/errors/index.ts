/**
 * Error hierarchy for seqctl
 */

export type ErrorCategory =
  | 'CONFIGURATION'
  | 'KUBERNETES'
  | 'TRANSPORT'
  | 'READINESS'
  | 'CANCELLATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  group?: string;
  [key: string]: unknown;
}

/**
 * Base error class for seqctl
 */
export class SeqctlError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'SeqctlError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Malformed static input: empty group, bad selector, missing field.
 * Fatal and never retried.
 */
export class ConfigurationError extends SeqctlError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Transient failure talking to the cluster API
 */
export class TransportError extends SeqctlError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'TRANSPORT',
      severity: 'MEDIUM',
      retryable: true,
      statusCode,
      ...context,
    });
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }
}

export interface ResourceFailure {
  kind: string;
  name: string;
  namespace?: string;
  statusCode?: number;
  message: string;
}

/**
 * The cluster rejected one or more documents of a batch
 */
export class ApplyError extends SeqctlError {
  public readonly failures: ResourceFailure[];

  constructor(message: string, failures: ResourceFailure[] = [], context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'KUBERNETES',
      severity: 'HIGH',
      retryable: false,
      failureCount: failures.length,
      ...context,
    });
    this.name = 'ApplyError';
    this.failures = failures;
  }
}

/**
 * Readiness did not converge in time. Recorded, never fatal.
 */
export class ReadinessTimeoutError extends SeqctlError {
  public readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number, context: Partial<ErrorContext> = {}) {
    super(`Readiness not reached within ${timeoutSeconds}s`, 'E4001', {
      category: 'READINESS',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ReadinessTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
  }
}

/**
 * A readiness predicate reached a terminal failure (e.g. Job Failed condition)
 */
export class PredicateFailureError extends SeqctlError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4002', {
      category: 'READINESS',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'PredicateFailureError';
  }
}

export class CancellationError extends SeqctlError {
  constructor(message = 'Operation cancelled', context: Partial<ErrorContext> = {}) {
    super(message, 'E5001', {
      category: 'CANCELLATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'CancellationError';
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SeqctlError) {
    return error.context.retryable;
  }
  return false;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): SeqctlError {
  if (error instanceof SeqctlError) {
    return error;
  }

  if (error instanceof Error) {
    return new SeqctlError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new SeqctlError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
