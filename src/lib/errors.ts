/**
 * Failure taxonomy shared by the API client and the batch orchestrator.
 */
export enum FailureKind {
  /** Retryable upstream condition; only seen while attempts remain */
  TRANSIENT = 'TRANSIENT',
  /** Bad identifier or credentials; never retried */
  PERMANENT = 'PERMANENT',
  /** A transient condition that survived every attempt */
  RETRIES_EXHAUSTED = 'RETRIES_EXHAUSTED',
  CANCELLED = 'CANCELLED',
}

export enum FailureReason {
  RATE_LIMITED = 'RATE_LIMITED',
  SERVER_ERROR = 'SERVER_ERROR',
  TIMEOUT = 'TIMEOUT',
  NETWORK = 'NETWORK',
  INVALID_IDENTIFIER = 'INVALID_IDENTIFIER',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  RUN_CANCELLED = 'RUN_CANCELLED',
}

export interface AnalysisFailure {
  kind: FailureKind;
  reason: FailureReason;
  message: string;
  status?: number;
  attempts?: number;
}

export class SpApiError extends Error {
  constructor(
    public kind: FailureKind,
    public reason: FailureReason,
    message: string,
    public status?: number,
    public attempts?: number
  ) {
    super(message);
    this.name = 'SpApiError';
  }

  get isTransient(): boolean {
    return this.kind === FailureKind.TRANSIENT;
  }

  toFailure(): AnalysisFailure {
    const failure: AnalysisFailure = { kind: this.kind, reason: this.reason, message: this.message };
    if (this.status !== undefined) failure.status = this.status;
    if (this.attempts !== undefined) failure.attempts = this.attempts;
    return failure;
  }
}

/** Raised before a batch starts; the only failures that escape analyzeProducts. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function cancelledError(message = 'Run cancelled'): SpApiError {
  return new SpApiError(FailureKind.CANCELLED, FailureReason.RUN_CANCELLED, message);
}

export function transientError(reason: FailureReason, message: string, status?: number): SpApiError {
  return new SpApiError(FailureKind.TRANSIENT, reason, message, status);
}

export function permanentError(reason: FailureReason, message: string, status?: number): SpApiError {
  return new SpApiError(FailureKind.PERMANENT, reason, message, status);
}

/**
 * Maps an upstream HTTP status to a failure. 429, 5xx and 408 are transient;
 * every other non-2xx status is permanent.
 */
export function errorFromStatus(status: number, message: string): SpApiError {
  if (status === 429) return transientError(FailureReason.RATE_LIMITED, message, status);
  if (status === 408) return transientError(FailureReason.TIMEOUT, message, status);
  if (status >= 500 && status < 600) return transientError(FailureReason.SERVER_ERROR, message, status);
  if (status === 401 || status === 403) return permanentError(FailureReason.UNAUTHORIZED, message, status);
  if (status === 404) return permanentError(FailureReason.NOT_FOUND, message, status);
  if (status === 400) return permanentError(FailureReason.INVALID_IDENTIFIER, message, status);
  return permanentError(FailureReason.MALFORMED_RESPONSE, message, status);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Converts anything thrown inside one identifier's pipeline into a failure record. */
export function toFailure(err: unknown): AnalysisFailure {
  if (err instanceof SpApiError) return err.toFailure();
  return {
    kind: FailureKind.PERMANENT,
    reason: FailureReason.MALFORMED_RESPONSE,
    message: errorMessage(err),
  };
}
