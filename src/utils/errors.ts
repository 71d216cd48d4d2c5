/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request - missing or malformed uploads
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * 404 Not Found
 */
export class NotFoundError extends AppError {
  constructor(message = 'Not found', code = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends AppError {
  constructor(message = 'Internal server error', code = 'INTERNAL_ERROR') {
    super(message, 500, code, false);
  }
}

/**
 * Workflow template is unreadable or lacks a required node.
 * A deployment problem rather than a request problem.
 */
export class WorkflowTemplateError extends InternalError {
  constructor(message: string) {
    super(message, 'WORKFLOW_TEMPLATE_ERROR');
  }
}

/**
 * Anything the merge pipeline throws that is not one of its reported outcomes.
 * Always answered as a blanket 500 carrying the underlying message.
 */
export class MergeFailedError extends InternalError {
  public readonly failure: unknown;

  constructor(failure: unknown) {
    super(failure instanceof Error ? failure.message : String(failure), 'MERGE_FAILED');
    this.failure = failure;
  }
}

/**
 * External API error (generation service, background removal, etc.)
 */
export class ExternalApiError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(
    service: string,
    message: string,
    originalError?: Error,
    code = 'EXTERNAL_API_ERROR',
    statusCode = 502
  ) {
    super(`${service}: ${message}`, statusCode, code);
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * Network failure or non-2xx response from an upstream service
 */
export class UpstreamTransportError extends ExternalApiError {
  public readonly status?: number;

  constructor(service: string, message: string, options: { status?: number; originalError?: Error } = {}) {
    super(service, message, options.originalError, 'UPSTREAM_TRANSPORT_ERROR');
    this.status = options.status;
  }
}

/**
 * Upstream answered, but not with the shape we rely on
 */
export class UpstreamProtocolError extends ExternalApiError {
  constructor(service: string, message: string, originalError?: Error) {
    super(service, message, originalError, 'UPSTREAM_PROTOCOL_ERROR');
  }
}

/**
 * Completion event did not arrive before the deadline
 */
export class CompletionTimeoutError extends ExternalApiError {
  public readonly jobId: string;
  public readonly timeoutMs: number;

  constructor(service: string, jobId: string, timeoutMs: number) {
    super(
      service,
      `No completion event for job ${jobId} within ${timeoutMs}ms`,
      undefined,
      'COMPLETION_TIMEOUT',
      504
    );
    this.jobId = jobId;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Waiting for a completion event was aborted by the caller
 */
export class CompletionCancelledError extends ExternalApiError {
  public readonly jobId: string;

  constructor(service: string, jobId: string) {
    super(service, `Wait for job ${jobId} was cancelled`, undefined, 'COMPLETION_CANCELLED', 503);
    this.jobId = jobId;
  }
}
