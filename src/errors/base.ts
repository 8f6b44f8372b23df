import { ErrorCode } from './codes';
import { ErrorContext, ApiErrorResponse } from './types';

/**
 * Base error class for all gateway errors
 *
 * Carries an error code for programmatic handling, the HTTP status code
 * to answer with, and context for logging.
 */
export abstract class GatewayError extends Error {
  abstract readonly code: ErrorCode;

  abstract readonly statusCode: number;

  readonly context: ErrorContext;

  /** ISO 8601 timestamp when error occurred */
  readonly timestamp: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for API response
   *
   * @param correlationId - Request correlation ID for tracing
   * @param includeStack - Attach the stack trace (disabled in production)
   */
  toApiResponse(correlationId: string, includeStack = false): ApiErrorResponse {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      correlationId,
      timestamp: this.timestamp,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      stack: includeStack ? this.stack : undefined,
    };
  }
}
