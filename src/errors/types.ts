import { ErrorCode } from './codes';

/**
 * Context information attached to errors for debugging and logging
 */
export interface ErrorContext {
  /** Request correlation ID for distributed tracing */
  correlationId?: string;
  /** Uploaded file name */
  filename?: string;
  /** File size in bytes */
  fileSize?: number;
  /** Processing duration in milliseconds */
  duration?: number;
  /** Parser URL the PDF was posted to */
  parserUrl?: string;
  /** HTTP status code from upstream service */
  httpStatus?: number;
  /** LibreOffice process exit code */
  exitCode?: number;
  /** Signal that terminated the LibreOffice process */
  signal?: string;
  /** Allow additional context fields */
  [key: string]: unknown;
}

/**
 * Structured error response returned by the API
 */
export interface ApiErrorResponse {
  /** Error class name (e.g., "UnsupportedFileTypeError") */
  error: string;
  code: ErrorCode;
  message: string;
  statusCode: number;
  correlationId: string;
  /** ISO 8601 timestamp when error occurred */
  timestamp: string;
  context?: ErrorContext;
  /** Stack trace, omitted in production */
  stack?: string;
}
