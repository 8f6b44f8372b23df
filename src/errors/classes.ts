import { ErrorCode } from './codes';
import { ErrorContext } from './types';
import { GatewayError } from './base';

// =============================================================================
// Request Errors (4xx)
// =============================================================================

/**
 * Missing or malformed upload, bad query parameter
 */
export class InvalidInputError extends GatewayError {
  readonly code: ErrorCode = ErrorCode.INVALID_INPUT;
  readonly statusCode: number = 400;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Uploaded file name does not carry a presentation extension
 */
export class UnsupportedFileTypeError extends InvalidInputError {
  readonly code: ErrorCode = ErrorCode.UNSUPPORTED_FILE_TYPE;

  constructor(extension: string, supported: readonly string[], context: ErrorContext = {}) {
    super(`Unsupported file type "${extension || '(none)'}"; expected one of ${supported.join(', ')}`, {
      ...context,
      extension,
    });
  }
}

/**
 * Upload exceeds the configured size limit
 */
export class PayloadTooLargeError extends InvalidInputError {
  readonly code: ErrorCode = ErrorCode.PAYLOAD_TOO_LARGE;
  readonly statusCode: number = 413;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

// =============================================================================
// Conversion Errors (502 - Bad Gateway, 504 on timeout)
// =============================================================================

/**
 * LibreOffice conversion failed
 */
export class ConversionError extends GatewayError {
  readonly code: ErrorCode = ErrorCode.CONVERSION_FAILED;
  readonly statusCode: number = 502;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Conversion failed: ${message}`, context);
  }
}

/**
 * LibreOffice did not exit within the timeout and was killed
 */
export class ConversionTimeoutError extends ConversionError {
  readonly code: ErrorCode = ErrorCode.CONVERSION_TIMEOUT;
  readonly statusCode: number = 504;

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super(`LibreOffice timed out after ${timeoutMs}ms`, { ...context, duration: timeoutMs });
  }
}

/**
 * LibreOffice exited cleanly but the expected PDF is absent
 */
export class ConversionOutputMissingError extends ConversionError {
  readonly code: ErrorCode = ErrorCode.CONVERSION_OUTPUT_MISSING;

  constructor(context: ErrorContext = {}) {
    super('LibreOffice exited without writing a PDF', context);
  }
}

/**
 * LibreOffice executable could not be located or started
 */
export class ConverterNotFoundError extends ConversionError {
  readonly code: ErrorCode = ErrorCode.CONVERTER_NOT_FOUND;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

// =============================================================================
// Parser Errors (502 - Bad Gateway)
// =============================================================================

/**
 * Downstream parser unreachable, failed, or answered with something other than JSON
 */
export class UpstreamError extends GatewayError {
  readonly code: ErrorCode = ErrorCode.UPSTREAM_ERROR;
  readonly statusCode: number = 502;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * No parser URL supplied by the request and none configured
 */
export class ParserNotConfiguredError extends UpstreamError {
  readonly code: ErrorCode = ErrorCode.PARSER_NOT_CONFIGURED;

  constructor(context: ErrorContext = {}) {
    super('Parser URL is not configured; set PARSER_URL or pass parser_url', context);
  }
}

// =============================================================================
// Internal Errors (500)
// =============================================================================

/**
 * Unexpected filesystem or process failure
 */
export class InternalError extends GatewayError {
  readonly code: ErrorCode = ErrorCode.INTERNAL_ERROR;
  readonly statusCode: number = 500;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Internal error: ${message}`, context);
  }
}
