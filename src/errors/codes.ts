/**
 * Structured error codes for programmatic error handling
 *
 * Categories:
 * - INVALID_* / UNSUPPORTED_* / PAYLOAD_* : request errors
 * - CONVERSION_* / CONVERTER_*            : LibreOffice conversion errors
 * - UPSTREAM_* / PARSER_*                 : downstream parser errors
 * - INTERNAL_*                            : internal server errors
 */
export enum ErrorCode {
  // Request errors (4xx)
  INVALID_INPUT = 'INVALID_INPUT',
  UNSUPPORTED_FILE_TYPE = 'UNSUPPORTED_FILE_TYPE',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',

  // Conversion errors (502/504)
  CONVERSION_FAILED = 'CONVERSION_FAILED',
  CONVERSION_TIMEOUT = 'CONVERSION_TIMEOUT',
  CONVERSION_OUTPUT_MISSING = 'CONVERSION_OUTPUT_MISSING',
  CONVERTER_NOT_FOUND = 'CONVERTER_NOT_FOUND',

  // Parser errors (502)
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
  PARSER_NOT_CONFIGURED = 'PARSER_NOT_CONFIGURED',

  // Internal errors (500)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
