/**
 * Error Handling Module
 *
 * ```typescript
 * import { UnsupportedFileTypeError, wrapError } from './errors';
 *
 * throw new UnsupportedFileTypeError('.docx', SUPPORTED_EXTENSIONS, { correlationId });
 *
 * const gatewayError = wrapError(error, { correlationId });
 * ```
 */

export { ErrorCode } from './codes';

export type { ErrorContext, ApiErrorResponse } from './types';

export { GatewayError } from './base';

export {
  // Request errors
  InvalidInputError,
  UnsupportedFileTypeError,
  PayloadTooLargeError,
  // Conversion errors
  ConversionError,
  ConversionTimeoutError,
  ConversionOutputMissingError,
  ConverterNotFoundError,
  // Parser errors
  UpstreamError,
  ParserNotConfiguredError,
  // Internal errors
  InternalError,
} from './classes';

export { wrapError, createErrorHandler } from './handler';
