import { FastifyInstance, FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { GatewayError } from './base';
import { ErrorContext } from './types';
import { InvalidInputError, PayloadTooLargeError, InternalError } from './classes';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';

/**
 * Read the HTTP status Fastify and its plugins attach to their errors
 */
function fastifyStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return undefined;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' ? statusCode : undefined;
}

/**
 * Wrap any thrown value in the matching GatewayError class
 *
 * - GatewayError: returned with the extra context merged in
 * - Fastify 413 (multipart file/body limits): PayloadTooLargeError
 * - Other Fastify 4xx (schema validation, bad multipart body): InvalidInputError
 * - Anything else: InternalError
 */
export function wrapError(error: unknown, context: ErrorContext = {}): GatewayError {
  if (error instanceof GatewayError) {
    Object.assign(error.context, context);
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const statusCode = fastifyStatusCode(error);

  if (statusCode === 413) {
    return new PayloadTooLargeError(message, context);
  }
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return new InvalidInputError(message, { ...context, httpStatus: statusCode });
  }

  const wrapped = new InternalError(message, context);
  if (error instanceof Error && error.stack) {
    wrapped.stack = error.stack;
  }
  return wrapped;
}

/**
 * Create a Fastify error handler that answers with GatewayError responses
 *
 * 1. Extracts correlation ID from request
 * 2. Wraps foreign errors
 * 3. Logs with full context (warn for 4xx, error for 5xx)
 * 4. Returns structured API response
 */
export function createErrorHandler(app: FastifyInstance, options: { exposeStack: boolean }) {
  return (error: FastifyError | GatewayError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const gatewayError = wrapError(error, { correlationId });

    const logPayload = {
      correlationId,
      code: gatewayError.code,
      message: gatewayError.message,
      statusCode: gatewayError.statusCode,
      context: gatewayError.context,
      stack: gatewayError.stack,
    };
    if (gatewayError.statusCode >= 500) {
      app.log.error(logPayload, 'Request error');
    } else {
      app.log.warn(logPayload, 'Request rejected');
    }

    return reply
      .status(gatewayError.statusCode)
      .send(gatewayError.toApiResponse(correlationId, options.exposeStack));
  };
}
