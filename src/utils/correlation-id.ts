import { v4 as uuidv4 } from 'uuid';
import { FastifyRequest, FastifyReply } from 'fastify';

// One ID per request, shared by the route handler and the error handler
const assigned = new WeakMap<object, string>();

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Extract the caller's correlation ID from the request, or generate one
 */
export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers['x-correlation-id'];

  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0) {
    return headerValue[0];
  }

  let correlationId = assigned.get(request.raw);
  if (!correlationId) {
    correlationId = generateCorrelationId();
    assigned.set(request.raw, correlationId);
  }
  return correlationId;
}

/**
 * Add correlation ID to response headers
 */
export function setCorrelationId(reply: FastifyReply, correlationId: string): void {
  reply.header('x-correlation-id', correlationId);
}
