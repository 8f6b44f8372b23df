import { FastifyInstance } from 'fastify';
import { HealthStatus, ReadinessStatus } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { resolveLibreOfficePath } from '../convert';
import { ConverterNotFoundError } from '../errors';

const healthSchema = {
  description: 'Liveness probe',
  response: {
    200: {
      type: 'object',
      properties: { status: { type: 'string', enum: ['ok'] } },
      required: ['status'],
    },
  },
};

const readinessBody = {
  type: 'object',
  properties: {
    ready: { type: 'boolean' },
    checks: {
      type: 'object',
      properties: { libreoffice: { type: 'boolean' } },
    },
    libreofficePath: { type: ['string', 'null'] },
    parserUrlConfigured: { type: 'boolean' },
    conversions: {
      type: 'object',
      properties: {
        activeJobs: { type: 'integer' },
        completedJobs: { type: 'integer' },
        failedJobs: { type: 'integer' },
        totalConversions: { type: 'integer' },
      },
    },
  },
};

const readinessSchema = {
  description: 'Readiness probe: LibreOffice must be resolvable',
  response: {
    200: readinessBody,
    503: readinessBody,
  },
};

/**
 * Health check routes
 */
export async function healthRoutes(app: FastifyInstance): Promise<void> {
  /**
   * GET /healthz - Liveness probe
   * Always returns 200 if the service is running
   */
  app.get<{ Reply: HealthStatus }>('/healthz', { schema: healthSchema }, async (request, reply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);
    return reply.code(200).send({ status: 'ok' });
  });

  /**
   * GET /readyz - Readiness probe
   * Returns 200 when the LibreOffice executable resolves, 503 otherwise
   */
  app.get<{ Reply: ReadinessStatus }>('/readyz', { schema: readinessSchema }, async (request, reply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    let libreofficePath: string | null = null;
    try {
      libreofficePath = await resolveLibreOfficePath({ explicitPath: app.config.libreOfficePath });
    } catch (error) {
      if (!(error instanceof ConverterNotFoundError)) {
        throw error;
      }
      request.log.warn({ correlationId, error: error.message }, 'LibreOffice not available');
    }

    const status: ReadinessStatus = {
      ready: libreofficePath !== null,
      checks: { libreoffice: libreofficePath !== null },
      libreofficePath,
      parserUrlConfigured: Boolean(app.config.parserUrl),
      conversions: app.converter.getStats(),
    };

    return reply.code(status.ready ? 200 : 503).send(status);
  });
}
