import { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

/**
 * Register the OpenAPI document and Swagger UI under /docs
 *
 * Must run before the routes are registered so they are collected.
 */
export async function registerDocs(app: FastifyInstance): Promise<void> {
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'pptx2pdf',
        description: 'Convert presentations to PDF with headless LibreOffice',
        version: '1.0.0',
      },
    },
  });
  await app.register(swaggerUi, { routePrefix: '/docs' });
}
