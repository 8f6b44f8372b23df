import { FastifyInstance } from 'fastify';
import { ServiceInfo } from '../types';

export const SERVICE_NAME = 'pptx2pdf';

const ENDPOINTS = [
  'GET /healthz',
  'GET /readyz',
  'POST /convert',
  'POST /convert_multipart',
  'POST /convert_and_parse',
];

/**
 * GET / - service name and the routes it offers
 */
export async function rootRoutes(app: FastifyInstance): Promise<void> {
  app.get<{ Reply: ServiceInfo }>('/', async () => {
    const endpoints = app.config.showDocs ? [...ENDPOINTS, 'GET /docs'] : ENDPOINTS;
    return { service: SERVICE_NAME, endpoints };
  });
}
