import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import type { FastifyInstance } from 'fastify';
import { build } from '../src/server';
import { generateCorrelationId } from '../src/utils/correlation-id';
import { testConfig } from './helpers/fake-soffice';
import { uploadPayload } from './helpers/multipart';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

describe('Correlation ID', () => {
  describe('generateCorrelationId', () => {
    it('should generate a valid UUID v4 format', () => {
      expect(generateCorrelationId()).toMatch(UUID_V4);
    });

    it('should generate lowercase UUIDs', () => {
      const correlationId = generateCorrelationId();
      expect(correlationId).toBe(correlationId.toLowerCase());
    });

    it('should generate multiple unique IDs in succession', () => {
      const ids = new Set<string>();
      for (let i = 0; i < 100; i++) {
        ids.add(generateCorrelationId());
      }
      expect(ids.size).toBe(100);
    });
  });

  describe('getCorrelationId', () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = await build(testConfig());
      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it('should extract correlation ID from string header', async () => {
      const customId = '12345678-1234-4567-89ab-123456789012';

      const response = await app.inject({
        method: 'GET',
        url: '/healthz',
        headers: { 'x-correlation-id': customId },
      });

      expect(response.headers['x-correlation-id']).toBe(customId);
    });

    it('should generate a new ID per request when none is sent', async () => {
      const first = await app.inject({ method: 'GET', url: '/healthz' });
      const second = await app.inject({ method: 'GET', url: '/healthz' });

      expect(first.headers['x-correlation-id']).toMatch(UUID_V4);
      expect(second.headers['x-correlation-id']).toMatch(UUID_V4);
      expect(first.headers['x-correlation-id']).not.toBe(second.headers['x-correlation-id']);
    });

    it('should report the caller ID in error responses', async () => {
      const upload = uploadPayload('notes.txt', 'plain text');

      const response = await app.inject({
        method: 'POST',
        url: '/convert',
        payload: upload.payload,
        headers: { ...upload.headers, 'x-correlation-id': 'error-trace-id' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.headers['x-correlation-id']).toBe('error-trace-id');
      expect(response.json()).toMatchObject({
        correlationId: 'error-trace-id',
        context: { correlationId: 'error-trace-id', filename: 'notes.txt', extension: '.txt' },
      });
    });

    it('should use the same generated ID in the header and the error body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/convert',
        payload: { file: 'deck.pptx' },
      });

      const correlationId = response.headers['x-correlation-id'];
      expect(correlationId).toMatch(UUID_V4);
      expect(response.json().correlationId).toBe(correlationId);
    });
  });
});
