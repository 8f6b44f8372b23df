import dotenv from 'dotenv';
import Fastify, { FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import { healthRoutes } from './routes/health';
import { convertRoutes } from './routes/convert';
import { rootRoutes } from './routes/root';
import gatewayPlugin from './plugins/gateway';
import { registerDocs } from './plugins/docs';
import { loadConfig, validateConfig } from './config';
import { createErrorHandler } from './errors';
import { AppConfig } from './types';

// Load environment variables from .env file
dotenv.config();

/**
 * Build and configure the Fastify application
 * @param config - Process-wide settings, read once at startup
 * @returns Configured Fastify instance
 */
export async function build(config: AppConfig = loadConfig()): Promise<FastifyInstance> {
  validateConfig(config);

  const app = Fastify({
    logger: config.nodeEnv === 'test' ? false : { level: config.logLevel },
  });

  app.setErrorHandler(createErrorHandler(app, { exposeStack: config.nodeEnv !== 'production' }));

  await app.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
  });

  if (config.showDocs) {
    await registerDocs(app);
  }

  await app.register(gatewayPlugin, { config });

  // Register routes
  await app.register(rootRoutes);
  await app.register(healthRoutes);
  await app.register(convertRoutes);

  return app;
}

/**
 * Start the server if this file is run directly
 */
if (require.main === module) {
  const config = loadConfig();

  build(config)
    .then(async (app) => {
      try {
        await app.listen({
          port: config.port,
          host: '0.0.0.0', // Required for container deployments
        });

        app.log.info(`Environment: ${config.nodeEnv}`);
      } catch (err) {
        app.log.error(err);
        process.exit(1);
      }

      const shutdown = async (signal: string) => {
        app.log.info(`Received ${signal}, shutting down gracefully...`);
        await app.close();
        process.exit(0);
      };

      for (const signal of ['SIGTERM', 'SIGINT'] as const) {
        process.on(signal, () => {
          shutdown(signal).catch((err) => {
            app.log.error(err, 'Shutdown failed');
            process.exit(1);
          });
        });
      }
    })
    .catch((err) => {
      console.error('Failed to build application:', err);
      process.exit(1);
    });
}
