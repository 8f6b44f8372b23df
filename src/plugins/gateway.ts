import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { AppConfig } from '../types';
import { LibreOfficeConverter } from '../convert';
import { ParserClient } from '../parser';

/**
 * Fastify plugin that wires the conversion services from configuration
 */

declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
    converter: LibreOfficeConverter;
    parserClient: ParserClient;
  }
}

interface GatewayPluginOptions {
  config: AppConfig;
}

async function gatewayPlugin(fastify: FastifyInstance, options: GatewayPluginOptions): Promise<void> {
  const { config } = options;

  const converter = new LibreOfficeConverter({
    libreOfficePath: config.libreOfficePath,
    timeout: config.conversionTimeout,
    workdir: config.conversionWorkdir,
  });
  const parserClient = new ParserClient({
    fileField: config.parserFileField,
    timeout: config.parserTimeout,
  });

  if (!config.parserUrl) {
    fastify.log.warn('PARSER_URL not set - /convert_and_parse requires a parser_url per request');
  }

  fastify.decorate('config', config);
  fastify.decorate('converter', converter);
  fastify.decorate('parserClient', parserClient);
}

export default fp(gatewayPlugin, {
  name: 'gateway',
  fastify: '4.x',
});
