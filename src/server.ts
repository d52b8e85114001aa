import { pathToFileURL } from 'node:url';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { loadConfig, type GatewayConfig } from './config.js';
import { GatewayError, type ErrorPayload } from './errors.js';
import { logger } from './middleware/logger.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { REQUEST_ID_HEADER, generateRequestId, requestIdMiddleware } from './middleware/request-id.js';
import { createDefaultRegistry } from './providers/index.js';
import { chatRoutes } from './routes/chat.js';
import { completionRoutes } from './routes/completions.js';
import { embeddingRoutes } from './routes/embeddings.js';
import { healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';
import { modelRoutes } from './routes/models.js';
import type { RouteDeps } from './routes/proxy.js';
import { AdapterManager } from './services/adapter-manager.js';
import { LoggerAuditSink, type AuditSink } from './services/audit.js';
import { StaticKeyAuthenticator, type ClientAuthenticator } from './services/client-auth.js';
import { ModelCatalog } from './services/model-catalog.js';

export interface BuildServerOptions {
  config?: GatewayConfig;
  manager?: AdapterManager;
  catalog?: ModelCatalog;
  authenticator?: ClientAuthenticator;
  auditSink?: AuditSink;
  /** Transport used by the default adapter registry. */
  fetchImpl?: typeof fetch;
}

function zodPayload(error: ZodError): ErrorPayload {
  const issue = error.issues[0];
  const param = issue?.path.join('.');
  return {
    error: {
      message: error.issues
        .map((entry) => (entry.path.length > 0 ? `${entry.path.join('.')}: ${entry.message}` : entry.message))
        .join('; '),
      type: 'invalid_request_error',
      code: null,
      ...(param ? { param } : {}),
    },
  };
}

function isFastifyClientError(error: FastifyError): boolean {
  return typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500;
}

function createManager(config: GatewayConfig, fetchImpl?: typeof fetch): AdapterManager {
  const manager = new AdapterManager(createDefaultRegistry({ fetchImpl }));
  if (!manager.initialize(config.provider.type, config.provider)) {
    logger.warn({ platform: config.provider.type }, 'Starting without an active platform adapter');
  }
  return manager;
}

async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();

  const deps: RouteDeps = {
    manager: options.manager ?? createManager(config, options.fetchImpl),
    catalog: options.catalog ?? new ModelCatalog(config.models),
    authenticator: options.authenticator ?? new StaticKeyAuthenticator(config.clientApiKeys),
    auditSink: options.auditSink ?? new LoggerAuditSink(),
  };

  const server = Fastify({
    logger: false,
    disableRequestLogging: true,
    requestIdHeader: REQUEST_ID_HEADER,
    genReqId: (request) => generateRequestId(request.headers[REQUEST_ID_HEADER]),
  });

  await server.register(cors);

  server.addHook('onRequest', requestIdMiddleware);
  server.addHook('onRequest', metricsMiddleware);

  await server.register((instance) => healthRoutes(instance, deps.manager));
  await server.register(metricsRoutes);
  await server.register((instance) => modelRoutes(instance, deps));
  await server.register((instance) => chatRoutes(instance, deps));
  await server.register((instance) => completionRoutes(instance, deps));
  await server.register((instance) => embeddingRoutes(instance, deps));

  server.setNotFoundHandler((request, reply) => {
    reply.code(404).send({
      error: {
        message: `Route ${request.method} ${request.url} not found`,
        type: 'invalid_request_error',
        code: 'not_found',
      },
    });
  });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      logger.warn({ requestId: request.id, issues: error.issues.length }, 'Request validation failed');
      reply.code(400).send(zodPayload(error));
      return;
    }

    if (error instanceof GatewayError) {
      const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
      log({ requestId: request.id, type: error.type, error: error.message }, 'Request failed');
      reply.code(error.statusCode).send(error.toPayload());
      return;
    }

    if (isFastifyClientError(error)) {
      logger.warn({ requestId: request.id, code: error.code, error: error.message }, 'Malformed request');
      reply.code(error.statusCode ?? 400).send({
        error: { message: error.message, type: 'invalid_request_error', code: error.code ?? null },
      });
      return;
    }

    logger.error({
      requestId: request.id,
      error: error.message,
      stack: error.stack,
    }, 'Request error');

    reply.code(500).send({
      error: { message: 'Internal server error', type: 'server_error', code: null },
    });
  });

  return server;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const server = await buildServer({ config });

  logger.info({ port: config.port, host: config.host, platform: config.provider.type }, 'Starting server');

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.error({ error: err }, 'Server failed to start');
    process.exit(1);
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Unhandled startup failure');
    process.exit(1);
  });
}

export { buildServer };
