import { performance } from 'node:perf_hooks';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { isErrorPayload, statusForPayload } from '../errors.js';
import { logger } from '../middleware/logger.js';
import type { Endpoint } from '../providers/base.js';
import type { OpenAIRequest } from '../schemas/request.js';
import type { AdapterManager } from '../services/adapter-manager.js';
import { recordAudit, type AuditSink } from '../services/audit.js';
import type { ClientAuthenticator } from '../services/client-auth.js';
import type { ModelCatalog } from '../services/model-catalog.js';
import { sendEventStream, toSseRecords, type StreamSummary } from './stream.js';

export interface RouteDeps {
  manager: AdapterManager;
  catalog: ModelCatalog;
  authenticator: ClientAuthenticator;
  auditSink: AuditSink;
}

export interface ProxyRoute<T extends OpenAIRequest> {
  endpoint: Endpoint;
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** Whether `stream: true` is honoured on this endpoint. */
  streamable: boolean;
}

/** Aborts when the client connection closes before the response is written. */
function clientAbortSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * Validates the body, maps the model, runs the call through the adapter manager
 * and writes JSON or SSE back. Validation failures throw and are rendered by the
 * server's error handler.
 */
export async function handleProxy<T extends OpenAIRequest>(
  request: FastifyRequest,
  reply: FastifyReply,
  deps: RouteDeps,
  route: ProxyRoute<T>
): Promise<FastifyReply> {
  const started = performance.now();
  const body = route.schema.parse(request.body);
  const model = deps.catalog.resolve(body.model);
  const upstreamRequest: OpenAIRequest = { ...body, model };
  const stream = route.streamable && 'stream' in body && body.stream === true;

  logger.info({
    requestId: request.id,
    endpoint: route.endpoint,
    model,
    stream,
  }, 'Proxy request');

  const options = { headers: request.headers, signal: clientAbortSignal(reply) };
  const audit = (statusCode: number, response: unknown) =>
    recordAudit(deps.auditSink, {
      requestId: request.id,
      endpoint: route.endpoint,
      model,
      stream,
      statusCode,
      durationMs: Math.round(performance.now() - started),
      clientKeyId: request.client?.keyId,
      request: body,
      response,
    });

  if (stream) {
    const summary: StreamSummary = { chunks: 0 };
    const events = deps.manager.processStreamRequest(route.endpoint, 'POST', upstreamRequest, options);

    async function* records(): AsyncGenerator<string, void, undefined> {
      try {
        yield* toSseRecords(events, summary);
      } finally {
        logger.info({
          requestId: request.id,
          chunks: summary.chunks,
          failed: summary.error !== undefined,
        }, 'Stream finished');
        await audit(200, summary.error ?? { chunks: summary.chunks });
      }
    }

    return sendEventStream(reply, records());
  }

  const result = await deps.manager.processRequest(route.endpoint, 'POST', upstreamRequest, options);
  const statusCode = isErrorPayload(result) ? statusForPayload(result) : 200;

  logger.info({ requestId: request.id, statusCode }, 'Proxy response');
  await audit(statusCode, result);

  return reply.code(statusCode).send(result);
}
