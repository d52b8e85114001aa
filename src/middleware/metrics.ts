/**
 * Prometheus metrics for the gateway's HTTP surface and its upstream calls.
 */

import client from 'prom-client';
import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';
import type { Usage } from '../schemas/request.js';

const register = new client.Registry();

client.collectDefaultMetrics({ register });

const httpRequestDuration = new client.Histogram({
  name: 'llm_gateway_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5, 10],
  registers: [register],
});

const httpRequestTotal = new client.Counter({
  name: 'llm_gateway_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

const upstreamLatency = new client.Histogram({
  name: 'llm_gateway_upstream_latency_seconds',
  help: 'Duration of upstream provider calls in seconds',
  labelNames: ['provider', 'endpoint', 'status'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120, 300],
  registers: [register],
});

const tokensUsed = new client.Counter({
  name: 'llm_gateway_tokens_total',
  help: 'Tokens reported by upstream providers',
  labelNames: ['provider', 'model', 'type'],
  registers: [register],
});

const streamChunks = new client.Counter({
  name: 'llm_gateway_stream_chunks_total',
  help: 'Normalized chunks written to streaming responses',
  labelNames: ['provider'],
  registers: [register],
});

const streamErrors = new client.Counter({
  name: 'llm_gateway_stream_errors_total',
  help: 'Streaming responses that ended with an error record',
  labelNames: ['provider', 'type'],
  registers: [register],
});

export function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = Date.now();

  reply.raw.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const route = request.routeOptions.url ?? request.url;
    const labels = {
      method: request.method,
      route,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, duration);
    httpRequestTotal.inc(labels);
  });

  done();
}

/** `status` is the upstream HTTP status, or the error type when none came back. */
export function trackUpstreamRequest(
  provider: string,
  endpoint: string,
  status: string,
  durationSeconds: number
): void {
  upstreamLatency.observe({ provider, endpoint, status }, durationSeconds);
}

export function trackTokens(provider: string, model: string, usage: Usage): void {
  tokensUsed.inc({ provider, model, type: 'prompt' }, usage.prompt_tokens);
  tokensUsed.inc({ provider, model, type: 'completion' }, usage.completion_tokens);
}

export function trackStreamChunk(provider: string): void {
  streamChunks.inc({ provider });
}

export function trackStreamError(provider: string, type: string): void {
  streamErrors.inc({ provider, type });
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}

export { register };
