import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { FastifyRequest, FastifyReply } from 'fastify';
import type { MetricValueWithName } from 'prom-client';
import {
  metricsMiddleware,
  trackUpstreamRequest,
  trackTokens,
  trackStreamChunk,
  trackStreamError,
  getMetrics,
  getContentType,
  register,
} from '../../../src/middleware/metrics.js';

async function counterValues(name: string): Promise<MetricValueWithName<string>[]> {
  const metric = register.getSingleMetric(name);
  if (!metric) throw new Error(`metric ${name} not registered`);
  return (await metric.get()).values;
}

describe('metrics', () => {
  beforeEach(() => {
    register.resetMetrics();
  });

  it('exposes the gateway metric families', async () => {
    const metrics = await getMetrics();

    expect(metrics).toContain('# TYPE llm_gateway_http_requests_total counter');
    expect(metrics).toContain('# TYPE llm_gateway_upstream_latency_seconds histogram');
    expect(metrics).toContain('# TYPE llm_gateway_stream_chunks_total counter');
  });

  it('uses the Prometheus text content type', () => {
    expect(getContentType()).toContain('text/plain');
  });

  it('splits token usage into prompt and completion', async () => {
    trackTokens('anthropic', 'claude-test', { prompt_tokens: 12, completion_tokens: 30, total_tokens: 42 });

    const values = await counterValues('llm_gateway_tokens_total');
    expect(values).toContainEqual({ value: 12, labels: { provider: 'anthropic', model: 'claude-test', type: 'prompt' } });
    expect(values).toContainEqual({ value: 30, labels: { provider: 'anthropic', model: 'claude-test', type: 'completion' } });
  });

  it('counts stream chunks and stream errors per provider', async () => {
    trackStreamChunk('coze');
    trackStreamChunk('coze');
    trackStreamError('coze', 'platform_error');

    expect(await counterValues('llm_gateway_stream_chunks_total')).toEqual([
      { value: 2, labels: { provider: 'coze' } },
    ]);
    expect(await counterValues('llm_gateway_stream_errors_total')).toEqual([
      { value: 1, labels: { provider: 'coze', type: 'platform_error' } },
    ]);
  });

  it('records upstream latency observations', async () => {
    trackUpstreamRequest('openai', '/chat/completions', '200', 1.5);

    const values = await counterValues('llm_gateway_upstream_latency_seconds');
    const count = values.find((entry) => entry.metricName === 'llm_gateway_upstream_latency_seconds_count');
    expect(count?.value).toBe(1);
    expect(count?.labels).toEqual({ provider: 'openai', endpoint: '/chat/completions', status: '200' });
  });

  describe('metricsMiddleware', () => {
    it('calls done and observes the request when the reply finishes', async () => {
      let onFinish: (() => void) | undefined;
      const request = { method: 'GET', url: '/health', routeOptions: { url: '/health' } } as unknown as FastifyRequest;
      const reply = {
        raw: {
          on: vi.fn((event: string, listener: () => void) => {
            if (event === 'finish') onFinish = listener;
          }),
        },
        statusCode: 200,
      } as unknown as FastifyReply;
      const done = vi.fn();

      metricsMiddleware(request, reply, done);
      expect(done).toHaveBeenCalledOnce();

      onFinish?.();
      expect(await counterValues('llm_gateway_http_requests_total')).toEqual([
        { value: 1, labels: { method: 'GET', route: '/health', status_code: '200' } },
      ]);
    });
  });
});
