import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import {
  ConfigurationError,
  UpstreamHTTPError,
  ValidationError,
  isErrorPayload,
  toGatewayError,
  type ErrorPayload,
  type GatewayError,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../middleware/logger.js';
import {
  trackStreamChunk,
  trackStreamError,
  trackTokens,
  trackUpstreamRequest,
} from '../middleware/metrics.js';
import type { Endpoint, ModelInfo, ProviderAdapter } from '../providers/base.js';
import { createDefaultRegistry, type AdapterRegistry } from '../providers/registry.js';
import {
  ProviderConfigSchema,
  type ProviderConfigInput,
  type ProviderType,
} from '../schemas/config.js';
import { isJsonObject, type JsonObject, type OpenAIRequest, type Usage } from '../schemas/request.js';
import type { HttpMethod, InboundHeaders } from './provider-client.js';
import {
  StreamNormalizer,
  buildChunk,
  normalizeStream,
  type StreamEvent,
  type StreamIdentity,
  type StreamInterpreter,
} from './stream-normalizer.js';

type InterpreterFactory = (identity: StreamIdentity, options: { signal?: AbortSignal }) => StreamInterpreter;

export type ManagerState = 'uninitialized' | 'initialized' | 'active';

export interface ProcessOptions {
  headers?: InboundHeaders;
  /** Fires when the inbound client goes away. */
  signal?: AbortSignal;
}

const INVALID_RESPONSE: ErrorPayload = {
  error: {
    message: 'Invalid response from platform',
    type: 'invalid_response',
    code: 'no_json',
  },
};

function usageOf(response: JsonObject): Usage | null {
  const usage = response.usage;
  if (!isJsonObject(usage)) return null;
  const { prompt_tokens, completion_tokens, total_tokens } = usage;
  if (typeof prompt_tokens !== 'number' || typeof completion_tokens !== 'number') return null;
  return {
    prompt_tokens,
    completion_tokens,
    total_tokens: typeof total_tokens === 'number' ? total_tokens : prompt_tokens + completion_tokens,
  };
}

function firstChoice(response: JsonObject): { content: string; finishReason: string } {
  const choices = response.choices;
  const choice: unknown = Array.isArray(choices) ? choices[0] : undefined;
  if (!isJsonObject(choice)) {
    return { content: '', finishReason: 'stop' };
  }

  const message = choice.message;
  const content = isJsonObject(message) && typeof message.content === 'string' ? message.content : '';
  const finishReason = typeof choice.finish_reason === 'string' ? choice.finish_reason : 'stop';
  return { content, finishReason };
}

/**
 * Owns the single active provider adapter and runs every proxied call through it.
 * Both entry points report failures as OpenAI-style error payloads instead of
 * throwing.
 */
export class AdapterManager {
  private adapter: ProviderAdapter | null = null;

  constructor(
    private readonly registry: AdapterRegistry = createDefaultRegistry(),
    private readonly log: Logger = rootLogger
  ) {}

  get state(): ManagerState {
    if (!this.adapter) return 'uninitialized';
    return this.adapter.config.enabled ? 'active' : 'initialized';
  }

  /**
   * Builds and validates an adapter for `type`, replacing the current one. On
   * failure the previous adapter, if any, stays in place.
   */
  initialize(type: ProviderType, config: Omit<ProviderConfigInput, 'type'>): boolean {
    const parsed = ProviderConfigSchema.safeParse({ ...config, type });
    if (!parsed.success) {
      this.log.error({ platform: type, issues: parsed.error.issues }, 'Invalid platform configuration');
      return false;
    }

    const adapter = this.registry.create(type, parsed.data);
    if (!adapter) {
      this.log.error({ platform: type }, 'Failed to initialize platform adapter');
      return false;
    }

    this.adapter = adapter;
    this.log.info({ platform: type, enabled: parsed.data.enabled }, 'Platform adapter initialized');
    return true;
  }

  reload(config: ProviderConfigInput): boolean {
    this.log.info({ platform: config.type }, 'Reloading platform adapter');
    return this.initialize(config.type, config);
  }

  getCurrentAdapter(): ProviderAdapter | null {
    return this.adapter;
  }

  getModelInfo(): ModelInfo | null {
    return this.adapter?.getModelInfo() ?? null;
  }

  isPlatformSupported(type: string): boolean {
    return this.registry.isSupported(type);
  }

  getSupportedPlatforms(): ProviderType[] {
    return this.registry.listPlatforms();
  }

  async processRequest(
    endpoint: Endpoint,
    method: HttpMethod,
    request: OpenAIRequest,
    options: ProcessOptions = {}
  ): Promise<JsonObject | ErrorPayload> {
    let adapter: ProviderAdapter;
    try {
      adapter = this.requireAdapter(endpoint);
    } catch (error) {
      return this.failure(error, endpoint);
    }

    const started = performance.now();
    try {
      const model = adapter.resolveModel(request.model);
      const body = adapter.transformRequest(endpoint, { ...request, model });

      const envelope = await adapter.makeRequest({
        endpoint,
        model,
        method,
        body,
        headers: options.headers,
        signal: options.signal,
      });
      trackUpstreamRequest(adapter.name, endpoint, String(envelope.statusCode), (performance.now() - started) / 1000);

      if (envelope.statusCode >= 400) {
        const error = new UpstreamHTTPError(envelope.statusCode, envelope.json);
        this.log.warn({ provider: adapter.name, endpoint, status: envelope.statusCode }, 'Upstream returned an error status');
        return error.toPayload();
      }

      if (!isJsonObject(envelope.json)) {
        this.log.warn({ provider: adapter.name, endpoint, bytes: envelope.rawBytes.byteLength }, 'Upstream response is not a JSON object');
        return INVALID_RESPONSE;
      }

      const response = adapter.transformResponse(endpoint, envelope.json);
      const usage = usageOf(response);
      if (usage) {
        trackTokens(adapter.name, model, usage);
      }

      this.log.debug({ provider: adapter.name, endpoint, model }, 'Request processed');
      return response;
    } catch (error) {
      const payload = this.failure(error, endpoint, adapter.name);
      if (!(error instanceof ValidationError)) {
        trackUpstreamRequest(adapter.name, endpoint, payload.error.type, (performance.now() - started) / 1000);
      }
      return payload;
    }
  }

  /**
   * Streams normalized chunk events. Providers without native streaming are served
   * from one buffered call as a start, content and stop chunk. A failure ends the
   * sequence with one error event.
   */
  async *processStreamRequest(
    endpoint: Endpoint,
    method: HttpMethod,
    request: OpenAIRequest,
    options: ProcessOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    let adapter: ProviderAdapter;
    try {
      adapter = this.requireAdapter(endpoint);
    } catch (error) {
      yield { type: 'error', payload: this.failure(error, endpoint) };
      return;
    }

    const model = adapter.resolveModel(request.model);
    const identity: StreamIdentity = {
      id: `chatcmpl-${randomUUID()}`,
      model,
      created: Math.floor(Date.now() / 1000),
    };

    const createInterpreter = adapter.supportsStreaming ? adapter.createStreamInterpreter?.bind(adapter) : undefined;
    const events = createInterpreter
      ? this.streamUpstream(adapter, createInterpreter, endpoint, method, { ...request, model }, identity, options)
      : this.synthesizeStream(endpoint, method, request, identity, options);

    for await (const event of events) {
      if (event.type === 'error') {
        trackStreamError(adapter.name, event.payload.error.type);
      } else {
        trackStreamChunk(adapter.name);
      }
      yield event;
    }
  }

  private async *streamUpstream(
    adapter: ProviderAdapter,
    createInterpreter: InterpreterFactory,
    endpoint: Endpoint,
    method: HttpMethod,
    request: OpenAIRequest,
    identity: StreamIdentity,
    options: ProcessOptions
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const started = performance.now();
    const log = this.log.child({ provider: adapter.name, streamId: identity.id });

    try {
      const body = adapter.transformRequest(endpoint, { ...request, stream: true });
      const upstream = await adapter.makeStreamRequest({
        endpoint,
        model: identity.model,
        method,
        body,
        headers: options.headers,
        signal: options.signal,
      });

      const status = upstream.ok ? upstream.statusCode : upstream.envelope.statusCode;
      trackUpstreamRequest(adapter.name, endpoint, String(status), (performance.now() - started) / 1000);

      if (!upstream.ok) {
        log.warn({ status }, 'Upstream rejected stream request');
        yield { type: 'error', payload: new UpstreamHTTPError(status, upstream.envelope.json).toPayload() };
        return;
      }

      const normalizer = new StreamNormalizer(createInterpreter(identity, { signal: options.signal }), identity, log);
      yield* normalizeStream(upstream.fragments, normalizer, log);
    } catch (error) {
      yield { type: 'error', payload: this.failure(error, endpoint, adapter.name) };
    }
  }

  private async *synthesizeStream(
    endpoint: Endpoint,
    method: HttpMethod,
    request: OpenAIRequest,
    identity: StreamIdentity,
    options: ProcessOptions
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const response = await this.processRequest(endpoint, method, { ...request, stream: false }, options);
    if (isErrorPayload(response)) {
      yield { type: 'error', payload: response };
      return;
    }

    const { content, finishReason } = firstChoice(response);
    yield { type: 'chunk', payload: buildChunk(identity, { role: 'assistant' }) };
    yield { type: 'chunk', payload: buildChunk(identity, { content }) };
    yield { type: 'chunk', payload: buildChunk(identity, {}, finishReason) };
  }

  private requireAdapter(endpoint: Endpoint): ProviderAdapter {
    const adapter = this.adapter;
    if (!adapter) {
      throw new ConfigurationError('No platform adapter configured');
    }
    if (!adapter.config.enabled) {
      throw new ConfigurationError(`Platform ${adapter.name} is disabled`);
    }
    if (!adapter.supportedEndpoints.includes(endpoint)) {
      throw new ValidationError(`Endpoint ${endpoint} is not supported by platform ${adapter.name}`);
    }
    return adapter;
  }

  private failure(error: unknown, endpoint: Endpoint, provider?: string): ErrorPayload {
    const gatewayError: GatewayError = toGatewayError(error);
    const fields = { provider, endpoint, type: gatewayError.type, error: gatewayError.message };
    if (gatewayError.statusCode >= 500) {
      this.log.error(fields, 'Request processing failed');
    } else {
      this.log.warn(fields, 'Request rejected');
    }
    return gatewayError.toPayload();
  }
}
