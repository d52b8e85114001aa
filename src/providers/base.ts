import { logger as rootLogger, type Logger } from '../middleware/logger.js';
import { TransformError, ValidationError } from '../errors.js';
import type { ProviderConfig } from '../schemas/config.js';
import {
  ChatCompletionRequestSchema,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type JsonObject,
  type OpenAIRequest,
  type Usage,
} from '../schemas/request.js';
import {
  ProviderClient,
  type HttpMethod,
  type InboundHeaders,
  type ProviderAuth,
  type UpstreamResponseEnvelope,
  type UpstreamStream,
} from '../services/provider-client.js';
import type { StreamIdentity, StreamInterpreter } from '../services/stream-normalizer.js';

export type Endpoint = '/chat/completions' | '/completions' | '/embeddings';

export const FALLBACK_MESSAGE = 'Sorry, I encountered an error processing your request.';

export interface ModelInfo {
  platform: string;
  enabled: boolean;
  actual_name: string;
  supports_streaming: boolean;
  supports_function_calling: boolean;
  supported_endpoints: Endpoint[];
  bot_id?: string;
}

export interface DispatchOptions {
  endpoint: Endpoint;
  /** Upstream model name, already resolved. */
  model: string;
  method?: HttpMethod;
  body: JsonObject;
  headers?: InboundHeaders;
  signal?: AbortSignal;
}

export interface AdapterDeps {
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

/**
 * One upstream provider. Request and response transforms are pure; transport goes
 * through the adapter's {@link ProviderClient}.
 */
export interface ProviderAdapter {
  readonly name: string;
  readonly config: ProviderConfig;
  readonly supportedEndpoints: readonly Endpoint[];
  readonly supportsStreaming: boolean;
  readonly supportsFunctionCalling: boolean;

  /** Model to send upstream for a requested model name. */
  resolveModel(requested: string): string;
  transformRequest(endpoint: Endpoint, request: OpenAIRequest): JsonObject;
  transformResponse(endpoint: Endpoint, response: JsonObject): JsonObject;
  resolveUrl(endpoint: Endpoint, model: string): string;
  validateConfig(): boolean;
  getModelInfo(): ModelInfo;
  makeRequest(options: DispatchOptions): Promise<UpstreamResponseEnvelope>;
  makeStreamRequest(options: DispatchOptions): Promise<UpstreamStream>;
  /** Absent for providers without native streaming. */
  createStreamInterpreter?(identity: StreamIdentity, options: { signal?: AbortSignal }): StreamInterpreter;
}

export abstract class BaseAdapter implements ProviderAdapter {
  abstract readonly name: string;
  abstract readonly supportedEndpoints: readonly Endpoint[];
  readonly supportsStreaming: boolean = true;
  readonly supportsFunctionCalling: boolean = true;

  protected readonly log: Logger;
  private readonly fetchImpl?: typeof fetch;
  private clientInstance?: ProviderClient;

  constructor(readonly config: ProviderConfig, deps: AdapterDeps = {}) {
    this.log = (deps.logger ?? rootLogger).child({ provider: config.type });
    this.fetchImpl = deps.fetchImpl;
    this.log.info({ enabled: config.enabled }, 'Initialized platform adapter');
  }

  abstract transformRequest(endpoint: Endpoint, request: OpenAIRequest): JsonObject;
  abstract transformResponse(endpoint: Endpoint, response: JsonObject): JsonObject;
  abstract resolveUrl(endpoint: Endpoint, model: string): string;
  protected abstract authenticate(): ProviderAuth;

  protected get client(): ProviderClient {
    this.clientInstance ??= new ProviderClient(
      {
        providerName: this.name,
        timeoutMs: this.config.timeoutMs,
        defaultHeaders: this.config.defaultHeaders,
        auth: this.authenticate(),
      },
      this.log,
      this.fetchImpl
    );
    return this.clientInstance;
  }

  protected get baseUrl(): string {
    return this.config.baseUrl.replace(/\/+$/, '');
  }

  resolveModel(requested: string): string {
    return this.config.actualModelName || requested;
  }

  validateConfig(): boolean {
    if (!this.config.apiKey) {
      this.log.error('API key is required');
      return false;
    }

    if (!this.config.baseUrl) {
      this.log.error('Base URL is required');
      return false;
    }

    return true;
  }

  getModelInfo(): ModelInfo {
    return {
      platform: this.name,
      enabled: this.config.enabled,
      actual_name: this.config.actualModelName ?? 'unknown',
      supports_streaming: this.supportsStreaming,
      supports_function_calling: this.supportsFunctionCalling,
      supported_endpoints: [...this.supportedEndpoints],
    };
  }

  makeRequest(options: DispatchOptions): Promise<UpstreamResponseEnvelope> {
    return this.client.request({
      method: options.method ?? 'POST',
      url: this.resolveUrl(options.endpoint, options.model),
      headers: options.headers,
      body: options.body,
      signal: options.signal,
    });
  }

  makeStreamRequest(options: DispatchOptions): Promise<UpstreamStream> {
    return this.client.stream({
      method: options.method ?? 'POST',
      url: this.resolveUrl(options.endpoint, options.model),
      headers: { ...options.headers, accept: 'text/event-stream' },
      body: options.body,
      signal: options.signal,
    });
  }

  /**
   * Canned single-choice answer used when the provider's body matches none of the
   * shapes the adapter knows.
   */
  protected fallbackResponse(response: JsonObject, model: string): ChatCompletionResponse {
    const error = new TransformError(`Unexpected ${this.name} response format`, Object.keys(response));
    this.log.warn({ responseKeys: error.responseKeys }, error.message);

    return completion({
      id: `${this.name}-error`,
      model,
      content: FALLBACK_MESSAGE,
      finishReason: 'stop',
    });
  }

  protected requireChatRequest(request: OpenAIRequest): ChatCompletionRequest {
    const parsed = ChatCompletionRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError(`${this.name} requires a non-empty messages list`, 'messages');
    }
    return parsed.data;
  }
}

export function completion(fields: {
  id: string;
  model: string;
  content: string;
  finishReason: string;
  usage?: Usage;
  created?: number;
}): ChatCompletionResponse {
  return {
    id: fields.id,
    object: 'chat.completion',
    created: fields.created ?? Math.floor(Date.now() / 1000),
    model: fields.model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: fields.content },
        finish_reason: fields.finishReason,
      },
    ],
    usage: fields.usage ?? { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
  };
}
