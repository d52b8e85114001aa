import { UpstreamStreamError } from '../errors.js';
import { isJsonObject, type JsonObject, type OpenAIRequest } from '../schemas/request.js';
import type { ProviderAuth } from '../services/provider-client.js';
import type { SseRecord, StreamInterpreter, StreamSignal } from '../services/stream-normalizer.js';
import { BaseAdapter, type Endpoint } from './base.js';

/**
 * OpenAI and every OpenAI-compatible upstream (Azure OpenAI, self-hosted
 * servers). The wire format already matches, so requests go out unchanged and
 * responses only need a shape check.
 */
export class OpenAIAdapter extends BaseAdapter {
  readonly name = 'openai';
  readonly supportedEndpoints: readonly Endpoint[] = ['/chat/completions', '/completions', '/embeddings'];

  protected authenticate(): ProviderAuth {
    if (this.config.type === 'azure_openai') {
      return { headers: { 'api-key': this.config.apiKey }, query: {} };
    }
    return { headers: { Authorization: `Bearer ${this.config.apiKey}` }, query: {} };
  }

  resolveUrl(endpoint: Endpoint): string {
    return `${this.baseUrl}${endpoint}`;
  }

  transformRequest(_endpoint: Endpoint, request: OpenAIRequest): JsonObject {
    return request;
  }

  transformResponse(endpoint: Endpoint, response: JsonObject): JsonObject {
    const listField = endpoint === '/embeddings' ? response.data : response.choices;
    if (Array.isArray(listField)) {
      return response;
    }

    const model = typeof response.model === 'string' ? response.model : this.config.actualModelName ?? 'unknown';
    return this.fallbackResponse(response, model);
  }

  createStreamInterpreter(): StreamInterpreter {
    return new OpenAIStreamInterpreter();
  }
}

/** Forwards upstream chunks untouched; only in-band error records are lifted out. */
export class OpenAIStreamInterpreter implements StreamInterpreter {
  readonly announcesRole = true;

  interpret(record: SseRecord): StreamSignal[] {
    if (!isJsonObject(record.data)) {
      return [];
    }

    const error = record.data.error;
    if (isJsonObject(error)) {
      const message = typeof error.message === 'string' ? error.message : 'Upstream stream error';
      return [{ kind: 'error', error: new UpstreamStreamError(message) }];
    }

    return [{ kind: 'passthrough', payload: record.data }];
  }
}
