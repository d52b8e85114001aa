import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { UpstreamStreamError } from '../errors.js';
import { isJsonObject, type JsonObject, type OpenAIRequest } from '../schemas/request.js';
import type { ProviderAuth } from '../services/provider-client.js';
import type { SseRecord, StreamInterpreter, StreamSignal } from '../services/stream-normalizer.js';
import { BaseAdapter, completion, type Endpoint } from './base.js';

export const ANTHROPIC_VERSION = '2023-06-01';
export const DEFAULT_MAX_TOKENS = 4096;

const AnthropicMessageSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough()),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export function mapStopReason(stopReason: string | null | undefined): string {
  switch (stopReason) {
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    default:
      return 'stop';
  }
}

export class AnthropicAdapter extends BaseAdapter {
  readonly name = 'anthropic';
  readonly supportedEndpoints: readonly Endpoint[] = ['/chat/completions'];

  protected authenticate(): ProviderAuth {
    return {
      headers: {
        'x-api-key': this.config.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      query: {},
    };
  }

  resolveUrl(): string {
    return `${this.baseUrl}/messages`;
  }

  /**
   * System messages move to the top-level `system` field; Anthropic requires
   * `max_tokens`, so it is always set.
   */
  transformRequest(_endpoint: Endpoint, request: OpenAIRequest): JsonObject {
    const chat = this.requireChatRequest(request);

    const system: string[] = [];
    const messages: Array<{ role: 'user' | 'assistant'; content: string }> = [];

    for (const message of chat.messages) {
      if (message.role === 'system') {
        system.push(message.content ?? '');
      } else {
        messages.push({
          role: message.role === 'assistant' ? 'assistant' : 'user',
          content: message.content ?? '',
        });
      }
    }

    const body: JsonObject = {
      model: chat.model,
      messages,
      max_tokens: chat.max_tokens ?? DEFAULT_MAX_TOKENS,
    };

    if (system.length > 0) body.system = system.join('\n\n');
    if (chat.temperature !== undefined) body.temperature = chat.temperature;
    if (chat.top_p !== undefined) body.top_p = chat.top_p;
    if (chat.stop !== undefined) body.stop_sequences = Array.isArray(chat.stop) ? chat.stop : [chat.stop];
    if (chat.stream) body.stream = true;
    if (chat.user) body.metadata = { user_id: chat.user };

    return body;
  }

  transformResponse(_endpoint: Endpoint, response: JsonObject): JsonObject {
    const parsed = AnthropicMessageSchema.safeParse(response);
    if (!parsed.success) {
      return this.fallbackResponse(response, this.config.actualModelName ?? 'claude');
    }

    const message = parsed.data;
    const inputTokens = message.usage?.input_tokens ?? 0;
    const outputTokens = message.usage?.output_tokens ?? 0;

    return completion({
      id: message.id ?? `chatcmpl-${randomUUID()}`,
      model: message.model ?? this.config.actualModelName ?? 'claude',
      content: message.content[0]?.text ?? '',
      finishReason: mapStopReason(message.stop_reason),
      usage: {
        prompt_tokens: inputTokens,
        completion_tokens: outputTokens,
        total_tokens: inputTokens + outputTokens,
      },
    });
  }

  createStreamInterpreter(): StreamInterpreter {
    return new AnthropicStreamInterpreter();
  }
}

/**
 * Anthropic's event sequence: message_start, content_block_* (text arrives as
 * text_delta), message_delta carrying the stop reason, message_stop.
 */
export class AnthropicStreamInterpreter implements StreamInterpreter {
  interpret(record: SseRecord): StreamSignal[] {
    if (!isJsonObject(record.data)) {
      return [];
    }

    const data = record.data;
    const type = typeof data.type === 'string' ? data.type : record.event;

    switch (type) {
      case 'message_start':
        return [{ kind: 'role' }];

      case 'content_block_delta': {
        const delta = data.delta;
        if (isJsonObject(delta) && delta.type === 'text_delta' && typeof delta.text === 'string') {
          return [{ kind: 'content', text: delta.text }];
        }
        return [];
      }

      case 'message_delta': {
        const delta = data.delta;
        if (isJsonObject(delta) && typeof delta.stop_reason === 'string') {
          return [{ kind: 'stop', finishReason: mapStopReason(delta.stop_reason) }];
        }
        return [];
      }

      case 'error': {
        const error = data.error;
        const message = isJsonObject(error) && typeof error.message === 'string'
          ? error.message
          : 'Anthropic stream error';
        return [{ kind: 'error', error: new UpstreamStreamError(message) }];
      }

      default:
        return [];
    }
  }
}
