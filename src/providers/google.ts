import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { JsonObject, OpenAIRequest } from '../schemas/request.js';
import type { ProviderAuth } from '../services/provider-client.js';
import { BaseAdapter, completion, type Endpoint } from './base.js';

const GenerateContentResponseSchema = z.object({
  candidates: z.array(
    z
      .object({
        content: z
          .object({
            role: z.string().optional(),
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
      .passthrough()
  ),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
  responseId: z.string().optional(),
});

export function mapFinishReason(finishReason: string | undefined): string {
  const normalized = (finishReason ?? 'STOP').toLowerCase();
  switch (normalized) {
    case 'max_tokens':
      return 'length';
    case 'safety':
    case 'recitation':
    case 'blocklist':
    case 'prohibited_content':
      return 'content_filter';
    default:
      return normalized;
  }
}

/**
 * Google Gemini `generateContent`. Gemini has no system role here, so every
 * non-assistant message is sent as a user turn. No native streaming: streamed
 * calls are served from one buffered request.
 */
export class GoogleAdapter extends BaseAdapter {
  readonly name = 'google';
  readonly supportedEndpoints: readonly Endpoint[] = ['/chat/completions'];
  readonly supportsStreaming = false;

  protected authenticate(): ProviderAuth {
    return { headers: {}, query: { key: this.config.apiKey } };
  }

  resolveUrl(_endpoint: Endpoint, model: string): string {
    if (!model) {
      throw new ValidationError('A model is required for Google requests', 'model');
    }
    const path = model.startsWith('models/') ? model : `models/${model}`;
    return `${this.baseUrl}/${path}:generateContent`;
  }

  transformRequest(_endpoint: Endpoint, request: OpenAIRequest): JsonObject {
    const chat = this.requireChatRequest(request);

    const body: JsonObject = {
      contents: chat.messages.map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: message.content ?? '' }],
      })),
    };

    const generationConfig: JsonObject = {};
    if (chat.max_tokens !== undefined) generationConfig.maxOutputTokens = chat.max_tokens;
    if (chat.temperature !== undefined) generationConfig.temperature = chat.temperature;
    if (chat.top_p !== undefined) generationConfig.topP = chat.top_p;
    if (chat.stop !== undefined) generationConfig.stopSequences = Array.isArray(chat.stop) ? chat.stop : [chat.stop];

    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }

    return body;
  }

  transformResponse(_endpoint: Endpoint, response: JsonObject): JsonObject {
    const parsed = GenerateContentResponseSchema.safeParse(response);
    if (!parsed.success) {
      return this.fallbackResponse(response, this.config.actualModelName ?? 'gemini');
    }

    const { candidates, usageMetadata, modelVersion, responseId } = parsed.data;
    const candidate = candidates[0];

    return completion({
      id: responseId ? `chatcmpl-${responseId}` : `chatcmpl-${randomUUID()}`,
      model: modelVersion ?? this.config.actualModelName ?? 'gemini',
      content: candidate?.content?.parts?.[0]?.text ?? '',
      finishReason: mapFinishReason(candidate?.finishReason),
      usage: {
        prompt_tokens: usageMetadata?.promptTokenCount ?? 0,
        completion_tokens: usageMetadata?.candidatesTokenCount ?? 0,
        total_tokens: usageMetadata?.totalTokenCount ?? 0,
      },
    });
  }
}
