import { UpstreamStreamError, ValidationError } from '../errors.js';
import type { Logger } from '../middleware/logger.js';
import { isJsonObject, type JsonObject, type OpenAIRequest } from '../schemas/request.js';
import type { ProviderAuth, UpstreamResponseEnvelope } from '../services/provider-client.js';
import type {
  SseRecord,
  StreamIdentity,
  StreamInterpreter,
  StreamSignal,
} from '../services/stream-normalizer.js';
import { BaseAdapter, completion, type Endpoint, type ModelInfo } from './base.js';

const BOT_PREFIX = 'bot-';

/** `bot-abc123` and `abc123` both address bot `abc123`. */
export function deriveBotId(model: string): string {
  const botId = model.startsWith(BOT_PREFIX) ? model.slice(BOT_PREFIX.length) : model;
  if (!botId.trim()) {
    throw new ValidationError('Unable to derive a Coze bot id from the model name', 'model');
  }
  return botId;
}

interface CozeMessage {
  role: 'user' | 'assistant';
  content: string;
  content_type: 'text';
}

/** Looks up the final answer of a finished chat when the stream carried none. */
export type AnswerRecovery = (conversationId: string, chatId: string) => Promise<string | null>;

function lastAnswer(messages: unknown): string | null {
  if (!Array.isArray(messages)) return null;

  let answer: string | null = null;
  for (const message of messages) {
    if (isJsonObject(message) && message.type === 'answer' && typeof message.content === 'string') {
      answer = message.content;
    }
  }
  return answer;
}

function messagesOf(body: unknown): unknown {
  if (!isJsonObject(body)) return undefined;
  if (Array.isArray(body.data)) return body.data;
  if (isJsonObject(body.data) && Array.isArray(body.data.messages)) return body.data.messages;
  return body.messages;
}

/**
 * Coze v3 chat. The bot is addressed through the request's `model`; the last
 * message is sent as the user turn and earlier ones as history.
 */
export class CozeAdapter extends BaseAdapter {
  readonly name = 'coze';
  readonly supportedEndpoints: readonly Endpoint[] = ['/chat/completions'];
  readonly supportsFunctionCalling = false;

  protected authenticate(): ProviderAuth {
    return { headers: { Authorization: `Bearer ${this.config.apiKey}` }, query: {} };
  }

  resolveUrl(): string {
    return `${this.baseUrl}/v3/chat`;
  }

  resolveModel(requested: string): string {
    return requested;
  }

  getModelInfo(): ModelInfo {
    return { ...super.getModelInfo(), bot_id: this.config.botId ?? '' };
  }

  transformRequest(_endpoint: Endpoint, request: OpenAIRequest): JsonObject {
    const chat = this.requireChatRequest(request);
    const botId = deriveBotId(chat.model);

    const history: CozeMessage[] = chat.messages.slice(0, -1).map((message) => ({
      role: message.role === 'assistant' ? 'assistant' : 'user',
      content: message.content ?? '',
      content_type: 'text',
    }));
    const last = chat.messages[chat.messages.length - 1];

    return {
      bot_id: botId,
      user_id: chat.user ?? 'default_user',
      additional_messages: [
        ...history,
        { role: 'user', content: last?.content ?? '', content_type: 'text' },
      ],
      stream: chat.stream ?? false,
      auto_save_history: true,
    };
  }

  transformResponse(_endpoint: Endpoint, response: JsonObject): JsonObject {
    const model = this.config.actualModelName ?? 'coze-bot';
    const data = isJsonObject(response.data) ? response.data : response;
    const messages = Array.isArray(response.messages) ? response.messages : data.messages;

    if (Array.isArray(messages)) {
      const conversationId = typeof data.conversation_id === 'string'
        ? data.conversation_id
        : typeof response.conversation_id === 'string' ? response.conversation_id : '';

      return completion({
        id: `chatcmpl-${conversationId}`,
        model,
        content: lastAnswer(messages) ?? '',
        finishReason: 'stop',
      });
    }

    // Older single-field shapes.
    for (const field of ['answer', 'content'] as const) {
      const value = response[field];
      if (typeof value === 'string') {
        return completion({ id: `chatcmpl-${String(response.conversation_id ?? '')}`, model, content: value, finishReason: 'stop' });
      }
    }

    return this.fallbackResponse(response, model);
  }

  createStreamInterpreter(_identity: StreamIdentity, options: { signal?: AbortSignal } = {}): StreamInterpreter {
    return new CozeStreamInterpreter(
      (conversationId, chatId) => this.fetchFinalAnswer(conversationId, chatId, options.signal),
      this.log
    );
  }

  /**
   * Tries the v3 message list of the chat, then the conversation's message list.
   * Lookup failures are logged and yield null.
   */
  async fetchFinalAnswer(conversationId: string, chatId: string, signal?: AbortSignal): Promise<string | null> {
    const attempts: Array<{ path: string; query: Record<string, string> }> = [
      { path: '/v3/chat/message/list', query: { conversation_id: conversationId, chat_id: chatId } },
      { path: '/v1/conversation/message/list', query: { conversation_id: conversationId } },
    ];

    for (const attempt of attempts) {
      let envelope: UpstreamResponseEnvelope;
      try {
        envelope = await this.client.request({
          method: 'GET',
          url: `${this.baseUrl}${attempt.path}`,
          query: attempt.query,
          signal,
        });
      } catch (error) {
        this.log.warn({
          path: attempt.path,
          error: error instanceof Error ? error.message : String(error),
        }, 'Coze message lookup failed');
        continue;
      }

      if (envelope.statusCode >= 400) {
        this.log.warn({ path: attempt.path, status: envelope.statusCode }, 'Coze message lookup rejected');
        continue;
      }

      const answer = lastAnswer(messagesOf(envelope.json));
      if (answer) {
        this.log.debug({ path: attempt.path, conversationId, chatId }, 'Recovered Coze answer');
        return answer;
      }
    }

    return null;
  }
}

/**
 * Coze stream records carry a `status` (in_progress, completed, failed) or
 * message content. The inline stream may stop short of the full answer, so once
 * conversation and chat ids are known the final answer is looked up after the
 * stream ends and only the text not yet delivered is emitted.
 */
export class CozeStreamInterpreter implements StreamInterpreter {
  private conversationId: string | null = null;
  private chatId: string | null = null;
  private inlineText = '';
  private pendingStop = false;

  constructor(private readonly recover: AnswerRecovery, private readonly log?: Logger) {}

  interpret(record: SseRecord): StreamSignal[] {
    if (!isJsonObject(record.data)) {
      return [];
    }

    const data = record.data;
    this.rememberIds(record.event, data);

    const signals: StreamSignal[] = [];
    const content = this.contentOf(record.event, data);
    if (content !== null) {
      this.inlineText += content;
      signals.push({ kind: 'content', text: content });
    }

    switch (data.status) {
      case 'in_progress':
        signals.push({ kind: 'keepalive' });
        break;
      case 'completed':
        if (this.recoveryPossible()) {
          this.pendingStop = true;
        } else {
          signals.push({ kind: 'stop', finishReason: 'stop' });
        }
        break;
      case 'failed': {
        const lastError = data.last_error;
        const message = isJsonObject(lastError) && typeof lastError.msg === 'string' && lastError.msg
          ? lastError.msg
          : 'Coze chat failed';
        signals.push({ kind: 'error', error: new UpstreamStreamError(message) });
        break;
      }
    }

    return signals;
  }

  async finish(): Promise<StreamSignal[]> {
    const signals: StreamSignal[] = [];

    if (this.conversationId && this.chatId) {
      const answer = await this.recover(this.conversationId, this.chatId).catch((error: unknown) => {
        this.log?.warn({ error: error instanceof Error ? error.message : String(error) }, 'Coze answer recovery failed');
        return null;
      });
      const missing = answer ? this.undelivered(answer) : '';
      if (missing) {
        this.inlineText += missing;
        signals.push({ kind: 'content', text: missing });
      }
    }

    if (this.pendingStop) {
      this.pendingStop = false;
      signals.push({ kind: 'stop', finishReason: 'stop' });
    }

    return signals;
  }

  /** The part of `answer` the client has not seen yet. */
  private undelivered(answer: string): string {
    if (answer.startsWith(this.inlineText)) {
      return answer.slice(this.inlineText.length);
    }
    return answer;
  }

  private recoveryPossible(): boolean {
    return this.conversationId !== null && this.chatId !== null;
  }

  private rememberIds(event: string | null, data: JsonObject): void {
    if (typeof data.conversation_id === 'string' && data.conversation_id) {
      this.conversationId = data.conversation_id;
    }
    if (typeof data.chat_id === 'string' && data.chat_id) {
      this.chatId = data.chat_id;
    } else if (event?.startsWith('conversation.chat.') && typeof data.id === 'string' && data.id) {
      this.chatId = data.id;
    }
  }

  private contentOf(event: string | null, data: JsonObject): string | null {
    const message = data.message;
    if (isJsonObject(message) && typeof message.content === 'string' && message.content) {
      return message.content;
    }
    if (event === 'conversation.message.delta' && data.type === 'answer' && typeof data.content === 'string' && data.content) {
      return data.content;
    }
    return null;
  }
}
