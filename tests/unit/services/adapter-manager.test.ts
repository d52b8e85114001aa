import { describe, it, expect, vi } from 'vitest';
import { createDefaultRegistry } from '../../../src/providers/registry.js';
import { AdapterManager } from '../../../src/services/adapter-manager.js';
import { collect, fakeFetch, jsonResponse, sseResponse } from '../../helpers/fixtures.js';

const chatRequest = { model: 'test-model', messages: [{ role: 'user' as const, content: 'Hi' }] };

function managerWith(fetchImpl: typeof fetch) {
  return new AdapterManager(createDefaultRegistry({ fetchImpl }));
}

describe('AdapterManager', () => {
  describe('lifecycle', () => {
    it('moves from uninitialized to active', () => {
      const manager = new AdapterManager();
      expect(manager.state).toBe('uninitialized');
      expect(manager.getCurrentAdapter()).toBeNull();

      expect(manager.initialize('openai', { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' })).toBe(true);
      expect(manager.state).toBe('active');
      expect(manager.getModelInfo()?.platform).toBe('openai');
    });

    it('stays initialized while the adapter is disabled', () => {
      const manager = new AdapterManager();
      manager.initialize('openai', { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1', enabled: false });
      expect(manager.state).toBe('initialized');
    });

    it('keeps the previous adapter when a reload fails', () => {
      const manager = new AdapterManager();
      manager.initialize('anthropic', { apiKey: 'test-secret', baseUrl: 'https://anthropic.test/v1' });

      expect(manager.reload({ type: 'openai', apiKey: '', baseUrl: 'https://openai.test/v1' })).toBe(false);
      expect(manager.initialize('cohere', { apiKey: 'test-secret', baseUrl: 'https://cohere.test' })).toBe(false);
      expect(manager.getCurrentAdapter()?.name).toBe('anthropic');
    });

    it('replaces the adapter on a successful reload', () => {
      const manager = new AdapterManager();
      manager.initialize('anthropic', { apiKey: 'test-secret', baseUrl: 'https://anthropic.test/v1' });

      expect(manager.reload({ type: 'coze', apiKey: 'test-secret', baseUrl: 'https://coze.test' })).toBe(true);
      expect(manager.getCurrentAdapter()?.name).toBe('coze');
    });

    it('answers platform support questions', () => {
      const manager = new AdapterManager();
      expect(manager.isPlatformSupported('google')).toBe(true);
      expect(manager.isPlatformSupported('cohere')).toBe(false);
      expect(manager.getSupportedPlatforms()).toContain('coze');
    });
  });

  describe('processRequest', () => {
    it('reports a missing adapter as a configuration error', async () => {
      const result = await new AdapterManager().processRequest('/chat/completions', 'POST', chatRequest);

      expect(result).toEqual({
        error: { message: 'No platform adapter configured', type: 'configuration_error', code: 'provider_unavailable' },
      });
    });

    it('reports a disabled adapter as a configuration error', async () => {
      const manager = new AdapterManager();
      manager.initialize('openai', { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1', enabled: false });

      const result = await manager.processRequest('/chat/completions', 'POST', chatRequest);
      expect(result).toMatchObject({ error: { type: 'configuration_error' } });
    });

    it('turns an upstream 503 into a platform_error payload', async () => {
      const { impl } = fakeFetch(() => jsonResponse({ error: { message: 'overloaded' } }, 503));
      const manager = managerWith(impl);
      manager.initialize('openai', { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' });

      const result = await manager.processRequest('/chat/completions', 'POST', chatRequest);

      expect(result).toEqual({ error: { message: 'Platform API error: 503', type: 'platform_error', code: 503 } });
    });

    it('answers an unrecognized OpenAI body with a single fallback choice', async () => {
      const { impl } = fakeFetch(() => jsonResponse({ unexpected: true }));
      const manager = managerWith(impl);
      manager.initialize('openai', { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' });

      const result = await manager.processRequest('/chat/completions', 'POST', chatRequest);

      expect(result).toMatchObject({
        object: 'chat.completion',
        choices: [{ index: 0, finish_reason: 'stop' }],
      });
      expect('choices' in result && Array.isArray(result.choices) ? result.choices.length : 0).toBe(1);
    });

    it('rejects endpoints the platform does not serve', async () => {
      const manager = new AdapterManager();
      manager.initialize('anthropic', { apiKey: 'test-secret', baseUrl: 'https://anthropic.test/v1' });

      const result = await manager.processRequest('/embeddings', 'POST', { model: 'm', input: 'x' });
      expect(result).toEqual({
        error: {
          message: 'Endpoint /embeddings is not supported by platform anthropic',
          type: 'invalid_request_error',
          code: null,
        },
      });
    });

    it('reports a non-JSON success body as an invalid response', async () => {
      const { impl } = fakeFetch(() => new Response('not json', { status: 200 }));
      const manager = managerWith(impl);
      manager.initialize('openai', { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1' });

      const result = await manager.processRequest('/chat/completions', 'POST', chatRequest);
      expect(result).toEqual({ error: { message: 'Invalid response from platform', type: 'invalid_response', code: 'no_json' } });
    });

    it('sends the configured actual model name upstream', async () => {
      const { impl, calls } = fakeFetch(() =>
        jsonResponse({ id: 'msg_1', content: [{ type: 'text', text: 'Hello' }], stop_reason: 'end_turn' })
      );
      const manager = managerWith(impl);
      manager.initialize('anthropic', {
        apiKey: 'test-secret',
        baseUrl: 'https://anthropic.test/v1',
        actualModelName: 'claude-real',
      });

      const result = await manager.processRequest('/chat/completions', 'POST', chatRequest);

      expect(calls[0]?.body).toMatchObject({ model: 'claude-real' });
      expect(result).toMatchObject({ choices: [{ message: { content: 'Hello' }, finish_reason: 'stop' }] });
    });

    it('reports an upstream timeout as timeout_error', async () => {
      const impl = vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );
      const manager = managerWith(impl);
      manager.initialize('openai', { apiKey: 'test-secret', baseUrl: 'https://openai.test/v1', timeoutMs: 20 });

      const result = await manager.processRequest('/chat/completions', 'POST', chatRequest);
      expect(result).toEqual({
        error: { message: 'Upstream request timed out after 20ms', type: 'timeout_error', code: 'timeout' },
      });
    });

    it('reports a bad Coze model as a validation error', async () => {
      const manager = new AdapterManager();
      manager.initialize('coze', { apiKey: 'test-secret', baseUrl: 'https://coze.test' });

      const result = await manager.processRequest('/chat/completions', 'POST', { ...chatRequest, model: 'bot-' });
      expect(result).toMatchObject({ error: { type: 'invalid_request_error', param: 'model' } });
    });
  });

  describe('processStreamRequest', () => {
    it('synthesizes start, content and stop for a non-streaming platform', async () => {
      const { impl } = fakeFetch(() =>
        jsonResponse({ candidates: [{ content: { parts: [{ text: 'buffered' }] }, finishReason: 'STOP' }] })
      );
      const manager = managerWith(impl);
      manager.initialize('google', { apiKey: 'test-secret', baseUrl: 'https://gemini.test/v1beta' });

      const events = await collect(manager.processStreamRequest('/chat/completions', 'POST', { ...chatRequest, stream: true }));

      expect(events.map((event) => (event.type === 'chunk' ? event.payload.choices[0] : event.type))).toEqual([
        { index: 0, delta: { role: 'assistant' }, finish_reason: null },
        { index: 0, delta: { content: 'buffered' }, finish_reason: null },
        { index: 0, delta: {}, finish_reason: 'stop' },
      ]);
    });

    it('yields one platform_error event when the stream is rejected at open', async () => {
      const { impl } = fakeFetch(() => jsonResponse({ message: 'unavailable' }, 503));
      const manager = managerWith(impl);
      manager.initialize('anthropic', { apiKey: 'test-secret', baseUrl: 'https://anthropic.test/v1' });

      const events = await collect(manager.processStreamRequest('/chat/completions', 'POST', chatRequest));

      expect(events).toEqual([
        { type: 'error', payload: { error: { message: 'Platform API error: 503', type: 'platform_error', code: 503 } } },
      ]);
    });

    it('requests a stream and normalizes Anthropic events', async () => {
      const { impl, calls } = fakeFetch(() =>
        sseResponse([
          'event: message_start\ndata: {"type":"message_start"}\n\n',
          'event: content_block_delta\ndata: {"type":"content_block_delta","delta":{"type":"text_delta","text":"Yo"}}\n\n',
          'event: message_delta\ndata: {"type":"message_delta","delta":{"stop_reason":"end_turn"}}\n\n',
        ])
      );
      const manager = managerWith(impl);
      manager.initialize('anthropic', { apiKey: 'test-secret', baseUrl: 'https://anthropic.test/v1' });

      const events = await collect(manager.processStreamRequest('/chat/completions', 'POST', chatRequest));

      expect(calls[0]?.body).toMatchObject({ stream: true });
      expect(calls[0]?.headers.accept).toBe('text/event-stream');
      expect(events).toHaveLength(3);
      expect(events.map((event) => event.type)).toEqual(['chunk', 'chunk', 'chunk']);
      expect(events[1]).toMatchObject({ payload: { model: 'test-model', choices: [{ delta: { content: 'Yo' } }] } });
    });

    it('recovers a Coze answer through the message list', async () => {
      const { impl, calls } = fakeFetch(
        () =>
          sseResponse([
            'event: conversation.chat.created\ndata: {"id":"chat-1","conversation_id":"conv-1","status":"created"}\n\n',
            'event: conversation.chat.completed\ndata: {"id":"chat-1","conversation_id":"conv-1","status":"completed"}\n\n',
            'event: done\ndata: "[DONE]"\n\n',
          ]),
        () => jsonResponse({ data: [{ type: 'answer', content: 'late answer' }] })
      );
      const manager = managerWith(impl);
      manager.initialize('coze', { apiKey: 'test-secret', baseUrl: 'https://coze.test' });

      const events = await collect(manager.processStreamRequest('/chat/completions', 'POST', { ...chatRequest, model: 'bot-abc' }));

      expect(calls[0]?.body).toMatchObject({ bot_id: 'abc', stream: true });
      expect(calls[1]?.url).toBe('https://coze.test/v3/chat/message/list?conversation_id=conv-1&chat_id=chat-1');
      expect(events.map((event) => (event.type === 'chunk' ? event.payload.choices[0]?.delta : event.type))).toEqual([
        { role: 'assistant' },
        { content: 'late answer' },
        {},
      ]);
    });
  });
});
