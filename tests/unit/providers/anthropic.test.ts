import { describe, it, expect } from 'vitest';
import { AnthropicAdapter, mapStopReason } from '../../../src/providers/anthropic.js';
import { FALLBACK_MESSAGE } from '../../../src/providers/base.js';
import { fakeFetch, jsonResponse, providerConfig } from '../../helpers/fixtures.js';

function adapter(fetchImpl?: typeof fetch) {
  return new AnthropicAdapter(
    providerConfig({ type: 'anthropic', apiKey: 'test-secret', baseUrl: 'https://anthropic.test/v1/' }),
    { fetchImpl }
  );
}

describe('AnthropicAdapter', () => {
  it('lifts the system message out and defaults max_tokens', () => {
    const body = adapter().transformRequest('/chat/completions', {
      model: 'claude-test',
      messages: [
        { role: 'system', content: 'Be terse' },
        { role: 'user', content: 'Hi' },
      ],
    });

    expect(body).toEqual({
      model: 'claude-test',
      system: 'Be terse',
      messages: [{ role: 'user', content: 'Hi' }],
      max_tokens: 4096,
    });
  });

  it('joins several system messages and maps sampling options', () => {
    const body = adapter().transformRequest('/chat/completions', {
      model: 'claude-test',
      messages: [
        { role: 'system', content: 'One' },
        { role: 'system', content: 'Two' },
        { role: 'user', content: 'Q' },
        { role: 'assistant', content: 'A' },
        { role: 'tool', content: 'result' },
      ],
      max_tokens: 100,
      temperature: 0.2,
      stop: 'END',
      stream: true,
      user: 'user-7',
    });

    expect(body).toEqual({
      model: 'claude-test',
      system: 'One\n\nTwo',
      messages: [
        { role: 'user', content: 'Q' },
        { role: 'assistant', content: 'A' },
        { role: 'user', content: 'result' },
      ],
      max_tokens: 100,
      temperature: 0.2,
      stop_sequences: ['END'],
      stream: true,
      metadata: { user_id: 'user-7' },
    });
  });

  it('maps a messages response to a chat completion', () => {
    const response = adapter().transformResponse('/chat/completions', {
      id: 'msg_1',
      model: 'claude-test',
      content: [{ type: 'text', text: 'Hello there' }],
      stop_reason: 'max_tokens',
      usage: { input_tokens: 10, output_tokens: 4 },
    });

    expect(response).toMatchObject({
      id: 'msg_1',
      object: 'chat.completion',
      model: 'claude-test',
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hello there' }, finish_reason: 'length' }],
      usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 },
    });
  });

  it('generates a completion id when the response has none', () => {
    const response = adapter().transformResponse('/chat/completions', {
      content: [{ type: 'text', text: 'Hi' }],
      stop_reason: 'end_turn',
    });

    expect(response.id).toMatch(/^chatcmpl-[0-9a-f-]{36}$/);
  });

  it('falls back to the apology on an unknown shape', () => {
    const response = adapter().transformResponse('/chat/completions', { unexpected: true });

    expect(response).toMatchObject({
      id: 'anthropic-error',
      choices: [{ message: { content: FALLBACK_MESSAGE }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 },
    });
  });

  it('maps stop reasons', () => {
    expect(mapStopReason('end_turn')).toBe('stop');
    expect(mapStopReason('stop_sequence')).toBe('stop');
    expect(mapStopReason('tool_use')).toBe('tool_calls');
    expect(mapStopReason(null)).toBe('stop');
  });

  it('posts to /messages with the API key and version headers', async () => {
    const { impl, calls } = fakeFetch(() => jsonResponse({ content: [] }));

    await adapter(impl).makeRequest({
      endpoint: '/chat/completions',
      model: 'claude-test',
      body: { model: 'claude-test' },
      headers: { authorization: 'Bearer client-key', 'x-trace': 'abc' },
    });

    expect(calls[0]?.url).toBe('https://anthropic.test/v1/messages');
    expect(calls[0]?.headers).toMatchObject({
      'x-api-key': 'test-secret',
      'anthropic-version': '2023-06-01',
      'x-trace': 'abc',
    });
    expect(calls[0]?.headers.authorization).toBeUndefined();
  });
});
