import { describe, it, expect } from 'vitest';
import {
  ChatCompletionRequestSchema,
  CompletionRequestSchema,
  EmbeddingRequestSchema,
  MessageSchema,
} from '../../../src/schemas/request.js';

describe('Request Schemas', () => {
  describe('MessageSchema', () => {
    it('validates valid messages', () => {
      expect(MessageSchema.safeParse({ role: 'user', content: 'hello' }).success).toBe(true);
    });

    it('accepts tool messages and null content', () => {
      expect(MessageSchema.safeParse({ role: 'tool', content: null, tool_call_id: 'call_1' }).success).toBe(true);
    });

    it('rejects invalid roles', () => {
      expect(MessageSchema.safeParse({ role: 'invalid', content: 'hello' }).success).toBe(false);
    });
  });

  describe('ChatCompletionRequestSchema', () => {
    it('validates valid requests', () => {
      const result = ChatCompletionRequestSchema.safeParse({
        model: 'gpt-test',
        messages: [{ role: 'user', content: 'hello' }],
        stop: ['\n'],
        stream: true,
      });
      expect(result.success).toBe(true);
    });

    it('requires model and messages', () => {
      expect(ChatCompletionRequestSchema.safeParse({}).success).toBe(false);
      expect(ChatCompletionRequestSchema.safeParse({ model: 'gpt-test', messages: [] }).success).toBe(false);
    });

    it('enforces sampling ranges', () => {
      const base = { model: 'gpt-test', messages: [{ role: 'user', content: 'hi' }] };

      expect(ChatCompletionRequestSchema.safeParse({ ...base, temperature: 2.5 }).success).toBe(false);
      expect(ChatCompletionRequestSchema.safeParse({ ...base, top_p: 1.1 }).success).toBe(false);
      expect(ChatCompletionRequestSchema.safeParse({ ...base, max_tokens: 0 }).success).toBe(false);
      expect(ChatCompletionRequestSchema.safeParse({ ...base, presence_penalty: -3 }).success).toBe(false);
    });

    it('keeps fields it does not model', () => {
      const result = ChatCompletionRequestSchema.parse({
        model: 'gpt-test',
        messages: [{ role: 'user', content: 'hi' }],
        seed: 7,
      });
      expect(result).toEqual({ model: 'gpt-test', messages: [{ role: 'user', content: 'hi' }], seed: 7 });
    });
  });

  describe('CompletionRequestSchema', () => {
    it('accepts string and token prompts', () => {
      expect(CompletionRequestSchema.safeParse({ model: 'm', prompt: 'Say hi' }).success).toBe(true);
      expect(CompletionRequestSchema.safeParse({ model: 'm', prompt: [1, 2, 3] }).success).toBe(true);
      expect(CompletionRequestSchema.safeParse({ model: 'm' }).success).toBe(false);
    });
  });

  describe('EmbeddingRequestSchema', () => {
    it('accepts input lists and rejects unknown encodings', () => {
      expect(EmbeddingRequestSchema.safeParse({ model: 'e', input: ['a', 'b'] }).success).toBe(true);
      expect(EmbeddingRequestSchema.safeParse({ model: 'e', input: 'a', encoding_format: 'hex' }).success).toBe(false);
    });
  });
});
