import { vi } from 'vitest';
import { ProviderConfigSchema, type ProviderConfig, type ProviderConfigInput } from '../../src/schemas/config.js';

export function providerConfig(input: ProviderConfigInput): ProviderConfig {
  return ProviderConfigSchema.parse(input);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/** A `text/event-stream` body delivered as the given fragments. */
export function sseResponse(fragments: string[], status = 200): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const fragment of fragments) {
        controller.enqueue(encoder.encode(fragment));
      }
      controller.close();
    },
  });
  return new Response(body, { status, headers: { 'content-type': 'text/event-stream' } });
}

export interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * fetch stand-in that answers from a queue of responses and records every call.
 * Once the queue is drained the last response factory keeps answering.
 */
export function fakeFetch(...responses: Array<() => Response>) {
  const calls: RecordedCall[] = [];

  const impl = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({
      url: typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url,
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });

    const next = responses.length > 1 ? responses.shift() : responses[0];
    if (!next) throw new Error('fakeFetch has no response configured');
    return next();
  });

  return { impl, calls };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
