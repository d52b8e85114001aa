import { Readable } from 'node:stream';
import type { FastifyReply } from 'fastify';
import type { ErrorPayload } from '../errors.js';
import type { StreamEvent } from '../services/stream-normalizer.js';

export interface StreamSummary {
  chunks: number;
  error?: ErrorPayload;
}

export function sseRecord(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/**
 * Frames stream events as SSE records. A normal end is marked with `[DONE]`; an
 * error event is written as the last record and `[DONE]` is left out.
 */
export async function* toSseRecords(
  events: AsyncIterable<StreamEvent>,
  summary: StreamSummary
): AsyncGenerator<string, void, undefined> {
  for await (const event of events) {
    if (event.type === 'error') {
      summary.error = event.payload;
      yield sseRecord(event.payload);
      return;
    }

    summary.chunks += 1;
    yield sseRecord(event.payload);
  }

  yield 'data: [DONE]\n\n';
}

export function sendEventStream(reply: FastifyReply, records: AsyncIterable<string>): FastifyReply {
  return reply
    .code(200)
    .header('content-type', 'text/event-stream; charset=utf-8')
    .header('cache-control', 'no-cache')
    .header('x-accel-buffering', 'no')
    .send(Readable.from(records));
}
