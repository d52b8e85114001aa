import { logger as rootLogger, type Logger } from '../middleware/logger.js';
import { toGatewayError, type ErrorPayload, type GatewayError } from '../errors.js';
import type { ChatCompletionChunk, ChunkDelta, JsonObject } from '../schemas/request.js';
import { SseLineBuffer } from './sse-line-buffer.js';

/** What a provider interpreter makes of one upstream SSE record. */
export type StreamSignal =
  | { kind: 'role' }
  | { kind: 'keepalive' }
  | { kind: 'content'; text: string }
  | { kind: 'stop'; finishReason?: string }
  | { kind: 'error'; error: GatewayError }
  | { kind: 'passthrough'; payload: JsonObject };

export interface SseRecord {
  /** Value of the most recent `event:` line in the current SSE block, if any. */
  event: string | null;
  data: unknown;
}

export interface StreamInterpreter {
  /** Upstream chunks already announce the assistant role; no synthetic start chunk. */
  readonly announcesRole?: boolean;
  interpret(record: SseRecord): StreamSignal[];
  /** Runs once after the upstream body has ended. */
  finish?(): Promise<StreamSignal[]>;
}

export type StreamEvent =
  | { type: 'chunk'; payload: ChatCompletionChunk }
  | { type: 'passthrough'; payload: JsonObject }
  | { type: 'error'; payload: ErrorPayload };

export type NormalizerState = 'awaiting_data' | 'in_progress' | 'completed' | 'failed';

export interface StreamIdentity {
  id: string;
  model: string;
  created: number;
}

export function buildChunk(
  identity: StreamIdentity,
  delta: ChunkDelta,
  finishReason: string | null = null
): ChatCompletionChunk {
  return {
    id: identity.id,
    object: 'chat.completion.chunk',
    created: identity.created,
    model: identity.model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
}

/**
 * Turns upstream SSE text into OpenAI `chat.completion.chunk` events.
 *
 * Lines are processed only once complete, so the emitted events do not depend on
 * how the upstream split its body. `event:` lines set context for the following
 * `data:` lines; blank lines end an SSE block. Undecodable `data:` payloads are
 * logged and dropped. The first emitted chunk of a session is always preceded by a
 * single `delta.role = "assistant"` chunk unless the interpreter passes chunks
 * through that already carry the role.
 */
export class StreamNormalizer {
  private readonly lines = new SseLineBuffer();
  private currentEvent: string | null = null;
  private startEmitted = false;
  private contentEmitted = false;
  private currentState: NormalizerState = 'awaiting_data';

  constructor(
    private readonly interpreter: StreamInterpreter,
    private readonly identity: StreamIdentity,
    private readonly log: Logger = rootLogger
  ) {}

  get state(): NormalizerState {
    return this.currentState;
  }

  get currentEventType(): string | null {
    return this.currentEvent;
  }

  get hasEmittedContent(): boolean {
    return this.contentEmitted;
  }

  push(fragment: string): StreamEvent[] {
    return this.processLines(this.lines.push(fragment));
  }

  /** Processes whatever partial line is still buffered once the upstream ends. */
  end(): StreamEvent[] {
    return this.processLines(this.lines.flush());
  }

  async finish(): Promise<StreamEvent[]> {
    if (this.currentState === 'failed' || !this.interpreter.finish) {
      return [];
    }
    return this.apply(await this.interpreter.finish());
  }

  private processLines(lines: string[]): StreamEvent[] {
    const events: StreamEvent[] = [];
    for (const line of lines) {
      if (this.currentState === 'failed') break;
      events.push(...this.processLine(line));
    }
    return events;
  }

  private processLine(line: string): StreamEvent[] {
    if (line === '') {
      this.currentEvent = null;
      return [];
    }

    if (line.startsWith('event:')) {
      this.currentEvent = line.slice('event:'.length).trim();
      return [];
    }

    if (!line.startsWith('data:')) {
      return [];
    }

    const payload = line.slice('data:'.length).trim();
    if (!payload || payload === '[DONE]') {
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(payload);
    } catch (error) {
      this.log.warn({
        event: this.currentEvent,
        error: error instanceof Error ? error.message : String(error),
        preview: payload.slice(0, 120),
      }, 'Dropping undecodable SSE data line');
      return [];
    }

    return this.apply(this.interpreter.interpret({ event: this.currentEvent, data }));
  }

  private apply(signals: StreamSignal[]): StreamEvent[] {
    const events: StreamEvent[] = [];

    for (const signal of signals) {
      if (this.currentState === 'awaiting_data') {
        this.currentState = 'in_progress';
      }

      switch (signal.kind) {
        case 'role':
          this.announceStart(events);
          break;
        case 'keepalive':
          this.announceStart(events);
          events.push({ type: 'chunk', payload: buildChunk(this.identity, {}) });
          break;
        case 'content':
          this.announceStart(events);
          this.contentEmitted = true;
          events.push({ type: 'chunk', payload: buildChunk(this.identity, { content: signal.text }) });
          break;
        case 'stop':
          this.announceStart(events);
          this.currentState = 'completed';
          events.push({ type: 'chunk', payload: buildChunk(this.identity, {}, signal.finishReason ?? 'stop') });
          break;
        case 'passthrough':
          events.push({ type: 'passthrough', payload: signal.payload });
          break;
        case 'error':
          this.currentState = 'failed';
          this.log.error({ error: signal.error.message, type: signal.error.type }, 'Upstream stream reported failure');
          events.push({ type: 'error', payload: signal.error.toPayload() });
          return events;
      }
    }

    return events;
  }

  private announceStart(events: StreamEvent[]): void {
    if (this.startEmitted || this.interpreter.announcesRole) return;
    this.startEmitted = true;
    events.push({ type: 'chunk', payload: buildChunk(this.identity, { role: 'assistant' }) });
  }
}

/**
 * Pulls fragments one at a time and yields normalized events. Always terminates:
 * an upstream failure ends the sequence with one error event, and returning early
 * from the consumer side closes the fragment source.
 */
export async function* normalizeStream(
  fragments: AsyncIterable<string>,
  normalizer: StreamNormalizer,
  log: Logger = rootLogger
): AsyncGenerator<StreamEvent, void, undefined> {
  try {
    for await (const fragment of fragments) {
      yield* normalizer.push(fragment);
      if (normalizer.state === 'failed') return;
    }

    yield* normalizer.end();
    if (normalizer.state === 'failed') return;

    yield* await normalizer.finish();
  } catch (error) {
    const gatewayError = toGatewayError(error);
    log.error({ error: gatewayError.message, type: gatewayError.type }, 'Stream processing failed');
    yield { type: 'error', payload: gatewayError.toPayload() };
  }
}
