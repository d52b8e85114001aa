import { logger as rootLogger, type Logger } from '../middleware/logger.js';
import {
  GatewayError,
  InternalError,
  UpstreamConnectionError,
  UpstreamTimeoutError,
} from '../errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type InboundHeaders = Record<string, string | string[] | undefined>;

export interface UpstreamResponseEnvelope {
  statusCode: number;
  headers: Record<string, string>;
  rawBytes: Uint8Array;
  json: unknown | null;
}

export interface ProviderAuth {
  headers: Record<string, string>;
  query: Record<string, string>;
}

export interface UpstreamRequestOptions {
  method: HttpMethod;
  url: string;
  headers?: InboundHeaders;
  body?: unknown;
  query?: Record<string, string>;
  /** Aborts the upstream call when the caller goes away. */
  signal?: AbortSignal;
}

export type UpstreamStream =
  | {
      ok: true;
      statusCode: number;
      headers: Record<string, string>;
      fragments: AsyncGenerator<string, void, undefined>;
    }
  | { ok: false; envelope: UpstreamResponseEnvelope };

export interface ProviderClientOptions {
  providerName: string;
  timeoutMs: number;
  defaultHeaders?: Record<string, string>;
  auth: ProviderAuth;
}

const STRIPPED_HEADERS = new Set([
  'authorization',
  'x-api-key',
  'cookie',
  'host',
  'content-length',
  'content-type',
  'connection',
  'keep-alive',
  'transfer-encoding',
  'upgrade',
  'te',
  'trailer',
]);

interface CallTimer {
  signal: AbortSignal;
  timedOut(): boolean;
  abort(): void;
  dispose(): void;
}

/**
 * HTTP transport for one upstream provider. Injects provider auth, applies the
 * per-call timeout and exposes either a buffered envelope or a lazy text stream.
 */
export class ProviderClient {
  constructor(
    private readonly options: ProviderClientOptions,
    private readonly requestLogger: Logger = rootLogger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  /**
   * Merge order: configured default headers, caller headers without the ones that
   * would conflict with ours, then provider auth.
   */
  prepareHeaders(callerHeaders: InboundHeaders = {}): Record<string, string> {
    const headers: Record<string, string> = { ...this.options.defaultHeaders };

    for (const [name, value] of Object.entries(callerHeaders)) {
      if (value === undefined || STRIPPED_HEADERS.has(name.toLowerCase())) continue;
      headers[name] = Array.isArray(value) ? value.join(', ') : value;
    }

    return {
      ...headers,
      ...this.options.auth.headers,
      'Content-Type': 'application/json',
    };
  }

  buildUrl(url: string, query: Record<string, string> = {}): string {
    const target = new URL(url);
    for (const [key, value] of Object.entries({ ...query, ...this.options.auth.query })) {
      target.searchParams.set(key, value);
    }
    return target.toString();
  }

  async request(options: UpstreamRequestOptions): Promise<UpstreamResponseEnvelope> {
    const timer = this.startTimer(options.signal);

    try {
      const response = await this.send(options, timer.signal);
      const rawBytes = new Uint8Array(await response.arrayBuffer());
      const envelope = this.toEnvelope(response, rawBytes);

      this.requestLogger.debug({
        provider: this.options.providerName,
        status: envelope.statusCode,
        hasJson: envelope.json !== null,
      }, 'Upstream response received');

      return envelope;
    } catch (error) {
      throw this.translateFailure(error, options, timer);
    } finally {
      timer.dispose();
    }
  }

  /**
   * Opens a streaming call. A non-2xx status is returned as a buffered envelope;
   * otherwise the body is handed out as decoded text fragments. Stopping the
   * fragment iteration early aborts the connection.
   */
  async stream(options: UpstreamRequestOptions): Promise<UpstreamStream> {
    const timer = this.startTimer(options.signal);

    let response: Response;
    try {
      response = await this.send(options, timer.signal);
    } catch (error) {
      timer.dispose();
      throw this.translateFailure(error, options, timer);
    }

    if (!response.ok || !response.body) {
      try {
        const rawBytes = new Uint8Array(await response.arrayBuffer());
        const envelope = this.toEnvelope(response, rawBytes);
        if (response.ok) {
          return { ok: true, statusCode: envelope.statusCode, headers: envelope.headers, fragments: emptyFragments() };
        }
        return { ok: false, envelope };
      } catch (error) {
        throw this.translateFailure(error, options, timer);
      } finally {
        timer.dispose();
      }
    }

    return {
      ok: true,
      statusCode: response.status,
      headers: headersToObject(response.headers),
      fragments: this.readFragments(response.body, options, timer),
    };
  }

  private async *readFragments(
    body: ReadableStream<Uint8Array>,
    options: UpstreamRequestOptions,
    timer: CallTimer
  ): AsyncGenerator<string, void, undefined> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let finished = false;

    try {
      while (true) {
        const result = await reader.read().catch((error: unknown) => {
          throw this.translateFailure(error, options, timer);
        });

        if (result.done) {
          finished = true;
          break;
        }

        const text = decoder.decode(result.value, { stream: true });
        if (text) {
          yield text;
        }
      }

      const tail = decoder.decode();
      if (tail) {
        yield tail;
      }
    } finally {
      timer.dispose();
      if (!finished) {
        timer.abort();
        this.requestLogger.debug({ provider: this.options.providerName }, 'Upstream stream closed early');
      }
    }
  }

  private send(options: UpstreamRequestOptions, signal: AbortSignal): Promise<Response> {
    const url = this.buildUrl(options.url, options.query);

    this.requestLogger.debug({
      provider: this.options.providerName,
      method: options.method,
      url: options.url,
    }, 'Making upstream request');

    return this.fetchImpl(url, {
      method: options.method,
      headers: this.prepareHeaders(options.headers),
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal,
    });
  }

  private toEnvelope(response: Response, rawBytes: Uint8Array): UpstreamResponseEnvelope {
    let json: unknown | null = null;
    const text = new TextDecoder().decode(rawBytes);

    if (text.trim()) {
      try {
        json = JSON.parse(text);
      } catch (error) {
        this.requestLogger.warn({
          provider: this.options.providerName,
          error: error instanceof Error ? error.message : String(error),
        }, 'Failed to parse upstream JSON response');
      }
    }

    return {
      statusCode: response.status,
      headers: headersToObject(response.headers),
      rawBytes,
      json,
    };
  }

  private startTimer(callerSignal?: AbortSignal): CallTimer {
    const controller = new AbortController();
    let expired = false;

    const timeoutId = setTimeout(() => {
      expired = true;
      controller.abort();
    }, this.options.timeoutMs);

    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    return {
      signal: controller.signal,
      timedOut: () => expired,
      abort: () => controller.abort(),
      dispose: () => {
        clearTimeout(timeoutId);
        callerSignal?.removeEventListener('abort', onCallerAbort);
      },
    };
  }

  private translateFailure(error: unknown, options: UpstreamRequestOptions, timer: CallTimer): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);

    if (timer.timedOut()) {
      this.requestLogger.error({ provider: this.options.providerName, url: options.url }, 'Upstream request timed out');
      return new UpstreamTimeoutError(this.options.timeoutMs);
    }

    if (options.signal?.aborted) {
      return new InternalError('Request cancelled by client');
    }

    this.requestLogger.error({
      provider: this.options.providerName,
      url: options.url,
      error: message,
    }, 'Upstream request failed');

    return new UpstreamConnectionError(`Failed to reach ${this.options.providerName}: ${message}`);
  }
}

export function headersToObject(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

async function* emptyFragments(): AsyncGenerator<string, void, undefined> {}
