/**
 * Error taxonomy shared by the adapters, the dispatch layer and the HTTP routes.
 * Every gateway error knows how to render itself as an OpenAI-style error body.
 */

export type ErrorPayload = {
  error: {
    message: string;
    type: string;
    code: string | number | null;
    param?: string;
  };
};

export abstract class GatewayError extends Error {
  abstract readonly type: string;
  abstract readonly statusCode: number;

  get code(): string | number | null {
    return null;
  }

  toPayload(): ErrorPayload {
    return {
      error: {
        message: this.message,
        type: this.type,
        code: this.code,
      },
    };
  }
}

export class ConfigurationError extends GatewayError {
  readonly type = 'configuration_error';
  readonly statusCode = 503;
  name = 'ConfigurationError';

  get code(): string {
    return 'provider_unavailable';
  }
}

export class ValidationError extends GatewayError {
  readonly type = 'invalid_request_error';
  readonly statusCode = 400;
  name = 'ValidationError';

  constructor(message: string, readonly param?: string) {
    super(message);
  }

  toPayload(): ErrorPayload {
    const payload = super.toPayload();
    if (this.param) {
      payload.error.param = this.param;
    }
    return payload;
  }
}

export class UpstreamHTTPError extends GatewayError {
  readonly type = 'platform_error';
  name = 'UpstreamHTTPError';

  constructor(readonly upstreamStatus: number, readonly upstreamBody?: unknown) {
    super(`Platform API error: ${upstreamStatus}`);
  }

  get statusCode(): number {
    return this.upstreamStatus;
  }

  get code(): number {
    return this.upstreamStatus;
  }
}

export class UpstreamConnectionError extends GatewayError {
  readonly type = 'platform_error';
  readonly statusCode = 502;
  name = 'UpstreamConnectionError';

  get code(): number {
    return 502;
  }
}

export class UpstreamTimeoutError extends GatewayError {
  readonly type = 'timeout_error';
  readonly statusCode = 504;
  name = 'UpstreamTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Upstream request timed out after ${timeoutMs}ms`);
  }

  get code(): string {
    return 'timeout';
  }
}

/** The upstream reported a failure inside an already-open stream. */
export class UpstreamStreamError extends GatewayError {
  readonly type = 'platform_error';
  readonly statusCode = 502;
  name = 'UpstreamStreamError';

  get code(): string {
    return 'stream_failed';
  }
}

/** Provider returned a body none of the adapter's known shapes match. Recovered locally. */
export class TransformError extends GatewayError {
  readonly type = 'transform_error';
  readonly statusCode = 502;
  name = 'TransformError';

  constructor(message: string, readonly responseKeys: string[] = []) {
    super(message);
  }
}

export class InternalError extends GatewayError {
  readonly type = 'internal_error';
  readonly statusCode = 500;
  name = 'InternalError';

  constructor(message: string, readonly original?: unknown) {
    super(message);
  }

  get code(): string {
    return 'processing_error';
  }
}

export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(`Internal error: ${message}`, error);
}

export function isErrorPayload(value: unknown): value is ErrorPayload {
  if (typeof value !== 'object' || value === null || !('error' in value)) {
    return false;
  }
  const inner = value.error;
  return typeof inner === 'object' && inner !== null && 'type' in inner && 'message' in inner;
}

const STATUS_BY_TYPE: Record<string, number> = {
  invalid_request_error: 400,
  configuration_error: 503,
  timeout_error: 504,
  invalid_response: 502,
};

/** HTTP status to answer with when a request ends in the given error payload. */
export function statusForPayload(payload: ErrorPayload): number {
  const { type, code } = payload.error;
  if (type === 'platform_error') {
    return typeof code === 'number' && code >= 400 && code <= 599 ? code : 502;
  }
  return STATUS_BY_TYPE[type] ?? 500;
}
