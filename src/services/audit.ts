import { logger as rootLogger, type Logger } from '../middleware/logger.js';

export interface AuditEntry {
  requestId: string;
  endpoint: string;
  model: string;
  stream: boolean;
  statusCode: number;
  durationMs: number;
  clientKeyId?: string;
  request: unknown;
  response?: unknown;
}

/** Receives one entry per proxied call, after the response has been produced. */
export interface AuditSink {
  record(entry: AuditEntry): void | Promise<void>;
}

export class LoggerAuditSink implements AuditSink {
  constructor(private readonly log: Logger = rootLogger) {}

  record(entry: AuditEntry): void {
    this.log.info({ audit: entry }, 'Request completed');
  }
}

/** Sink failures are logged and never reach the caller. */
export async function recordAudit(sink: AuditSink, entry: AuditEntry, log: Logger = rootLogger): Promise<void> {
  try {
    await sink.record(entry);
  } catch (error) {
    log.error({
      requestId: entry.requestId,
      error: error instanceof Error ? error.message : String(error),
    }, 'Audit sink failed');
  }
}
