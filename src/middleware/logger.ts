import pino, { type Logger } from 'pino';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'openai-bridge-gateway' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['apiKey', '*.apiKey', 'headers.authorization', 'headers["x-api-key"]'],
    censor: '[redacted]',
  },
});

export type { Logger };
