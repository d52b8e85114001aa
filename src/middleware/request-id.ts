import type { FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

/** Keeps a caller-supplied id when it is usable, otherwise a fresh UUID. */
export function generateRequestId(incoming: string | string[] | undefined): string {
  const value = Array.isArray(incoming) ? incoming[0] : incoming;
  return value && value.trim() && value.length <= 200 ? value.trim() : randomUUID();
}

export async function requestIdMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  reply.header(REQUEST_ID_HEADER, request.id);
}
