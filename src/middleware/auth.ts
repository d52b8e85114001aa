import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ErrorPayload } from '../errors.js';
import {
  hasPermission,
  type ClientAuthenticator,
  type ClientIdentity,
  type Permission,
} from '../services/client-auth.js';
import { logger } from './logger.js';

declare module 'fastify' {
  interface FastifyRequest {
    client?: ClientIdentity;
  }
}

function reject(reply: FastifyReply, statusCode: number, payload: ErrorPayload): FastifyReply {
  return reply.code(statusCode).send(payload);
}

/** preHandler that authenticates the caller and checks one permission. */
export function requirePermission(
  authenticator: ClientAuthenticator,
  permission: Permission
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined> {
  return async (request, reply) => {
    const identity = authenticator.authenticate(request.headers.authorization);

    if (!identity) {
      logger.warn({ requestId: request.id, url: request.url }, 'Rejected API key');
      return reject(reply, 401, {
        error: {
          message: 'Invalid or missing API key',
          type: 'invalid_request_error',
          code: 'invalid_api_key',
        },
      });
    }

    if (!hasPermission(identity, permission)) {
      logger.warn({ requestId: request.id, keyId: identity.keyId, permission }, 'Insufficient permissions');
      return reject(reply, 403, {
        error: {
          message: `Insufficient permissions. Required: ${permission}`,
          type: 'permission_error',
          code: 'insufficient_permissions',
        },
      });
    }

    request.client = identity;
    return undefined;
  };
}
