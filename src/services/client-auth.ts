import { z } from 'zod';

export const PermissionSchema = z.enum(['admin', 'chat', 'completion', 'embedding']);

export type Permission = z.infer<typeof PermissionSchema>;

export interface ClientIdentity {
  keyId: string;
  permissions: ReadonlySet<Permission>;
}

/** Decides who is calling from the inbound `Authorization` header. */
export interface ClientAuthenticator {
  /** Null when the caller is rejected. */
  authenticate(authorization: string | undefined): ClientIdentity | null;
}

const DEFAULT_PERMISSIONS: Permission[] = ['chat', 'completion', 'embedding'];
const ALL_PERMISSIONS: Permission[] = ['admin', ...DEFAULT_PERMISSIONS];

export function hasPermission(identity: ClientIdentity, permission: Permission): boolean {
  return identity.permissions.has('admin') || identity.permissions.has(permission);
}

export function extractBearerToken(authorization: string | undefined): string | null {
  if (!authorization) return null;
  const match = /^Bearer\s+(.+)$/i.exec(authorization.trim());
  return match?.[1]?.trim() || null;
}

/**
 * Keys come from configuration as `key` or `key:perm1|perm2`. A bare key gets
 * chat, completion and embedding. With no keys configured every caller is
 * accepted as `anonymous` with all permissions.
 */
export class StaticKeyAuthenticator implements ClientAuthenticator {
  private readonly keys = new Map<string, ClientIdentity>();

  constructor(entries: string[]) {
    entries.forEach((entry, index) => {
      const separator = entry.indexOf(':');
      const key = separator === -1 ? entry : entry.slice(0, separator);
      const permissions = separator === -1
        ? DEFAULT_PERMISSIONS
        : entry
            .slice(separator + 1)
            .split('|')
            .map((name) => PermissionSchema.parse(name.trim()));

      this.keys.set(key, { keyId: `key-${index + 1}`, permissions: new Set(permissions) });
    });
  }

  get enabled(): boolean {
    return this.keys.size > 0;
  }

  authenticate(authorization: string | undefined): ClientIdentity | null {
    if (!this.enabled) {
      return { keyId: 'anonymous', permissions: new Set(ALL_PERMISSIONS) };
    }

    const token = extractBearerToken(authorization);
    return token ? this.keys.get(token) ?? null : null;
  }
}
