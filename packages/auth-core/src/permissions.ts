import type { Logger } from '@sessionkit/observability';
import { PermissionLookupError } from './errors.js';
import type { PermissionLookup } from './interfaces.js';
import type { PermissionLookupFailurePolicy, UserId } from './types.js';

export function normalizePermissions(permissions: readonly string[]): string[] {
  return Array.from(new Set(permissions.filter((permission) => permission.length > 0))).sort();
}

/**
 * Resolve a user's current permissions under the configured failure policy
 */
export async function resolvePermissions(
  lookup: PermissionLookup,
  userId: UserId,
  policy: PermissionLookupFailurePolicy,
  logger: Logger
): Promise<string[]> {
  try {
    return normalizePermissions(await lookup.getPermissions(userId));
  } catch (error) {
    if (policy === 'fail') {
      throw new PermissionLookupError(`Permission lookup failed for user ${userId}`, {
        cause: error,
      });
    }
    logger.warn({ userId, err: error }, 'session.permission_lookup_failed');
    return [];
  }
}
