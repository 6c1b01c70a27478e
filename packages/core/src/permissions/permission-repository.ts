import type { PermissionLookup, UserId } from '@sessionkit/auth-core';
import type { QueryExecutor } from '@sessionkit/database';
import { z } from 'zod';

export const USER_PERMISSIONS_TABLE = 'user_permissions';

const PermissionRowSchema = z.object({ permission: z.string() });

export class PostgresPermissionLookup implements PermissionLookup {
  constructor(
    private readonly executor: QueryExecutor,
    private readonly table: string = USER_PERMISSIONS_TABLE
  ) {}

  async getPermissions(userId: UserId): Promise<string[]> {
    const result = await this.executor.query(
      `SELECT permission FROM ${this.table} WHERE user_id = $1`,
      [userId]
    );
    return result.rows.map((row) => PermissionRowSchema.parse(row).permission);
  }
}
