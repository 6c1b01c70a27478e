import type { Session, SessionId, SessionStore } from '@sessionkit/auth-core';
import { PersistenceError, withPersistence } from '@sessionkit/auth-core';
import type { QueryExecutor, QueryRow } from '@sessionkit/database';
import { z } from 'zod';

export const SESSIONS_TABLE = 'auth_sessions';

const SessionRowSchema = z.object({
  id: z.string().uuid(),
  user_id: z.string().min(1),
  created_at: z.coerce.date(),
  last_use_at: z.coerce.date(),
  secret_hash: z.string().min(1),
});

function toSession(row: QueryRow): Session {
  const parsed = SessionRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PersistenceError('Stored session row is invalid', { cause: parsed.error });
  }
  return {
    id: parsed.data.id,
    userId: parsed.data.user_id,
    createdAt: parsed.data.created_at,
    lastUseAt: parsed.data.last_use_at,
    secretHash: parsed.data.secret_hash,
  };
}

/**
 * Session records in Postgres. `save` upserts by id and never moves last_use_at backwards.
 */
export class PostgresSessionStore implements SessionStore {
  constructor(
    private readonly executor: QueryExecutor,
    private readonly table: string = SESSIONS_TABLE
  ) {}

  async save(session: Session): Promise<void> {
    await withPersistence('save session', () =>
      this.executor.query(
        `INSERT INTO ${this.table} (id, user_id, created_at, last_use_at, secret_hash)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (id) DO UPDATE SET
           last_use_at = GREATEST(${this.table}.last_use_at, EXCLUDED.last_use_at),
           secret_hash = EXCLUDED.secret_hash`,
        [session.id, session.userId, session.createdAt, session.lastUseAt, session.secretHash]
      )
    );
  }

  async update(session: Session): Promise<boolean> {
    const result = await withPersistence('update session', () =>
      this.executor.query(
        `UPDATE ${this.table} SET
           last_use_at = GREATEST(last_use_at, $2),
           secret_hash = $3
         WHERE id = $1`,
        [session.id, session.lastUseAt, session.secretHash]
      )
    );
    return result.rowCount > 0;
  }

  async get(id: SessionId): Promise<Session | null> {
    const result = await withPersistence('load session', () =>
      this.executor.query(
        `SELECT id, user_id, created_at, last_use_at, secret_hash FROM ${this.table} WHERE id = $1`,
        [id]
      )
    );
    const row = result.rows[0];
    return row ? toSession(row) : null;
  }

  async delete(id: SessionId): Promise<void> {
    await withPersistence('delete session', () =>
      this.executor.query(`DELETE FROM ${this.table} WHERE id = $1`, [id])
    );
  }
}
