import type { PermissionLookup, SessionStore } from './interfaces.js';
import type { Session, SessionId, UserId } from './types.js';

function cloneSession(session: Session): Session {
  return {
    ...session,
    createdAt: new Date(session.createdAt.getTime()),
    lastUseAt: new Date(session.lastUseAt.getTime()),
  };
}

/**
 * Process-local session store for tests and single-node development
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<SessionId, Session>();

  async save(session: Session): Promise<void> {
    this.sessions.set(session.id, cloneSession(session));
  }

  async update(session: Session): Promise<boolean> {
    const existing = this.sessions.get(session.id);
    if (!existing) {
      return false;
    }
    this.sessions.set(session.id, {
      ...existing,
      lastUseAt: new Date(Math.max(existing.lastUseAt.getTime(), session.lastUseAt.getTime())),
      secretHash: session.secretHash,
    });
    return true;
  }

  async get(id: SessionId): Promise<Session | null> {
    const session = this.sessions.get(id);
    return session ? cloneSession(session) : null;
  }

  async delete(id: SessionId): Promise<void> {
    this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  listByUser(userId: UserId): Session[] {
    return Array.from(this.sessions.values())
      .filter((session) => session.userId === userId)
      .map(cloneSession);
  }
}

export class StaticPermissionLookup implements PermissionLookup {
  private readonly grants: Map<UserId, readonly string[]>;

  constructor(grants: Record<UserId, readonly string[]> = {}) {
    this.grants = new Map(Object.entries(grants));
  }

  async getPermissions(userId: UserId): Promise<string[]> {
    return [...(this.grants.get(userId) ?? [])];
  }
}
