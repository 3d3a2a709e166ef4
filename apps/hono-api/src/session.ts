/**
 * In-memory session registry
 *
 * A session is created at login and looked up by the opaque id carried in the session
 * cookie. Sessions do not survive a restart. A session left idle for `idleTimeoutMs` is
 * dropped on its next lookup or at the next login; beyond `maxSessions` the least recently
 * used session is evicted.
 */

import type { Actor } from '@jwp-tracker/core';
import { createId } from '@paralleldrive/cuid2';

export interface Session {
  readonly id: string;
  readonly actor: Actor;
  /** Set while a save for this session is running */
  saving: boolean;
  lastSeenAt: number;
}

export interface SessionRegistry {
  create(actor: Actor): Session;
  get(id: string | undefined): Session | undefined;
  destroy(id: string | undefined): boolean;
  readonly size: number;
}

export interface SessionRegistryOptions {
  generateId?: () => string;
  /** Default: 8 hours */
  idleTimeoutMs?: number;
  /** Default: 1000 */
  maxSessions?: number;
  /** Milliseconds since the epoch (default: Date.now) */
  clock?: () => number;
}

const DEFAULT_IDLE_TIMEOUT_MS = 8 * 60 * 60 * 1000;
const DEFAULT_MAX_SESSIONS = 1000;

export const createSessionRegistry = (options: SessionRegistryOptions = {}): SessionRegistry => {
  const generateId = options.generateId ?? createId;
  const idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
  const maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
  const clock = options.clock ?? Date.now;

  // Insertion order doubles as recency order: a lookup moves the session to the end.
  const sessions = new Map<string, Session>();

  const isExpired = (session: Session, now: number): boolean => now - session.lastSeenAt > idleTimeoutMs;

  const sweep = (now: number): void => {
    for (const [id, session] of sessions) {
      if (isExpired(session, now)) {
        sessions.delete(id);
      }
    }
  };

  return {
    create: (actor: Actor): Session => {
      const now = clock();
      sweep(now);
      while (sessions.size >= maxSessions) {
        const oldest = sessions.keys().next();
        if (oldest.done) {
          break;
        }
        sessions.delete(oldest.value);
      }

      const session: Session = { id: generateId(), actor, saving: false, lastSeenAt: now };
      sessions.set(session.id, session);
      return session;
    },

    get: (id: string | undefined): Session | undefined => {
      const session = id === undefined ? undefined : sessions.get(id);
      if (!session) {
        return undefined;
      }

      const now = clock();
      sessions.delete(session.id);
      if (isExpired(session, now)) {
        return undefined;
      }
      session.lastSeenAt = now;
      sessions.set(session.id, session);
      return session;
    },

    destroy: (id: string | undefined): boolean => (id === undefined ? false : sessions.delete(id)),

    get size(): number {
      return sessions.size;
    },
  };
};
