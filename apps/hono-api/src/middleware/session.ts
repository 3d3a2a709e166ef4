import type { Context } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';
import { createMiddleware } from 'hono/factory';
import { HTTPException } from 'hono/http-exception';
import type { AppEnv } from '../env.js';
import type { Session, SessionRegistry } from '../session.js';

export const SESSION_COOKIE = 'jwp_session';

/** Resolves the session cookie into the `session` context variable */
export const sessionMiddleware = (sessions: SessionRegistry) =>
  createMiddleware<AppEnv>(async (c, next) => {
    c.set('session', sessions.get(getCookie(c, SESSION_COOKIE)));
    await next();
  });

export const startSession = (c: Context<AppEnv>, session: Session): void => {
  setCookie(c, SESSION_COOKIE, session.id, { httpOnly: true, sameSite: 'Lax', path: '/' });
};

export const endSession = (c: Context<AppEnv>, sessions: SessionRegistry): void => {
  sessions.destroy(getCookie(c, SESSION_COOKIE));
  deleteCookie(c, SESSION_COOKIE, { path: '/' });
};

/** @throws {HTTPException} 401 when nobody is logged in */
export const requireSession = (c: Context<AppEnv>): Session => {
  const session = c.get('session');
  if (!session) {
    throw new HTTPException(401, { message: 'Please log in first.' });
  }
  return session;
};

/** Rejects everyone but the admin with 401 or 403 */
export const requireAdmin = createMiddleware<AppEnv>(async (c, next) => {
  if (requireSession(c).actor.role !== 'admin') {
    throw new HTTPException(403, { message: 'Admin access required.' });
  }
  await next();
});
