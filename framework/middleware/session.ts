/**
 * Session Stage
 *
 * Loads the session named by the request cookie, attaches it to the
 * Context, sets the cookie for new sessions when the response is committed
 * and saves the session once the response has been sent.
 */

import { Session, DEFAULT_SESSION_OPTIONS, type SessionOptions, type SessionStore } from '../session/session.ts';
import { defineStage, type NamedStage } from './pipeline.ts';

export function fetchSession(store: SessionStore, options: SessionOptions = {}): NamedStage {
  const opts = { ...DEFAULT_SESSION_OPTIONS, ...options };

  return defineStage('fetchSession', async (ctx) => {
    if (ctx.hasSession) return;

    const sessionId = ctx.cookies.get(opts.name) ?? null;
    const session = new Session(sessionId, opts);
    if (sessionId !== null) {
      await session.load(store);
    }
    ctx.putSession(session);

    ctx.registerBeforeSend((committing) => {
      if (session.getIsNew()) {
        committing.appendRespHeader('Set-Cookie', session.toCookie());
      }
    });

    ctx.registerAfterSend(async () => {
      await session.save(store);
    });
  });
}
