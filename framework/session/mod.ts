/**
 * Layer 3: Sessions
 *
 * Cookie-identified session data behind a pluggable store.
 */

export {
  Session,
  MemorySessionStore,
  DEFAULT_SESSION_OPTIONS,
  type SessionData,
  type SessionOptions,
  type SessionStore,
} from './session.ts';
