/**
 * Flash Stage
 *
 * Hydrates the Flash Store from the session and writes it back when the
 * response is committed. Only persisted messages survive, plus, on redirects,
 * the messages written during this request.
 */

import { FlashStore } from '../flash/flash.ts';
import { resolvedStatus } from '../http/finalizer.ts';
import { isRedirectStatus } from '../http/status.ts';
import { defineStage, type NamedStage } from './pipeline.ts';

export const FLASH_SESSION_KEY = '_flash';

export interface FetchFlashOptions {
  /** Keep messages written before a redirect for the next request. */
  keepOnRedirect?: boolean;
}

export function fetchFlash(options: FetchFlashOptions = {}): NamedStage {
  const keepOnRedirect = options.keepOnRedirect ?? true;

  return defineStage('fetchFlash', (ctx) => {
    if (ctx.hasFlash) return;

    const session = ctx.session;
    const store = FlashStore.hydrate(session.get(FLASH_SESSION_KEY));
    session.delete(FLASH_SESSION_KEY);
    ctx.putFlashStore(store);

    ctx.registerBeforeSend((committing) => {
      const status = resolvedStatus(committing);
      const redirecting = status !== undefined && isRedirectStatus(status);
      const serialized = store.serialize({ keepWritten: keepOnRedirect && redirecting });

      if (serialized) {
        session.set(FLASH_SESSION_KEY, serialized);
      } else {
        session.delete(FLASH_SESSION_KEY);
      }
    });
  });
}
