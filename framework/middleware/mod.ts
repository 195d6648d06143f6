/**
 * Layer 2: Middleware Layer
 *
 * Ordered request stages that run before and around a controller action.
 *
 * Responsibilities:
 * - Run stages in registration order, skipping those an action is guarded out of
 * - Stop at the first halt or commit
 * - Negotiate the response format
 * - Hydrate the session and flash, and write them back on commit
 */

export {
  Pipeline,
  always,
  only,
  except,
  defineStage,
  type ActionGuard,
  type ActionPredicate,
  type NamedStage,
  type Stage,
  type StageEntry,
  type StageFn,
} from './pipeline.ts';
export {
  acceptFormats,
  negotiate,
  resolveFormat,
  type AcceptFormatsOptions,
  type Negotiated,
  type NegotiationOptions,
} from './negotiation.ts';
export { fetchSession } from './session.ts';
export { fetchFlash, FLASH_SESSION_KEY, type FetchFlashOptions } from './flash.ts';
