/**
 * Gantry
 *
 * Controller pipeline, content-negotiated rendering and flash messages for
 * Fetch-style request handling on Node.js.
 *
 * @module gantry
 */

// Application
export {
  Application,
  createApp,
  type ApplicationOptions,
  type Route,
  type RouteTarget,
} from './app.ts';

// Layer 1: HTTP
export {
  Context,
  HttpError,
  DoubleCommitError,
  TemplateNotFoundError,
  UnsupportedFormatError,
  InvalidStatusError,
  RedirectMisuseError,
  UnknownActionError,
  NoResponseError,
  SessionNotFetchedError,
  FlashNotFetchedError,
  RequestAbortedError,
  PipelineSealedError,
  ControllerDefinitionError,
  commit,
  toResponse,
  registerFormat,
  contentTypeFor,
  lookupStatus,
  reasonPhrase,
  text,
  html,
  json,
  sendResp,
  redirect,
  putRespContentType,
  putFormat,
  putLayout,
  putView,
  type ContextOptions,
  type ErrorPayload,
  type Format,
  type Params,
  type RedirectTarget,
  type StatusInput,
} from './http/mod.ts';

// Layer 2: Middleware
export {
  Pipeline,
  always,
  only,
  except,
  defineStage,
  acceptFormats,
  negotiate,
  resolveFormat,
  fetchSession,
  fetchFlash,
  FLASH_SESSION_KEY,
  type ActionGuard,
  type ActionPredicate,
  type NamedStage,
  type Stage,
  type StageFn,
  type AcceptFormatsOptions,
  type NegotiationOptions,
  type FetchFlashOptions,
} from './middleware/mod.ts';

// Layer 3: Sessions
export {
  Session,
  MemorySessionStore,
  type SessionData,
  type SessionOptions,
  type SessionStore,
} from './session/mod.ts';

// Layer 4: Flash
export { FlashStore, type SerializedFlash } from './flash/mod.ts';

// Layer 5: Controllers
export {
  Controller,
  ControllerDefinition,
  defineController,
  dispatchAction,
  autoRender,
  type ControllerClass,
  type ControllerOptions,
  type FallbackHandler,
} from './controller/mod.ts';

// Layer 6: Views
export {
  RenderDispatcher,
  TemplateRegistry,
  type RenderDispatcherOptions,
  type ResolutionKey,
  type Template,
  type TemplateAssigns,
  type TemplateRef,
  type TemplateResolver,
} from './view/mod.ts';

// Layer 7: Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './telemetry/mod.ts';

// Layer 8: Configuration
export { Config, loadConfig, type ConfigOptions } from './config/mod.ts';
