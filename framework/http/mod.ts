/**
 * Layer 1: HTTP
 *
 * The request Context, status table, response helpers and the finalizer
 * that commits each response exactly once.
 */

export {
  Context,
  type ContextOptions,
  type BeforeSendCallback,
  type AfterSendCallback,
} from './context.ts';
export {
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
  type ErrorPayload,
} from './errors.ts';
export { commit, toResponse, resolvedStatus } from './finalizer.ts';
export {
  registerFormat,
  mediaTypesFor,
  contentTypeFor,
  formatForMediaType,
  type Format,
  type KnownFormat,
} from './formats.ts';
export { readRequest, parseCookies, type RequestData, type Params } from './request.ts';
export {
  text,
  html,
  json,
  sendResp,
  redirect,
  putRespContentType,
  putFormat,
  putLayout,
  putView,
  type RedirectTarget,
} from './response.ts';
export {
  lookupStatus,
  reasonPhrase,
  isRedirectStatus,
  type StatusInput,
  type StatusEntry,
} from './status.ts';
