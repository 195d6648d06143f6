/**
 * Format Negotiation
 *
 * Picks the response format for a request. In order of precedence:
 * 1. a format set explicitly by the action (`putFormat`, `putRespContentType`)
 * 2. the `_format` request param, which must be one of the accepted formats
 * 3. the Accept header, matched against the accepted formats' media types
 * 4. the default format (or the first accepted one when the default is not)
 */

import Negotiator from 'negotiator';
import type { Context } from '../http/context.ts';
import { UnsupportedFormatError } from '../http/errors.ts';
import { formatForMediaType, mediaTypesFor, type Format } from '../http/formats.ts';
import { defineStage, type NamedStage } from './pipeline.ts';

export interface NegotiationOptions {
  /** Request param carrying an explicit format. */
  param?: string;
  defaultFormat?: Format;
}

export type Negotiated =
  | { ok: true; format: Format; source: 'param' | 'header' | 'default' }
  | { ok: false; requested: string };

const DEFAULT_PARAM = '_format';
const DEFAULT_FORMAT: Format = 'html';

function requestedFormat(ctx: Context, param: string): string | undefined {
  const value = ctx.params[param];
  return typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : undefined;
}

function fromAcceptHeader(accept: string, accepted: readonly Format[]): Negotiated | undefined {
  const candidates = new Map<string, Format>();
  for (const format of accepted) {
    for (const type of mediaTypesFor(format)) {
      if (!candidates.has(type)) candidates.set(type, format);
    }
  }
  if (candidates.size === 0) return undefined;

  const negotiator = new Negotiator({ headers: { accept } });
  const [preferred] = negotiator.mediaTypes([...candidates.keys()]);
  if (preferred === undefined) {
    return { ok: false, requested: formatForMediaType(accept) ?? accept };
  }
  const format = candidates.get(preferred.toLowerCase());
  return format === undefined ? undefined : { ok: true, format, source: 'header' };
}

/**
 * Negotiate the request's format against `accepted` (empty means anything
 * goes) without throwing
 */
export function negotiate(
  ctx: Context,
  accepted: readonly Format[],
  options: NegotiationOptions = {}
): Negotiated {
  const requested = requestedFormat(ctx, options.param ?? DEFAULT_PARAM);
  if (requested !== undefined) {
    if (accepted.length > 0 && !accepted.includes(requested)) {
      return { ok: false, requested };
    }
    return { ok: true, format: requested, source: 'param' };
  }

  const accept = ctx.requestHeaders.get('Accept');
  if (accept && accepted.length > 0) {
    const fromHeader = fromAcceptHeader(accept, accepted);
    if (fromHeader) return fromHeader;
  }

  const fallback = options.defaultFormat ?? DEFAULT_FORMAT;
  const format = accepted.length === 0 || accepted.includes(fallback) ? fallback : accepted[0];
  return { ok: true, format: format ?? fallback, source: 'default' };
}

/**
 * The format a response for `ctx` is rendered in.
 * Throws `UnsupportedFormatError` when the request asks for a format the
 * controller does not accept.
 */
export function resolveFormat(ctx: Context, options: NegotiationOptions = {}): Format {
  if (ctx.formatOverride !== undefined) {
    return ctx.formatOverride;
  }

  const accepted = ctx.acceptedFormats ?? [];
  const result = negotiate(ctx, accepted, options);
  if (!result.ok) {
    throw new UnsupportedFormatError(result.requested, accepted);
  }
  return result.format;
}

export interface AcceptFormatsOptions extends NegotiationOptions {
  /** Reject unacceptable requests in this stage instead of at render time. */
  strict?: boolean;
}

/**
 * Stage declaring the formats a controller answers with
 */
export function acceptFormats(formats: readonly Format[], options: AcceptFormatsOptions = {}): NamedStage {
  const accepted = [...formats];

  return defineStage('acceptFormats', (ctx) => {
    ctx.acceptedFormats = accepted;
    const result = negotiate(ctx, accepted, { ...ctx.renderer?.negotiation, ...options });

    if (result.ok) {
      ctx.format = result.format;
      return;
    }

    ctx.logger.debug('Requested format is not accepted', { requested: result.requested, accepted });
    if (options.strict) {
      throw new UnsupportedFormatError(result.requested, accepted);
    }
  });
}
