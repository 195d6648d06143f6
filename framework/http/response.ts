/**
 * Response Helpers
 *
 * Send text, HTML, JSON or raw bodies, redirect, and set the response
 * content type. Each sending helper commits the Context.
 */

import type { Context } from './context.ts';
import { RedirectMisuseError } from './errors.ts';
import { commit } from './finalizer.ts';
import { contentTypeFor, formatForMediaType, type Format } from './formats.ts';
import type { StatusInput } from './status.ts';

/**
 * Where a redirect points. `to` is a path inside the application,
 * `external` a fully qualified URL.
 */
export type RedirectTarget = { to: string } | { external: string };

function putDefaultContentType(ctx: Context, format: Format): void {
  if (ctx.getRespHeader('Content-Type') === null) {
    ctx.putRespHeader('Content-Type', contentTypeFor(format));
  }
}

/**
 * Set the Content-Type header. When the media type maps to a known format
 * it also becomes the explicit format used for rendering.
 */
export function putRespContentType(ctx: Context, contentType: string, charset: string | null = 'utf-8'): Context {
  const value = charset && !contentType.includes(';') ? `${contentType}; charset=${charset}` : contentType;
  ctx.putRespHeader('Content-Type', value);
  const format = formatForMediaType(contentType);
  if (format) {
    ctx.formatOverride = format;
  }
  return ctx;
}

/**
 * Explicitly choose the response format, bypassing negotiation
 */
export function putFormat(ctx: Context, format: Format): Context {
  ctx.assertWritable('set the format');
  ctx.formatOverride = format;
  return ctx;
}

/**
 * Choose the layout for rendering, or `false` to render without one
 */
export function putLayout(ctx: Context, layout: string | false): Context {
  ctx.assertWritable('set the layout');
  ctx.layout = layout;
  return ctx;
}

/**
 * Render templates from another namespace than the controller's
 */
export function putView(ctx: Context, namespace: string): Context {
  ctx.assertWritable('set the view');
  ctx.view = namespace;
  return ctx;
}

export function text(ctx: Context, body: string): Context {
  putDefaultContentType(ctx, 'text');
  ctx.format ??= 'text';
  return commit(ctx, body);
}

export function html(ctx: Context, markup: string): Context {
  putDefaultContentType(ctx, 'html');
  ctx.format ??= 'html';
  return commit(ctx, markup);
}

export function json(ctx: Context, data: unknown): Context {
  putDefaultContentType(ctx, 'json');
  ctx.format ??= 'json';
  return commit(ctx, JSON.stringify(data));
}

/**
 * Send a raw body with the given status
 */
export function sendResp(ctx: Context, status: StatusInput, body: string | null): Context {
  ctx.putStatus(status);
  return commit(ctx, body);
}

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

function checkInternalPath(path: string): void {
  if (SCHEME.test(path)) {
    throw new RedirectMisuseError('to', path, 'full URLs must use the external form');
  }
  if (!path.startsWith('/') || path.startsWith('//') || path.includes('\\')) {
    throw new RedirectMisuseError('to', path, 'internal redirects take a path starting with a single "/"');
  }
}

function checkExternalUrl(url: string): void {
  const misuse = new RedirectMisuseError('external', url, 'external redirects take a fully qualified URL');
  if (!SCHEME.test(url)) throw misuse;
  try {
    new URL(url);
  } catch (error) {
    if (error instanceof TypeError) throw misuse;
    throw error;
  }
}

/**
 * Redirect to a path or an external URL.
 *
 * Sets 302 unless a status is already set, sets Location and commits an
 * empty body.
 */
export function redirect(ctx: Context, target: RedirectTarget): Context {
  let location: string;
  if ('to' in target) {
    checkInternalPath(target.to);
    location = target.to;
  } else {
    checkExternalUrl(target.external);
    location = target.external;
  }

  ctx.assertWritable('redirect');
  if (ctx.status === undefined) {
    ctx.putStatus(302);
  }
  ctx.putRespHeader('Location', location);
  return commit(ctx, '');
}
