/**
 * Response Finalizer
 *
 * Commits status, headers and body exactly once per request and turns the
 * committed Context into a Fetch `Response` for the transport.
 */

import type { Context } from './context.ts';
import { InvalidStatusError, NoResponseError } from './errors.ts';
import { lookupStatus, NULL_BODY_STATUSES } from './status.ts';

/**
 * Commit the response.
 *
 * Throws `DoubleCommitError` when the Context is already committed and
 * `InvalidStatusError` when the status set on it is not in the status
 * table (an unset status commits as 200). Before-send callbacks run first
 * and may still change headers or status.
 */
export function commit(ctx: Context, body: string | null): Context {
  ctx.assertWritable('send a response');

  ctx.runBeforeSend();

  const input = ctx.status ?? 200;
  const entry = lookupStatus(input);
  if (!entry) {
    throw new InvalidStatusError(input);
  }

  ctx.markCommitted(entry.code, body);
  ctx.logger.debug('Response committed', { status: entry.code });
  return ctx;
}

/**
 * Resolved status code of a Context, `undefined` while unset or unrecognised
 */
export function resolvedStatus(ctx: Context): number | undefined {
  return ctx.status === undefined ? undefined : lookupStatus(ctx.status)?.code;
}

/**
 * Build the Fetch response for a committed Context
 */
export function toResponse(ctx: Context): Response {
  if (!ctx.committed) {
    throw new NoResponseError(ctx.controller, ctx.action, ctx.halted);
  }

  const status = resolvedStatus(ctx) ?? 200;
  const body = NULL_BODY_STATUSES.has(status) ? null : ctx.body;

  return new Response(body, {
    status,
    headers: ctx.respHeaders(),
  });
}
