/**
 * Base Controller
 *
 * One instance per request. Actions are plain methods that read the
 * request through the bound Context and answer through the helpers below.
 */

import type { Context } from '../http/context.ts';
import { HttpError } from '../http/errors.ts';
import type { Format } from '../http/formats.ts';
import type { Params } from '../http/request.ts';
import * as response from '../http/response.ts';
import type { StatusInput } from '../http/status.ts';
import type { TemplateAssigns } from '../view/resolver.ts';
import type { TemplateRef } from '../view/dispatcher.ts';

export abstract class Controller {
  private _ctx?: Context;

  /**
   * Bind the request Context
   */
  setContext(ctx: Context): this {
    this._ctx = ctx;
    return this;
  }

  get ctx(): Context {
    if (!this._ctx) {
      throw new Error(`${this.constructor.name} has no request context; call setContext() first`);
    }
    return this._ctx;
  }

  /**
   * Route, body and query params merged
   */
  get params(): Readonly<Params> {
    return this.ctx.params;
  }

  get query(): Readonly<Record<string, string>> {
    return this.ctx.queryParams;
  }

  queryParam(name: string, defaultValue?: string): string | undefined {
    return this.ctx.queryParams[name] ?? defaultValue;
  }

  /**
   * Get a required string parameter (400 if missing)
   */
  requireParam(name: string): string {
    const value = this.params[name];
    if (typeof value !== 'string' || value === '') {
      throw new HttpError(400, 'MISSING_PARAM', `Required parameter '${name}' is missing`, { param: name });
    }
    return value;
  }

  assign(key: string, value: unknown): this;
  assign(values: Record<string, unknown>): this;
  assign(keyOrValues: string | Record<string, unknown>, value?: unknown): this {
    if (typeof keyOrValues === 'string') {
      this.ctx.assign(keyOrValues, value);
    } else {
      this.ctx.assign(keyOrValues);
    }
    return this;
  }

  putStatus(status: StatusInput): this {
    this.ctx.putStatus(status);
    return this;
  }

  putLayout(layout: string | false): this {
    response.putLayout(this.ctx, layout);
    return this;
  }

  putView(namespace: string): this {
    response.putView(this.ctx, namespace);
    return this;
  }

  putFormat(format: Format): this {
    response.putFormat(this.ctx, format);
    return this;
  }

  putFlash(key: string, message: string): this {
    this.ctx.flash.put(key, message);
    return this;
  }

  /**
   * Render a template; without a reference, the current action's
   */
  async render(ref?: TemplateRef, assigns?: TemplateAssigns): Promise<Context> {
    const renderer = this.ctx.renderer;
    if (!renderer) {
      throw new Error('No render dispatcher is attached to the request context');
    }
    return await renderer.render(this.ctx, ref, assigns);
  }

  redirect(target: response.RedirectTarget): Context {
    return response.redirect(this.ctx, target);
  }

  json(data: unknown): Context {
    return response.json(this.ctx, data);
  }

  html(markup: string): Context {
    return response.html(this.ctx, markup);
  }

  text(body: string): Context {
    return response.text(this.ctx, body);
  }
}
