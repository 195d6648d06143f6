/**
 * Application Class
 *
 * Entry point called by the transport once the router has matched a
 * request. Builds the request Context, runs the application stages and the
 * controller, and turns the committed Context (or the error that stopped
 * it) into a Fetch `Response`.
 */

import { randomUUID } from 'node:crypto';
import { Config, type ConfigOptions } from './config/config.ts';
import { Context } from './http/context.ts';
import { HttpError, NoResponseError, RequestAbortedError } from './http/errors.ts';
import { toResponse } from './http/finalizer.ts';
import { contentTypeFor } from './http/formats.ts';
import { reasonPhrase } from './http/status.ts';
import { fetchFlash } from './middleware/flash.ts';
import { Pipeline, type ActionGuard, type Stage } from './middleware/pipeline.ts';
import { fetchSession } from './middleware/session.ts';
import type { SessionStore } from './session/session.ts';
import { createRequestLogger, Logger } from './telemetry/logger.ts';
import { RenderDispatcher } from './view/dispatcher.ts';
import { TemplateRegistry, type TemplateResolver } from './view/resolver.ts';

/**
 * Anything that can run an action against a Context; usually a
 * `ControllerDefinition`
 */
export interface RouteTarget {
  readonly namespace: string;
  call(ctx: Context, action: string): Promise<Context>;
}

/**
 * What the router resolved a request to
 */
export interface Route {
  controller: RouteTarget;
  action: string;
  params?: Record<string, string>;
}

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  templates?: TemplateResolver;
  logger?: Logger;
  /** Enables the session and flash stages. */
  sessionStore?: SessionStore;
}

export class Application {
  readonly config: Config;
  readonly logger: Logger;
  readonly templates: TemplateResolver;
  readonly renderer: RenderDispatcher;
  private readonly pipeline = new Pipeline('app');

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.logger = options.logger ?? new Logger({
      level: this.config.logLevel,
      format: this.config.logFormat,
    });
    this.templates = options.templates ?? new TemplateRegistry();
    this.renderer = new RenderDispatcher({
      resolver: this.templates,
      layout: this.config.layout,
      layoutFormats: this.config.layoutFormats,
      defaultFormat: this.config.defaultFormat,
      formatParam: this.config.formatParam,
    });

    if (options.sessionStore) {
      this.use(fetchSession(options.sessionStore, this.config.sessionOptions));
      this.use(fetchFlash({ keepOnRedirect: this.config.keepFlashOnRedirect }));
    }
  }

  /**
   * Add a stage that runs before every controller
   */
  use(stage: Stage, guard?: ActionGuard): this {
    this.pipeline.register(stage, guard);
    return this;
  }

  /**
   * Handle one routed request. Errors become error responses; only a
   * cancelled request rejects, with `RequestAbortedError`.
   */
  async handle(request: Request, route: Route, signal?: AbortSignal): Promise<Response> {
    const startedAt = performance.now();
    const requestId = randomUUID();
    const method = request.method.toUpperCase();
    const path = new URL(request.url).pathname;
    const logger = createRequestLogger(this.logger, {
      requestId,
      method,
      path,
      controller: route.controller.namespace,
      action: route.action,
    });

    logger.info(`→ ${method} ${path}`);

    let ctx: Context | undefined;
    let response: Response;
    try {
      ctx = await Context.fromRequest(request, {
        pathParams: route.params,
        signal,
        logger,
        renderer: this.renderer,
        requestId,
      });
      await this.dispatch(ctx, route);
      response = toResponse(ctx);
      await ctx.runAfterSend();
    } catch (error) {
      if (error instanceof RequestAbortedError) {
        logger.warn('Request aborted', { stage: error.stage });
        throw error;
      }
      response = this.errorResponse(error, ctx, logger);
    }

    const duration = (performance.now() - startedAt).toFixed(2);
    logger.info(`← ${method} ${path} ${response.status} ${duration}ms`);
    return response;
  }

  /**
   * Fetch handler for a transport; `router` maps a request to a route
   */
  handler(router: (request: Request) => Route | undefined): (request: Request) => Promise<Response> {
    return async (request) => {
      const route = router(request);
      if (!route) {
        const path = new URL(request.url).pathname;
        this.logger.warn(`No route for ${request.method} ${path}`);
        return new Response(`404 ${reasonPhrase(404)}`, {
          status: 404,
          headers: { 'Content-Type': contentTypeFor('text') },
        });
      }
      return await this.handle(request, route, request.signal);
    };
  }

  private async dispatch(ctx: Context, route: Route): Promise<void> {
    ctx.acceptedFormats = this.config.acceptedFormats;
    ctx.controller = route.controller.namespace;
    ctx.action = route.action;

    await this.pipeline.run(ctx, route.action);
    if (!ctx.halted && !ctx.committed) {
      await route.controller.call(ctx, route.action);
    }

    ctx.throwIfAborted();
    if (!ctx.committed) {
      throw new NoResponseError(ctx.controller, ctx.action, ctx.halted);
    }
  }

  /**
   * Build an error response from scratch; the request Context may already
   * be committed or half-written.
   */
  private errorResponse(error: unknown, ctx: Context | undefined, logger: Logger): Response {
    const httpError = error instanceof HttpError ? error : undefined;
    const status = httpError?.status ?? 500;
    const code = httpError?.code ?? 'INTERNAL_ERROR';

    if (status >= 500) {
      logger.error('Request failed', error instanceof Error ? error : new Error(String(error)), { status, code });
    } else {
      logger.warn(`Request failed: ${httpError?.message ?? reasonPhrase(status)}`, { status, code });
    }

    const format = ctx?.formatOverride ?? ctx?.format;
    if (format === 'json') {
      const payload = httpError
        ? httpError.toPayload()
        : { success: false, error: { code, message: reasonPhrase(status) } };
      return new Response(JSON.stringify(payload), {
        status,
        headers: { 'Content-Type': contentTypeFor('json') },
      });
    }

    return new Response(`${status} ${reasonPhrase(status)}`, {
      status,
      headers: { 'Content-Type': contentTypeFor('text') },
    });
  }
}

export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
