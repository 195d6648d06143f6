/**
 * Controller Definitions
 *
 * `defineController` binds a Controller class to its namespace, its action
 * names and its stage pipeline. Everything is validated and the pipeline
 * sealed when the definition is created, so a misspelt action or a late
 * stage fails at startup rather than on the first request.
 *
 * Action dispatch and auto-rendering are ordinary stages:
 *
 * ```ts
 * const PageController = defineController(PageCtrl, {
 *   namespace: 'page',
 *   actions: ['index', 'show'],
 *   accepts: ['html', 'text'],
 *   pipeline: (p) => {
 *     p.register(dispatchAction());
 *     p.register(autoRender(), only('index'));
 *   },
 * });
 * ```
 */

import type { Context } from '../http/context.ts';
import { ControllerDefinitionError, UnknownActionError } from '../http/errors.ts';
import type { Format } from '../http/formats.ts';
import { acceptFormats } from '../middleware/negotiation.ts';
import { Pipeline, defineStage, type NamedStage } from '../middleware/pipeline.ts';
import type { Controller } from './base.ts';

/**
 * Runs when an action returns a value without sending a response
 */
export type FallbackHandler = (ctx: Context, result: unknown) => void | Promise<void>;

export type ControllerClass<T extends Controller> = new () => T;

type MethodName<T> = {
  [K in keyof T]: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] & string;

export interface ControllerOptions<T extends Controller> {
  /** Template namespace, also the controller's name in logs and errors. */
  namespace: string;
  actions: readonly MethodName<T>[];
  /** Accepted formats; registers `acceptFormats` as the first stage. */
  accepts?: readonly Format[];
  layout?: string | false;
  /**
   * Register the stages after `acceptFormats`. Defaults to a single
   * `dispatchAction()`.
   */
  pipeline?: (pipeline: Pipeline) => void;
  fallback?: FallbackHandler;
}

/**
 * The action being dispatched for one request
 */
class ActionInvocation {
  constructor(
    readonly handler: () => unknown,
    readonly fallback?: FallbackHandler
  ) {}
}

const INVOCATION_KEY = 'controller.invocation';

function currentInvocation(ctx: Context, stage: string): ActionInvocation {
  const invocation = ctx.state.get(INVOCATION_KEY);
  if (!(invocation instanceof ActionInvocation)) {
    throw new Error(`Stage '${stage}' must run inside a controller pipeline`);
  }
  return invocation;
}

/**
 * Stage that runs the action method. When the action returns a value
 * without committing and the controller has a fallback, the fallback
 * handles it.
 */
export function dispatchAction(): NamedStage {
  return defineStage('dispatchAction', async (ctx) => {
    const invocation = currentInvocation(ctx, 'dispatchAction');
    const result: unknown = await invocation.handler();

    if (result !== undefined && !ctx.committed && invocation.fallback) {
      ctx.logger.debug('Action returned a value; running fallback', { action: ctx.action });
      await invocation.fallback(ctx, result);
    }
  });
}

/**
 * Stage that renders the action's template unless a response was sent
 */
export function autoRender(): NamedStage {
  return defineStage('autoRender', async (ctx) => {
    if (ctx.committed) return;
    if (!ctx.renderer) {
      throw new Error('autoRender needs a render dispatcher on the request context');
    }
    await ctx.renderer.render(ctx);
  });
}

export class ControllerDefinition<T extends Controller> {
  readonly namespace: string;
  readonly pipeline: Pipeline;
  private readonly ControllerClass: ControllerClass<T>;
  private readonly actions: ReadonlySet<string>;
  private readonly layout?: string | false;
  private readonly fallback?: FallbackHandler;

  constructor(ControllerClass: ControllerClass<T>, options: ControllerOptions<T>) {
    this.ControllerClass = ControllerClass;
    this.namespace = options.namespace;
    this.actions = new Set(options.actions);
    this.layout = options.layout;
    this.fallback = options.fallback;
    this.pipeline = new Pipeline(options.namespace);

    if (options.accepts) {
      this.pipeline.register(acceptFormats(options.accepts));
    }
    if (options.pipeline) {
      options.pipeline(this.pipeline);
    } else {
      this.pipeline.register(dispatchAction());
    }
    this.pipeline.seal();
  }

  get actionNames(): string[] {
    return [...this.actions];
  }

  hasAction(action: string): boolean {
    return this.actions.has(action);
  }

  /**
   * Run the pipeline for `action` against a fresh controller instance
   */
  async call(ctx: Context, action: string): Promise<Context> {
    if (!this.actions.has(action)) {
      throw new UnknownActionError(this.namespace, action);
    }

    const controller = new this.ControllerClass().setContext(ctx);
    const method: unknown = Reflect.get(controller, action);
    if (typeof method !== 'function') {
      throw new UnknownActionError(this.namespace, action);
    }

    ctx.controller = this.namespace;
    ctx.action = action;
    if (ctx.layout === undefined && this.layout !== undefined) {
      ctx.layout = this.layout;
    }
    ctx.state.set(
      INVOCATION_KEY,
      new ActionInvocation(() => method.call(controller), this.fallback)
    );

    return await this.pipeline.run(ctx, action);
  }
}

/**
 * Define a controller. Throws `ControllerDefinitionError` when an action
 * is not a method of the class or the namespace is empty.
 */
export function defineController<T extends Controller>(
  ControllerClass: ControllerClass<T>,
  options: ControllerOptions<T>
): ControllerDefinition<T> {
  if (!options.namespace) {
    throw new ControllerDefinitionError(`${ControllerClass.name} needs a namespace`);
  }

  const prototype: object = ControllerClass.prototype;
  for (const action of options.actions) {
    if (typeof Reflect.get(prototype, action) !== 'function') {
      throw new ControllerDefinitionError(`${ControllerClass.name} has no action method '${action}'`);
    }
  }

  return new ControllerDefinition(ControllerClass, options);
}
