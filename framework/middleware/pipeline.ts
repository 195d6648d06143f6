/**
 * Stage Pipeline
 *
 * An ordered list of request stages registered when a controller is
 * defined. Each run passes one Context through the stages in registration
 * order:
 * - a stage whose predicate rejects the current action is skipped entirely
 * - the run stops as soon as the Context is halted or committed
 * - a cancelled request aborts at the next stage boundary
 * - an error thrown by a stage aborts the remaining stages and propagates
 *
 * The first run seals the pipeline; registering afterwards throws.
 */

import type { Context } from '../http/context.ts';
import { PipelineSealedError } from '../http/errors.ts';

export type StageFn = (ctx: Context) => void | Promise<void>;

export interface NamedStage {
  name: string;
  call: StageFn;
}

export type Stage = StageFn | NamedStage;

export type ActionPredicate = (action: string) => boolean;

/**
 * Which actions a stage applies to: a predicate, or an allow/deny list
 */
export type ActionGuard = ActionPredicate | { only: readonly string[] } | { except: readonly string[] };

export interface StageEntry {
  readonly name: string;
  readonly call: StageFn;
  readonly predicate: ActionPredicate;
}

export const always: ActionPredicate = () => true;

export function only(...actions: string[]): ActionPredicate {
  const set = new Set(actions);
  return (action) => set.has(action);
}

export function except(...actions: string[]): ActionPredicate {
  const set = new Set(actions);
  return (action) => !set.has(action);
}

function toPredicate(guard: ActionGuard): ActionPredicate {
  if (typeof guard === 'function') return guard;
  if ('only' in guard) return only(...guard.only);
  return except(...guard.except);
}

export function defineStage(name: string, call: StageFn): NamedStage {
  return { name, call };
}

export class Pipeline {
  readonly name: string;
  private readonly entries: StageEntry[] = [];
  private sealed = false;

  constructor(name = 'pipeline') {
    this.name = name;
  }

  /**
   * Append a stage, optionally limited to some actions
   */
  register(stage: Stage, guard: ActionGuard = always): this {
    if (this.sealed) {
      throw new PipelineSealedError(this.name);
    }
    const named = typeof stage === 'function'
      ? { name: stage.name || `stage[${this.entries.length}]`, call: stage }
      : stage;
    this.entries.push({ name: named.name, call: named.call, predicate: toPredicate(guard) });
    return this;
  }

  get stages(): readonly StageEntry[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  /**
   * Run the stages that apply to `action` against `ctx`
   */
  async run(ctx: Context, action: string): Promise<Context> {
    this.sealed = true;

    for (const entry of this.entries) {
      if (ctx.halted || ctx.committed) break;
      ctx.throwIfAborted(entry.name);

      if (!entry.predicate(action)) {
        ctx.logger.debug(`Skipping ${entry.name}`, { pipeline: this.name, action });
        continue;
      }

      const startedAt = performance.now();
      ctx.logger.debug(`Entering ${entry.name}`, { pipeline: this.name, action });
      await entry.call(ctx);
      ctx.logger.debug(`Exiting ${entry.name}`, {
        pipeline: this.name,
        action,
        duration: Math.round((performance.now() - startedAt) * 100) / 100,
        halted: ctx.halted,
        committed: ctx.committed,
      });
    }

    return ctx;
  }
}
