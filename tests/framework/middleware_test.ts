/**
 * Pipeline Tests
 */

import { expect, test } from 'vitest';
import { DoubleCommitError, PipelineSealedError, RequestAbortedError } from '../../framework/http/errors.ts';
import { text } from '../../framework/http/response.ts';
import { Pipeline, defineStage, except, only } from '../../framework/middleware/pipeline.ts';
import { captureLogger, createTestContext } from './helpers.ts';

function recorder(order: string[], name: string) {
  return defineStage(name, () => {
    order.push(name);
  });
}

test('Pipeline - runs stages in registration order', async () => {
  const order: string[] = [];
  const pipeline = new Pipeline()
    .register(recorder(order, 'first'))
    .register(recorder(order, 'second'))
    .register(recorder(order, 'third'));

  await pipeline.run(createTestContext(), 'index');

  expect(order).toEqual(['first', 'second', 'third']);
});

test('Pipeline - runs exactly the stages whose guard accepts the action', async () => {
  const order: string[] = [];
  const pipeline = new Pipeline()
    .register(recorder(order, 'always'))
    .register(recorder(order, 'indexOnly'), only('index'))
    .register(recorder(order, 'notIndex'), except('index'))
    .register(recorder(order, 'listed'), { only: ['show', 'edit'] })
    .register(recorder(order, 'predicate'), (action) => action.startsWith('sh'));

  await pipeline.run(createTestContext(), 'show');
  expect(order).toEqual(['always', 'notIndex', 'listed', 'predicate']);

  order.length = 0;
  await pipeline.run(createTestContext(), 'index');
  expect(order).toEqual(['always', 'indexOnly']);
});

test('Pipeline - a skipped stage leaves no side effects', async () => {
  let ran = false;
  const pipeline = new Pipeline().register(
    defineStage('markRendered', (ctx) => {
      ctx.registerBeforeSend(() => {
        ran = true;
      });
    }),
    only('index')
  );

  const ctx = createTestContext();
  await pipeline.run(ctx, 'show');
  text(ctx, 'manual');

  expect(ran).toBe(false);
});

test('Pipeline - stops after a stage halts', async () => {
  const order: string[] = [];
  const pipeline = new Pipeline()
    .register(defineStage('guard', (ctx) => {
      order.push('guard');
      ctx.halt();
    }))
    .register(recorder(order, 'after'));

  const ctx = await pipeline.run(createTestContext(), 'index');

  expect(order).toEqual(['guard']);
  expect(ctx.halted).toBe(true);
  expect(ctx.committed).toBe(false);
});

test('Pipeline - stops after a stage commits', async () => {
  const order: string[] = [];
  const pipeline = new Pipeline()
    .register(defineStage('respond', (ctx) => {
      text(ctx, 'early');
    }))
    .register(recorder(order, 'after'));

  const ctx = await pipeline.run(createTestContext(), 'index');

  expect(order).toEqual([]);
  expect(ctx.body).toBe('early');
});

test('Pipeline - an empty pipeline returns the context unchanged', async () => {
  const ctx = createTestContext();
  const result = await new Pipeline().run(ctx, 'index');

  expect(result).toBe(ctx);
  expect(ctx.committed).toBe(false);
  expect(ctx.halted).toBe(false);
  expect(ctx.status).toBeUndefined();
});

test('Pipeline - a failing stage aborts the remaining ones', async () => {
  const order: string[] = [];
  const pipeline = new Pipeline()
    .register(defineStage('explode', () => {
      throw new Error('boom');
    }))
    .register(recorder(order, 'after'));

  await expect(pipeline.run(createTestContext(), 'index')).rejects.toThrow('boom');
  expect(order).toEqual([]);
});

test('Pipeline - a second commit inside a stage surfaces immediately', async () => {
  const pipeline = new Pipeline().register(defineStage('twice', (ctx) => {
    text(ctx, 'one');
    text(ctx, 'two');
  }));

  await expect(pipeline.run(createTestContext(), 'index')).rejects.toThrow(DoubleCommitError);
});

test('Pipeline - is sealed by its first run', async () => {
  const pipeline = new Pipeline('page').register(recorder([], 'first'));
  await pipeline.run(createTestContext(), 'index');

  expect(pipeline.isSealed).toBe(true);
  expect(() => pipeline.register(recorder([], 'late'))).toThrow(PipelineSealedError);
});

test('Pipeline - names function stages', () => {
  function loadUser(): void {}
  const pipeline = new Pipeline().register(loadUser).register(() => undefined);

  expect(pipeline.stages.map((s) => s.name)).toEqual(['loadUser', 'stage[1]']);
  expect(pipeline.length).toBe(2);
});

test('Pipeline - a cancelled request aborts at the next stage boundary', async () => {
  const controller = new AbortController();
  const order: string[] = [];
  const pipeline = new Pipeline()
    .register(defineStage('slow', () => {
      order.push('slow');
      controller.abort();
    }))
    .register(recorder(order, 'cleanup'));

  const ctx = createTestContext({ signal: controller.signal });

  await expect(pipeline.run(ctx, 'index')).rejects.toBeInstanceOf(RequestAbortedError);
  expect(order).toEqual(['slow']);
  expect(ctx.committed).toBe(false);
});

test('Pipeline - logs entered, exited and skipped stages', async () => {
  const { logger, entries } = captureLogger();
  const pipeline = new Pipeline('page')
    .register(defineStage('a', () => undefined))
    .register(defineStage('b', () => undefined), only('index'));

  await pipeline.run(createTestContext({ logger }), 'show');

  expect(entries.map((e) => e.message)).toEqual(['Entering a', 'Exiting a', 'Skipping b']);
  expect(entries[0]?.context).toEqual({ pipeline: 'page', action: 'show' });
});
