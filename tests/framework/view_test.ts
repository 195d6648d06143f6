/**
 * View Tests
 *
 * Template resolution and the render dispatcher.
 */

import { describe, expect, test, vi } from 'vitest';
import type { ContextOptions } from '../../framework/http/context.ts';
import {
  DoubleCommitError,
  TemplateNotFoundError,
  UnsupportedFormatError,
} from '../../framework/http/errors.ts';
import { putFormat, putLayout, putRespContentType, putView } from '../../framework/http/response.ts';
import { RenderDispatcher } from '../../framework/view/dispatcher.ts';
import {
  parseResolutionPath,
  resolutionPath,
  TemplateRegistry,
  type Template,
  type TemplateResolver,
} from '../../framework/view/resolver.ts';
import { createTestContext } from './helpers.ts';

const templates = new TemplateRegistry()
  .register('page/index.html', (a) => `<h1>${String(a.title)}</h1>`)
  .register('page/index.text', (a) => `Title: ${String(a.title)}`)
  .register('page/index.json', (a) => ({ title: a.title }))
  .register('page/show.html', (a) => `<p>${String(a.id)}</p>`)
  .register('shared/index.html', () => 'shared')
  .registerLayout('app', 'html', (a) => `<main>${String(a.innerContent)}</main>`);

const renderer = new RenderDispatcher({ resolver: templates, layout: 'app' });

function pageContext(url = 'http://localhost/', options: ContextOptions = {}) {
  const ctx = createTestContext({ url, renderer, ...options });
  ctx.controller = 'page';
  ctx.action = 'index';
  ctx.acceptedFormats = ['html', 'json', 'text'];
  ctx.assign('title', 'Home');
  return ctx;
}

describe('TemplateRegistry', () => {
  test('parseResolutionPath - splits namespace, template and format', () => {
    expect(parseResolutionPath('admin/users/index.html')).toEqual({
      namespace: 'admin/users',
      template: 'index',
      format: 'html',
    });
    expect(resolutionPath({ namespace: 'page', template: 'show', format: 'json' })).toBe('page/show.json');
  });

  test('TemplateRegistry - rejects paths without a namespace or format', () => {
    const registry = new TemplateRegistry();

    expect(() => registry.register('index.html', () => '')).toThrow(TypeError);
    expect(() => registry.register('page/index', () => '')).toThrow(TypeError);
    expect(() => registry.register('page/index.', () => '')).toThrow(TypeError);
  });

  test('TemplateRegistry - layouts live in the layouts namespace', () => {
    expect(templates.has('layouts/app.html')).toBe(true);
    expect(templates.size).toBe(6);
  });
});

describe('RenderDispatcher', () => {
  test('render - renders the action template inside the layout', async () => {
    const ctx = pageContext();
    await renderer.render(ctx);

    expect(ctx.body).toBe('<main><h1>Home</h1></main>');
    expect(ctx.status).toBe(200);
    expect(ctx.format).toBe('html');
    expect(ctx.getRespHeader('Content-Type')).toBe('text/html; charset=utf-8');
    expect(ctx.committed).toBe(true);
  });

  test('render - layouts only wrap layout formats', async () => {
    const ctx = pageContext('http://localhost/?_format=text');
    await renderer.render(ctx);

    expect(ctx.body).toBe('Title: Home');
    expect(ctx.getRespHeader('Content-Type')).toBe('text/plain; charset=utf-8');
  });

  test('render - JSON-encodes non-string template output', async () => {
    const ctx = pageContext('http://localhost/', { headers: { Accept: 'application/json' } });
    await renderer.render(ctx);

    expect(ctx.body).toBe('{"title":"Home"}');
    expect(ctx.getRespHeader('Content-Type')).toBe('application/json; charset=utf-8');
  });

  test('render - explicit template with assigns merged over context assigns', async () => {
    const ctx = pageContext();
    ctx.assign('id', '1');
    await renderer.render(ctx, 'show.html', { id: '7' });

    expect(ctx.body).toBe('<main><p>7</p></main>');
  });

  test('render - a template from another namespace', async () => {
    const ctx = pageContext();
    await renderer.render(ctx, 'shared/index.html');

    expect(ctx.body).toBe('<main>shared</main>');
  });

  test('render - object references', async () => {
    const ctx = pageContext('http://localhost/?_format=text');
    await renderer.render(ctx, { template: 'show', format: 'html' });

    expect(ctx.body).toBe('<main><p>undefined</p></main>');
  });

  test('render - putLayout(false) renders without a layout', async () => {
    const ctx = pageContext();
    putLayout(ctx, false);
    await renderer.render(ctx);

    expect(ctx.body).toBe('<h1>Home</h1>');
  });

  test('render - putView switches the template namespace', async () => {
    const ctx = pageContext();
    putView(ctx, 'shared');
    await renderer.render(ctx);

    expect(ctx.body).toBe('<main>shared</main>');
  });

  test('render - an explicit format bypasses the accepted formats', async () => {
    const ctx = pageContext();
    ctx.acceptedFormats = ['html'];
    putFormat(ctx, 'text');
    await renderer.render(ctx);

    expect(ctx.body).toBe('Title: Home');
  });

  test('render - putRespContentType chooses the format and keeps its header', async () => {
    const ctx = pageContext();
    putRespContentType(ctx, 'text/plain', 'us-ascii');
    await renderer.render(ctx);

    expect(ctx.body).toBe('Title: Home');
    expect(ctx.getRespHeader('Content-Type')).toBe('text/plain; charset=us-ascii');
  });

  test('render - a template reference with another format replaces the Content-Type header', async () => {
    const ctx = pageContext();
    putRespContentType(ctx, 'text/plain');
    await renderer.render(ctx, 'show.html', { id: '7' });

    expect(ctx.body).toBe('<main><p>7</p></main>');
    expect(ctx.getRespHeader('Content-Type')).toBe('text/html; charset=utf-8');
  });

  test('render - a custom Content-Type header is kept', async () => {
    const ctx = pageContext();
    ctx.putRespHeader('Content-Type', 'application/vnd.gantry+html');
    await renderer.render(ctx);

    expect(ctx.getRespHeader('Content-Type')).toBe('application/vnd.gantry+html');
  });

  test('render - a missing template names its resolution key', async () => {
    const ctx = pageContext();

    await expect(renderer.render(ctx, 'missing')).rejects.toThrow('Template not found: page/missing.html');
    await expect(renderer.render(ctx, 'missing')).rejects.toBeInstanceOf(TemplateNotFoundError);
    expect(ctx.committed).toBe(false);
  });

  test('render - a missing layout is reported too', async () => {
    const ctx = pageContext();
    putLayout(ctx, 'admin');

    await expect(renderer.render(ctx)).rejects.toThrow('Template not found: layouts/admin.html');
  });

  test('render - an unsupported format fails before any template lookup', async () => {
    const resolve = vi.spyOn(templates, 'resolve');
    const ctx = pageContext('http://localhost/?_format=xml');
    ctx.acceptedFormats = ['html', 'text'];

    await expect(renderer.render(ctx)).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(resolve).not.toHaveBeenCalled();
    expect(ctx.committed).toBe(false);
  });

  test('render - rendering twice is a double commit', async () => {
    const ctx = pageContext();
    await renderer.render(ctx);

    await expect(renderer.render(ctx, 'show.html')).rejects.toBeInstanceOf(DoubleCommitError);
    expect(ctx.body).toBe('<main><h1>Home</h1></main>');
  });

  test('render - needs a template when no action is dispatched', async () => {
    const ctx = createTestContext({ renderer });

    await expect(renderer.render(ctx)).rejects.toBeInstanceOf(TypeError);
  });

  test('render - works with asynchronous resolvers', async () => {
    const page: Template = () => 'async page';
    const resolver: TemplateResolver = {
      resolve: async (key) => (resolutionPath(key) === 'page/index.html' ? page : undefined),
    };
    const dispatcher = new RenderDispatcher({ resolver });
    const ctx = pageContext();

    await dispatcher.render(ctx);

    expect(ctx.body).toBe('async page');
  });
});
