/**
 * Render Dispatcher
 *
 * Resolves (namespace, template, format) to a template, renders it with
 * the merged assigns, wraps it in the active layout and commits the
 * response with the format's content type.
 */

import type { Context } from '../http/context.ts';
import { TemplateNotFoundError } from '../http/errors.ts';
import { commit } from '../http/finalizer.ts';
import { contentTypeFor, formatForMediaType, type Format } from '../http/formats.ts';
import { resolveFormat, type NegotiationOptions } from '../middleware/negotiation.ts';
import {
  LAYOUTS_NAMESPACE,
  resolutionPath,
  type ResolutionKey,
  type Template,
  type TemplateAssigns,
  type TemplateResolver,
} from './resolver.ts';

/**
 * What to render: `"show.html"`, `"show"` (format negotiated),
 * `"admin/show.html"` (other namespace), or the object form.
 * Omitted, the current action's template is rendered.
 */
export type TemplateRef = string | { template: string; format?: Format; namespace?: string };

export interface RenderDispatcherOptions {
  resolver: TemplateResolver;
  /** Layout used when the Context does not choose one. */
  layout?: string | false;
  /** Formats rendered inside a layout. */
  layoutFormats?: readonly Format[];
  defaultFormat?: Format;
  formatParam?: string;
}

interface RenderTarget {
  namespace?: string;
  template: string;
  format?: Format;
}

function parseRef(ref: TemplateRef): RenderTarget {
  if (typeof ref !== 'string') return ref;

  const slash = ref.lastIndexOf('/');
  const namespace = slash > 0 ? ref.slice(0, slash) : undefined;
  const file = ref.slice(slash + 1);
  const dot = file.lastIndexOf('.');
  if (dot > 0 && dot < file.length - 1) {
    return { namespace, template: file.slice(0, dot), format: file.slice(dot + 1) };
  }
  return { namespace, template: file };
}

function encode(output: unknown): string {
  if (typeof output === 'string') return output;
  return JSON.stringify(output) ?? '';
}

export class RenderDispatcher {
  readonly negotiation: NegotiationOptions;
  private readonly resolver: TemplateResolver;
  private readonly defaultLayout: string | false;
  private readonly layoutFormats: readonly Format[];

  constructor(options: RenderDispatcherOptions) {
    this.resolver = options.resolver;
    this.defaultLayout = options.layout ?? false;
    this.layoutFormats = options.layoutFormats ?? ['html'];
    this.negotiation = {
      defaultFormat: options.defaultFormat ?? 'html',
      param: options.formatParam ?? '_format',
    };
  }

  /**
   * Render and commit. Throws `DoubleCommitError` if the Context was
   * already committed, `UnsupportedFormatError` before any lookup when the
   * negotiated format is not accepted, and `TemplateNotFoundError` naming
   * the key when a template or layout is missing.
   */
  async render(ctx: Context, ref?: TemplateRef, assigns: TemplateAssigns = {}): Promise<Context> {
    ctx.assertWritable('render');

    const target = ref === undefined ? { template: ctx.action } : parseRef(ref);
    if (!target.template) {
      throw new TypeError('render() needs a template when no action is being dispatched');
    }

    const format = target.format ?? resolveFormat(ctx, this.negotiation);
    const key: ResolutionKey = {
      namespace: target.namespace ?? ctx.view ?? ctx.controller,
      template: target.template,
      format,
    };

    const merged = { ...ctx.assigns, ...assigns };
    let body = encode(await (await this.lookup(key))(merged));

    const layout = this.layoutFor(ctx, format);
    if (layout !== undefined) {
      const layoutKey: ResolutionKey = { namespace: LAYOUTS_NAMESPACE, template: layout, format };
      body = encode(await (await this.lookup(layoutKey))({ ...merged, innerContent: body }));
    }

    ctx.format = format;
    const contentType = ctx.getRespHeader('Content-Type');
    const headerFormat = contentType === null ? undefined : formatForMediaType(contentType);
    // A header naming another known format would contradict the body.
    if (contentType === null || (headerFormat !== undefined && headerFormat !== format)) {
      ctx.putRespHeader('Content-Type', contentTypeFor(format));
    }

    ctx.logger.debug('Rendered template', {
      template: resolutionPath(key),
      layout: layout ?? false,
    });
    return commit(ctx, body);
  }

  private async lookup(key: ResolutionKey): Promise<Template> {
    const template = await this.resolver.resolve(key);
    if (!template) {
      throw new TemplateNotFoundError(key);
    }
    return template;
  }

  private layoutFor(ctx: Context, format: Format): string | undefined {
    const layout = ctx.layout ?? this.defaultLayout;
    if (layout === false || !this.layoutFormats.includes(format)) {
      return undefined;
    }
    return layout;
  }
}
