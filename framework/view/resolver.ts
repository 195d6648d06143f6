/**
 * Template Resolution
 *
 * Templates are looked up by (namespace, template, format). The templating
 * language itself is outside the framework: a template is any function of
 * the assigns that produces the body.
 */

import type { Format } from '../http/formats.ts';

export interface ResolutionKey {
  namespace: string;
  template: string;
  format: Format;
}

export const LAYOUTS_NAMESPACE = 'layouts';

export type TemplateAssigns = Record<string, unknown>;

/**
 * Produces a response body. Strings are sent as they are; any other value
 * is JSON-encoded.
 */
export type Template = (assigns: TemplateAssigns) => unknown;

export interface TemplateResolver {
  resolve(key: ResolutionKey): Template | undefined | Promise<Template | undefined>;
}

/**
 * `page/index.html` for a key
 */
export function resolutionPath(key: ResolutionKey): string {
  return `${key.namespace}/${key.template}.${key.format}`;
}

/**
 * Split `page/index.html` into a key. The namespace may itself contain
 * slashes (`admin/users/index.html`).
 */
export function parseResolutionPath(path: string): ResolutionKey {
  const slash = path.lastIndexOf('/');
  const file = path.slice(slash + 1);
  const dot = file.lastIndexOf('.');
  if (slash <= 0 || dot <= 0 || dot === file.length - 1) {
    throw new TypeError(`Template path must look like 'namespace/name.format', got '${path}'`);
  }
  return {
    namespace: path.slice(0, slash),
    template: file.slice(0, dot),
    format: file.slice(dot + 1),
  };
}

/**
 * In-memory resolver
 */
export class TemplateRegistry implements TemplateResolver {
  private readonly templates = new Map<string, Template>();

  /**
   * Register a template under `namespace/name.format`
   */
  register(path: string, template: Template): this {
    const key = parseResolutionPath(path);
    this.templates.set(resolutionPath(key), template);
    return this;
  }

  /**
   * Register a layout; layouts live in the `layouts` namespace
   */
  registerLayout(name: string, format: Format, template: Template): this {
    this.templates.set(resolutionPath({ namespace: LAYOUTS_NAMESPACE, template: name, format }), template);
    return this;
  }

  resolve(key: ResolutionKey): Template | undefined {
    return this.templates.get(resolutionPath(key));
  }

  has(path: string): boolean {
    return this.templates.has(path);
  }

  get size(): number {
    return this.templates.size;
  }
}
