/**
 * Layer 6: Presentation
 *
 * Template resolution and the render dispatcher.
 */

export {
  RenderDispatcher,
  type RenderDispatcherOptions,
  type TemplateRef,
} from './dispatcher.ts';
export {
  TemplateRegistry,
  LAYOUTS_NAMESPACE,
  resolutionPath,
  parseResolutionPath,
  type ResolutionKey,
  type Template,
  type TemplateAssigns,
  type TemplateResolver,
} from './resolver.ts';
