/**
 * Layer 5: Controller Layer
 *
 * Controllers group actions under a template namespace and run them
 * through a stage pipeline fixed when the controller is defined.
 *
 * Responsibilities:
 * - Validate action names at definition time
 * - Dispatch an action as one stage of the pipeline
 * - Render the action's template when the action sends nothing itself
 * - Hand unanswered action results to a fallback
 */

export { Controller } from './base.ts';
export {
  ControllerDefinition,
  defineController,
  dispatchAction,
  autoRender,
  type ControllerClass,
  type ControllerOptions,
  type FallbackHandler,
} from './definition.ts';
