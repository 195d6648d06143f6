/**
 * Layer 8: Configuration
 *
 * Accepted formats, default layout, session and flash settings.
 */

export {
  Config,
  loadConfig,
  type ConfigOptions,
  type FormatOptions,
  type ViewOptions,
  type SessionConfig,
} from './config.ts';
