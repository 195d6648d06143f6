/**
 * Configuration Management
 *
 * Nested options with dot-path access, merged from defaults, a JSON file
 * and environment variables.
 */

import { readFile } from 'node:fs/promises';
import { isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';

export interface FormatOptions {
  accepted?: string[];
  default?: string;
  param?: string;
}

export interface ViewOptions {
  layout?: string | false;
  layoutFormats?: string[];
}

export interface SessionConfig {
  name?: string;
  maxAge?: number;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
  path?: string;
}

export interface ConfigOptions {
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  formats?: FormatOptions;
  view?: ViewOptions;
  session?: SessionConfig;
  flash?: {
    keepOnRedirect?: boolean;
  };
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  env: 'development',
  logLevel: 'info',
  logFormat: 'pretty',
  formats: {
    accepted: ['html', 'json', 'text', 'xml'],
    default: 'html',
    param: '_format',
  },
  view: {
    layout: 'app',
    layoutFormats: ['html'],
  },
  session: {
    name: 'gantry_session',
    maxAge: 86400 * 7,
    secure: true,
    httpOnly: true,
    sameSite: 'Lax',
    path: '/',
  },
  flash: {
    keepOnRedirect: true,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  /**
   * Typed options, or any parsed JSON object
   */
  constructor(options: ConfigOptions | Record<string, unknown> = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Read a value by dot path (`formats.default`)
   */
  get<T>(key: string, defaultValue: T): T;
  get(key: string): unknown;
  get(key: string, defaultValue?: unknown): unknown {
    return getNestedValue(this.config, key) ?? defaultValue;
  }

  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return getNestedValue(this.config, key) !== undefined;
  }

  all(): Record<string, unknown> {
    return mergeConfig({}, this.config);
  }

  /**
   * Formats the application accepts unless a controller narrows them
   */
  get acceptedFormats(): string[] {
    const value = this.get('formats.accepted');
    return Array.isArray(value) ? value.filter((f): f is string => typeof f === 'string') : [];
  }

  get defaultFormat(): string {
    const value = this.get('formats.default');
    return typeof value === 'string' ? value : 'html';
  }

  get formatParam(): string {
    const value = this.get('formats.param');
    return typeof value === 'string' ? value : '_format';
  }

  get layout(): string | false {
    const value = this.get('view.layout');
    return typeof value === 'string' ? value : false;
  }

  get layoutFormats(): string[] {
    const value = this.get('view.layoutFormats');
    return Array.isArray(value) ? value.filter((f): f is string => typeof f === 'string') : [];
  }

  get sessionOptions(): SessionConfig {
    const value = this.get('session');
    if (!isPlainObject(value)) return {};

    const options: SessionConfig = {};
    if (typeof value.name === 'string') options.name = value.name;
    if (typeof value.maxAge === 'number') options.maxAge = value.maxAge;
    if (typeof value.secure === 'boolean') options.secure = value.secure;
    if (typeof value.httpOnly === 'boolean') options.httpOnly = value.httpOnly;
    if (value.sameSite === 'Strict' || value.sameSite === 'Lax' || value.sameSite === 'None') {
      options.sameSite = value.sameSite;
    }
    if (typeof value.path === 'string') options.path = value.path;
    return options;
  }

  get keepFlashOnRedirect(): boolean {
    return this.get('flash.keepOnRedirect') !== false;
  }

  get logLevel(): LogLevel {
    const value = this.get('logLevel');
    return isLogLevel(value) ? value : 'info';
  }

  get logFormat(): LogFormat {
    return this.get('logFormat') === 'json' ? 'json' : 'pretty';
  }
}

function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = base[key];
    if (isPlainObject(value)) {
      result[key] = mergeConfig(isPlainObject(current) ? current : {}, value);
    } else if (Array.isArray(value)) {
      result[key] = [...value];
    } else {
      result[key] = value;
    }
  }

  return result;
}

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

const DEFAULT_CONFIG_PATHS = ['./config/gantry.json'];

async function readJsonIfPresent(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(content);
}

/**
 * Load configuration from a JSON file and the environment.
 *
 * Without an explicit path, `./config/gantry.json` is tried, then the
 * `gantry` key of `./package.json`. Missing files are skipped; a file that
 * exists but does not parse is an error.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    const parsed = await readJsonIfPresent(configPath);
    if (isPlainObject(parsed)) fileConfig = parsed;
  } else {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const parsed = await readJsonIfPresent(path);
      if (isPlainObject(parsed)) {
        fileConfig = parsed;
        break;
      }
    }
    if (Object.keys(fileConfig).length === 0) {
      const pkg = await readJsonIfPresent('./package.json');
      if (isPlainObject(pkg) && isPlainObject(pkg.gantry)) {
        fileConfig = pkg.gantry;
      }
    }
  }

  const config = new Config(fileConfig);

  const overrides: Record<string, unknown> = {
    env: env.NODE_ENV,
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : undefined,
    'formats.default': env.GANTRY_DEFAULT_FORMAT,
    'view.layout': env.GANTRY_LAYOUT === 'false' ? false : env.GANTRY_LAYOUT,
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && value !== '') {
      config.set(key, value);
    }
  }

  return config;
}
