/**
 * Config Tests
 *
 * Tests for the configuration management system.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { Config, loadConfig } from '../../framework/config/config.ts';

describe('Config', () => {
  test('Config - uses default values when no options provided', () => {
    const config = new Config();

    expect(config.get('env')).toBe('development');
    expect(config.defaultFormat).toBe('html');
    expect(config.formatParam).toBe('_format');
    expect(config.acceptedFormats).toEqual(['html', 'json', 'text', 'xml']);
    expect(config.layout).toBe('app');
    expect(config.layoutFormats).toEqual(['html']);
    expect(config.keepFlashOnRedirect).toBe(true);
    expect(config.logLevel).toBe('info');
    expect(config.logFormat).toBe('pretty');
  });

  test('Config - deep merges nested objects', () => {
    const config = new Config({ session: { secure: false } });

    expect(config.get('session.secure')).toBe(false);
    expect(config.get('session.name')).toBe('gantry_session');
  });

  test('Config - replaces arrays instead of merging them', () => {
    const config = new Config({ formats: { accepted: ['json'] } });

    expect(config.acceptedFormats).toEqual(['json']);
    expect(config.defaultFormat).toBe('html');
  });

  test('Config.get - returns the default for missing keys', () => {
    const config = new Config();

    expect(config.get('missing.key', 'fallback')).toBe('fallback');
    expect(config.has('missing.key')).toBe(false);
    expect(config.has('view.layout')).toBe(true);
  });

  test('Config.set - creates nested keys', () => {
    const config = new Config();
    config.set('view.layout', false);
    config.set('custom.deep.value', 3);

    expect(config.layout).toBe(false);
    expect(config.get('custom.deep.value')).toBe(3);
  });

  test('Config.all - returns a copy', () => {
    const config = new Config();
    const copy = config.all();
    config.set('formats.default', 'json');

    expect(copy.formats).toEqual({ accepted: ['html', 'json', 'text', 'xml'], default: 'html', param: '_format' });
  });

  test('Config - ignores invalid log levels', () => {
    const config = new Config();
    config.set('logLevel', 'loud');

    expect(config.logLevel).toBe('info');
  });

  test('Config.sessionOptions - keeps only well-typed values', () => {
    const config = new Config();
    config.set('session.sameSite', 'Sometimes');
    config.set('session.maxAge', '60');

    expect(config.sessionOptions).toEqual({
      name: 'gantry_session',
      secure: true,
      httpOnly: true,
      path: '/',
    });
  });

  test('Config - flash.keepOnRedirect can be turned off', () => {
    expect(new Config({ flash: { keepOnRedirect: false } }).keepFlashOnRedirect).toBe(false);
  });
});

describe('loadConfig', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gantry-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('loadConfig - reads a JSON file over the defaults', async () => {
    const path = join(dir, 'gantry.json');
    await writeFile(path, JSON.stringify({ formats: { default: 'json' }, view: { layout: 'admin' } }));

    const config = await loadConfig(path, {});

    expect(config.defaultFormat).toBe('json');
    expect(config.layout).toBe('admin');
    expect(config.formatParam).toBe('_format');
  });

  test('loadConfig - environment variables win over the file', async () => {
    const path = join(dir, 'gantry.json');
    await writeFile(path, JSON.stringify({ logLevel: 'debug', view: { layout: 'admin' } }));

    const config = await loadConfig(path, {
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      GANTRY_DEFAULT_FORMAT: 'text',
      GANTRY_LAYOUT: 'false',
    });

    expect(config.get('env')).toBe('production');
    expect(config.logLevel).toBe('warn');
    expect(config.defaultFormat).toBe('text');
    expect(config.layout).toBe(false);
  });

  test('loadConfig - ignores an invalid LOG_LEVEL', async () => {
    const config = await loadConfig(join(dir, 'none.json'), { LOG_LEVEL: 'loud' });

    expect(config.logLevel).toBe('info');
  });

  test('loadConfig - a missing file gives the defaults', async () => {
    const config = await loadConfig(join(dir, 'none.json'), {});

    expect(config.layout).toBe('app');
    expect(config.get('env')).toBe('development');
  });

  test('loadConfig - a malformed file is an error', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "formats": ');

    await expect(loadConfig(path, {})).rejects.toBeInstanceOf(SyntaxError);
  });
});
