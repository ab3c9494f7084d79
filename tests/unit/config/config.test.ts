/**
 * Configuration loading tests.
 */

import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../../../src/config/index.js';
import { ConfigError } from '../../../src/errors.js';

function configError(env: Record<string, string>): unknown {
  try {
    loadConfig(env);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('parses the override tier list', () => {
    expect(loadConfig({ DISPATCH_OVERRIDE_TIERS: 'cloud, enterprise,' }).overrideTiers).toEqual([
      'cloud',
      'enterprise',
    ]);
  });

  it('rejects duplicate tiers', () => {
    const error = configError({ DISPATCH_OVERRIDE_TIERS: 'cloud,cloud' });

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      variable: 'DISPATCH_OVERRIDE_TIERS',
      message: 'Invalid configuration for DISPATCH_OVERRIDE_TIERS: tiers must be unique',
    });
  });

  it('parses boolean flags', () => {
    const config = loadConfig({ DISPATCH_CACHE_ENABLED: 'off', DISPATCH_CACHE_COMPRESS: ' YES ' });

    expect(config.cacheEnabled).toBe(false);
    expect(config.cacheCompress).toBe(true);
  });

  it('rejects unknown boolean words', () => {
    expect(configError({ DISPATCH_CACHE_ENABLED: 'maybe' })).toMatchObject({
      variable: 'DISPATCH_CACHE_ENABLED',
    });
  });

  it('parses positive integers', () => {
    const config = loadConfig({ DISPATCH_MAX_CONCURRENCY: '4', DISPATCH_INVOCATION_TIMEOUT_MS: '2500' });

    expect(config.maxConcurrency).toBe(4);
    expect(config.invocationTimeoutMs).toBe(2500);
  });

  it('rejects non-positive and non-numeric integers', () => {
    expect(configError({ DISPATCH_MAX_CONCURRENCY: '0' })).toMatchObject({ variable: 'DISPATCH_MAX_CONCURRENCY' });
    expect(configError({ DISPATCH_MAX_CONCURRENCY: 'many' })).toMatchObject({
      variable: 'DISPATCH_MAX_CONCURRENCY',
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ DISPATCH_MAX_CONCURRENCY: '', DISPATCH_OVERRIDE_TIERS: ' ' }).maxConcurrency).toBe(10);
  });

  it('takes the environment name from DISPATCH_ENV, then NODE_ENV', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).environment).toBe('production');
    expect(loadConfig({ NODE_ENV: 'production', DISPATCH_ENV: 'staging' }).environment).toBe('staging');
  });

  it('validates the log level and key prefix', () => {
    expect(loadConfig({ DISPATCH_LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
    expect(configError({ DISPATCH_LOG_LEVEL: 'loud' })).toMatchObject({ variable: 'DISPATCH_LOG_LEVEL' });
    expect(configError({ DISPATCH_CACHE_KEY_PREFIX: 'has space' })).toMatchObject({
      variable: 'DISPATCH_CACHE_KEY_PREFIX',
    });
  });
});
