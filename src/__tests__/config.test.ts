import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { ConfigError } from '../types/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      GSQ_KWARGS: '{}',
      GSQ_CACHE_DIR: '/tmp/gsq',
      GSQ_PROMPT_MODE: 'interactive',
      GSQ_NESTED_STEPS: 'sequential',
      DUCKDB_PATH: ':memory:',
      LOG_LEVEL: 'WARN',
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      GSQ_BUCKET: 'my-bucket/events',
      GSQ_CACHE_DIR: '/var/cache/gsq',
      GSQ_PROMPT_MODE: 'strict',
      GSQ_NESTED_STEPS: 'first',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config).toMatchObject({
      GSQ_BUCKET: 'my-bucket/events',
      GSQ_CACHE_DIR: '/var/cache/gsq',
      GSQ_PROMPT_MODE: 'strict',
      GSQ_NESTED_STEPS: 'first',
      LOG_LEVEL: 'DEBUG',
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ GSQ_CACHE_DIR: '', GSQ_BUCKET: '' });

    expect(config.GSQ_CACHE_DIR).toBe('/tmp/gsq');
    expect(config.GSQ_BUCKET).toBeUndefined();
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/root' })).not.toHaveProperty('HOME');
  });

  it('lists every invalid value', () => {
    let caught: unknown;
    try {
      loadConfig({ GSQ_PROMPT_MODE: 'never', LOG_LEVEL: 'LOUD' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ issues: [expect.stringMatching(/^GSQ_PROMPT_MODE: /), expect.stringMatching(/^LOG_LEVEL: /)] });
  });
});
