/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect } from 'vitest';
import { parseReduceList, resolveConfig, validateConfig, withUrl } from './config.js';
import { ReduceError, UsageError } from './errors.js';
import type { SnapshotConfig } from './types/config.js';

const noEnv = {};

function baseConfig(overrides: Partial<SnapshotConfig> = {}): SnapshotConfig {
  return {
    url: 'http://localhost:3000/api-docs/openapi.json',
    urlFromDefault: true,
    out: 'openapi/backend_openapi.json',
    profile: 'full',
    reduce: [],
    minify: false,
    timeoutMs: 10_000,
    headers: [],
    stdout: false,
    ...overrides,
  };
}

describe('parseReduceList', () => {
  it('accepts paths and components in order', () => {
    expect(parseReduceList('paths,components')).toEqual(['paths', 'components']);
    expect(parseReduceList('components,paths')).toEqual(['components', 'paths']);
  });

  it('trims entries, skips blanks and collapses duplicates', () => {
    expect(parseReduceList(' paths , ,paths,components ')).toEqual(['paths', 'components']);
  });

  it('rejects mixed case', () => {
    expect(() => parseReduceList('Paths')).toThrow(ReduceError);
    expect(() => parseReduceList('Paths')).toThrow('reduce values must be lowercase: Paths');
  });

  it('rejects unknown keys', () => {
    expect(() => parseReduceList('paths,info')).toThrow('unsupported reduce value: info');
  });

  it('rejects an empty list', () => {
    expect(() => parseReduceList('')).toThrow('reduce list cannot be empty');
    expect(() => parseReduceList(' , ')).toThrow('reduce list cannot be empty');
  });
});

describe('resolveConfig', () => {
  it('applies defaults for a snapshot run', () => {
    const { config, mode } = resolveConfig({}, undefined, noEnv);

    expect(mode).toEqual({ kind: 'snapshot' });
    expect(config).toEqual({
      url: 'http://localhost:3000/api-docs/openapi.json',
      urlFromDefault: true,
      out: 'openapi/backend_openapi.json',
      outlineOut: undefined,
      profile: 'full',
      reduce: [],
      minify: false,
      timeoutMs: 10_000,
      headers: [],
      stdout: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies watch defaults for the full profile', () => {
    const { config, mode } = resolveConfig({ minify: true }, { intervalMs: '500' }, noEnv);

    expect(mode).toEqual({ kind: 'watch', intervalMs: 500 });
    expect(config.url).toBe('http://localhost:3000/api-docs/openapi.json');
    expect(config.urlFromDefault).toBe(true);
    expect(config.out).toBe('openapi/backend_openapi.json');
    expect(config.outlineOut).toBe('openapi/backend_openapi.outline.json');
    expect(config.reduce).toEqual(['paths', 'components']);
  });

  it('skips the watch outline with --no-outline or --stdout', () => {
    expect(resolveConfig({}, { outline: false }, noEnv).config.outlineOut).toBeUndefined();
    expect(resolveConfig({ stdout: true }, {}, noEnv).config.outlineOut).toBeUndefined();
  });

  it('does not default reduce keys for the outline profile', () => {
    const { config } = resolveConfig({ profile: 'outline' }, {}, noEnv);

    expect(config.reduce).toEqual([]);
    expect(config.outlineOut).toBeUndefined();
  });

  it('marks an explicit URL as not default', () => {
    const { config } = resolveConfig({ url: 'https://api.example.com/openapi.json' }, undefined, noEnv);

    expect(config.url).toBe('https://api.example.com/openapi.json');
    expect(config.urlFromDefault).toBe(false);
  });

  it('reads fallbacks from the environment', () => {
    const { config } = resolveConfig({}, undefined, {
      OPENAPI_SNAPSHOT_URL: 'http://localhost:8080/docs.json',
      OPENAPI_SNAPSHOT_OUT: 'build/openapi.json',
      OPENAPI_SNAPSHOT_TIMEOUT_MS: '2500',
    });

    expect(config.url).toBe('http://localhost:8080/docs.json');
    expect(config.urlFromDefault).toBe(false);
    expect(config.out).toBe('build/openapi.json');
    expect(config.timeoutMs).toBe(2500);
  });

  it('prefers flags over the environment', () => {
    const { config } = resolveConfig({ out: 'cli.json' }, undefined, { OPENAPI_SNAPSHOT_OUT: 'env.json' });

    expect(config.out).toBe('cli.json');
  });

  it('leaves out unset when printing to stdout', () => {
    expect(resolveConfig({ stdout: true }, undefined, noEnv).config.out).toBeUndefined();
  });

  it('rejects a non-positive timeout', () => {
    expect(() => resolveConfig({ timeoutMs: '0' }, undefined, noEnv)).toThrow(
      'invalid options: --timeout-ms: Number must be greater than 0'
    );
  });

  it('rejects an unknown profile', () => {
    expect(() => resolveConfig({ profile: 'yaml' }, undefined, noEnv)).toThrow(UsageError);
    expect(() => resolveConfig({ profile: 'yaml' }, undefined, noEnv)).toThrow(/--profile/);
  });

  it('rejects an invalid watch interval', () => {
    expect(() => resolveConfig({}, { intervalMs: 'soon' }, noEnv)).toThrow(/--interval-ms/);
  });

  it('surfaces reduce list errors', () => {
    expect(() => resolveConfig({ reduce: 'info' }, undefined, noEnv)).toThrow(ReduceError);
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateConfig(baseConfig())).not.toThrow();
  });

  it('requires a destination unless printing to stdout', () => {
    expect(() => validateConfig(baseConfig({ out: undefined }))).toThrow(
      '--out is required unless --stdout is set.'
    );
    expect(() => validateConfig(baseConfig({ out: undefined, stdout: true }))).not.toThrow();
  });

  it('rejects reduce keys with the outline profile', () => {
    expect(() => validateConfig(baseConfig({ profile: 'outline', reduce: ['paths'] }))).toThrow(
      '--reduce is not supported with --profile outline.'
    );
  });

  it('rejects an outline destination with the outline profile', () => {
    expect(() => validateConfig(baseConfig({ profile: 'outline', outlineOut: 'x.json' }))).toThrow(
      '--outline-out is not supported with --profile outline.'
    );
  });

  it('allows reduce keys together with an outline destination', () => {
    expect(() => validateConfig(baseConfig({ reduce: ['paths'], outlineOut: 'x.json' }))).not.toThrow();
  });
});

describe('withUrl', () => {
  it('returns a frozen copy marked as user supplied', () => {
    const original = baseConfig();
    const updated = withUrl(original, 'http://localhost:4000/api-docs/openapi.json');

    expect(updated.url).toBe('http://localhost:4000/api-docs/openapi.json');
    expect(updated.urlFromDefault).toBe(false);
    expect(original.urlFromDefault).toBe(true);
    expect(Object.isFrozen(updated)).toBe(true);
  });
});
