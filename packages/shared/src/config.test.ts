import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { loadEnv, sharedConfigSchema } from './config.js';

describe('sharedConfigSchema', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.LOADING_KIT_LOG_LEVEL;
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.unstubAllGlobals();
  });

  it('defaults the log level to warn', () => {
    expect(loadEnv(sharedConfigSchema)).toEqual({ LOADING_KIT_LOG_LEVEL: 'warn' });
  });

  it.each(['trace', 'debug', 'info', 'error', 'fatal', 'silent'] as const)('reads the %s level', (level) => {
    process.env.LOADING_KIT_LOG_LEVEL = level;

    expect(loadEnv(sharedConfigSchema).LOADING_KIT_LOG_LEVEL).toBe(level);
  });

  it('reads an unrecognised level as warn', () => {
    process.env.LOADING_KIT_LOG_LEVEL = 'verbose';

    expect(loadEnv(sharedConfigSchema).LOADING_KIT_LOG_LEVEL).toBe('warn');
  });

  it('uses the defaults in a page without a process', () => {
    vi.stubGlobal('process', undefined);
    const config = loadEnv(sharedConfigSchema);
    vi.unstubAllGlobals();

    expect(config).toEqual({ LOADING_KIT_LOG_LEVEL: 'warn' });
  });
});

describe('loadEnv', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('coerces values through the schema', () => {
    process.env.LOADING_KIT_SAMPLE_MS = '250';

    expect(loadEnv(z.object({ LOADING_KIT_SAMPLE_MS: z.coerce.number() }))).toEqual({ LOADING_KIT_SAMPLE_MS: 250 });
  });

  it('lists every variable that fails validation', () => {
    delete process.env.LOADING_KIT_THEME;
    process.env.LOADING_KIT_SAMPLE_MS = '2.5';

    const schema = z.object({
      LOADING_KIT_THEME: z.string(),
      LOADING_KIT_SAMPLE_MS: z.coerce.number().int(),
    });

    expect(() => loadEnv(schema)).toThrow(
      'Environment variable validation failed: \n' +
        ' - LOADING_KIT_THEME: Required\n' +
        ' - LOADING_KIT_SAMPLE_MS: Expected integer, received float'
    );
  });
});
