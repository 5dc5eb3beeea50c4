import { afterEach, describe, expect, it, vi } from 'vitest';

describe('getLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to the info level when LOG_LEVEL is invalid', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    vi.stubEnv('NODE_ENV', 'production');
    vi.resetModules();
    const { getLogger } = await import('./get-logger');

    expect(getLogger().level).toBe('info');
  });

  it('uses the configured level', async () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('NODE_ENV', 'production');
    vi.resetModules();
    const { getLogger } = await import('./get-logger');

    expect(getLogger().level).toBe('debug');
  });
});
