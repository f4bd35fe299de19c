import { afterEach, describe, it, expect, vi } from 'vitest';

describe('runner config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('reads settings from the environment', async () => {
    vi.stubEnv('CHALLENGE_SECRET', 'test-secret');
    vi.stubEnv('CHALLENGE_BASE_URL', 'https://challenge.test/');
    vi.stubEnv('CHALLENGE_ID', 'course');
    vi.stubEnv('CHALLENGE_TASK_COUNT', '7');
    vi.stubEnv('LOG_LEVEL', 'debug');

    const { config } = await import('@runner/config');

    expect(config.secret).toBe('test-secret');
    expect(config.baseUrl).toBe('https://challenge.test/');
    expect(config.challengeId).toBe('course');
    expect(config.taskCount).toBe(7);
    expect(config.logLevel).toBe('debug');
  });

  it('falls back to info for an unknown log level', async () => {
    vi.stubEnv('LOG_LEVEL', 'loud');

    const { config } = await import('@runner/config');

    expect(config.logLevel).toBe('info');
  });

  it('falls back to 50 tasks when the count is not a positive integer', async () => {
    for (const raw of ['lots', '0', '-3', '2.5']) {
      vi.stubEnv('CHALLENGE_TASK_COUNT', raw);
      vi.resetModules();

      const { config } = await import('@runner/config');

      expect(config.taskCount).toBe(50);
    }
  });

  it('treats empty ids as absent', async () => {
    vi.stubEnv('CHALLENGE_ID', '');
    vi.stubEnv('CHALLENGE_ROUND_ID', '');
    vi.stubEnv('CHALLENGE_TASK_TYPE', '');

    const { config } = await import('@runner/config');

    expect(config.challengeId).toBeUndefined();
    expect(config.roundId).toBeUndefined();
    expect(config.taskType).toBe('json');
  });
});
