import { describe, it, expect, afterEach, vi } from 'vitest';
import { getConfig, resetConfig, validateConfig } from './index.js';

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('should use the default for a blank numeric value', () => {
    vi.stubEnv('MONITOR_INTERVAL_MS', '');
    vi.stubEnv('VERIFY_ATTEMPTS', '');
    resetConfig();

    const config = getConfig();

    expect(config.monitor.intervalMs).toBe(5000);
    expect(config.verify.attempts).toBe(4);
  });

  it('should use the default for a blank URL', () => {
    vi.stubEnv('SERVICE_HEALTH_URL', '');
    resetConfig();

    expect(getConfig().service.healthUrl).toBe('http://127.0.0.1:8001/health');
  });

  it('should coerce numeric strings', () => {
    vi.stubEnv('SANDBOX_TIMEOUT_MS', '2500');
    resetConfig();

    expect(getConfig().sandbox.timeoutMs).toBe(2500);
  });

  it('should keep the cached config until reset', () => {
    vi.stubEnv('MONITOR_INTERVAL_MS', '7000');
    resetConfig();
    const first = getConfig();

    vi.stubEnv('MONITOR_INTERVAL_MS', '9000');
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().monitor.intervalMs).toBe(9000);
  });

  it('should report every invalid value', () => {
    vi.stubEnv('AUTO_FIX_THRESHOLD', '2');
    vi.stubEnv('VERIFY_ATTEMPTS', '-1');

    expect(validateConfig()).toEqual({
      valid: false,
      errors: [
        'thresholds.autoFix: Number must be less than or equal to 1',
        'verify.attempts: Number must be greater than 0',
      ],
    });
  });

  it('should accept the default environment', () => {
    expect(validateConfig()).toEqual({ valid: true });
  });
});
