/**
 * Apply-and-Verify Executor Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { RetryExhaustedError, type HealthSignal } from '@remedyops/shared';
import { ApplyAndVerifyExecutor, type ApplyAndVerifyDeps } from './apply-and-verify.js';

const healthy: HealthSignal = { healthy: true };
const unhealthy: HealthSignal = { healthy: false, error: 'Config invalid' };

function createService(signals: HealthSignal[]) {
  const healthCheck = vi.fn<() => Promise<HealthSignal>>();
  for (const signal of signals) {
    healthCheck.mockResolvedValueOnce(signal);
  }
  healthCheck.mockResolvedValue(unhealthy);
  return {
    applyRecovery: vi.fn().mockResolvedValue({ fixed: true, action: 'config_restored', file: 'config.json' }),
    restart: vi.fn().mockResolvedValue(undefined),
    healthCheck,
  } satisfies ApplyAndVerifyDeps['service'];
}

describe('ApplyAndVerifyExecutor', () => {
  it('should resolve at the first healthy attempt', async () => {
    const service = createService([unhealthy, healthy]);
    const delay = vi.fn().mockResolvedValue(undefined);
    const report = vi.fn().mockResolvedValue(undefined);
    const executor = new ApplyAndVerifyExecutor({ service, delay });

    const outcome = await executor.execute('bad_config', report);

    expect(outcome.attempts).toBe(2);
    expect(service.healthCheck).toHaveBeenCalledTimes(2);
    expect(service.restart).toHaveBeenCalledTimes(1);
    expect(delay.mock.calls).toEqual([[3000], [3000]]);
    expect(report.mock.calls).toEqual([
      ['fix_applied', 'Recovery action config_restored (config.json) succeeded'],
      ['verify_retry', 'Attempt 1/4 unhealthy: Config invalid'],
    ]);
  });

  it('should make exactly four attempts before giving up', async () => {
    const service = createService([]);
    const report = vi.fn().mockResolvedValue(undefined);
    const executor = new ApplyAndVerifyExecutor({ service, delay: async () => undefined });

    const failure = executor.execute('bad_config', report);

    await expect(failure).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(failure).rejects.toThrow('Fix applied but still unhealthy after 4 attempts: Config invalid');
    expect(service.healthCheck).toHaveBeenCalledTimes(4);
    expect(report.mock.calls.filter(([action]) => action === 'verify_retry')).toHaveLength(3);
  });

  it('should not restart after a crash recovery', async () => {
    const service = createService([healthy]);
    const executor = new ApplyAndVerifyExecutor({ service, delay: async () => undefined });

    await executor.execute('crash', async () => undefined);

    expect(service.restart).not.toHaveBeenCalled();
  });

  it('should stop early once the wall clock is exceeded', async () => {
    const service = createService([]);
    let clock = 0;
    const executor = new ApplyAndVerifyExecutor(
      {
        service,
        delay: async (ms) => {
          clock += ms;
        },
        now: () => clock,
      },
      { maxWallClockMs: 5000 }
    );

    await expect(executor.execute('slow', async () => undefined)).rejects.toMatchObject({ attempts: 2 });
    expect(service.healthCheck).toHaveBeenCalledTimes(2);
  });

  it('should propagate a failing recovery action', async () => {
    const service = createService([]);
    service.applyRecovery.mockRejectedValue(new Error('disk full'));
    const executor = new ApplyAndVerifyExecutor({ service, delay: async () => undefined });

    await expect(executor.execute('bug', async () => undefined)).rejects.toThrow('disk full');
    expect(service.healthCheck).not.toHaveBeenCalled();
  });
});
