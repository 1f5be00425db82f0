/**
 * Apply-and-Verify Executor
 * Runs the monitored service's recovery action for a fault type, then polls
 * health with bounded retries until the service reports healthy.
 */

import {
  createChildLogger,
  RetryExhaustedError,
  type FaultType,
  type HealthSignal,
  type RecoveryResult,
} from '@remedyops/shared';
import type { MonitoredService } from '../collaborators/types.js';

export interface ApplyAndVerifyConfig {
  attempts: number;
  settleMs: number;
  retryDelayMs: number;
  maxWallClockMs: number;
}

export const DEFAULT_APPLY_AND_VERIFY_CONFIG: ApplyAndVerifyConfig = {
  attempts: 4,
  settleMs: 3000,
  retryDelayMs: 3000,
  maxWallClockMs: 60000,
};

export type VerifyProgressAction = 'fix_applied' | 'verify_retry';

/**
 * Receives progress as it happens so it can be logged and broadcast
 */
export type VerifyProgressReporter = (action: VerifyProgressAction, detail: string) => Promise<void>;

export interface VerifyOutcome {
  recovery: RecoveryResult;
  attempts: number;
  health: HealthSignal;
}

export interface ApplyAndVerifyDeps {
  service: Pick<MonitoredService, 'applyRecovery' | 'restart' | 'healthCheck'>;
  delay?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultDelay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function describeRecovery(recovery: RecoveryResult): string {
  const target = recovery.file ? ` (${recovery.file})` : '';
  if (recovery.fixed) {
    return `Recovery action ${recovery.action ?? 'none'}${target} succeeded`;
  }
  return `Recovery action ${recovery.action ?? 'none'}${target} failed: ${recovery.error ?? 'unknown error'}`;
}

export class ApplyAndVerifyExecutor {
  private config: ApplyAndVerifyConfig;
  private service: ApplyAndVerifyDeps['service'];
  private delay: (ms: number) => Promise<void>;
  private now: () => number;
  private logger = createChildLogger({ component: 'ApplyAndVerify' });

  constructor(deps: ApplyAndVerifyDeps, config: Partial<ApplyAndVerifyConfig> = {}) {
    this.config = { ...DEFAULT_APPLY_AND_VERIFY_CONFIG, ...config };
    this.service = deps.service;
    this.delay = deps.delay ?? defaultDelay;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Resolves on the first healthy attempt. Throws RetryExhaustedError when
   * every attempt is unhealthy; errors from the service propagate as-is.
   */
  async execute(faultType: FaultType, report: VerifyProgressReporter, incidentId?: string): Promise<VerifyOutcome> {
    const startedAt = this.now();

    const recovery = await this.service.applyRecovery(faultType);
    await report('fix_applied', describeRecovery(recovery));

    if (faultType !== 'crash') {
      await this.service.restart();
    }

    await this.delay(this.config.settleMs);

    let lastError = 'unhealthy';
    let attemptsMade = 0;

    for (let attempt = 1; attempt <= this.config.attempts; attempt++) {
      attemptsMade = attempt;
      const health = await this.service.healthCheck();

      if (health.healthy) {
        this.logger.info({ incidentId, faultType, attempt }, 'Service healthy after fix');
        return { recovery, attempts: attempt, health };
      }

      lastError = health.error || health.errorType || 'unhealthy';
      this.logger.warn({ incidentId, attempt, error: lastError }, 'Verification attempt unhealthy');

      if (attempt === this.config.attempts) {
        break;
      }
      if (this.now() - startedAt > this.config.maxWallClockMs) {
        this.logger.warn({ incidentId, maxWallClockMs: this.config.maxWallClockMs }, 'Verification wall clock exceeded');
        break;
      }

      await report('verify_retry', `Attempt ${attempt}/${this.config.attempts} unhealthy: ${lastError}`);
      await this.delay(this.config.retryDelayMs);
    }

    throw new RetryExhaustedError(attemptsMade, lastError, { incidentId });
  }
}
