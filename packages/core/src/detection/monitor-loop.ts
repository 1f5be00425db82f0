/**
 * Monitor Loop
 * Polls the monitored service on a fixed interval, classifies unhealthy
 * signals and claims the dedup key before announcing a fault. Handling of the
 * fault runs outside the tick; a failing tick is reported and the loop goes on.
 */

import { EventEmitter } from 'eventemitter3';
import { createChildLogger, type FaultType, type HealthSignal } from '@remedyops/shared';
import { classifyFault } from '../classification/fault-classifier.js';
import type { DedupGuard } from './dedup-guard.js';

export interface HealthSource {
  healthCheck(): Promise<HealthSignal>;
}

export interface DetectedFault {
  health: HealthSignal;
  faultType: FaultType;
  detectedAt: Date;
}

export interface MonitorLoopEvents {
  'health:checked': (health: HealthSignal) => void;
  'fault:detected': (fault: DetectedFault) => void;
  'fault:suppressed': (fault: DetectedFault) => void;
  'cycle:error': (error: Error) => void;
}

export interface MonitorLoopConfig {
  intervalMs: number;
}

const DEFAULT_CONFIG: MonitorLoopConfig = {
  intervalMs: 5000,
};

const logger = createChildLogger({ component: 'MonitorLoop' });

export class MonitorLoop extends EventEmitter<MonitorLoopEvents> {
  private config: MonitorLoopConfig;
  private source: HealthSource;
  private guard: DedupGuard;
  private pollInterval: NodeJS.Timeout | null = null;
  private cycleInFlight = false;
  private cyclesRun = 0;

  constructor(source: HealthSource, guard: DedupGuard, config: Partial<MonitorLoopConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.source = source;
    this.guard = guard;
  }

  /**
   * Start polling. The first tick runs immediately; the returned promise settles when it has.
   */
  start(): Promise<void> {
    if (this.pollInterval) {
      logger.warn('Already running');
      return Promise.resolve();
    }

    logger.info({ intervalMs: this.config.intervalMs }, 'Starting health monitoring');

    this.pollInterval = setInterval(() => {
      void this.runCycle();
    }, this.config.intervalMs);

    return this.runCycle();
  }

  stop(): void {
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
      logger.info({ cyclesRun: this.cyclesRun }, 'Stopped health monitoring');
    }
  }

  isRunning(): boolean {
    return this.pollInterval !== null;
  }

  /**
   * One tick. Never rejects.
   */
  async runCycle(): Promise<void> {
    // A slow health check must not stack ticks
    if (this.cycleInFlight) {
      logger.debug('Previous cycle still running, skipping tick');
      return;
    }
    this.cycleInFlight = true;
    this.cyclesRun++;

    try {
      const health = await this.source.healthCheck();
      this.emit('health:checked', health);

      if (health.healthy) return;

      const fault: DetectedFault = {
        health,
        faultType: classifyFault(health),
        detectedAt: new Date(),
      };

      if (!this.guard.tryReserve(fault.faultType)) {
        this.emit('fault:suppressed', fault);
        return;
      }

      logger.info({ faultType: fault.faultType, error: health.error }, 'Fault detected');
      this.emit('fault:detected', fault);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ errorMessage: err.message }, 'Monitor cycle error');
      this.emit('cycle:error', err);
    } finally {
      this.cycleInFlight = false;
    }
  }
}
