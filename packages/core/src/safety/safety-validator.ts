/**
 * Safety Validator
 * Tries the remote guardrail service while it is reachable and falls back to
 * the local gate. One remote failure switches to local for the rest of the run.
 */

import { createChildLogger, errorMessage, type SafetyContext, type SafetyResult } from '@remedyops/shared';
import { SafetyGate, type SafetyStats } from './safety-gate.js';
import type { RemoteSafetyClient } from './remote-safety-client.js';

export interface SafetyValidatorStats extends SafetyStats {
  /** null until the remote service has been tried */
  apiAvailable: boolean | null;
}

export class SafetyValidator {
  private gate: SafetyGate;
  private remote: RemoteSafetyClient | null;
  private apiAvailable: boolean | null = null;
  private remoteRun = 0;
  private remotePassed = 0;
  private logger = createChildLogger({ component: 'SafetyValidator' });

  constructor(gate: SafetyGate = new SafetyGate(), remote: RemoteSafetyClient | null = null) {
    this.gate = gate;
    this.remote = remote;
  }

  async check(context: SafetyContext, fixText: string): Promise<SafetyResult> {
    if (this.remote?.isConfigured() && this.apiAvailable !== false) {
      try {
        const result = await this.remote.check(context, fixText);
        this.apiAvailable = true;
        this.remoteRun++;
        if (result.passed) this.remotePassed++;
        return result;
      } catch (error) {
        this.apiAvailable = false;
        this.logger.warn({ error: errorMessage(error) }, 'Remote safety unavailable, using local gate');
      }
    }

    return this.gate.evaluate(context, fixText);
  }

  /**
   * Local gate only; used where a verdict is recorded but never blocks
   */
  checkLocal(context: SafetyContext, fixText: string): SafetyResult {
    return this.gate.evaluate(context, fixText);
  }

  getStats(): SafetyValidatorStats {
    const local = this.gate.getStats();
    const checksRun = local.checksRun + this.remoteRun;
    const checksPassed = local.checksPassed + this.remotePassed;
    return {
      checksRun,
      checksPassed,
      checksFailed: checksRun - checksPassed,
      passRate: Math.round((checksPassed / Math.max(checksRun, 1)) * 100) / 100,
      apiAvailable: this.apiAvailable,
    };
  }
}
