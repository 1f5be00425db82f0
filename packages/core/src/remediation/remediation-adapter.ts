/**
 * Remediation Adapter
 * Prefers the reasoning engine and falls back to the rule-based strategy on
 * any failure. Fallback results carry the engine error that caused them.
 */

import {
  createChildLogger,
  errorMessage,
  type Diagnosis,
  type EvidenceBundle,
  type FaultType,
  type FixProposal,
} from '@remedyops/shared';
import { RuleBasedStrategy } from './rule-based-strategy.js';
import type { RefineInput, RemediationStats, RemediationStrategy } from './types.js';

export class RemediationAdapter {
  private engineCalls = 0;
  private engineSuccesses = 0;
  private fallbacks = 0;
  private lastEngineError: string | null = null;
  private logger = createChildLogger({ component: 'RemediationAdapter' });

  constructor(
    private engine: RemediationStrategy | null,
    private fallback: RemediationStrategy = new RuleBasedStrategy()
  ) {}

  get engineAvailable(): boolean {
    return this.engine !== null;
  }

  async diagnose(faultType: FaultType, evidence: EvidenceBundle, incidentId?: string): Promise<Diagnosis> {
    return this.withFallback(
      'diagnose',
      incidentId,
      (strategy) => strategy.diagnose(faultType, evidence, incidentId)
    );
  }

  async generateFix(
    faultType: FaultType,
    diagnosis: Diagnosis,
    evidence: EvidenceBundle,
    incidentId?: string
  ): Promise<FixProposal> {
    return this.withFallback(
      'generateFix',
      incidentId,
      (strategy) => strategy.generateFix(faultType, diagnosis, evidence, incidentId)
    );
  }

  async refineFix(input: RefineInput): Promise<FixProposal> {
    return this.withFallback('refineFix', input.incidentId, (strategy) => strategy.refineFix(input));
  }

  /**
   * Rule-based diagnosis and fix without consulting the engine
   */
  async fallbackProposal(
    faultType: FaultType,
    evidence: EvidenceBundle,
    incidentId?: string
  ): Promise<{ diagnosis: Diagnosis; fix: FixProposal }> {
    this.fallbacks++;
    const diagnosis = await this.fallback.diagnose(faultType, evidence, incidentId);
    const fix = await this.fallback.generateFix(faultType, diagnosis, evidence, incidentId);
    return { diagnosis, fix };
  }

  getStats(): RemediationStats {
    return {
      engineAvailable: this.engineAvailable,
      engineCalls: this.engineCalls,
      engineSuccesses: this.engineSuccesses,
      fallbacks: this.fallbacks,
      lastEngineError: this.lastEngineError,
    };
  }

  private async withFallback<T extends { engineError?: string }>(
    operation: string,
    incidentId: string | undefined,
    run: (strategy: RemediationStrategy) => Promise<T>
  ): Promise<T> {
    let engineError: string | undefined;

    if (this.engine) {
      this.engineCalls++;
      try {
        const result = await run(this.engine);
        this.engineSuccesses++;
        return result;
      } catch (error) {
        engineError = errorMessage(error);
        this.lastEngineError = engineError;
        this.logger.warn({ incidentId, operation, error: engineError }, 'Reasoning engine failed, using rule-based fallback');
      }
    }

    this.fallbacks++;
    const result = await run(this.fallback);
    return engineError === undefined ? result : { ...result, engineError };
  }
}
