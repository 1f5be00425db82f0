/**
 * Remediation types
 */

import type { Diagnosis, EvidenceBundle, FaultType, FixProposal } from '@remedyops/shared';

export type StrategyName = 'reasoning-engine' | 'rule-based';

export interface RefineInput {
  incidentId: string;
  faultType: FaultType | null;
  diagnosis: Diagnosis | null;
  proposedFix: string;
  fixDiff: string;
  fixCode: string;
  testCode: string;
  riskLevel: FixProposal['riskLevel'];
  feedback: string;
}

/**
 * One way of producing a diagnosis and a fix. Implementations may throw;
 * the adapter decides what a failure means.
 */
export interface RemediationStrategy {
  readonly name: StrategyName;
  diagnose(faultType: FaultType, evidence: EvidenceBundle, incidentId?: string): Promise<Diagnosis>;
  generateFix(
    faultType: FaultType,
    diagnosis: Diagnosis,
    evidence: EvidenceBundle,
    incidentId?: string
  ): Promise<FixProposal>;
  refineFix(input: RefineInput): Promise<FixProposal>;
}

export interface RemediationStats {
  engineAvailable: boolean;
  engineCalls: number;
  engineSuccesses: number;
  fallbacks: number;
  lastEngineError: string | null;
}
