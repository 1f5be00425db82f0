/**
 * Confidence Scorer
 * Pure function of the pipeline outcome plus a snapshot of past human
 * decisions for the same diagnosis category.
 */

import type {
  Diagnosis,
  ImpactSeverity,
  LearningRecord,
  SafetyResult,
  SandboxOutcome,
} from '@remedyops/shared';

export interface ConfidenceInput {
  diagnosis: Pick<Diagnosis, 'category' | 'fileAtFault'>;
  sandbox: Pick<SandboxOutcome, 'fixApplied' | 'testPassed'>;
  safety: Pick<SafetyResult, 'passed' | 'score'>;
  severity: ImpactSeverity;
  /** Records whose incidentType equals the diagnosis category */
  history: ReadonlyArray<Pick<LearningRecord, 'humanDecision'>>;
}

export interface ConfidenceBreakdown {
  score: number;
  base: number;
  diagnosis: number;
  sandbox: number;
  safety: number;
  severityPenalty: number;
  learningAdjustment: number;
}

const BASE_SCORE = 0.5;

const SEVERITY_PENALTY: Record<ImpactSeverity, number> = {
  low: 0,
  medium: -0.05,
  high: -0.1,
  critical: -0.15,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * (approvedRate - 0.5) * 0.2, bounded to ±0.1; zero with no history
 */
export function learningAdjustment(history: ConfidenceInput['history']): number {
  if (history.length === 0) return 0;
  const approved = history.filter((r) => r.humanDecision === 'approved').length;
  return clamp((approved / history.length - 0.5) * 0.2, -0.1, 0.1);
}

export function scoreConfidenceDetailed(input: ConfidenceInput): ConfidenceBreakdown {
  const { diagnosis, sandbox, safety } = input;

  const diagnosisPart =
    (diagnosis.category && diagnosis.category !== 'unknown' ? 0.1 : 0) + (diagnosis.fileAtFault ? 0.05 : 0);
  const sandboxPart = (sandbox.testPassed ? 0.15 : 0) + (sandbox.fixApplied ? 0.05 : 0);
  const safetyPart = (safety.passed ? 0.1 : 0) + 0.1 * safety.score;
  const severityPenalty = SEVERITY_PENALTY[input.severity];
  const adjustment = learningAdjustment(input.history);

  const raw = BASE_SCORE + diagnosisPart + sandboxPart + safetyPart + severityPenalty + adjustment;

  return {
    score: round3(clamp(raw, 0, 1)),
    base: BASE_SCORE,
    diagnosis: diagnosisPart,
    sandbox: sandboxPart,
    safety: safetyPart,
    severityPenalty,
    learningAdjustment: adjustment,
  };
}

export function scoreConfidence(input: ConfidenceInput): number {
  return scoreConfidenceDetailed(input).score;
}
