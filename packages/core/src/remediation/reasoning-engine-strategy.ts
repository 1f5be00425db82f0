/**
 * Reasoning-engine remediation
 * Delegates to the Gemini client and turns an unsuccessful response into an error.
 */

import type { GeminiClient, GeminiResponse } from '@remedyops/gemini';
import {
  ReasoningEngineError,
  type Diagnosis,
  type EvidenceBundle,
  type FaultType,
  type FixProposal,
} from '@remedyops/shared';
import type { RefineInput, RemediationStrategy } from './types.js';

export type ReasoningEngine = Pick<GeminiClient, 'diagnose' | 'generateFix' | 'refineFix'>;

function unwrap<T>(operation: string, response: GeminiResponse<T>): T {
  if (!response.success || response.data === undefined) {
    const reason = response.error ?? 'empty response';
    throw new ReasoningEngineError(`${operation} failed: ${reason}`, reason, { operation });
  }
  return response.data;
}

/**
 * The file the diagnosis points at, as the service reported it
 */
export function fileForDiagnosis(diagnosis: Diagnosis, evidence: EvidenceBundle): string {
  const file = diagnosis.fileAtFault ?? '';
  if (file.includes('config')) {
    return evidence.configContent;
  }
  return evidence.handlerCode;
}

export class ReasoningEngineStrategy implements RemediationStrategy {
  readonly name = 'reasoning-engine' as const;

  constructor(private engine: ReasoningEngine) {}

  async diagnose(faultType: FaultType, evidence: EvidenceBundle, incidentId?: string): Promise<Diagnosis> {
    const response = await this.engine.diagnose({
      incidentId,
      faultType,
      health: evidence.health,
      logs: evidence.logs,
      traceback: evidence.traceback,
      handlerCode: evidence.handlerCode,
      configContent: evidence.configContent,
    });
    return unwrap('diagnose', response);
  }

  async generateFix(
    faultType: FaultType,
    diagnosis: Diagnosis,
    evidence: EvidenceBundle,
    incidentId?: string
  ): Promise<FixProposal> {
    const response = await this.engine.generateFix({
      incidentId,
      faultType,
      diagnosis,
      currentFile: fileForDiagnosis(diagnosis, evidence),
    });
    return unwrap('generateFix', response);
  }

  async refineFix(input: RefineInput): Promise<FixProposal> {
    const response = await this.engine.refineFix({
      incidentId: input.incidentId,
      faultType: input.faultType,
      diagnosis: input.diagnosis,
      proposedFix: input.proposedFix,
      fixDiff: input.fixDiff,
      fixCode: input.fixCode,
      feedback: input.feedback,
    });
    return unwrap('refineFix', response);
  }
}
