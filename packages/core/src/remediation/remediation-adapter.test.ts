/**
 * Remediation Adapter Tests
 */
import { describe, it, expect, vi } from 'vitest';
import type { Diagnosis, EvidenceBundle } from '@remedyops/shared';
import { ReasoningEngineStrategy, type ReasoningEngine } from './reasoning-engine-strategy.js';
import { RemediationAdapter } from './remediation-adapter.js';
import { fallbackFix } from './rule-based-strategy.js';

const evidence: EvidenceBundle = {
  health: { healthy: false, error: 'Config invalid', detail: 'bad token' },
  logs: 'log line',
  traceback: '',
  handlerCode: 'HANDLER',
  configContent: 'CONFIG',
};

const engineDiagnosis: Diagnosis = {
  rootCause: 'config.json is truncated',
  category: 'config',
  fileAtFault: 'config.json',
  lineHint: '1',
  explanation: 'truncated',
  reasoning: 'looked at it',
};

function createEngine(overrides: Partial<ReasoningEngine> = {}): ReasoningEngine {
  return {
    diagnose: vi.fn().mockResolvedValue({ success: true, data: engineDiagnosis }),
    generateFix: vi.fn().mockResolvedValue({ success: true, data: fallbackFix('bad_config') }),
    refineFix: vi.fn().mockResolvedValue({ success: false, error: 'quota' }),
    ...overrides,
  };
}

describe('RemediationAdapter', () => {
  it('should use the rule-based strategy when no engine is configured', async () => {
    const adapter = new RemediationAdapter(null);

    const diagnosis = await adapter.diagnose('bad_config', evidence);

    expect(diagnosis.rootCause).toBe('config.json contains invalid JSON, parser error: bad token');
    expect(diagnosis.engineError).toBeUndefined();
    expect(adapter.getStats()).toEqual({
      engineAvailable: false,
      engineCalls: 0,
      engineSuccesses: 0,
      fallbacks: 1,
      lastEngineError: null,
    });
  });

  it('should return the engine result when it succeeds', async () => {
    const engine = createEngine();
    const adapter = new RemediationAdapter(new ReasoningEngineStrategy(engine));

    const diagnosis = await adapter.diagnose('bad_config', evidence, 'inc-1');

    expect(diagnosis).toEqual(engineDiagnosis);
    expect(engine.diagnose).toHaveBeenCalledWith({
      incidentId: 'inc-1',
      faultType: 'bad_config',
      health: evidence.health,
      logs: 'log line',
      traceback: '',
      handlerCode: 'HANDLER',
      configContent: 'CONFIG',
    });
    expect(adapter.getStats().engineSuccesses).toBe(1);
  });

  it('should pass the config file content when the diagnosis points at config', async () => {
    const engine = createEngine();
    const adapter = new RemediationAdapter(new ReasoningEngineStrategy(engine));

    await adapter.generateFix('bad_config', engineDiagnosis, evidence, 'inc-1');

    expect(engine.generateFix).toHaveBeenCalledWith({
      incidentId: 'inc-1',
      faultType: 'bad_config',
      diagnosis: engineDiagnosis,
      currentFile: 'CONFIG',
    });
  });

  it('should fall back and record the engine error on an unsuccessful response', async () => {
    const adapter = new RemediationAdapter(new ReasoningEngineStrategy(createEngine()));

    const refined = await adapter.refineFix({
      incidentId: 'inc-1',
      faultType: 'crash',
      diagnosis: null,
      proposedFix: 'Restart',
      fixDiff: '',
      fixCode: '# restart',
      testCode: '',
      riskLevel: 'low',
      feedback: 'check memory first',
    });

    expect(refined.description).toBe('Restart\n\nUpdated per engineer feedback: check memory first');
    expect(refined.engineError).toBe('refineFix failed: quota');
    expect(adapter.getStats()).toMatchObject({
      engineCalls: 1,
      engineSuccesses: 0,
      fallbacks: 1,
      lastEngineError: 'refineFix failed: quota',
    });
  });

  it('should fall back when the engine throws', async () => {
    const engine = createEngine({ diagnose: vi.fn().mockRejectedValue(new Error('socket hang up')) });
    const adapter = new RemediationAdapter(new ReasoningEngineStrategy(engine));

    const diagnosis = await adapter.diagnose('crash', evidence);

    expect(diagnosis.category).toBe('crash');
    expect(diagnosis.engineError).toBe('socket hang up');
  });
});
