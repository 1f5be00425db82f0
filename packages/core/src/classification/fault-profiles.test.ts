/**
 * Fault Profile Tests
 */
import { describe, it, expect } from 'vitest';
import {
  assessImpactSeverity,
  assessApprovalSeverity,
  buildTitle,
  buildDescription,
  buildImpactAnalysis,
  buildErrorEvidence,
} from './fault-profiles.js';

describe('fault profiles', () => {
  it('should rate a crash critical and blocker', () => {
    const impact = assessImpactSeverity('crash');
    expect(impact).toBe('critical');
    expect(assessApprovalSeverity('crash', impact)).toBe('blocker');
  });

  it('should force blocker approval for bad_config despite high impact', () => {
    expect(assessImpactSeverity('bad_config')).toBe('high');
    expect(assessApprovalSeverity('bad_config', 'high')).toBe('blocker');
  });

  it('should map impact to approval severity for the other faults', () => {
    expect(assessApprovalSeverity('bug', assessImpactSeverity('bug'))).toBe('medium');
    expect(assessApprovalSeverity('slow', assessImpactSeverity('slow'))).toBe('medium');
    expect(assessApprovalSeverity('unknown', 'low')).toBe('low');
  });

  it('should prefix the title by impact and cut the error at 80 characters', () => {
    expect(buildTitle({ healthy: false, error: 'Process not running' }, 'critical')).toBe(
      '[critical] Process not running'
    );
    const long = 'x'.repeat(100);
    expect(buildTitle({ healthy: false, error: long }, 'high')).toBe(`[warning] ${'x'.repeat(80)}`);
  });

  it('should describe each fault type', () => {
    expect(buildDescription({ healthy: false, error: 'bad value' }, 'bad_config')).toBe(
      'Configuration error: bad value'
    );
    expect(buildDescription({ healthy: false, errorType: 'NameError', error: 'x' }, 'bug')).toBe(
      'Code error in handler: NameError: x'
    );
  });

  it('should fall back to a generic impact analysis for unknown faults', () => {
    expect(buildImpactAnalysis({ healthy: false, error: 'weird' }, 'unknown', 'medium')).toBe(
      'UNKNOWN IMPACT\n\nSeverity: medium\nError: weird'
    );
    expect(buildImpactAnalysis({ healthy: false }, 'crash', 'critical').split('\n')[0]).toBe(
      'CRITICAL IMPACT: Complete Service Outage'
    );
  });

  it('should keep only the last 1500 log characters in the evidence', () => {
    const logs = `${'a'.repeat(100)}${'b'.repeat(1500)}`;
    const evidence = buildErrorEvidence({ healthy: false }, logs, 'Traceback line');

    expect(evidence).toBe(
      `=== HEALTH CHECK ===\n{\n  "healthy": false\n}\n\n=== TRACEBACK ===\nTraceback line\n\n=== APPLICATION LOGS ===\n${'b'.repeat(1500)}`
    );
  });
});
