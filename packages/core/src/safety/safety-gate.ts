/**
 * Local Safety Gate
 * Pure rule evaluation of a fix payload. Critical checks are binary and any
 * failure fails the gate; advisory checks only move the score.
 */

import { createChildLogger, type SafetyContext, type SafetyResult } from '@remedyops/shared';
import {
  ADVISORY_CHECKS,
  BROAD_SCOPE_PATTERNS,
  COHERENCE_KEYWORDS,
  CREDENTIAL_PATTERNS,
  CRITICAL_CHECKS,
  DATA_LOSS_PATTERNS,
  DESTRUCTIVE_COMMANDS,
  ROLLBACK_INDICATORS,
  SECURITY_PATTERNS,
  type PatternRule,
  type SafetyCheckName,
} from './safety-rules.js';

export interface SafetyStats {
  checksRun: number;
  checksPassed: number;
  checksFailed: number;
  passRate: number;
}

const CHECK_LABELS: Record<SafetyCheckName, string> = {
  noDestructiveCommands: 'No destructive commands',
  noDataLoss: 'No data loss',
  noSecurityRegression: 'No security regression',
  noCredentialExposure: 'No credential exposure',
  rollbackPossible: 'Rollback possible',
  fixFaultCoherence: 'Fix matches fault',
  minimalScope: 'Minimal scope',
};

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Compose the text the gate evaluates from a fix
 */
export function buildFixText(fixCode: string | null | undefined, fixDiff: string | null | undefined): string {
  return `${fixCode ?? ''}\n${fixDiff ?? ''}`;
}

export class SafetyGate {
  private checksRun = 0;
  private checksPassed = 0;
  private checksFailed = 0;
  private logger = createChildLogger({ component: 'SafetyGate' });

  evaluate(context: SafetyContext, fixText: string): SafetyResult {
    const lower = fixText.toLowerCase();
    const warnings: string[] = [];

    const matchAll = (rules: readonly PatternRule[], label: string): boolean => {
      let clean = true;
      for (const rule of rules) {
        if (lower.includes(rule.pattern)) {
          clean = false;
          warnings.push(`${label}: ${rule.description} (${rule.pattern})`);
        }
      }
      return clean;
    };

    const checks: Record<SafetyCheckName, boolean> = {
      noDestructiveCommands: matchAll(DESTRUCTIVE_COMMANDS, 'Destructive command'),
      noDataLoss: matchAll(DATA_LOSS_PATTERNS, 'Potential data loss'),
      noSecurityRegression: matchAll(SECURITY_PATTERNS, 'Security concern'),
      noCredentialExposure: true,
      rollbackPossible: false,
      fixFaultCoherence: true,
      minimalScope: true,
    };

    for (const rule of CREDENTIAL_PATTERNS) {
      if (rule.pattern.test(fixText)) {
        checks.noCredentialExposure = false;
        warnings.push(`Credential exposure: ${rule.description}`);
      }
    }

    checks.rollbackPossible =
      ROLLBACK_INDICATORS.some((indicator) => lower.includes(indicator)) || context.faultType === 'crash';

    const expected = COHERENCE_KEYWORDS[context.faultType];
    if (expected) {
      checks.fixFaultCoherence = expected.some((keyword) => lower.includes(keyword));
      if (!checks.fixFaultCoherence) {
        warnings.push(`Fix may not match fault type '${context.faultType}'`);
      }
    }

    for (const pattern of BROAD_SCOPE_PATTERNS) {
      if (lower.includes(pattern)) {
        checks.minimalScope = false;
        warnings.push(`Fix may affect multiple files: '${pattern}'`);
      }
    }

    const criticalPassed = CRITICAL_CHECKS.every((name) => checks[name]);
    const advisoryFraction = ADVISORY_CHECKS.filter((name) => checks[name]).length / ADVISORY_CHECKS.length;
    const score = round3((criticalPassed ? 1.0 : 0.2) * (0.7 + 0.3 * advisoryFraction));

    this.checksRun++;
    if (criticalPassed) {
      this.checksPassed++;
    } else {
      this.checksFailed++;
    }

    this.logger.info(
      { faultType: context.faultType, passed: criticalPassed, score, warnings: warnings.length },
      'Local safety check completed'
    );

    return {
      passed: criticalPassed,
      score,
      checks,
      warnings,
      reasoning: this.buildReasoning(context, checks, warnings, score, criticalPassed),
      providerMode: 'local',
    };
  }

  getStats(): SafetyStats {
    return {
      checksRun: this.checksRun,
      checksPassed: this.checksPassed,
      checksFailed: this.checksFailed,
      passRate: Math.round((this.checksPassed / Math.max(this.checksRun, 1)) * 100) / 100,
    };
  }

  private buildReasoning(
    context: SafetyContext,
    checks: Record<SafetyCheckName, boolean>,
    warnings: string[],
    score: number,
    passed: boolean
  ): string {
    const lines = [
      'Safety analysis (local engine)',
      `Fault type: ${context.faultType} | Severity: ${context.severity}`,
      `Overall score: ${Math.round(score * 100)}% | Verdict: ${passed ? 'SAFE' : 'UNSAFE'}`,
      '',
      'Checks:',
      ...[...CRITICAL_CHECKS, ...ADVISORY_CHECKS].map(
        (name) => `  [${checks[name] ? 'pass' : 'fail'}] ${CHECK_LABELS[name]}`
      ),
    ];
    if (warnings.length > 0) {
      lines.push('', 'Warnings:', ...warnings.map((w) => `  ${w}`));
    }
    return lines.join('\n');
  }
}
