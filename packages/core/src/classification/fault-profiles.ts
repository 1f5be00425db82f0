/**
 * Fault profiles
 * Static per-fault-type facts used when an incident is opened: severities,
 * description, impact analysis, title and the evidence bundle text.
 */

import type {
  ApprovalSeverity,
  FaultType,
  HealthSignal,
  ImpactSeverity,
} from '@remedyops/shared';

const IMPACT_BY_FAULT: Record<FaultType, ImpactSeverity> = {
  crash: 'critical',
  bad_config: 'high',
  bug: 'high',
  slow: 'medium',
  unknown: 'medium',
};

const APPROVAL_BY_IMPACT: Record<ImpactSeverity, ApprovalSeverity> = {
  critical: 'blocker',
  high: 'medium',
  medium: 'medium',
  low: 'low',
};

// Faults that risk data loss always need the highest approval authority
const BLOCKER_FAULTS: readonly FaultType[] = ['crash', 'bad_config'];

export function assessImpactSeverity(faultType: FaultType): ImpactSeverity {
  return IMPACT_BY_FAULT[faultType];
}

export function assessApprovalSeverity(faultType: FaultType, impact: ImpactSeverity): ApprovalSeverity {
  if (BLOCKER_FAULTS.includes(faultType)) {
    return 'blocker';
  }
  return APPROVAL_BY_IMPACT[impact];
}

export function buildTitle(health: HealthSignal, impact: ImpactSeverity): string {
  const prefix = impact === 'critical' ? '[critical]' : '[warning]';
  return `${prefix} ${(health.error ?? 'Unknown').slice(0, 80)}`;
}

export function buildDescription(health: HealthSignal, faultType: FaultType): string {
  const error = health.error ?? 'Unknown';
  switch (faultType) {
    case 'crash':
      return `Application process crashed: ${error}`;
    case 'bad_config':
      return `Configuration error: ${error}`;
    case 'bug':
      return `Code error in handler: ${health.errorType ?? ''}: ${error}`;
    case 'slow':
      return `Performance degradation: ${error}`;
    default:
      return `Application error: ${error}`;
  }
}

const IMPACT_ANALYSIS: Partial<Record<FaultType, string[]>> = {
  crash: [
    'CRITICAL IMPACT: Complete Service Outage',
    '',
    '- All API endpoints are unreachable',
    '- Customers cannot browse, order or check out',
    '- In-flight transactions may be lost',
    '- Upstream services depending on this API will also fail',
    '- Estimated blast radius: 100% of users',
  ],
  bad_config: [
    'HIGH IMPACT: Configuration Corruption',
    '',
    '- Application fails on startup due to invalid config',
    '- Database connection settings unreadable, potential data loss',
    '- All API endpoints return HTTP 500 errors',
    '- Estimated blast radius: 100% of users',
  ],
  bug: [
    'HIGH IMPACT: Code Defect in Business Logic',
    '',
    '- Health validation fails and the app reports unhealthy',
    '- Undefined function calls fail on every request',
    '- Analytics endpoint broken',
    '- Estimated blast radius: 60-80% of API calls',
  ],
  slow: [
    'MEDIUM IMPACT: Performance Degradation',
    '',
    '- Requests take seconds instead of milliseconds',
    '- Health checks time out',
    '- No data loss but severe latency for users',
    '- Estimated blast radius: 100% of users (degraded, not blocked)',
  ],
};

export function buildImpactAnalysis(health: HealthSignal, faultType: FaultType, impact: ImpactSeverity): string {
  const lines = IMPACT_ANALYSIS[faultType];
  if (lines) return lines.join('\n');
  return `UNKNOWN IMPACT\n\nSeverity: ${impact}\nError: ${health.error ?? 'Unknown'}`;
}

/**
 * Evidence bundle text: health JSON, traceback, then the last 1500 log characters
 */
export function buildErrorEvidence(health: HealthSignal, logs: string, traceback: string): string {
  const parts = [`=== HEALTH CHECK ===\n${JSON.stringify(health, null, 2)}`];
  if (traceback) {
    parts.push(`\n=== TRACEBACK ===\n${traceback}`);
  }
  if (logs) {
    parts.push(`\n=== APPLICATION LOGS ===\n${logs.slice(-1500)}`);
  }
  return parts.join('\n');
}
