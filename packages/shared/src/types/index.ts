/**
 * Core types for RemedyOps
 */

import type { UserRole } from './users.js';

// Fault types
export const FAULT_TYPES = {
  CRASH: 'crash',
  SLOW: 'slow',
  BAD_CONFIG: 'bad_config',
  BUG: 'bug',
  UNKNOWN: 'unknown',
} as const;

export type FaultType = (typeof FAULT_TYPES)[keyof typeof FAULT_TYPES];

export const FAULT_TYPE_VALUES: readonly FaultType[] = Object.values(FAULT_TYPES);

export function isFaultType(value: unknown): value is FaultType {
  return typeof value === 'string' && FAULT_TYPE_VALUES.some((ft) => ft === value);
}

// Faults the monitored service can simulate on request
export const INJECTABLE_FAULTS = ['crash', 'bad_config', 'bug', 'slow'] as const;

export type InjectableFault = (typeof INJECTABLE_FAULTS)[number];

export interface FaultInjection {
  fault: InjectableFault;
  detail: string;
  /** Workspace file the injection rewrote */
  fileModified: string | null;
}

// Incident lifecycle
export const INCIDENT_STATUSES = {
  DETECTED: 'detected',
  DIAGNOSING: 'diagnosing',
  FIX_PROPOSED: 'fix_proposed',
  AWAITING_APPROVAL: 'awaiting_approval',
  DEPLOYING: 'deploying',
  RESOLVED: 'resolved',
  REJECTED: 'rejected',
} as const;

export type IncidentStatus = (typeof INCIDENT_STATUSES)[keyof typeof INCIDENT_STATUSES];

export const INCIDENT_STATUS_VALUES = [
  'detected',
  'diagnosing',
  'fix_proposed',
  'awaiting_approval',
  'deploying',
  'resolved',
  'rejected',
] as const satisfies readonly IncidentStatus[];

export function isIncidentStatus(value: unknown): value is IncidentStatus {
  return typeof value === 'string' && INCIDENT_STATUS_VALUES.some((s) => s === value);
}

export const TERMINAL_STATUSES: readonly IncidentStatus[] = [
  INCIDENT_STATUSES.RESOLVED,
  INCIDENT_STATUSES.REJECTED,
];

export function isTerminalStatus(status: IncidentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ===========================================
// Severity Axes
// ===========================================

/** Operational blast radius */
export const IMPACT_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;
export type ImpactSeverity = (typeof IMPACT_SEVERITIES)[number];

/** Governs which role may approve a fix */
export const APPROVAL_SEVERITIES = ['low', 'medium', 'high', 'blocker'] as const;
export type ApprovalSeverity = (typeof APPROVAL_SEVERITIES)[number];

export const RISK_LEVELS = ['low', 'medium', 'high'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

// ===========================================
// Diagnosis & Fix
// ===========================================

export interface Diagnosis {
  rootCause: string;
  category: string;
  fileAtFault: string | null;
  lineHint: string | null;
  explanation: string;
  reasoning: string;
  /** Set when the reasoning engine failed and the rule-based result was used */
  engineError?: string;
}

export interface FixProposal {
  description: string;
  diff: string;
  fixCode: string;
  testCode: string;
  riskLevel: RiskLevel;
  engineError?: string;
}

export interface SandboxOutcome {
  fixApplied: boolean;
  testPassed: boolean;
  fixOutput?: string;
  testOutput?: string;
  /** Set when a snippet was killed at the sandbox timeout */
  timedOut?: boolean;
  /** True when the sandbox was unavailable and the conservative default was used */
  skipped?: boolean;
}

export type SafetyProviderMode = 'local' | 'api';

export interface SafetyResult {
  passed: boolean;
  score: number;
  checks: Record<string, boolean>;
  warnings: string[];
  reasoning: string;
  providerMode: SafetyProviderMode;
  sessionId?: string;
}

export interface SafetyContext {
  faultType: FaultType;
  rootCause: string;
  severity: ImpactSeverity;
}

// Incident
export interface Incident {
  id: string;
  title: string;
  description: string;
  serviceName: string;
  faultType: FaultType | null;
  impactSeverity: ImpactSeverity;
  approvalSeverity: ApprovalSeverity;
  status: IncidentStatus;
  impactAnalysis: string;
  errorEvidence: string;
  rootCause: string | null;
  diagnosis: Diagnosis | null;
  diagnosisCategory: string | null;
  proposedFix: string | null;
  fixDiff: string | null;
  fixCode: string | null;
  testCode: string | null;
  riskLevel: RiskLevel | null;
  confidenceScore: number;
  safetyResult: SafetyResult | null;
  safetyPassed: boolean | null;
  autoResolved: boolean;
  reportedBy: string;
  assignedTo: string;
  clearedBy: string | null;
  clearedAt: Date | null;
  detectedAt: Date;
  resolvedAt: Date | null;
  updatedAt: Date;
}

// ===========================================
// Human Decisions & Audit
// ===========================================

export const APPROVAL_ACTIONS = ['approve', 'reject', 'override', 'request_changes'] as const;

export type ApprovalAction = (typeof APPROVAL_ACTIONS)[number];

export function isApprovalAction(value: unknown): value is ApprovalAction {
  return typeof value === 'string' && APPROVAL_ACTIONS.some((a) => a === value);
}

export interface ApprovalRecord {
  id: string;
  incidentId: string;
  userName: string;
  userRole: UserRole | null;
  action: ApprovalAction;
  comment: string;
  createdAt: Date;
}

export const HUMAN_DECISIONS = ['approved', 'rejected', 'modified'] as const;
export type HumanDecision = (typeof HUMAN_DECISIONS)[number];

export interface LearningRecord {
  id: string;
  incidentType: string;
  errorPattern: string;
  proposedFixPattern: string;
  humanDecision: HumanDecision;
  confidenceAdjustment: number;
  createdAt: Date;
}

export interface ActivityLogEntry {
  id: number;
  incidentId: string | null;
  actor: string;
  action: string;
  detail: string;
  createdAt: Date;
}

export interface Comment {
  id: string;
  incidentId: string;
  userName: string;
  content: string;
  createdAt: Date;
}

export * from './users.js';
export * from './health.js';
export * from './events.js';
