/**
 * Clearance Report
 * Plain-text summary sent to final-authority users once an approved or
 * overridden fix has been deployed and verified.
 */

import { formatDistanceStrict } from 'date-fns';
import type { ApprovalAction, Incident, UserRole } from '@remedyops/shared';

export interface ClearanceReport {
  incidentId: string;
  title: string;
  clearedBy: string;
  clearedByRole: UserRole | null;
  action: ApprovalAction;
  outcome: string;
  timeToResolution: string | null;
  report: string;
}

export function buildClearanceReport(
  incident: Incident,
  actor: string,
  role: UserRole | null,
  action: ApprovalAction
): ClearanceReport {
  const timeToResolution = incident.resolvedAt
    ? formatDistanceStrict(incident.resolvedAt, incident.detectedAt)
    : null;
  const outcome = incident.status === 'resolved' ? 'Resolved and verified healthy' : `Status ${incident.status}`;
  const safetyScore = incident.safetyResult ? `${Math.round(incident.safetyResult.score * 100)}%` : 'n/a';

  const lines = [
    `CLEARANCE REPORT: ${incident.title}`,
    '',
    `Impact severity: ${incident.impactSeverity} | Approval severity: ${incident.approvalSeverity}`,
    `Root cause: ${incident.rootCause ?? 'unknown'}`,
    `Fix applied: ${incident.proposedFix ?? 'none'}`,
    `Confidence: ${Math.round(incident.confidenceScore * 100)}% | Safety score: ${safetyScore}`,
    `${action === 'override' ? 'Overridden' : 'Approved'} by: ${actor} (${role ?? 'unregistered'})`,
    `Outcome: ${outcome}`,
  ];
  if (timeToResolution) {
    lines.push(`Time to resolution: ${timeToResolution}`);
  }

  return {
    incidentId: incident.id,
    title: incident.title,
    clearedBy: actor,
    clearedByRole: role,
    action,
    outcome,
    timeToResolution,
    report: lines.join('\n'),
  };
}
