/**
 * Role-based approval policy
 */

import {
  AuthorizationError,
  MIN_APPROVAL_LEVEL,
  ROLE_LEVELS,
  USER_ROLES,
  type ApprovalAction,
  type ApprovalSeverity,
  type UserRole,
} from '@remedyops/shared';

// Actions that change what gets deployed need authority; the rest are open to everyone
const GATED_ACTIONS: readonly ApprovalAction[] = ['approve', 'override'];

export function isGatedAction(action: ApprovalAction): boolean {
  return GATED_ACTIONS.includes(action);
}

/**
 * Lowest role whose level meets the severity's minimum
 */
export function minimumRoleFor(severity: ApprovalSeverity): UserRole {
  const minLevel = MIN_APPROVAL_LEVEL[severity];
  return USER_ROLES.find((role) => ROLE_LEVELS[role] >= minLevel) ?? 'cto';
}

export function canApprove(role: UserRole | null, severity: ApprovalSeverity): boolean {
  if (!role) return false;
  return ROLE_LEVELS[role] >= MIN_APPROVAL_LEVEL[severity];
}

/**
 * Throw AuthorizationError when the actor may not perform the action
 */
export function authorizeAction(
  action: ApprovalAction,
  role: UserRole | null,
  severity: ApprovalSeverity,
  incidentId?: string
): void {
  if (!isGatedAction(action)) return;

  if (!canApprove(role, severity)) {
    throw new AuthorizationError(minimumRoleFor(severity), role, {
      incidentId,
      action,
      approvalSeverity: severity,
    });
  }
}
