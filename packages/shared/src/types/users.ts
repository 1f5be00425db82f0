/**
 * Users, roles and approval authority
 */

import type { ApprovalSeverity } from './index.js';

export const USER_ROLES = ['junior_dev', 'senior_dev', 'tech_lead', 'engineering_manager', 'cto'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.some((r) => r === value);
}

/**
 * Total ordering of roles. Higher level carries more authority.
 */
export const ROLE_LEVELS: Record<UserRole, number> = {
  junior_dev: 1,
  senior_dev: 2,
  tech_lead: 3,
  engineering_manager: 4,
  cto: 5,
};

/**
 * Minimum role level required to approve or override per approval severity
 */
export const MIN_APPROVAL_LEVEL: Record<ApprovalSeverity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  blocker: 4,
};

export interface User {
  id: string;
  name: string;
  role: UserRole;
  /** Receives clearance reports */
  finalAuthority: boolean;
  createdAt: Date;
}
