/**
 * Incident status transition definitions and validation
 */

import {
  INCIDENT_STATUSES,
  InvalidTransitionError,
  isTerminalStatus,
  type IncidentStatus,
} from '@remedyops/shared';

export type TransitionCondition =
  | 'diagnosis_started'
  | 'fix_generated'
  | 'auto_deploy'
  | 'approved'
  | 'overridden'
  | 'human_review_required'
  | 'changes_requested'
  | 'rejected'
  | 'verified_healthy'
  | 'verification_failed';

export interface StateTransition {
  from: IncidentStatus;
  to: IncidentStatus;
  conditions: TransitionCondition[];
}

// Valid status transitions
// fix_proposed -> fix_proposed is the request_changes self-loop
const VALID_TRANSITIONS: StateTransition[] = [
  { from: INCIDENT_STATUSES.DETECTED, to: INCIDENT_STATUSES.DIAGNOSING, conditions: ['diagnosis_started'] },

  { from: INCIDENT_STATUSES.DIAGNOSING, to: INCIDENT_STATUSES.FIX_PROPOSED, conditions: ['fix_generated'] },

  {
    from: INCIDENT_STATUSES.FIX_PROPOSED,
    to: INCIDENT_STATUSES.DEPLOYING,
    conditions: ['auto_deploy', 'approved', 'overridden'],
  },
  {
    from: INCIDENT_STATUSES.FIX_PROPOSED,
    to: INCIDENT_STATUSES.AWAITING_APPROVAL,
    conditions: ['human_review_required'],
  },
  { from: INCIDENT_STATUSES.FIX_PROPOSED, to: INCIDENT_STATUSES.FIX_PROPOSED, conditions: ['changes_requested'] },
  { from: INCIDENT_STATUSES.FIX_PROPOSED, to: INCIDENT_STATUSES.REJECTED, conditions: ['rejected'] },

  {
    from: INCIDENT_STATUSES.AWAITING_APPROVAL,
    to: INCIDENT_STATUSES.DEPLOYING,
    conditions: ['approved', 'overridden'],
  },
  {
    from: INCIDENT_STATUSES.AWAITING_APPROVAL,
    to: INCIDENT_STATUSES.FIX_PROPOSED,
    conditions: ['changes_requested'],
  },
  { from: INCIDENT_STATUSES.AWAITING_APPROVAL, to: INCIDENT_STATUSES.REJECTED, conditions: ['rejected'] },

  { from: INCIDENT_STATUSES.DEPLOYING, to: INCIDENT_STATUSES.RESOLVED, conditions: ['verified_healthy'] },
  { from: INCIDENT_STATUSES.DEPLOYING, to: INCIDENT_STATUSES.FIX_PROPOSED, conditions: ['verification_failed'] },

  // Terminal states have no outgoing transitions
];

export class TransitionValidator {
  private transitionMap: Map<IncidentStatus, StateTransition[]>;

  constructor() {
    this.transitionMap = new Map();

    for (const transition of VALID_TRANSITIONS) {
      const existing = this.transitionMap.get(transition.from) ?? [];
      existing.push(transition);
      this.transitionMap.set(transition.from, existing);
    }
  }

  /**
   * Check if a transition is valid, optionally under a specific condition
   */
  isValidTransition(from: IncidentStatus, to: IncidentStatus, condition?: TransitionCondition): boolean {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.some((t) => t.to === to && (!condition || t.conditions.includes(condition)));
  }

  /**
   * Get all valid transitions from a state
   */
  getValidTransitions(from: IncidentStatus): IncidentStatus[] {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.map((t) => t.to);
  }

  /**
   * Validate and throw if invalid
   */
  validateTransition(from: IncidentStatus, to: IncidentStatus, condition?: TransitionCondition): void {
    if (!this.isValidTransition(from, to, condition)) {
      throw new InvalidTransitionError(from, to, {
        validTransitions: this.getValidTransitions(from),
        condition,
      });
    }
  }

  /**
   * Check if a state is terminal
   */
  isTerminalState(state: IncidentStatus): boolean {
    return isTerminalStatus(state);
  }
}

// Singleton instance
export const transitionValidator = new TransitionValidator();
