/**
 * Incident Lifecycle State Machine
 *
 * States: detected → diagnosing → fix_proposed → awaiting_approval/deploying → resolved/rejected
 */

export { IncidentLifecycle } from './incident-lifecycle.js';
export { TransitionValidator, transitionValidator } from './transitions.js';
export type { StateTransition, TransitionCondition } from './transitions.js';
export { authorizeAction, canApprove, isGatedAction, minimumRoleFor } from './approval-policy.js';
export type { IncidentStore, LifecycleEvents, TransitionEvent } from './types.js';
