/**
 * Incident lifecycle types
 */

import type { Incident, IncidentStatus } from '@remedyops/shared';
import type { IncidentRepository } from '@remedyops/database';
import type { TransitionCondition } from './transitions.js';

/**
 * Persistence surface the lifecycle writes through
 */
export type IncidentStore = Pick<IncidentRepository, 'getById' | 'setStatus'>;

export interface TransitionEvent {
  incident: Incident;
  from: IncidentStatus;
  to: IncidentStatus;
  condition: TransitionCondition;
}

export interface LifecycleEvents {
  'transition': (event: TransitionEvent) => void;
  'incident:resolved': (event: TransitionEvent) => void;
  'incident:rejected': (event: TransitionEvent) => void;
}
