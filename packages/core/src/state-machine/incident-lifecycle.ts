/**
 * Incident Lifecycle
 * Sole mutator of Incident.status. Every status write is validated against the
 * transition table and persisted as a single repository update.
 */

import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  logStatusTransition,
  InvariantViolationError,
  ValidationError,
  INCIDENT_STATUSES,
  type Incident,
  type IncidentStatus,
} from '@remedyops/shared';
import { incidentRepository, type UpdateIncidentInput } from '@remedyops/database';
import { transitionValidator, type TransitionCondition } from './transitions.js';
import type { IncidentStore, LifecycleEvents, TransitionEvent } from './types.js';

export class IncidentLifecycle extends EventEmitter<LifecycleEvents> {
  private readonly store: IncidentStore;
  private logger = createChildLogger({ component: 'IncidentLifecycle' });

  constructor(store: IncidentStore = incidentRepository) {
    super();
    this.store = store;
  }

  /**
   * Load an incident or fail with a not-found validation error
   */
  async require(incidentId: string): Promise<Incident> {
    const incident = await this.store.getById(incidentId);
    if (!incident) {
      throw new ValidationError(`Incident not found: ${incidentId}`, { incidentId, notFound: true });
    }
    return incident;
  }

  /**
   * Fail closed when the incident already reached a terminal state
   */
  assertOpen(incident: Incident): void {
    if (transitionValidator.isTerminalState(incident.status)) {
      throw new InvariantViolationError(`Incident ${incident.id} is already ${incident.status}`, {
        incidentId: incident.id,
        status: incident.status,
      });
    }
  }

  /**
   * Validate and persist a status change, with any content fields written in the same update
   */
  async transition(
    incidentId: string,
    to: IncidentStatus,
    condition: TransitionCondition,
    extra: UpdateIncidentInput = {}
  ): Promise<Incident> {
    const current = await this.require(incidentId);
    const from = current.status;

    transitionValidator.validateTransition(from, to, condition);

    const updated = await this.store.setStatus(incidentId, to, extra);
    if (!updated) {
      throw new ValidationError(`Incident not found: ${incidentId}`, { incidentId, notFound: true });
    }

    logStatusTransition(incidentId, from, to, condition);
    this.logger.debug({ incidentId, from, to, condition }, 'Incident status persisted');

    const event: TransitionEvent = { incident: updated, from, to, condition };
    this.emit('transition', event);
    if (to === INCIDENT_STATUSES.RESOLVED) {
      this.emit('incident:resolved', event);
    } else if (to === INCIDENT_STATUSES.REJECTED) {
      this.emit('incident:rejected', event);
    }

    return updated;
  }
}
