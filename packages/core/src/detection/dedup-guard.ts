/**
 * Dedup Guard
 * At most one open incident per fault-type key. tryReserve checks and claims a
 * key in one synchronous step, so two overlapping ticks cannot both open an
 * incident for the same fault.
 */

import { createChildLogger, isFaultType, type FaultType, type Incident } from '@remedyops/shared';
import { deriveFaultTypeFromRootCause } from '../classification/fault-classifier.js';

// Reserved but not yet bound to a persisted incident
const PENDING = null;

export class DedupGuard {
  private active = new Map<FaultType, string | typeof PENDING>();
  private logger = createChildLogger({ component: 'DedupGuard' });

  /**
   * Claim the key. Returns false when an incident for it is already open or pending.
   */
  tryReserve(faultType: FaultType): boolean {
    if (this.active.has(faultType)) {
      this.logger.debug({ faultType }, 'Duplicate detection suppressed');
      return false;
    }
    this.active.set(faultType, PENDING);
    return true;
  }

  /**
   * Bind a reserved key to the incident created for it
   */
  assign(faultType: FaultType, incidentId: string): void {
    this.active.set(faultType, incidentId);
  }

  /**
   * Drop the key. With an incident id, only drops it while that incident still owns it.
   */
  release(faultType: FaultType, incidentId?: string): void {
    const owner = this.active.get(faultType);
    if (incidentId !== undefined && owner !== incidentId && owner !== PENDING) {
      return;
    }
    if (this.active.delete(faultType)) {
      this.logger.debug({ faultType, incidentId }, 'Fault key released');
    }
  }

  has(faultType: FaultType): boolean {
    return this.active.has(faultType);
  }

  getIncidentId(faultType: FaultType): string | null {
    return this.active.get(faultType) ?? null;
  }

  /**
   * Reverse lookup: which key an incident holds, if any
   */
  findFaultType(incidentId: string): FaultType | null {
    for (const [faultType, owner] of this.active) {
      if (owner === incidentId) return faultType;
    }
    return null;
  }

  /**
   * Key an incident should hold: its persisted key, else re-derived from root cause
   */
  static resolveFaultType(incident: Pick<Incident, 'faultType' | 'rootCause'>): FaultType {
    return isFaultType(incident.faultType) ? incident.faultType : deriveFaultTypeFromRootCause(incident.rootCause);
  }

  /**
   * Replace the mapping with the given open incidents (oldest first; a later one
   * on the same key does not displace the first)
   */
  rebuild(openIncidents: ReadonlyArray<Pick<Incident, 'id' | 'faultType' | 'rootCause'>>): void {
    this.active.clear();
    for (const incident of openIncidents) {
      const faultType = DedupGuard.resolveFaultType(incident);
      if (!this.active.has(faultType)) {
        this.active.set(faultType, incident.id);
      }
    }
    this.logger.info({ active: Object.fromEntries(this.active) }, 'Dedup guard rebuilt');
  }

  snapshot(): Partial<Record<FaultType, string | null>> {
    return Object.fromEntries(this.active);
  }

  get size(): number {
    return this.active.size;
  }
}
