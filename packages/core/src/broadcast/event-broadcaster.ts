/**
 * Event Broadcaster
 * Registry of connected observers plus per-observer presence. Sends never
 * block the caller: a sink that throws or rejects is dropped.
 */

import {
  createChildLogger,
  errorMessage,
  BROADCAST_EVENTS,
  type BroadcastEnvelope,
  type BroadcastEventType,
  type PresenceSnapshot,
} from '@remedyops/shared';

/**
 * Anything that can deliver an envelope to one observer (a websocket, a test spy)
 */
export interface ObserverSink {
  send(envelope: BroadcastEnvelope): void | Promise<void>;
}

export class EventBroadcaster {
  private sinks = new Map<string, ObserverSink>();
  private viewing = new Map<string, string>();
  private logger = createChildLogger({ component: 'EventBroadcaster' });

  /**
   * Add an observer. A second registration under the same name replaces the first.
   */
  register(name: string, sink: ObserverSink): void {
    this.sinks.set(name, sink);
    this.logger.info({ observer: name, online: this.sinks.size }, 'Observer registered');
    this.broadcastPresence();
  }

  /**
   * Remove an observer. With `sink`, only when that sink is still the one registered.
   */
  unregister(name: string, sink?: ObserverSink): void {
    if (sink && this.sinks.get(name) !== sink) return;
    const existed = this.sinks.delete(name);
    this.viewing.delete(name);
    if (existed) {
      this.logger.info({ observer: name, online: this.sinks.size }, 'Observer unregistered');
    }
    this.broadcastPresence();
  }

  /**
   * Fan out an envelope to every observer
   */
  broadcast<T>(type: BroadcastEventType, data: T): void {
    const envelope: BroadcastEnvelope<T> = { type, data };
    for (const [name, sink] of [...this.sinks.entries()]) {
      // Skip a sink dropped earlier in this fan-out
      if (this.sinks.get(name) === sink) {
        this.deliver(name, sink, envelope);
      }
    }
  }

  /**
   * Deliver directly to one observer. Returns false when it is not connected.
   */
  sendTo<T>(name: string, type: BroadcastEventType, data: T): boolean {
    const sink = this.sinks.get(name);
    if (!sink) return false;
    return this.deliver(name, sink, { type, data });
  }

  setViewing(name: string, incidentId: string | null): void {
    if (incidentId) {
      this.viewing.set(name, incidentId);
    } else {
      this.viewing.delete(name);
    }
  }

  getPresence(): PresenceSnapshot {
    return {
      online: [...this.sinks.keys()],
      viewing: Object.fromEntries(this.viewing),
    };
  }

  broadcastPresence(): void {
    this.broadcast(BROADCAST_EVENTS.PRESENCE, this.getPresence());
  }

  isOnline(name: string): boolean {
    return this.sinks.has(name);
  }

  get size(): number {
    return this.sinks.size;
  }

  private deliver(name: string, sink: ObserverSink, envelope: BroadcastEnvelope): boolean {
    try {
      const result = sink.send(envelope);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.drop(name, sink, error));
      }
      return true;
    } catch (error) {
      this.drop(name, sink, error);
      return false;
    }
  }

  private drop(name: string, sink: ObserverSink, error: unknown): void {
    // Only drop the sink that failed; the name may have re-registered since
    if (this.sinks.get(name) !== sink) return;
    this.sinks.delete(name);
    this.viewing.delete(name);
    this.logger.warn({ observer: name, error: errorMessage(error) }, 'Dropping observer after failed send');
    this.broadcastPresence();
  }
}
