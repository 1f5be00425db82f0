/**
 * Event Broadcaster Tests
 */
import { describe, it, expect, vi } from 'vitest';
import type { BroadcastEnvelope } from '@remedyops/shared';
import { EventBroadcaster, type ObserverSink } from './event-broadcaster.js';

function recordingSink(): ObserverSink & { received: BroadcastEnvelope[] } {
  const received: BroadcastEnvelope[] = [];
  return {
    received,
    send: (envelope) => {
      received.push(envelope);
    },
  };
}

describe('EventBroadcaster', () => {
  it('should broadcast presence when an observer registers', () => {
    const broadcaster = new EventBroadcaster();
    const alice = recordingSink();

    broadcaster.register('alice', alice);

    expect(alice.received).toEqual([{ type: 'presence', data: { online: ['alice'], viewing: {} } }]);
  });

  it('should send every broadcast to every observer', () => {
    const broadcaster = new EventBroadcaster();
    const alice = recordingSink();
    const bob = recordingSink();
    broadcaster.register('alice', alice);
    broadcaster.register('bob', bob);

    broadcaster.broadcast('health_update', { healthy: true });

    expect(alice.received.at(-1)).toEqual({ type: 'health_update', data: { healthy: true } });
    expect(bob.received.at(-1)).toEqual({ type: 'health_update', data: { healthy: true } });
  });

  it('should replace an observer registered twice under one name', () => {
    const broadcaster = new EventBroadcaster();
    const first = recordingSink();
    const second = recordingSink();
    broadcaster.register('alice', first);
    broadcaster.register('alice', second);

    broadcaster.broadcast('agent_status', { running: true });

    expect(broadcaster.size).toBe(1);
    expect(first.received.some((e) => e.type === 'agent_status')).toBe(false);
    expect(second.received.at(-1)).toEqual({ type: 'agent_status', data: { running: true } });
  });

  it('should drop a sink whose send throws and keep delivering to the rest', () => {
    const broadcaster = new EventBroadcaster();
    const healthy = recordingSink();
    const broken: ObserverSink = {
      send: vi.fn().mockImplementationOnce(() => undefined).mockImplementation(() => {
        throw new Error('socket closed');
      }),
    };
    broadcaster.register('broken', broken);
    broadcaster.register('healthy', healthy);

    broadcaster.broadcast('activity', { action: 'started' });

    expect(broadcaster.isOnline('broken')).toBe(false);
    expect(broadcaster.isOnline('healthy')).toBe(true);
    expect(healthy.received.at(-1)).toEqual({ type: 'activity', data: { action: 'started' } });
  });

  it('should tell the remaining observers when a sink is dropped', () => {
    const broadcaster = new EventBroadcaster();
    const bob = recordingSink();
    let failing = false;
    const carol: ObserverSink = {
      send: () => {
        if (failing) throw new Error('socket closed');
      },
    };
    broadcaster.register('carol', carol);
    broadcaster.register('bob', bob);
    broadcaster.setViewing('carol', 'inc-3');
    failing = true;

    broadcaster.broadcast('activity', { action: 'started' });

    expect(bob.received.slice(-2)).toEqual([
      { type: 'presence', data: { online: ['bob'], viewing: {} } },
      { type: 'activity', data: { action: 'started' } },
    ]);
  });

  it('should drop a sink whose send rejects without raising', async () => {
    const broadcaster = new EventBroadcaster();
    const rejecting: ObserverSink = {
      send: () => Promise.reject(new Error('write failed')),
    };
    broadcaster.register('carol', rejecting);

    expect(() => broadcaster.broadcast('incident_update', { id: 'inc-1' })).not.toThrow();
    await new Promise<void>((resolve) => setImmediate(resolve));

    expect(broadcaster.isOnline('carol')).toBe(false);
  });

  it('should deliver sendTo only to the named observer', () => {
    const broadcaster = new EventBroadcaster();
    const alice = recordingSink();
    const erin = recordingSink();
    broadcaster.register('alice', alice);
    broadcaster.register('erin', erin);
    const aliceCount = alice.received.length;

    expect(broadcaster.sendTo('erin', 'clearance_report', { text: 'cleared' })).toBe(true);
    expect(broadcaster.sendTo('nobody', 'clearance_report', {})).toBe(false);

    expect(erin.received.at(-1)).toEqual({ type: 'clearance_report', data: { text: 'cleared' } });
    expect(alice.received).toHaveLength(aliceCount);
  });

  it('should track viewing and clear it on unregister', () => {
    const broadcaster = new EventBroadcaster();
    const alice = recordingSink();
    const bob = recordingSink();
    broadcaster.register('alice', alice);
    broadcaster.register('bob', bob);

    broadcaster.setViewing('alice', 'inc-7');
    broadcaster.setViewing('bob', 'inc-8');
    broadcaster.setViewing('bob', null);
    expect(broadcaster.getPresence()).toEqual({ online: ['alice', 'bob'], viewing: { alice: 'inc-7' } });

    broadcaster.unregister('alice');
    expect(bob.received.at(-1)).toEqual({ type: 'presence', data: { online: ['bob'], viewing: {} } });
  });
});
