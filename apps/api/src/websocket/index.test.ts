/**
 * WebSocket message handling
 */
import { describe, it, expect, vi } from 'vitest';
import type { BroadcastEnvelope } from '@remedyops/shared';
import { EventBroadcaster } from '@remedyops/core';
import { handleClientMessage, parseClientMessage } from './index.js';

describe('parseClientMessage', () => {
  it('accepts viewing, typing and ping messages', () => {
    expect(parseClientMessage('{"type":"viewing","incident_id":"inc-1"}')).toEqual({
      type: 'viewing',
      incident_id: 'inc-1',
    });
    expect(parseClientMessage('{"type":"typing","incident_id":"inc-1"}')).toEqual({
      type: 'typing',
      incident_id: 'inc-1',
    });
    expect(parseClientMessage('{"type":"ping"}')).toEqual({ type: 'ping' });
  });

  it('returns null for malformed or unknown messages', () => {
    expect(parseClientMessage('not json')).toBeNull();
    expect(parseClientMessage('{"type":"subscribe"}')).toBeNull();
    expect(parseClientMessage('{"type":"typing"}')).toBeNull();
  });
});

describe('handleClientMessage', () => {
  const setup = () => {
    const broadcaster = new EventBroadcaster();
    const received: BroadcastEnvelope[] = [];
    broadcaster.register('bob', { send: (envelope) => void received.push(envelope) });
    received.length = 0;
    return { broadcaster, received };
  };

  it('updates presence when an observer views an incident', () => {
    const { broadcaster, received } = setup();

    handleClientMessage(broadcaster, 'bob', { type: 'viewing', incident_id: 'inc-1' }, vi.fn());

    expect(received).toEqual([{ type: 'presence', data: { online: ['bob'], viewing: { bob: 'inc-1' } } }]);
  });

  it('clears the viewed incident', () => {
    const { broadcaster } = setup();
    handleClientMessage(broadcaster, 'bob', { type: 'viewing', incident_id: 'inc-1' }, vi.fn());

    handleClientMessage(broadcaster, 'bob', { type: 'viewing', incident_id: null }, vi.fn());

    expect(broadcaster.getPresence().viewing).toEqual({});
  });

  it('rebroadcasts typing with the sender name', () => {
    const { broadcaster, received } = setup();

    handleClientMessage(broadcaster, 'bob', { type: 'typing', incident_id: 'inc-1' }, vi.fn());

    expect(received).toEqual([{ type: 'user_typing', data: { user: 'bob', incident_id: 'inc-1' } }]);
  });

  it('answers ping on the same socket only', () => {
    const { broadcaster, received } = setup();
    const reply = vi.fn();

    handleClientMessage(broadcaster, 'bob', { type: 'ping' }, reply);

    expect(reply).toHaveBeenCalledWith(expect.objectContaining({ type: 'pong' }));
    expect(received).toEqual([]);
  });
});
