/**
 * Dedup Guard Tests
 */
import { describe, it, expect } from 'vitest';
import { DedupGuard } from './dedup-guard.js';

describe('DedupGuard', () => {
  it('should allow one reservation per fault type', () => {
    const guard = new DedupGuard();

    expect(guard.tryReserve('bad_config')).toBe(true);
    expect(guard.tryReserve('bad_config')).toBe(false);
    expect(guard.tryReserve('crash')).toBe(true);
    expect(guard.size).toBe(2);
  });

  it('should bind a reservation to its incident and look it up both ways', () => {
    const guard = new DedupGuard();
    guard.tryReserve('bug');
    expect(guard.getIncidentId('bug')).toBeNull();

    guard.assign('bug', 'inc-1');

    expect(guard.getIncidentId('bug')).toBe('inc-1');
    expect(guard.findFaultType('inc-1')).toBe('bug');
    expect(guard.findFaultType('inc-2')).toBeNull();
  });

  it('should only release a key for the incident that owns it', () => {
    const guard = new DedupGuard();
    guard.tryReserve('slow');
    guard.assign('slow', 'inc-1');

    guard.release('slow', 'inc-other');
    expect(guard.has('slow')).toBe(true);

    guard.release('slow', 'inc-1');
    expect(guard.has('slow')).toBe(false);
    expect(guard.tryReserve('slow')).toBe(true);
  });

  it('should rebuild from open incidents using the persisted key or the root cause', () => {
    const guard = new DedupGuard();
    guard.tryReserve('unknown');

    guard.rebuild([
      { id: 'inc-1', faultType: 'crash', rootCause: null },
      { id: 'inc-2', faultType: null, rootCause: 'config.json contains invalid JSON' },
      { id: 'inc-3', faultType: 'crash', rootCause: null },
    ]);

    expect(guard.snapshot()).toEqual({ crash: 'inc-1', bad_config: 'inc-2' });
    expect(guard.tryReserve('bad_config')).toBe(false);
    expect(guard.tryReserve('unknown')).toBe(true);
  });
});
