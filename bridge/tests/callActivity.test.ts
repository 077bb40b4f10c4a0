// ============================================================================
// Tests for CallActivityTracker
// Drives the tracker with status and stats observations on a controllable
// clock and checks the call log entries it derives.
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CallActivityTracker, UNKNOWN_NUMBER } from '../src/callActivity.js';
import { CallLogStore } from '../src/callLogStore.js';
import type { DeviceStatus } from '../src/schemas.js';

const T0 = Date.UTC(2026, 0, 15, 9, 30, 0);

function ringing(number: string, state = 'IncomingCall'): DeviceStatus {
  return { state, call: { active: true, number } };
}

function idle(): DeviceStatus {
  return { state: 'Idle', call: { active: false } };
}

describe('CallActivityTracker', () => {
  let store: CallLogStore;
  let tracker: CallActivityTracker;
  let nowMs: number;

  beforeEach(() => {
    nowMs = T0;
    store = new CallLogStore(':memory:', 'desk');
    tracker = new CallActivityTracker(store, () => new Date(nowMs));
  });

  afterEach(() => {
    store.close();
  });

  // --------------------------------------------------------------------------
  // Incoming calls
  // --------------------------------------------------------------------------

  describe('observeStatus()', () => {
    it('should log an incoming entry when the phone starts ringing', () => {
      tracker.observeStatus(idle());
      tracker.observeStatus(ringing('5550100'));

      expect(tracker.entries()).toEqual([
        {
          timestamp: '2026-01-15T09:30:00.000Z',
          type: 'incoming',
          number: '5550100',
          duration: 0,
          state: 'IncomingCall',
        },
      ]);
    });

    it('should log one entry for IncomingCall followed by IncomingCallRing', () => {
      tracker.observeStatus(ringing('5550100', 'IncomingCall'));
      tracker.observeStatus(ringing('5550100', 'IncomingCallRing'));
      expect(tracker.entries()).toHaveLength(1);
    });

    it('should back-fill the duration of an answered call from InCall to hang-up', () => {
      tracker.observeStatus(idle());
      tracker.observeStatus(ringing('5550100'));

      nowMs = T0 + 5_000;
      tracker.observeStatus({ state: 'InCall', call: { active: true, number: '5550100' } });

      nowMs = T0 + 65_000;
      tracker.observeStatus(idle());

      const [entry] = tracker.entries();
      expect(entry.type).toBe('incoming');
      expect(entry.duration).toBe(60);
    });

    it('should round the duration down to whole seconds', () => {
      tracker.observeStatus(ringing('5550100'));
      tracker.observeStatus({ state: 'InCall', call: { active: true, number: '5550100' } });
      nowMs = T0 + 12_999;
      tracker.observeStatus(idle());
      expect(tracker.entries()[0].duration).toBe(12);
    });

    it('should leave a missed call at duration 0', () => {
      tracker.observeStatus(ringing('5550100'));
      nowMs = T0 + 20_000;
      tracker.observeStatus(idle());
      expect(tracker.entries()[0].duration).toBe(0);
    });

    it('should not overwrite a newest entry that already has a duration', () => {
      store.add({ timestamp: '2026-01-15T09:00:00.000Z', type: 'outgoing', number: '5550111', duration: 42, state: 'Calling' });

      tracker.observeStatus({ state: 'InCall', call: { active: true, number: '5550111' } });
      nowMs = T0 + 10_000;
      tracker.observeStatus(idle());

      expect(tracker.entries()[0].duration).toBe(42);
    });

    it('should fill a pending outgoing entry when the dialled call ends', () => {
      tracker.logOutgoing('5550122');
      tracker.observeStatus({ state: 'InCall', call: { active: true, number: '5550122' } });
      nowMs = T0 + 30_000;
      tracker.observeStatus(idle());

      expect(tracker.entries()).toHaveLength(1);
      expect(tracker.entries()[0]).toMatchObject({ type: 'outgoing', duration: 30 });
    });

    it('should log an incoming entry when IncomingCallRing follows Idle directly', () => {
      tracker.observeStatus(idle());
      tracker.observeStatus(ringing('5550100', 'IncomingCallRing'));

      expect(tracker.entries()).toEqual([
        {
          timestamp: '2026-01-15T09:30:00.000Z',
          type: 'incoming',
          number: '5550100',
          duration: 0,
          state: 'IncomingCallRing',
        },
      ]);
    });

    it('should let a later call overwrite an answered call that lasted under a second', () => {
      tracker.observeStatus(idle());
      tracker.observeStatus(ringing('5550100'));
      nowMs = T0 + 400;
      tracker.observeStatus({ state: 'InCall', call: { active: true, number: '5550100' } });
      nowMs = T0 + 900;
      tracker.observeStatus(idle());

      // 0.5s rounds down to 0, the same value a call still in progress has
      expect(tracker.entries()[0].duration).toBe(0);

      // A call picked up without ringing adds no entry of its own
      nowMs = T0 + 60_000;
      tracker.observeStatus({ state: 'InCall', call: { active: true, number: '5550177' } });
      nowMs = T0 + 105_000;
      tracker.observeStatus(idle());

      expect(tracker.entries()).toEqual([
        {
          timestamp: '2026-01-15T09:30:00.000Z',
          type: 'incoming',
          number: '5550100',
          duration: 45,
          state: 'IncomingCall',
        },
      ]);
    });

    it('should ignore an active state without a caller number', () => {
      tracker.observeStatus({ state: 'IncomingCall', call: { active: false, number: '5550100' } });
      tracker.observeStatus({ state: 'IncomingCall' });
      expect(tracker.entries()).toEqual([]);
    });

    it('should log a second ringing call from a new number', () => {
      tracker.observeStatus(ringing('5550100'));
      tracker.observeStatus(idle());
      tracker.observeStatus(ringing('5550200'));
      expect(tracker.entries().map((e) => e.number)).toEqual(['5550200', '5550100']);
    });
  });

  // --------------------------------------------------------------------------
  // Blocked calls
  // --------------------------------------------------------------------------

  describe('observeStats()', () => {
    it('should only record a baseline on the first observation', () => {
      tracker.observeStats({ total_blocked_calls: 5 });
      expect(tracker.entries()).toEqual([]);
    });

    it('should log one blocked entry per counter increment', () => {
      tracker.observeStats({ total_blocked_calls: 5 });
      tracker.observeStats({ total_blocked_calls: 7 });

      const entries = tracker.entries();
      expect(entries).toHaveLength(2);
      for (const e of entries) {
        expect(e).toEqual({
          timestamp: '2026-01-15T09:30:00.000Z',
          type: 'blocked',
          number: UNKNOWN_NUMBER,
          duration: 0,
          state: 'Blocked',
        });
      }
    });

    it('should follow a counter reset down without logging', () => {
      tracker.observeStats({ total_blocked_calls: 5 });
      tracker.observeStats({ total_blocked_calls: 1 });
      expect(tracker.entries()).toEqual([]);

      tracker.observeStats({ total_blocked_calls: 2 });
      expect(tracker.entries()).toHaveLength(1);
    });

    it('should ignore a counter that is not a whole number', () => {
      tracker.observeStats({ total_blocked_calls: 2 });
      tracker.observeStats({ total_blocked_calls: 2.5 });
      tracker.observeStats({ total_blocked_calls: -1 });
      expect(tracker.entries()).toEqual([]);

      tracker.observeStats({ total_blocked_calls: 3 });
      expect(tracker.entries()).toHaveLength(1);
    });

    it('should never append more entries than the store keeps', () => {
      const small = new CallLogStore(':memory:', 'hall', 5);
      const capped = new CallActivityTracker(small, () => new Date(nowMs));

      capped.observeStats({ total_blocked_calls: 2 });
      capped.observeStats({ total_blocked_calls: 1_000_000_000 });

      expect(small.count()).toBe(5);
      small.close();
    });

    it('should ignore stats without the blocked counter', () => {
      tracker.observeStats({ total_calls: 10 });
      tracker.observeStats({ total_blocked_calls: 3 });
      expect(tracker.entries()).toEqual([]);
    });
  });

  // --------------------------------------------------------------------------
  // Outgoing calls
  // --------------------------------------------------------------------------

  describe('logOutgoing()', () => {
    it('should append an outgoing entry in the Calling state', () => {
      tracker.logOutgoing('*67');
      expect(tracker.entries()).toEqual([
        { timestamp: '2026-01-15T09:30:00.000Z', type: 'outgoing', number: '*67', duration: 0, state: 'Calling' },
      ]);
    });
  });
});
