// ============================================================================
// Tests for mergeStatus
// A partial status update must never drop keys the snapshot already has;
// wifi and call are merged one level deeper, everything else is replaced.
// ============================================================================

import { describe, it, expect } from 'vitest';
import { mergeStatus } from '../src/statusMerge.js';
import type { DeviceStatus } from '../src/schemas.js';

describe('mergeStatus()', () => {
  const full: DeviceStatus = {
    state: 'Idle',
    uptime: 120000,
    free_heap: 150000,
    wifi: { connected: true, ip: '192.168.1.40', ssid: 'lab', rssi: -55 },
    call: { active: false },
  };

  it('should keep keys the update does not mention', () => {
    const merged = mergeStatus(full, { state: 'IncomingCall' });
    expect(merged).toEqual({ ...full, state: 'IncomingCall' });
  });

  it('should merge wifi one level deep when the snapshot already has it', () => {
    const merged = mergeStatus(full, { wifi: { rssi: -70 } });
    expect(merged.wifi).toEqual({ connected: true, ip: '192.168.1.40', ssid: 'lab', rssi: -70 });
  });

  it('should merge call one level deep when the snapshot already has it', () => {
    const existing: DeviceStatus = { state: 'InCall', call: { active: true, number: '5550100', id: 7 } };
    const merged = mergeStatus(existing, { call: { number: '5550199' } });
    expect(merged.call).toEqual({ active: true, number: '5550199', id: 7 });
  });

  it('should take a nested section whole when the snapshot lacks it', () => {
    const merged = mergeStatus({ state: 'Idle' }, { wifi: { rssi: -60 } });
    expect(merged).toEqual({ state: 'Idle', wifi: { rssi: -60 } });
  });

  it('should replace other object-valued keys whole', () => {
    const merged = mergeStatus({ extra: { a: 1 } }, { extra: { b: 2 } });
    expect(merged.extra).toEqual({ b: 2 });
  });

  it('should add keys that were never seen before', () => {
    const merged = mergeStatus(full, { firmware: '2.1.0' });
    expect(merged.firmware).toBe('2.1.0');
    expect(merged.state).toBe('Idle');
  });

  it('should not modify either argument', () => {
    const existing: DeviceStatus = { state: 'Idle', wifi: { rssi: -55, ssid: 'lab' } };
    const update: DeviceStatus = { wifi: { rssi: -80 } };
    mergeStatus(existing, update);
    expect(existing).toEqual({ state: 'Idle', wifi: { rssi: -55, ssid: 'lab' } });
    expect(update).toEqual({ wifi: { rssi: -80 } });
  });

  it('should be idempotent for the same update', () => {
    const update: DeviceStatus = { state: 'InCall', call: { active: true, number: '5550100' } };
    const once = mergeStatus(full, update);
    expect(mergeStatus(once, update)).toEqual(once);
  });
});
