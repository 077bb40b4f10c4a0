// ============================================================================
// TsuryPhone Bridge - Call Activity Tracker
// The device reports its current state but keeps no history. This tracker
// watches status transitions and the blocked-call counter and turns them
// into call log entries:
//   - entering a ringing state with a caller number  -> "incoming" entry
//   - leaving an answered call                         -> duration back-filled
//   - blocked-call counter going up by N               -> N "blocked" entries
//   - a successful call action                         -> "outgoing" entry
// ============================================================================

import type { CallLogEntry, CallType } from '../../shared/types.js';
import type { CallLogStore } from './callLogStore.js';
import type { DeviceStats, DeviceStatus } from './schemas.js';
import { createLogger, type Logger } from './logger.js';

/** Phone states during which a call is in progress or arriving */
const ACTIVE_STATES: ReadonlySet<string> = new Set(['IncomingCall', 'IncomingCallRing', 'InCall']);

/** Phone states that mean the phone is ringing for an inbound call */
const RINGING_STATES: ReadonlySet<string> = new Set(['IncomingCall', 'IncomingCallRing']);

/** State reached once an inbound call is picked up */
const ANSWERED_STATE = 'InCall';

/** Placeholder number for blocked calls, which the counter does not identify */
export const UNKNOWN_NUMBER = 'Unknown';

export class CallActivityTracker {
  private lastState = '';
  private lastCallNumber = '';
  private callStartedAt: Date | null = null;
  /** null until the first stats observation sets a baseline */
  private lastBlockedTotal: number | null = null;
  private log: Logger;

  /**
   * @param store - Where entries are written
   * @param now - Clock, replaceable in tests
   */
  constructor(
    private readonly store: CallLogStore,
    private readonly now: () => Date = () => new Date(),
    logPrefix = 'CallActivity',
  ) {
    this.log = createLogger(logPrefix);
  }

  // --------------------------------------------------------------------------
  // Observations
  // --------------------------------------------------------------------------

  /**
   * Feed the latest full status (after any merge). Only the transition
   * from the previous observation matters.
   */
  observeStatus(status: DeviceStatus): void {
    const state = status.state ?? '';
    const call = status.call;
    const callNumber = call?.active ? (call.number ?? '') : '';

    if (
      ACTIVE_STATES.has(state) &&
      callNumber &&
      (state !== this.lastState || callNumber !== this.lastCallNumber)
    ) {
      this.callStartedAt = this.now();
      this.lastCallNumber = callNumber;

      if (RINGING_STATES.has(state) && !RINGING_STATES.has(this.lastState)) {
        this.append('incoming', callNumber, state);
      }
    } else if (ACTIVE_STATES.has(this.lastState) && !ACTIVE_STATES.has(state) && this.callStartedAt) {
      const duration = Math.floor((this.now().getTime() - this.callStartedAt.getTime()) / 1000);
      if (this.lastState === ANSWERED_STATE) {
        if (this.store.updateLatestDuration(duration)) {
          this.log.debug(`Call ended after ${duration}s`);
        }
      }
      this.callStartedAt = null;
      this.lastCallNumber = '';
    }

    this.lastState = state;
  }

  /**
   * Feed the latest stats. The first observation only records a baseline,
   * so restarting the bridge does not replay the device's lifetime total.
   */
  observeStats(stats: DeviceStats): void {
    const total = stats.total_blocked_calls;
    if (total === undefined || !Number.isInteger(total) || total < 0) return;

    if (this.lastBlockedTotal !== null && total > this.lastBlockedTotal) {
      // Never more than the store keeps
      const added = Math.min(total - this.lastBlockedTotal, this.store.maxEntries);
      for (let i = 0; i < added; i++) {
        this.append('blocked', UNKNOWN_NUMBER, 'Blocked');
      }
      this.log.info(`Logged ${added} blocked call(s)`);
    }

    // A lower total means the device counters were reset; follow them down
    this.lastBlockedTotal = total;
  }

  /** Record an outgoing call placed through the bridge */
  logOutgoing(number: string): void {
    this.append('outgoing', number, 'Calling');
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  /** The call log, newest first */
  entries(): CallLogEntry[] {
    return this.store.list();
  }

  private append(type: CallType, number: string, state: string): void {
    this.store.add({
      timestamp: this.now().toISOString(),
      type,
      number,
      duration: 0,
      state,
    });
    this.log.debug(`Added call log entry: ${type} ${number}`);
  }
}
