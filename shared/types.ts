// ============================================================================
// TsuryPhone Bridge - Shared Type Definitions
// ============================================================================
// Types shared between the bridge and anything that renders its data
// (dashboards, entity platforms). The bridge owns the snapshot; these
// consumers only read it.
//
// Data flow:
//   Device --[HTTP poll + WebSocket push]--> Bridge --[EntityState]--> UI
// ============================================================================

// ============================================================================
// Section 1: Call Log
// ============================================================================
// The device keeps no call history of its own. The bridge derives one from
// status transitions, blocked-call counters, and outgoing call actions.
// ============================================================================

/** How a call log entry came to exist. */
export type CallType = 'incoming' | 'outgoing' | 'blocked';

/** A single call log entry, newest first in every list. */
export interface CallLogEntry {
  /** ISO-8601 timestamp of when the entry was logged */
  timestamp: string;
  /** Direction or outcome of the call */
  type: CallType;
  /** Remote number, or "Unknown" for blocked calls counted from stats */
  number: string;
  /** Call duration in whole seconds; 0 until the call ends */
  duration: number;
  /** Phone state label at the moment the entry was created */
  state: string;
}

// ============================================================================
// Section 2: Ring Patterns
// ============================================================================

/**
 * Structured ring pattern sent with the `ring_pattern` action.
 * Durations alternate ring/pause when repeats > 1.
 */
export interface RingPattern {
  /** Ring/pause durations in milliseconds, each in (0, 30000] */
  durations: number[];
  /** How many times the whole sequence plays, in [1, 100] */
  repeats: number;
}

// ============================================================================
// Section 3: Entity Descriptors
// ============================================================================
// Display-side view of the snapshot. Each entity reads one value out of
// the snapshot or call log and optionally a bag of attributes.
// ============================================================================

/** Entity platforms the bridge produces values for. */
export type EntityPlatform = 'sensor' | 'switch' | 'select' | 'time';

/** Primitive value an entity can display. */
export type EntityValue = string | number | boolean | null;

/** Current value of one entity. */
export interface EntityState {
  /** Stable key, unique per device (e.g. "wifi_rssi") */
  key: string;
  /** Which platform renders this entity */
  platform: EntityPlatform;
  /** Human-readable name */
  name: string;
  /** The value to display; null when the data has not arrived yet */
  value: EntityValue;
  /** Unit of measurement, where one applies */
  unit?: string;
  /** Selectable options (select platform only) */
  options?: string[];
  /** Extra attributes shown alongside the value */
  attributes?: Record<string, EntityValue>;
}
