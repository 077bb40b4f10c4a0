// ============================================================================
// TsuryPhone Bridge - Status Merge
// Folds a partial status update into the last known status. Keys in the
// update overwrite; keys missing from it are kept, so a push frame that
// only carries `state` does not blank out Wi-Fi or call details.
// ============================================================================

import type { DeviceStatus } from './schemas.js';

/**
 * Sections merged one level deeper instead of being replaced whole.
 * `{call: {number}}` must not drop a previously known `call.id`.
 */
const NESTED_KEYS: ReadonlySet<string> = new Set(['wifi', 'call']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Return a new status with `update` merged over `existing`. Neither
 * argument is modified.
 */
export function mergeStatus(existing: DeviceStatus, update: DeviceStatus): DeviceStatus {
  const merged: DeviceStatus = { ...existing };

  for (const [key, value] of Object.entries(update)) {
    if (NESTED_KEYS.has(key) && isPlainObject(value) && key in existing) {
      const current = existing[key];
      merged[key] = { ...(isPlainObject(current) ? current : {}), ...value };
    } else {
      merged[key] = value;
    }
  }

  return merged;
}
