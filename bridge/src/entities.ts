// ============================================================================
// TsuryPhone Bridge - Entity Descriptors
// Turns a session snapshot and call log into display-ready entity values
// (sensors, switches, time inputs and selects). Everything here is a pure
// function of its inputs; the only way back to the device is through the
// SelectAction that parseSelectOption produces.
// ============================================================================

import type { CallLogEntry, EntityState, EntityValue } from '../../shared/types.js';
import type { Snapshot } from './schemas.js';

/** Webhook ids longer than this are cut short in select options */
const WEBHOOK_ID_DISPLAY_LENGTH = 20;

const CALL_ICON = '📞';
const REMOVE_ICON = '🗑️';

// ============================================================================
// Formatting helpers
// ============================================================================

/** 3725 -> "01:02:05" */
export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, '0')).join(':');
}

/** (7, 5) -> "07:05" */
export function formatClock(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

function talkTime(callLog: readonly CallLogEntry[], types: ReadonlyArray<CallLogEntry['type']>): number {
  return callLog.filter((e) => types.includes(e.type)).reduce((sum, e) => sum + e.duration, 0);
}

function countOf(callLog: readonly CallLogEntry[], type: CallLogEntry['type']): number {
  return callLog.filter((e) => e.type === type).length;
}

// ============================================================================
// Sensors
// ============================================================================

export function sensorStates(snapshot: Readonly<Snapshot>, callLog: readonly CallLogEntry[]): EntityState[] {
  const status = snapshot.status;
  const stats = snapshot.stats;
  const call = status?.call;
  const wifi = status?.wifi;
  const callActive = call?.active === true;

  const stateAttributes: Record<string, EntityValue> = {};
  if (status) {
    stateAttributes.previous_state = status.previous_state ?? null;
    stateAttributes.call_active = callActive;
    if (callActive) {
      stateAttributes.call_number = call?.number ?? null;
      stateAttributes.call_id = call?.id ?? null;
      stateAttributes.has_call_waiting = call?.has_waiting ?? false;
      if (call?.has_waiting) {
        stateAttributes.waiting_call_id = call.waiting_id ?? null;
      }
    }
  }

  const totalTalk = talkTime(callLog, ['incoming', 'outgoing']);
  const incomingTalk = talkTime(callLog, ['incoming']);
  const outgoingTalk = talkTime(callLog, ['outgoing']);
  const last = callLog[0];

  return [
    {
      key: 'state',
      platform: 'sensor',
      name: 'State',
      value: status?.state ?? null,
      attributes: stateAttributes,
    },
    { key: 'uptime', platform: 'sensor', name: 'Uptime', value: status?.uptime ?? null, unit: 'ms' },
    { key: 'free_heap', platform: 'sensor', name: 'Free Heap', value: status?.free_heap ?? null, unit: 'B' },
    {
      key: 'wifi_rssi',
      platform: 'sensor',
      name: 'WiFi RSSI',
      value: wifi?.rssi ?? null,
      unit: 'dBm',
      attributes: status
        ? {
            connected: wifi?.connected ?? null,
            ip_address: wifi?.ip ?? null,
            ssid: wifi?.ssid ?? null,
          }
        : {},
    },
    { key: 'total_calls', platform: 'sensor', name: 'Total Calls', value: stats?.total_calls ?? null },
    { key: 'incoming_calls', platform: 'sensor', name: 'Incoming Calls', value: stats?.total_incoming_calls ?? null },
    { key: 'outgoing_calls', platform: 'sensor', name: 'Outgoing Calls', value: stats?.total_outgoing_calls ?? null },
    { key: 'blocked_calls', platform: 'sensor', name: 'Blocked Calls', value: stats?.total_blocked_calls ?? null },
    { key: 'resets', platform: 'sensor', name: 'Resets', value: stats?.total_resets ?? null },
    {
      key: 'call_number',
      platform: 'sensor',
      name: 'Call Number',
      value: callActive ? (call?.number ?? null) : null,
    },
    {
      key: 'call_id',
      platform: 'sensor',
      name: 'Call ID',
      value: callActive ? (call?.id ?? null) : null,
    },
    { key: 'cpu_freq', platform: 'sensor', name: 'CPU Frequency', value: stats?.cpu_freq ?? null, unit: 'MHz' },
    { key: 'flash_size', platform: 'sensor', name: 'Flash Size', value: stats?.flash_size ?? null, unit: 'B' },
    { key: 'sketch_size', platform: 'sensor', name: 'Sketch Size', value: stats?.sketch_size ?? null, unit: 'B' },
    {
      key: 'call_log',
      platform: 'sensor',
      name: 'Call Log',
      value: callLog.length,
      attributes: {
        total_calls: callLog.length,
        incoming_calls: countOf(callLog, 'incoming'),
        outgoing_calls: countOf(callLog, 'outgoing'),
        blocked_calls: countOf(callLog, 'blocked'),
        total_talk_time_seconds: totalTalk,
        total_talk_time_formatted: formatDuration(totalTalk),
      },
    },
    {
      key: 'last_call',
      platform: 'sensor',
      name: 'Last Call',
      value: last ? `${last.type} - ${last.number}` : null,
      attributes: last
        ? {
            call_type: last.type,
            call_number: last.number,
            duration: last.duration,
            timestamp: last.timestamp,
          }
        : {},
    },
    {
      key: 'total_talk_time',
      platform: 'sensor',
      name: 'Total Talk Time',
      value: totalTalk,
      unit: 's',
      attributes: {
        total_talk_time_seconds: totalTalk,
        total_talk_time_formatted: formatDuration(totalTalk),
        incoming_talk_time_seconds: incomingTalk,
        incoming_talk_time_formatted: formatDuration(incomingTalk),
        outgoing_talk_time_seconds: outgoingTalk,
        outgoing_talk_time_formatted: formatDuration(outgoingTalk),
      },
    },
  ];
}

// ============================================================================
// Switches and time inputs
// ============================================================================

export function switchStates(snapshot: Readonly<Snapshot>): EntityState[] {
  return [
    { key: 'dnd_force', platform: 'switch', name: 'DnD Force', value: snapshot.dnd?.force_enabled ?? false },
    { key: 'dnd_schedule', platform: 'switch', name: 'DnD Schedule', value: snapshot.dnd?.schedule_enabled ?? false },
    { key: 'maintenance', platform: 'switch', name: 'Maintenance Mode', value: snapshot.status?.maintenance ?? false },
  ];
}

/** DnD window edges; only meaningful while the schedule is enabled */
export function timeStates(snapshot: Readonly<Snapshot>): EntityState[] {
  const dnd = snapshot.dnd;
  const scheduled = dnd?.schedule_enabled ?? false;
  return [
    {
      key: 'dnd_start_time',
      platform: 'time',
      name: 'DnD Start Time',
      value: formatClock(dnd?.start_hour ?? 0, dnd?.start_minute ?? 0),
      attributes: { available: scheduled },
    },
    {
      key: 'dnd_end_time',
      platform: 'time',
      name: 'DnD End Time',
      value: formatClock(dnd?.end_hour ?? 0, dnd?.end_minute ?? 0),
      attributes: { available: scheduled },
    },
  ];
}

// ============================================================================
// Selects
// ============================================================================

export type SelectKey = 'quick_dial' | 'remove_quick_dial' | 'blocked_numbers' | 'remove_webhook';

interface SelectText {
  name: string;
  placeholder: string;
  empty: string;
  loading: string;
}

export const SELECT_TEXT: Record<SelectKey, SelectText> = {
  quick_dial: {
    name: 'Call Quick Dial',
    placeholder: 'Select quick dial to call...',
    empty: 'No quick dial entries',
    loading: 'Loading quick dial entries...',
  },
  remove_quick_dial: {
    name: 'Remove Quick Dial Entry',
    placeholder: 'Select quick dial to remove...',
    empty: 'No quick dial entries',
    loading: 'Loading quick dial entries...',
  },
  blocked_numbers: {
    name: 'Blocked Numbers',
    placeholder: 'Select number to unblock...',
    empty: 'No blocked numbers',
    loading: 'Loading blocked numbers...',
  },
  remove_webhook: {
    name: 'Remove Webhook Shortcut',
    placeholder: 'Select webhook to remove...',
    empty: 'No webhook shortcuts',
    loading: 'Loading webhooks...',
  },
};

/** Option list: placeholder first, then one option per item or a fallback line */
function buildOptions(key: SelectKey, items: string[] | undefined): string[] {
  const text = SELECT_TEXT[key];
  if (items === undefined) return [text.placeholder, text.loading];
  if (items.length === 0) return [text.placeholder, text.empty];
  return [text.placeholder, ...items];
}

function truncateWebhookId(id: string): string {
  return id.length > WEBHOOK_ID_DISPLAY_LENGTH ? `${id.slice(0, WEBHOOK_ID_DISPLAY_LENGTH)}...` : id;
}

/** Options for one select; undefined category data shows the loading line */
export function selectOptions(key: SelectKey, snapshot: Readonly<Snapshot>): string[] {
  switch (key) {
    case 'quick_dial':
      return buildOptions(
        key,
        snapshot.phonebook && (snapshot.phonebook.entries ?? []).map((e) => `${CALL_ICON} ${e.name}: ${e.number}`),
      );
    case 'remove_quick_dial':
      return buildOptions(
        key,
        snapshot.phonebook && (snapshot.phonebook.entries ?? []).map((e) => `${REMOVE_ICON} ${e.name}: ${e.number}`),
      );
    case 'blocked_numbers':
      return buildOptions(
        key,
        snapshot.blocked && (snapshot.blocked.blocked_numbers ?? []).map((n) => `${REMOVE_ICON} ${n}`),
      );
    case 'remove_webhook':
      return buildOptions(
        key,
        snapshot.webhooks &&
          (snapshot.webhooks.webhooks ?? []).map((w) => `${REMOVE_ICON} ${w.number}: ${truncateWebhookId(w.webhook_id)}`),
      );
  }
}

export function selectStates(snapshot: Readonly<Snapshot>): EntityState[] {
  const keys: SelectKey[] = ['quick_dial', 'remove_quick_dial', 'blocked_numbers', 'remove_webhook'];
  return keys.map((key): EntityState => {
    const options = selectOptions(key, snapshot);
    return {
      key,
      platform: 'select',
      name: SELECT_TEXT[key].name,
      // Selects always rest on their placeholder
      value: options[0] ?? null,
      options,
    };
  });
}

/** What choosing a select option asks the device to do */
export type SelectAction =
  | { kind: 'call'; number: string }
  | { kind: 'remove-quick-dial'; name: string }
  | { kind: 'unblock'; number: string }
  | { kind: 'remove-webhook'; name: string };

/**
 * Reverse an option string into the action it stands for. Placeholder,
 * fallback and unrecognized options return null.
 */
export function parseSelectOption(key: SelectKey, option: string): SelectAction | null {
  const text = SELECT_TEXT[key];
  if (option === text.placeholder || option === text.empty || option === text.loading) {
    return null;
  }

  switch (key) {
    case 'quick_dial': {
      const rest = stripIcon(option, CALL_ICON);
      if (rest === null) return null;
      const at = rest.indexOf(': ');
      if (at === -1) return null;
      return { kind: 'call', number: rest.slice(at + 2) };
    }
    case 'remove_quick_dial': {
      const name = nameBeforeColon(option);
      return name === null ? null : { kind: 'remove-quick-dial', name };
    }
    case 'blocked_numbers': {
      const number = stripIcon(option, REMOVE_ICON);
      return number ? { kind: 'unblock', number } : null;
    }
    case 'remove_webhook': {
      const name = nameBeforeColon(option);
      return name === null ? null : { kind: 'remove-webhook', name };
    }
  }
}

function stripIcon(option: string, icon: string): string | null {
  const prefix = `${icon} `;
  return option.startsWith(prefix) ? option.slice(prefix.length) : null;
}

/** "🗑️ name: rest" -> "name" */
function nameBeforeColon(option: string): string | null {
  const rest = stripIcon(option, REMOVE_ICON);
  if (rest === null) return null;
  const at = rest.indexOf(': ');
  return at === -1 ? null : rest.slice(0, at);
}

// ============================================================================
// All entities
// ============================================================================

/** Every entity for one device, in display order */
export function describeEntities(snapshot: Readonly<Snapshot>, callLog: readonly CallLogEntry[]): EntityState[] {
  return [...sensorStates(snapshot, callLog), ...switchStates(snapshot), ...timeStates(snapshot), ...selectStates(snapshot)];
}
