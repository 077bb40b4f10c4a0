// ============================================================================
// TsuryPhone Bridge - Input Helpers
// Validation and parsing for user-entered text before it becomes a device
// request. Everything here throws InvalidInputError (or returns a cleaned
// value) without touching the network.
// ============================================================================

import { InvalidInputError } from './errors.js';

const DEVICE_NAME_RE = /^[a-z][a-z0-9-]*$/;

/** Characters kept in a dialled number: digits, +, #, * */
const PHONE_JUNK_RE = /[^\d+#*]/g;

const WEBHOOK_SHORTCUT_RE = /^[a-zA-Z0-9]+:https?:\/\/.+$/;

/**
 * Device names start with a lowercase letter and contain only lowercase
 * letters, digits and single dashes, with no trailing dash.
 */
export function isValidDeviceName(name: string): boolean {
  return DEVICE_NAME_RE.test(name) && !name.includes('--') && !name.endsWith('-');
}

/** Throwing form of isValidDeviceName */
export function validateDeviceName(name: string): string {
  if (!isValidDeviceName(name)) {
    throw new InvalidInputError(
      `Invalid device name "${name}": use lowercase letters, digits and single dashes, starting with a letter`,
    );
  }
  return name;
}

/**
 * Strip formatting from a phone number ("+1 (555) 010-0000" -> "+15550100000").
 * Returns an empty string when nothing dialable is left.
 */
export function cleanPhoneNumber(value: string): string {
  return value.replace(PHONE_JUNK_RE, '');
}

/** Cleaned number, or InvalidInputError when nothing dialable is left */
export function requirePhoneNumber(value: string): string {
  const number = cleanPhoneNumber(value);
  if (!number) {
    throw new InvalidInputError(`No dialable digits in "${value}"`);
  }
  return number;
}

export interface QuickDialInput {
  name: string;
  number: string;
}

/** Parse "entry: number" (e.g. "5: +1 555 0100") into a quick-dial entry */
export function parseQuickDialInput(value: string): QuickDialInput {
  const at = value.indexOf(':');
  if (at === -1) {
    throw new InvalidInputError(`Expected "name: number", got "${value}"`);
  }

  const name = value.slice(0, at).trim();
  const number = cleanPhoneNumber(value.slice(at + 1).trim());
  if (!name || !number) {
    throw new InvalidInputError(`Expected "name: number", got "${value}"`);
  }
  return { name, number };
}

export interface WebhookShortcutInput {
  name: string;
  webhookId: string;
}

/** Parse "name:url" (e.g. "alarm:http://hooks.local/alarm") into a shortcut */
export function parseWebhookShortcutInput(value: string): WebhookShortcutInput {
  const trimmed = value.trim();
  if (!WEBHOOK_SHORTCUT_RE.test(trimmed)) {
    throw new InvalidInputError(`Expected "name:http(s)://...", got "${value}"`);
  }

  const at = trimmed.indexOf(':');
  return {
    name: trimmed.slice(0, at).trim(),
    webhookId: trimmed.slice(at + 1).trim(),
  };
}

/** Prefix http:// when the URL carries no scheme */
export function normalizeServerUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) {
    throw new InvalidInputError('Server URL is empty');
  }
  return /^https?:\/\//.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export interface DndHours {
  startHour: number;
  startMinute: number;
  endHour: number;
  endMinute: number;
}

/** Check every field is a whole number inside its clock range */
export function validateDndHours(hours: DndHours): DndHours {
  checkClockField('start hour', hours.startHour, 23);
  checkClockField('start minute', hours.startMinute, 59);
  checkClockField('end hour', hours.endHour, 23);
  checkClockField('end minute', hours.endMinute, 59);
  return hours;
}

const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;

/** Parse "HH:MM" (24-hour) into hour and minute */
export function parseClock(text: string): { hour: number; minute: number } {
  const match = CLOCK_RE.exec(text.trim());
  if (!match) {
    throw new InvalidInputError(`Expected a time as HH:MM, got "${text}"`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  checkClockField('hour', hour, 23);
  checkClockField('minute', minute, 59);
  return { hour, minute };
}

function checkClockField(label: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidInputError(`DnD ${label} must be between 0 and ${max}: ${value}`);
  }
}
