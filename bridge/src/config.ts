// ============================================================================
// TsuryPhone Bridge - Configuration
// Loads ~/.tsuryphone/bridge.json (JSON5: comments and trailing commas are
// fine) and deep-merges it, plus any programmatic overrides, over the
// defaults. Device entries are validated one by one; a bad entry is
// skipped with a warning instead of failing the whole bridge.
// ============================================================================

import fs from 'fs';
import os from 'os';
import path from 'path';
import JSON5 from 'json5';
import { z } from 'zod';
import { DEFAULT_MAX_ENTRIES } from './callLogStore.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './deviceClient.js';
import { DEFAULT_SCAN_INTERVAL_MS } from './deviceSession.js';
import { describeError } from './errors.js';
import { isValidDeviceName } from './inputs.js';
import { createLogger } from './logger.js';
import { DEFAULT_PING_INTERVAL_MS, DEFAULT_START_DELAY_MS } from './updateChannel.js';

const log = createLogger('Config');

/** Directory holding the config file and the call log database */
export const CONFIG_DIR = path.join(os.homedir(), '.tsuryphone');

/** Path to the config file */
export const CONFIG_FILE = path.join(CONFIG_DIR, 'bridge.json');

export const DEFAULT_PORT = 80;
export const DEFAULT_DEVICE_NAME = 'tsuryphone';

// --- Types ---

export interface DeviceConfig {
  /** Registry key; defaults to the host */
  id: string;
  host: string;
  port: number;
  /** Name pushed to the device together with serverUrl */
  deviceName: string;
  /** Where the device should send webhooks; pushed on start when set */
  serverUrl?: string;
}

export interface BridgeConfig {
  devices: DeviceConfig[];
  polling: {
    /** Interval of the status/stats pull cycle */
    scanIntervalMs: number;
    /** Timeout of every HTTP request to a device */
    requestTimeoutMs: number;
  };
  channel: {
    /** Grace delay before the first WebSocket connect */
    startDelayMs: number;
    /** Liveness ping cadence */
    pingIntervalMs: number;
  };
  callLog: {
    /** SQLite file shared by all devices; "~" expands to the home directory */
    dbPath: string;
    maxEntries: number;
  };
  logging: {
    debug: boolean;
  };
}

/** Shape accepted from the config file and from programmatic overrides */
export interface BridgeConfigInput {
  devices?: readonly unknown[];
  polling?: Partial<BridgeConfig['polling']>;
  channel?: Partial<BridgeConfig['channel']>;
  callLog?: Partial<BridgeConfig['callLog']>;
  logging?: Partial<BridgeConfig['logging']>;
}

/** Default config values used when fields are missing from the config file */
export const DEFAULT_CONFIG: BridgeConfig = {
  devices: [],
  polling: {
    scanIntervalMs: DEFAULT_SCAN_INTERVAL_MS,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  },
  channel: {
    startDelayMs: DEFAULT_START_DELAY_MS,
    pingIntervalMs: DEFAULT_PING_INTERVAL_MS,
  },
  callLog: {
    dbPath: path.join(CONFIG_DIR, 'call-log.db'),
    maxEntries: DEFAULT_MAX_ENTRIES,
  },
  logging: {
    debug: false,
  },
};

// --- Schemas ---

const positiveInt = z.number().int().positive();

const fileConfigSchema = z.object({
  devices: z.array(z.unknown()).optional(),
  polling: z.object({ scanIntervalMs: positiveInt, requestTimeoutMs: positiveInt }).partial().optional(),
  channel: z.object({ startDelayMs: z.number().int().nonnegative(), pingIntervalMs: positiveInt }).partial().optional(),
  callLog: z.object({ dbPath: z.string().min(1), maxEntries: positiveInt }).partial().optional(),
  logging: z.object({ debug: z.boolean() }).partial().optional(),
});

const deviceSchema = z.object({
  id: z.string().min(1).optional(),
  host: z.string().trim().min(1),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  deviceName: z
    .string()
    .default(DEFAULT_DEVICE_NAME)
    .refine(isValidDeviceName, { message: 'lowercase letters, digits and single dashes, starting with a letter' }),
  serverUrl: z.string().min(1).optional(),
});

/** One device entry as written in the config file */
export type DeviceConfigInput = z.input<typeof deviceSchema>;

// ============================================================================
// Config loading utilities
// ============================================================================

/**
 * Load the bridge config file. Returns an empty config if the file
 * doesn't exist or cannot be parsed.
 */
export function loadConfig(file: string = CONFIG_FILE): BridgeConfigInput {
  try {
    if (!fs.existsSync(file)) return {};

    const raw: unknown = JSON5.parse(fs.readFileSync(file, 'utf-8'));
    const result = fileConfigSchema.safeParse(raw);
    if (!result.success) {
      log.warn(`Ignoring invalid config file ${file}: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      return {};
    }
    return result.data;
  } catch (err) {
    log.warn(`Failed to load config file ${file}, using defaults: ${describeError(err)}`);
    return {};
  }
}

/**
 * Deep-merge a file-loaded config and an optional programmatic override
 * on top of the default config. Devices are taken whole from the override
 * when it names any, otherwise from the file.
 */
export function mergeConfig(fileConfig: BridgeConfigInput, overrides?: BridgeConfigInput): BridgeConfig {
  return {
    devices: parseDevices(overrides?.devices ?? fileConfig.devices ?? []),
    polling: {
      ...DEFAULT_CONFIG.polling,
      ...(fileConfig.polling || {}),
      ...(overrides?.polling || {}),
    },
    channel: {
      ...DEFAULT_CONFIG.channel,
      ...(fileConfig.channel || {}),
      ...(overrides?.channel || {}),
    },
    callLog: {
      ...DEFAULT_CONFIG.callLog,
      ...(fileConfig.callLog || {}),
      ...(overrides?.callLog || {}),
    },
    logging: {
      ...DEFAULT_CONFIG.logging,
      ...(fileConfig.logging || {}),
      ...(overrides?.logging || {}),
    },
  };
}

/**
 * Validate device entries. Invalid entries and repeated ids are skipped
 * with a warning.
 */
export function parseDevices(entries: readonly unknown[]): DeviceConfig[] {
  const devices: DeviceConfig[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    const result = deviceSchema.safeParse(entry);
    if (!result.success) {
      const reason = result.error.issues.map((i) => `${i.path.join('.') || 'entry'}: ${i.message}`).join('; ');
      log.warn(`Skipping device #${index}: ${reason}`);
      return;
    }

    const { id, host, port, deviceName, serverUrl } = result.data;
    const deviceId = id ?? host;
    if (seen.has(deviceId)) {
      log.warn(`Skipping device #${index}: duplicate id "${deviceId}"`);
      return;
    }
    seen.add(deviceId);

    devices.push(serverUrl === undefined
      ? { id: deviceId, host, port, deviceName }
      : { id: deviceId, host, port, deviceName, serverUrl });
  });

  return devices;
}

/** Expand a leading "~" to the home directory */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}
