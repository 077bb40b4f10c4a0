// ============================================================================
// TsuryPhone Bridge - Main Entry Point
// Ties the bridge together: loads configuration, opens one device session
// (HTTP pull + WebSocket push + call log) per configured phone, and gives
// callers one place to read entity values and send commands by device id.
// ============================================================================

import type { CallLogEntry, EntityState } from '../../shared/types.js';
import { CallLogStore } from './callLogStore.js';
import { CONFIG_FILE, expandHome, loadConfig, mergeConfig, type BridgeConfig, type BridgeConfigInput, type DeviceConfig } from './config.js';
import { DeviceSession } from './deviceSession.js';
import { describeEntities, parseSelectOption, type SelectAction, type SelectKey } from './entities.js';
import { describeError } from './errors.js';
import { parseClock } from './inputs.js';
import { createLogger, setDebugLogging } from './logger.js';
import { ON_DEMAND_CATEGORIES, type Snapshot } from './schemas.js';
import { SessionRegistry } from './sessionRegistry.js';

// Re-export all modules and types for consumers of this package
export { CallActivityTracker, UNKNOWN_NUMBER } from './callActivity.js';
export { CallLogStore } from './callLogStore.js';
export * from './config.js';
export { ACTIONS, DeviceClient, type ActionName, type ActionParams } from './deviceClient.js';
export { DeviceSession, type DeviceSessionOptions, type SnapshotListener } from './deviceSession.js';
export * from './entities.js';
export * from './errors.js';
export * from './inputs.js';
export { createLogger, setDebugLogging, type Logger } from './logger.js';
export { parseRingPattern } from './ringPattern.js';
export * from './schemas.js';
export { SessionRegistry } from './sessionRegistry.js';
export { mergeStatus } from './statusMerge.js';
export {
  UpdateChannel,
  nextState,
  reconnectDelay,
  type ChannelEvent,
  type ChannelState,
  type BackoffOptions,
} from './updateChannel.js';
export type * from '../../shared/types.js';

const log = createLogger('TsuryBridge');

/** Listener for snapshot changes on any device */
export type BridgeListener = (deviceId: string, snapshot: Readonly<Snapshot>) => void;

export class TsuryBridge {
  private config: BridgeConfig;
  private registry = new SessionRegistry();
  private running = false;

  /**
   * @param overrides - Programmatic config merged over the file config
   * @param configFile - Config file to read (default ~/.tsuryphone/bridge.json)
   */
  constructor(overrides?: BridgeConfigInput, configFile: string = CONFIG_FILE) {
    this.config = mergeConfig(loadConfig(configFile), overrides);
    setDebugLogging(this.config.logging.debug);

    for (const device of this.config.devices) {
      this.registry.add(this.createSession(device));
    }
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  /** The merged configuration in effect */
  get settings(): Readonly<BridgeConfig> {
    return this.config;
  }

  /** Ids of every configured device */
  deviceIds(): string[] {
    return this.registry.ids();
  }

  /** The session for a device; throws UnknownDeviceError for unknown ids */
  session(deviceId: string): DeviceSession {
    return this.registry.get(deviceId);
  }

  /** Current entity values for one device */
  entities(deviceId: string): EntityState[] {
    const session = this.registry.get(deviceId);
    return describeEntities(session.snapshot, session.callLogEntries());
  }

  callLog(deviceId: string): CallLogEntry[] {
    return this.registry.get(deviceId).callLogEntries();
  }

  /**
   * Listen for snapshot changes on every device.
   * @returns a function that removes the listener from all sessions
   */
  subscribe(listener: BridgeListener): () => void {
    const unsubscribers = this.registry
      .all()
      .map((session) => session.subscribe((snapshot) => listener(session.id, snapshot)));
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /** Start every session. One device failing to start does not stop the others. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    log.info(`Starting with ${this.registry.size} device(s)...`);

    const results = await Promise.allSettled(this.registry.all().map((session) => session.start()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        log.error(`Device ${this.registry.ids()[i]} failed to start: ${describeError(result.reason)}`);
      }
    });

    log.info('Started successfully');
  }

  /**
   * Stop every session; each closes its channel before its call log.
   * Also valid before start(), since sessions open their stores up front.
   */
  async stop(): Promise<void> {
    this.running = false;

    log.info('Stopping...');
    const results = await Promise.allSettled(this.registry.all().map((session) => session.stop()));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.error(`Session failed to stop cleanly: ${describeError(result.reason)}`);
      }
    }
    log.info('Stopped');
  }

  // --------------------------------------------------------------------------
  // Commands
  // --------------------------------------------------------------------------

  /** Make sure every on-demand category of a device has been loaded once */
  async loadOnDemand(deviceId: string): Promise<void> {
    const session = this.registry.get(deviceId);
    await Promise.all(ON_DEMAND_CATEGORIES.map((category) => session.fetchOnDemand(category)));
  }

  /**
   * Act on a select option chosen by the user.
   * @returns the action taken, or null for placeholder and fallback options
   */
  async selectOption(deviceId: string, key: SelectKey, option: string): Promise<SelectAction | null> {
    const session = this.registry.get(deviceId);
    const action = parseSelectOption(key, option);
    if (!action) return null;

    switch (action.kind) {
      case 'call':
        await session.call(action.number);
        break;
      case 'remove-quick-dial':
        await session.removeQuickDial(action.name);
        break;
      case 'unblock':
        await session.removeBlockedNumber(action.number);
        break;
      case 'remove-webhook':
        await session.removeWebhookShortcut(action.name);
        break;
    }
    return action;
  }

  /**
   * Move one edge of the DnD window ("HH:MM"), keeping the other edge as
   * the device last reported it.
   */
  async setDndTime(deviceId: string, edge: 'start' | 'end', text: string): Promise<void> {
    const session = this.registry.get(deviceId);
    const { hour, minute } = parseClock(text);
    const dnd = await session.fetchOnDemand('dnd');

    await session.setDndHours(
      edge === 'start'
        ? { startHour: hour, startMinute: minute, endHour: dnd.end_hour ?? 0, endMinute: dnd.end_minute ?? 0 }
        : { startHour: dnd.start_hour ?? 0, startMinute: dnd.start_minute ?? 0, endHour: hour, endMinute: minute },
    );
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private createSession(device: DeviceConfig): DeviceSession {
    const callLog = new CallLogStore(expandHome(this.config.callLog.dbPath), device.id, this.config.callLog.maxEntries);
    return new DeviceSession({
      id: device.id,
      host: device.host,
      port: device.port,
      deviceName: device.deviceName,
      serverUrl: device.serverUrl,
      callLog,
      scanIntervalMs: this.config.polling.scanIntervalMs,
      requestTimeoutMs: this.config.polling.requestTimeoutMs,
      startDelayMs: this.config.channel.startDelayMs,
      pingIntervalMs: this.config.channel.pingIntervalMs,
    });
  }
}
