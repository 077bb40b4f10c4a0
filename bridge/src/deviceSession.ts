// ============================================================================
// TsuryPhone Bridge - Device Session
// One session per configured device. Owns the canonical snapshot of the
// device's state and keeps it current from two sources:
//   1. A pull timer that fetches status and stats every scanIntervalMs
//   2. The real-time update channel, whose partial status frames are
//      merged into the snapshot as they arrive
// Both paths feed the call activity tracker and notify subscribers.
//
// The remaining categories (phonebook, blocked, dnd, webhooks) are loaded
// lazily on first read and re-fetched after the mutations that change them.
// ============================================================================

import type { CallLogEntry } from '../../shared/types.js';
import { CallActivityTracker } from './callActivity.js';
import type { CallLogStore } from './callLogStore.js';
import { ACTIONS, DeviceClient, DEFAULT_REQUEST_TIMEOUT_MS, type ActionName, type ActionParams } from './deviceClient.js';
import { RefreshFailedError, describeError } from './errors.js';
import {
  normalizeServerUrl,
  requirePhoneNumber,
  validateDeviceName,
  validateDndHours,
  type DndHours,
} from './inputs.js';
import { createLogger, type Logger } from './logger.js';
import { parseRingPattern } from './ringPattern.js';
import {
  CATEGORY_DEFAULTS,
  type Category,
  type CategoryData,
  type DeviceInfo,
  type DeviceStatus,
  type OnDemandCategory,
  type Snapshot,
} from './schemas.js';
import { mergeStatus } from './statusMerge.js';
import { UpdateChannel, type BackoffOptions, type ChannelState } from './updateChannel.js';

/** Default interval of the status/stats pull cycle */
export const DEFAULT_SCAN_INTERVAL_MS = 30_000;

/** Identity string served by GET / on a genuine device */
export const DEVICE_SIGNATURE = 'tsuryphone';

/** Called after every snapshot or call log change */
export type SnapshotListener = (snapshot: Readonly<Snapshot>) => void;

export interface DeviceSessionOptions {
  /** Registry key for this device */
  id: string;
  host: string;
  port: number;
  /** Store for this device's call log; closed by stop() */
  callLog: CallLogStore;
  /** Name pushed to the device when provisioning */
  deviceName?: string;
  /** Server URL pushed to the device on start, if set */
  serverUrl?: string;
  scanIntervalMs?: number;
  requestTimeoutMs?: number;
  startDelayMs?: number;
  pingIntervalMs?: number;
  backoff?: BackoffOptions;
  /** Clock for call log timestamps and durations */
  now?: () => Date;
}

export class DeviceSession {
  readonly id: string;
  readonly wsUrl: string;
  private client: DeviceClient;
  private channel: UpdateChannel;
  private tracker: CallActivityTracker;
  private callLog: CallLogStore;
  private data: Snapshot = {};
  private listeners = new Set<SnapshotListener>();
  private refreshTimer: NodeJS.Timeout | null = null;
  private running = false;
  private closed = false;
  private readonly scanIntervalMs: number;
  private readonly deviceName: string | undefined;
  private readonly serverUrl: string | undefined;
  private log: Logger;

  constructor(options: DeviceSessionOptions) {
    this.id = options.id;
    this.wsUrl = `ws://${options.host}:${options.port}/ws`;
    this.scanIntervalMs = options.scanIntervalMs ?? DEFAULT_SCAN_INTERVAL_MS;
    this.deviceName = options.deviceName;
    this.serverUrl = options.serverUrl;
    this.log = createLogger(`DeviceSession ${options.host}:${options.port}`);

    this.client = new DeviceClient(options.host, options.port, options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
    this.callLog = options.callLog;
    this.tracker = new CallActivityTracker(this.callLog, options.now, `CallActivity ${options.id}`);
    this.channel = new UpdateChannel(this.wsUrl, (update) => this.applyUpdate(update), {
      startDelayMs: options.startDelayMs,
      pingIntervalMs: options.pingIntervalMs,
      backoff: options.backoff,
      logPrefix: `UpdateChannel ${options.host}:${options.port}`,
    });
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  /** http://host:port */
  get baseUrl(): string {
    return this.client.baseUrl;
  }

  /** Last-known device state. Treat as read-only. */
  get snapshot(): Readonly<Snapshot> {
    return this.data;
  }

  /** Whether the push channel currently has a usable connection */
  get isChannelConnected(): boolean {
    return this.channel.isConnected;
  }

  /** Connection state of the push channel, for logging and diagnostics */
  get channelState(): ChannelState {
    return this.channel.state;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Derived call log, newest first */
  callLogEntries(): CallLogEntry[] {
    return this.tracker.entries();
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Start the session:
   * 1. Start the update channel (connects after its grace delay)
   * 2. Push the server URL and device name when a server URL is configured
   * 3. Run one pull cycle so the snapshot is populated
   * 4. Start the pull timer
   * Failures in steps 2-3 are logged; the session still starts.
   */
  async start(): Promise<void> {
    if (this.running || this.closed) return;
    this.running = true;

    this.log.info(`Starting (${this.callLog.count()} call log entries loaded)`);

    // The grace delay runs alongside the initial requests, not after them
    this.channel.start();

    if (this.serverUrl) {
      try {
        await this.provision(this.serverUrl);
      } catch (err) {
        this.log.warn(`Could not push configuration to device: ${describeError(err)}`);
      }
    }

    try {
      await this.refresh();
    } catch (err) {
      this.log.warn(`Initial refresh failed: ${describeError(err)}`);
    }

    // stop() may have run while the initial requests were in flight
    if (!this.running) return;

    this.refreshTimer = setInterval(() => {
      this.refresh().catch((err: unknown) => {
        this.log.warn(`Refresh failed: ${describeError(err)}`);
      });
    }, this.scanIntervalMs);

    this.log.info('Started');
  }

  /**
   * Tear the session down: the channel is shut down (and its socket
   * closed) before the call log store is closed as the final step.
   */
  async stop(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.running = false;

    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }

    await this.channel.stop();

    this.listeners.clear();
    this.callLog.close();
    this.log.info('Stopped');
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  /**
   * Fetch one category and store it in the snapshot. On failure the
   * cached value is left untouched and the error propagates.
   */
  async fetch<C extends Category>(category: C): Promise<CategoryData[C]> {
    const value = await this.client.getCategory(category);
    this.data[category] = value;
    this.notify();
    return value;
  }

  /**
   * Return a category from the snapshot, loading it on first use. When
   * the device cannot be reached the category default is returned and
   * nothing is cached, so the next read tries again.
   */
  async fetchOnDemand<C extends OnDemandCategory>(category: C): Promise<CategoryData[C]> {
    const cached: CategoryData[C] | undefined = this.data[category];
    if (cached !== undefined) return cached;

    try {
      return await this.fetch(category);
    } catch (err) {
      this.log.warn(`Could not load ${category}, using defaults: ${describeError(err)}`);
      return CATEGORY_DEFAULTS[category]();
    }
  }

  /**
   * One pull cycle: health-check the channel, fetch status and stats in
   * parallel, and overwrite whichever succeeded. Rejects with
   * RefreshFailedError only when both fail.
   */
  async refresh(): Promise<void> {
    this.ensureChannel();

    const [status, stats] = await Promise.allSettled([
      this.client.getCategory('status'),
      this.client.getCategory('stats'),
    ]);

    if (status.status === 'fulfilled') {
      this.data.status = status.value;
      this.track(() => this.tracker.observeStatus(status.value));
    }
    if (stats.status === 'fulfilled') {
      this.data.stats = stats.value;
      this.track(() => this.tracker.observeStats(stats.value));
    }

    if (status.status === 'rejected' && stats.status === 'rejected') {
      throw new RefreshFailedError(
        `No data received from ${this.baseUrl}: ${describeError(status.reason)}`,
        [status.reason, stats.reason],
      );
    }

    this.notify();
  }

  /** GET / and check the device identifies itself as a TsuryPhone */
  async probeDevice(): Promise<DeviceInfo | null> {
    const info = await this.client.getDeviceInfo();
    return info.device === DEVICE_SIGNATURE ? info : null;
  }

  // --------------------------------------------------------------------------
  // Subscriptions
  // --------------------------------------------------------------------------

  /**
   * Register a listener called after every snapshot change.
   * @returns a function that removes the listener
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --------------------------------------------------------------------------
  // Actions
  // --------------------------------------------------------------------------

  /** POST to the unified action endpoint. Errors propagate unretried. */
  async performAction(action: ActionName, params?: ActionParams): Promise<void> {
    this.log.info(`Action ${action}`);
    await this.client.postAction(action, params);
  }

  /** Dial a number and record it as an outgoing call */
  async call(number: string): Promise<void> {
    const dialled = requirePhoneNumber(number);
    await this.performAction(ACTIONS.call, { number: dialled });
    this.tracker.logOutgoing(dialled);
    this.notify();
  }

  async hangup(): Promise<void> {
    await this.performAction(ACTIONS.hangup);
  }

  async reset(): Promise<void> {
    await this.performAction(ACTIONS.reset);
  }

  async switchCallWaiting(): Promise<void> {
    await this.performAction(ACTIONS.callWaiting);
  }

  async setMaintenanceMode(enabled: boolean): Promise<void> {
    await this.performAction(ACTIONS.maintenance, { enabled });
  }

  /** Ask the firmware to re-read its own state */
  async requestDeviceRefresh(): Promise<void> {
    await this.performAction(ACTIONS.refresh);
  }

  /**
   * Parse a ring pattern ("500,500x3") and ring the phone with it.
   * An invalid pattern throws RingPatternError before any request.
   */
  async ringWithPattern(text: string): Promise<void> {
    const { durations, repeats } = parseRingPattern(text);
    await this.performAction(ACTIONS.ringPattern, { durations, repeats });
  }

  async addQuickDial(name: string, number: string): Promise<void> {
    await this.performAction(ACTIONS.quickDialAdd, { name, number });
    await this.refetch('phonebook');
  }

  async removeQuickDial(name: string): Promise<void> {
    await this.performAction(ACTIONS.quickDialRemove, { name });
    await this.refetch('phonebook');
  }

  async addBlockedNumber(number: string): Promise<void> {
    await this.performAction(ACTIONS.blockedAdd, { number });
    await this.refetch('blocked');
  }

  async removeBlockedNumber(number: string): Promise<void> {
    await this.performAction(ACTIONS.blockedRemove, { number });
    await this.refetch('blocked');
  }

  /** The firmware keys webhook shortcuts by the `number` field */
  async addWebhookShortcut(name: string, webhookId: string): Promise<void> {
    await this.performAction(ACTIONS.webhookAdd, { number: name, webhook_id: webhookId });
    await this.refetch('webhooks');
  }

  async removeWebhookShortcut(name: string): Promise<void> {
    await this.performAction(ACTIONS.webhookRemove, { number: name });
    await this.refetch('webhooks');
  }

  async setDndForce(enabled: boolean): Promise<void> {
    await this.performAction(ACTIONS.dndForce, { enabled });
    await this.refetch('dnd');
  }

  async setDndSchedule(enabled: boolean): Promise<void> {
    await this.performAction(ACTIONS.dndSchedule, { enabled });
    await this.refetch('dnd');
  }

  async setDndHours(hours: DndHours): Promise<void> {
    const { startHour, startMinute, endHour, endMinute } = validateDndHours(hours);
    await this.client.postJson('/dnd', {
      start_hour: startHour,
      start_minute: startMinute,
      end_hour: endHour,
      end_minute: endMinute,
    });
    await this.refetch('dnd');
  }

  async setDeviceName(name: string): Promise<void> {
    const deviceName = validateDeviceName(name);
    await this.performAction(ACTIONS.setDeviceName, { device_name: deviceName });
  }

  /** Tell the device where to send its webhooks */
  async configureServerUrl(url: string): Promise<void> {
    const serverUrl = normalizeServerUrl(url);
    await this.client.postJson('/webhooks', { server_url: serverUrl });
    this.log.info(`Configured server URL ${serverUrl}`);
  }

  // --------------------------------------------------------------------------
  // Channel supervision
  // --------------------------------------------------------------------------

  /**
   * Force a reconnect when the channel has given up on its socket (or
   * holds a dead one) while the session is running. A handshake already
   * in flight, or the startup grace period, is left alone.
   *
   * @returns true if a reconnect was forced
   */
  ensureChannel(): boolean {
    if (!this.running || this.channel.isConnected) return false;

    const kind = this.channel.state.kind;
    if (kind !== 'connected' && kind !== 'disconnected') return false;

    this.log.warn(`Update channel not usable (${kind}), reconnecting`);
    this.channel.reconnect();
    return true;
  }

  // --------------------------------------------------------------------------
  // Internal helpers
  // --------------------------------------------------------------------------

  /** Merge a pushed status frame into the snapshot */
  private applyUpdate(update: DeviceStatus): void {
    const merged = mergeStatus(this.data.status ?? {}, update);
    this.data.status = merged;
    this.track(() => this.tracker.observeStatus(merged));
    this.notify();
  }

  private async provision(serverUrl: string): Promise<void> {
    await this.configureServerUrl(serverUrl);
    if (this.deviceName) {
      await this.setDeviceName(this.deviceName);
    }
  }

  /** Re-fetch after a mutation; the action already succeeded, so a miss is only logged */
  private async refetch(category: OnDemandCategory): Promise<void> {
    try {
      await this.fetch(category);
    } catch (err) {
      this.log.warn(`Could not re-fetch ${category}: ${describeError(err)}`);
    }
  }

  /** Call log bookkeeping must not stop the snapshot from updating */
  private track(step: () => void): void {
    try {
      step();
    } catch (err) {
      this.log.error('Call log update failed:', err);
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.data);
      } catch (err) {
        this.log.error('Subscriber threw:', err);
      }
    }
  }
}
