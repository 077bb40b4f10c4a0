// ============================================================================
// TsuryPhone Bridge - Real-Time Update Channel
// Keeps a WebSocket open to the device's /ws endpoint. Every text frame is
// a full or partial status document that is handed to the session for
// merging. The channel reconnects on its own with capped backoff, and
// pings the device on a fixed cadence to catch connections that died
// without a close frame.
//
// Connection lifecycle:
//   idle --start--> connecting --opened--> connected
//                       |                     |
//                       +------closed---------+--> disconnected --retry--> connecting
//   any --shutdown--> shutting-down (terminal)
// ============================================================================

import WebSocket from 'ws';
import { describeError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { statusSchema, type DeviceStatus } from './schemas.js';

// --- State machine ---

/**
 * Connection state. `failures` counts consecutive failed or dropped
 * connections since the last successful handshake.
 */
export type ChannelState =
  | { kind: 'idle' }
  | { kind: 'connecting'; failures: number }
  | { kind: 'connected' }
  | { kind: 'disconnected'; failures: number }
  | { kind: 'shutting-down' };

export type ChannelEvent =
  | { type: 'start' }
  | { type: 'opened' }
  | { type: 'closed' }
  | { type: 'retry' }
  | { type: 'shutdown' };

/**
 * Pure transition function. Events that make no sense in the current
 * state leave it unchanged; nothing leaves `shutting-down`.
 */
export function nextState(state: ChannelState, event: ChannelEvent): ChannelState {
  if (state.kind === 'shutting-down') return state;
  if (event.type === 'shutdown') return { kind: 'shutting-down' };

  switch (state.kind) {
    case 'idle':
      return event.type === 'start' ? { kind: 'connecting', failures: 0 } : state;
    case 'connecting':
      if (event.type === 'opened') return { kind: 'connected' };
      if (event.type === 'closed') return { kind: 'disconnected', failures: state.failures + 1 };
      return state;
    case 'connected':
      return event.type === 'closed' ? { kind: 'disconnected', failures: 1 } : state;
    case 'disconnected':
      return event.type === 'retry' ? { kind: 'connecting', failures: state.failures } : state;
  }
}

// --- Backoff ---

export interface BackoffOptions {
  /** Wait after the first failure */
  firstMs: number;
  /** Wait after the second and third failures */
  earlyMs: number;
  /** Base of the exponential phase (fourth failure onwards) */
  baseMs: number;
  /** Largest exponent applied to baseMs */
  capExponent: number;
  /** Upper bound on any wait */
  maxMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  firstMs: 1_000,
  earlyMs: 5_000,
  baseMs: 10_000,
  capExponent: 2,
  maxMs: 30_000,
};

/**
 * Delay before reconnect attempt number `failures` (1-based):
 * 1s, 5s, 5s, then 10s, 20s, 30s, 30s, ...
 */
export function reconnectDelay(failures: number, backoff: BackoffOptions = DEFAULT_BACKOFF): number {
  if (failures <= 1) return backoff.firstMs;
  if (failures <= 3) return Math.min(backoff.earlyMs, backoff.maxMs);
  const exponent = Math.min(failures - 4, backoff.capExponent);
  return Math.min(backoff.baseMs * 2 ** exponent, backoff.maxMs);
}

// --- Channel ---

/** Receives each validated status frame */
export type StatusUpdateHandler = (update: DeviceStatus) => void;

export interface UpdateChannelOptions {
  /** Grace period before the first connect, letting firmware finish booting */
  startDelayMs?: number;
  /** Interval between liveness pings while connected */
  pingIntervalMs?: number;
  backoff?: BackoffOptions;
  /** Component label used in log lines */
  logPrefix?: string;
}

export const DEFAULT_START_DELAY_MS = 2_000;
export const DEFAULT_PING_INTERVAL_MS = 25_000;

/** How long a graceful close may take before the socket is torn down */
const CLOSE_GRACE_MS = 2_000;

export class UpdateChannel {
  private ws: WebSocket | null = null;
  private _state: ChannelState = { kind: 'idle' };
  private startTimer: NodeJS.Timeout | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private pongReceived = true;
  private readonly startDelayMs: number;
  private readonly pingIntervalMs: number;
  private readonly backoff: BackoffOptions;
  private log: Logger;

  constructor(
    private readonly url: string,
    private readonly onUpdate: StatusUpdateHandler,
    options: UpdateChannelOptions = {},
  ) {
    this.startDelayMs = options.startDelayMs ?? DEFAULT_START_DELAY_MS;
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.log = createLogger(options.logPrefix ?? 'UpdateChannel');
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  /** Current connection state (read-only view for logging and tests) */
  get state(): ChannelState {
    return this._state;
  }

  /** Whether the channel has a live, open socket */
  get isConnected(): boolean {
    return this._state.kind === 'connected' && this.ws?.readyState === WebSocket.OPEN;
  }

  /**
   * Begin connecting after the startup grace delay.
   * Calling start() again, or after stop(), does nothing.
   */
  start(): void {
    if (this._state.kind !== 'idle' || this.startTimer) return;

    this.log.info(`Connecting to ${this.url} in ${this.startDelayMs}ms`);
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.dispatch({ type: 'start' });
      this.openSocket();
    }, this.startDelayMs);
  }

  /**
   * Drop the current socket (if any) and connect again right away.
   * Used by the session health check when the channel claims to be
   * down while it should be up. Ignored before start() and after stop().
   */
  reconnect(): void {
    const kind = this._state.kind;
    if (kind === 'idle' || kind === 'shutting-down') return;

    this.log.warn('Forcing reconnect');
    this.clearRetryTimer();
    this.detachSocket();

    if (kind === 'connecting' || kind === 'connected') {
      this.dispatch({ type: 'closed' });
    }
    this.dispatch({ type: 'retry' });
    this.openSocket();
  }

  /**
   * Shut the channel down for good. The state flips to shutting-down
   * before anything is cancelled, so a close event racing this call
   * cannot schedule a reconnect. Resolves once the socket has closed.
   */
  async stop(): Promise<void> {
    this.dispatch({ type: 'shutdown' });

    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    this.clearRetryTimer();
    this.stopHeartbeat();

    const ws = this.ws;
    if (!ws) return;

    await new Promise<void>((resolve) => {
      if (ws.readyState === WebSocket.CLOSED) {
        resolve();
        return;
      }

      const forceTimer = setTimeout(() => ws.terminate(), CLOSE_GRACE_MS);
      ws.once('close', () => {
        clearTimeout(forceTimer);
        resolve();
      });

      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, 'Bridge shutting down');
      }
    });

    this.ws = null;
    this.log.info('Stopped');
  }

  // --------------------------------------------------------------------------
  // Connection handling
  // --------------------------------------------------------------------------

  private dispatch(event: ChannelEvent): void {
    const previous = this._state;
    this._state = nextState(previous, event);
    if (previous.kind !== this._state.kind) {
      this.log.debug(`${previous.kind} -> ${this._state.kind} (${event.type})`);
    }
  }

  private openSocket(): void {
    if (this._state.kind !== 'connecting') return;

    const attempt = this._state.failures + 1;
    this.log.debug(`Connection attempt #${attempt} to ${this.url}`);

    const ws = new WebSocket(this.url, { handshakeTimeout: 30_000 });
    this.ws = ws;

    ws.on('open', () => {
      if (this.ws !== ws) return;
      this.dispatch({ type: 'opened' });
      this.log.info(`Connected (attempt #${attempt})`);
      this.startHeartbeat(ws);
    });

    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (this.ws !== ws) return;
      if (isBinary) {
        this.log.warn('Ignoring binary frame');
        return;
      }
      this.handleMessage(data.toString());
    });

    ws.on('pong', () => {
      this.pongReceived = true;
    });

    ws.on('close', (code: number, reason: Buffer) => {
      if (this.ws !== ws) return;
      this.handleClose(code, reason.toString());
    });

    ws.on('error', (err: Error) => {
      // 'close' always follows, which drives the reconnect
      this.log.warn(`Connection error (attempt #${attempt}): ${err.message}`);
    });
  }

  /**
   * Decide what happens after the socket closed: exit when shutting down,
   * otherwise wait out the backoff and connect again.
   */
  private handleClose(code: number, reason: string): void {
    this.stopHeartbeat();
    this.ws = null;

    if (this._state.kind === 'shutting-down') return;

    this.dispatch({ type: 'closed' });
    if (this._state.kind !== 'disconnected') return;

    const failures = this._state.failures;
    const delay = reconnectDelay(failures, this.backoff);
    this.log.warn(
      `Connection closed (code=${code}${reason ? `, reason=${reason}` : ''}); reconnecting in ${delay}ms (attempt #${failures + 1})`,
    );

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.dispatch({ type: 'retry' });
      this.openSocket();
    }, delay);
  }

  /**
   * Parse a text frame and pass it on. Bad frames are logged and dropped;
   * they never affect the connection.
   */
  private handleMessage(text: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this.log.warn(`Received invalid JSON: ${text} (${describeError(err)})`);
      return;
    }

    const result = statusSchema.safeParse(parsed);
    if (!result.success) {
      this.log.warn(`Ignoring frame that is not a JSON object: ${text}`);
      return;
    }

    if (typeof result.data.state === 'string') {
      this.log.info(`State update: ${result.data.state}`);
    }

    try {
      this.onUpdate(result.data);
    } catch (err) {
      this.log.error('Status update handler failed:', err);
    }
  }

  /** Stop listening to the current socket and kill it without a reconnect */
  private detachSocket(): void {
    this.stopHeartbeat();
    const ws = this.ws;
    this.ws = null;
    if (!ws) return;
    ws.removeAllListeners();
    // Keep a listener so a late error on the dead socket is not thrown
    ws.on('error', () => undefined);
    ws.terminate();
  }

  // --------------------------------------------------------------------------
  // Heartbeat
  // --------------------------------------------------------------------------

  /**
   * Ping on a fixed cadence regardless of inbound traffic. A missing pong
   * by the next tick, or a ping that throws, is treated as a dead link.
   */
  private startHeartbeat(ws: WebSocket): void {
    this.stopHeartbeat();
    this.pongReceived = true;

    this.heartbeatTimer = setInterval(() => {
      if (!this.pongReceived) {
        this.log.warn('Heartbeat timeout, dropping connection');
        ws.terminate();
        return;
      }

      this.pongReceived = false;
      try {
        ws.ping();
      } catch (err) {
        this.log.warn(`Ping failed, dropping connection: ${describeError(err)}`);
        ws.terminate();
      }
    }, this.pingIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private clearRetryTimer(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }
}
