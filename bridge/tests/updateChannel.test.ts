// ============================================================================
// Tests for UpdateChannel
// The transition function and backoff schedule are checked directly; the
// channel itself runs against an in-process ws server with the backoff
// shortened so reconnects happen within the test.
// ============================================================================

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WebSocketServer } from 'ws';
import type { AddressInfo } from 'net';
import {
  UpdateChannel,
  nextState,
  reconnectDelay,
  type BackoffOptions,
  type ChannelState,
} from '../src/updateChannel.js';
import type { DeviceStatus } from '../src/schemas.js';
import { sleep, waitFor } from './fakeDevice.js';

const FAST_BACKOFF: BackoffOptions = { firstMs: 10, earlyMs: 10, baseMs: 10, capExponent: 0, maxMs: 10 };

// ----------------------------------------------------------------------------
// Pure parts
// ----------------------------------------------------------------------------

describe('reconnectDelay()', () => {
  it('should follow the 1s, 5s, 5s, 10s, 20s, 30s schedule', () => {
    expect([1, 2, 3, 4, 5, 6, 7, 8].map((n) => reconnectDelay(n))).toEqual([
      1000, 5000, 5000, 10000, 20000, 30000, 30000, 30000,
    ]);
  });

  it('should never decrease and never exceed 30s', () => {
    let previous = 0;
    for (let n = 1; n <= 50; n++) {
      const delay = reconnectDelay(n);
      expect(delay).toBeGreaterThanOrEqual(previous);
      expect(delay).toBeLessThanOrEqual(30000);
      previous = delay;
    }
  });
});

describe('nextState()', () => {
  const idle: ChannelState = { kind: 'idle' };
  const connecting: ChannelState = { kind: 'connecting', failures: 2 };
  const connected: ChannelState = { kind: 'connected' };
  const disconnected: ChannelState = { kind: 'disconnected', failures: 2 };
  const shuttingDown: ChannelState = { kind: 'shutting-down' };

  it('should start connecting from idle', () => {
    expect(nextState(idle, { type: 'start' })).toEqual({ kind: 'connecting', failures: 0 });
  });

  it('should move to connected on open, dropping the failure count', () => {
    expect(nextState(connecting, { type: 'opened' })).toEqual({ kind: 'connected' });
  });

  it('should count a failed attempt when a connect closes', () => {
    expect(nextState(connecting, { type: 'closed' })).toEqual({ kind: 'disconnected', failures: 3 });
  });

  it('should count a dropped connection as the first failure', () => {
    expect(nextState(connected, { type: 'closed' })).toEqual({ kind: 'disconnected', failures: 1 });
  });

  it('should retry from disconnected keeping the failure count', () => {
    expect(nextState(disconnected, { type: 'retry' })).toEqual({ kind: 'connecting', failures: 2 });
  });

  it('should enter shutting-down from every state', () => {
    for (const state of [idle, connecting, connected, disconnected]) {
      expect(nextState(state, { type: 'shutdown' })).toEqual(shuttingDown);
    }
  });

  it('should never leave shutting-down', () => {
    for (const type of ['start', 'opened', 'closed', 'retry', 'shutdown'] as const) {
      expect(nextState(shuttingDown, { type })).toBe(shuttingDown);
    }
  });

  it('should ignore events that do not apply', () => {
    expect(nextState(idle, { type: 'opened' })).toBe(idle);
    expect(nextState(connected, { type: 'retry' })).toBe(connected);
    expect(nextState(disconnected, { type: 'opened' })).toBe(disconnected);
  });
});

// ----------------------------------------------------------------------------
// Channel against a ws server
// ----------------------------------------------------------------------------

describe('UpdateChannel', () => {
  let wss: WebSocketServer;
  let url: string;
  let connections: number;
  let channel: UpdateChannel | null;
  let updates: DeviceStatus[];

  async function startServer(options: { autoPong?: boolean } = {}): Promise<void> {
    wss = new WebSocketServer({ port: 0, host: '127.0.0.1', autoPong: options.autoPong ?? true });
    await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
    const address: AddressInfo | string = wss.address();
    if (typeof address === 'string') throw new Error('ws server has no TCP address');
    url = `ws://127.0.0.1:${address.port}/ws`;
    wss.on('connection', () => {
      connections++;
    });
  }

  function createChannel(pingIntervalMs = 25_000): UpdateChannel {
    channel = new UpdateChannel(url, (update) => updates.push(update), {
      startDelayMs: 0,
      pingIntervalMs,
      backoff: FAST_BACKOFF,
    });
    return channel;
  }

  beforeEach(() => {
    connections = 0;
    channel = null;
    updates = [];
    // Keep connection chatter out of the test output
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await channel?.stop();
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    vi.restoreAllMocks();
  });

  it('should connect after the start delay and report itself connected', async () => {
    await startServer();
    const ch = createChannel();
    expect(ch.state.kind).toBe('idle');

    ch.start();
    await waitFor(() => ch.isConnected);
    expect(ch.state).toEqual({ kind: 'connected' });
    expect(connections).toBe(1);
  });

  it('should hand each status frame to the update handler', async () => {
    await startServer();
    const ch = createChannel();
    ch.start();
    await waitFor(() => wss.clients.size === 1);

    for (const client of wss.clients) {
      client.send(JSON.stringify({ state: 'IncomingCall', call: { active: true, number: '5550100' } }));
    }

    await waitFor(() => updates.length === 1);
    expect(updates[0]).toEqual({ state: 'IncomingCall', call: { active: true, number: '5550100' } });
  });

  it('should deliver a frame whose known fields hold null or the wrong type', async () => {
    await startServer();
    const ch = createChannel();
    ch.start();
    await waitFor(() => wss.clients.size === 1);

    for (const client of wss.clients) {
      client.send(
        JSON.stringify({ state: 'IncomingCallRing', uptime: 'soon', call: { active: true, number: '5550123', id: null } }),
      );
    }

    await waitFor(() => updates.length === 1);
    expect(updates[0].state).toBe('IncomingCallRing');
    expect(updates[0].uptime).toBeUndefined();
    expect(updates[0].call).toEqual({ active: true, number: '5550123' });
  });

  it('should drop malformed frames and keep the connection', async () => {
    await startServer();
    const ch = createChannel();
    ch.start();
    await waitFor(() => wss.clients.size === 1);

    for (const client of wss.clients) {
      client.send('not json');
      client.send('[1,2,3]');
      client.send('"Idle"');
      client.send('null');
      client.send(JSON.stringify({ state: 'InCall' }));
    }

    await waitFor(() => updates.length === 1);
    await sleep(50);
    expect(updates).toEqual([{ state: 'InCall' }]);
    expect(ch.isConnected).toBe(true);
    expect(connections).toBe(1);
  });

  it('should reconnect after the server drops the connection', async () => {
    await startServer();
    const ch = createChannel();
    ch.start();
    await waitFor(() => ch.isConnected);

    for (const client of wss.clients) {
      client.terminate();
    }

    await waitFor(() => connections === 2 && ch.isConnected);
    expect(ch.state).toEqual({ kind: 'connected' });
  });

  it('should keep retrying while the server is unreachable', async () => {
    await startServer();
    const address: AddressInfo | string = wss.address();
    if (typeof address === 'string') throw new Error('ws server has no TCP address');
    await new Promise<void>((resolve) => wss.close(() => resolve()));

    const ch = createChannel();
    ch.start();
    await waitFor(() => {
      const state = ch.state;
      return state.kind !== 'idle' && 'failures' in state && state.failures >= 3;
    });
    expect(ch.isConnected).toBe(false);

    // Bring a server back on the same port; the channel finds it
    wss = new WebSocketServer({ port: address.port, host: '127.0.0.1' });
    wss.on('connection', () => {
      connections++;
    });
    await waitFor(() => ch.isConnected);
    expect(connections).toBe(1);
  });

  it('should drop a connection whose pings go unanswered', async () => {
    await startServer({ autoPong: false });
    const ch = createChannel(30);
    ch.start();

    await waitFor(() => connections >= 2);
  });

  it('should connect again at once on reconnect()', async () => {
    await startServer();
    const ch = createChannel();
    ch.start();
    await waitFor(() => ch.isConnected);

    ch.reconnect();
    expect(ch.state.kind).toBe('connecting');
    await waitFor(() => connections === 2 && ch.isConnected);
  });

  it('should ignore reconnect() before start()', async () => {
    await startServer();
    const ch = createChannel();
    ch.reconnect();
    await sleep(50);
    expect(ch.state.kind).toBe('idle');
    expect(connections).toBe(0);
  });

  it('should close the socket on stop() and never reconnect', async () => {
    await startServer();
    const ch = createChannel();
    ch.start();
    await waitFor(() => ch.isConnected);

    await ch.stop();
    expect(ch.state.kind).toBe('shutting-down');
    expect(ch.isConnected).toBe(false);

    await sleep(100);
    expect(connections).toBe(1);
    expect(wss.clients.size).toBe(0);
  });

  it('should not connect at all when stopped during the start delay', async () => {
    await startServer();
    channel = new UpdateChannel(url, (update) => updates.push(update), { startDelayMs: 50 });
    channel.start();
    await channel.stop();

    await sleep(100);
    expect(connections).toBe(0);
    expect(channel.state.kind).toBe('shutting-down');
  });

  it('should ignore start() after stop()', async () => {
    await startServer();
    const ch = createChannel();
    await ch.stop();
    ch.start();
    await sleep(50);
    expect(connections).toBe(0);
  });
});
