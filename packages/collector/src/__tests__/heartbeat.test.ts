import { describe, it, expect, vi } from 'vitest';
import { HeartbeatMonitor } from '../heartbeat.js';
import { ConnectionHealth } from '../connection-health.js';
import { UpstreamClient } from '../rpc-client.js';
import { listen } from '../dispatcher.js';
import type { StreamHandlers } from '../events.js';
import { FakeSocket } from './helpers.js';

function connectedHealth(): ConnectionHealth {
  const health = new ConnectionHealth(() => 0);
  health.markConnected();
  return health;
}

describe('HeartbeatMonitor', () => {
  it('forces the connection down after three consecutive failed pings', async () => {
    const health = connectedHealth();
    const target = { ping: vi.fn(async () => false), close: vi.fn() };
    const monitor = new HeartbeatMonitor(target, health);

    expect(await monitor.tick()).toBe('healthy');
    expect(await monitor.tick()).toBe('healthy');
    expect(health.connected).toBe(true);
    expect(health.status()).toBe('degraded');
    expect(target.close).not.toHaveBeenCalled();

    expect(await monitor.tick()).toBe('unhealthy');
    expect(health.connected).toBe(false);
    expect(health.snapshot().disconnectReason).toBe('heartbeat timeout');
    expect(target.close).toHaveBeenCalledTimes(1);

    // no further pings once unhealthy
    await monitor.tick();
    expect(target.ping).toHaveBeenCalledTimes(3);
  });

  it('resets the failure count after one successful ping', async () => {
    const health = connectedHealth();
    const results = [false, false, true, false, false];
    const target = { ping: vi.fn(async () => results.shift() ?? true), close: vi.fn() };
    const monitor = new HeartbeatMonitor(target, health);

    for (let i = 0; i < 5; i++) await monitor.tick();

    expect(monitor.getStatus().failures).toBe(2);
    expect(monitor.getStatus().state).toBe('healthy');
    expect(health.connected).toBe(true);
    expect(target.close).not.toHaveBeenCalled();
  });

  it('treats a throwing ping as a failure', async () => {
    const health = connectedHealth();
    const target = {
      ping: vi.fn(async (): Promise<boolean> => {
        throw new Error('socket gone');
      }),
      close: vi.fn(),
    };
    const monitor = new HeartbeatMonitor(target, health, { threshold: 1 });

    expect(await monitor.tick()).toBe('unhealthy');
    expect(target.close).toHaveBeenCalledTimes(1);
  });

  it('pings on its interval once started', async () => {
    vi.useFakeTimers();
    try {
      const health = connectedHealth();
      const target = { ping: vi.fn(async () => true), close: vi.fn() };
      const monitor = new HeartbeatMonitor(target, health, { intervalMs: 30_000, timeoutMs: 10_000 });

      monitor.start();
      await vi.advanceTimersByTimeAsync(90_000);
      expect(target.ping).toHaveBeenCalledTimes(3);
      expect(target.ping).toHaveBeenCalledWith(10_000);

      monitor.stop();
      await vi.advanceTimersByTimeAsync(60_000);
      expect(target.ping).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
    }
  });

  it('unblocks a silent listen loop by closing the stream', async () => {
    const socket = new FakeSocket();
    const client = new UpstreamClient({
      wsUrl: 'ws://node:6006',
      httpUrl: 'http://node:5005',
      socketFactory: () => socket,
    });
    const connecting = client.connect();
    socket.emit('open');
    expect(await connecting).toBe(true);

    const health = connectedHealth();
    const handlers: StreamHandlers = {
      ledgerClosed: vi.fn(),
      serverStatus: vi.fn(),
      validationReceived: vi.fn(),
    };
    const listening = listen(client.messages(), health, handlers);

    const monitor = new HeartbeatMonitor({ ping: async () => false, close: () => client.close() }, health);
    await monitor.tick();
    await monitor.tick();
    await monitor.tick();

    expect(await listening).toBe('unhealthy');
    expect(socket.terminated).toBe(true);
  });
});
