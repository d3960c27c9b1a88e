import { describe, it, expect, vi } from 'vitest';
import { loadCollectorConfig, type FetchFn } from '@validator-watch/shared';
import { Collector } from '../collector.js';

const BASE_ENV = {
  RIPPLED_WS_URL: 'ws://node:6006',
  RIPPLED_HTTP_URL: 'http://node:5005',
  VICTORIA_METRICS_URL: 'http://store:8428',
};

function nodeFetch(info: Record<string, unknown>) {
  return vi.fn<FetchFn>(async (input) => {
    if (input === BASE_ENV.RIPPLED_HTTP_URL) {
      return Response.json({ result: { status: 'success', info } });
    }
    return new Response(null, { status: 204 });
  });
}

function collectorWith(env: Record<string, string>, info: Record<string, unknown>) {
  return new Collector(loadCollectorConfig({ ...BASE_ENV, ...env }), {
    fetch: nodeFetch(info),
    now: () => 1_700_000_000_000,
  });
}

describe('Collector', () => {
  it('registers one poll loop per cadence', () => {
    const collector = collectorWith({}, {});
    expect(Object.keys(collector.scheduler.stats())).toEqual([
      'server_info',
      'peers',
      'server_state',
      'connection_health',
      'reconcile',
      'cleanup',
    ]);
  });

  it('adopts the validator key reported by the server_info poll', async () => {
    const collector = collectorWith({}, { pubkey_validator: 'n9test', peers: 5, uptime: 125 });
    expect(collector.validatorKey).toBeNull();

    expect(await collector.scheduler.runTick('server_info')).toBe(true);

    expect(collector.validatorKey).toBe('n9test');
    // peer count, uptime gauge, uptime info
    expect(collector.sink.getStats().pending).toBe(3);
  });

  it('ignores a placeholder key and keeps a configured one', async () => {
    const unset = collectorWith({}, { pubkey_validator: 'none' });
    await unset.scheduler.runTick('server_info');
    expect(unset.validatorKey).toBeNull();

    const configured = collectorWith({ VALIDATOR_PUBLIC_KEY: 'n9configured' }, { pubkey_validator: 'n9other' });
    await configured.scheduler.runTick('server_info');
    expect(configured.validatorKey).toBe('n9configured');
  });

  it('makes one HTTP request per poll attempt', async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response('busy', { status: 503 }));
    const collector = new Collector(loadCollectorConfig(BASE_ENV), {
      fetch,
      sleep: async () => undefined,
      now: () => 1_700_000_000_000,
    });

    expect(await collector.scheduler.runTick('server_info')).toBe(false);

    // three scheduler attempts, no retries inside the JSON-RPC client
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('publishes reconciliation samples from the reconcile loop', async () => {
    const collector = collectorWith({}, {});
    expect(collector.sink.getStats().pending).toBe(0);

    await collector.scheduler.runTick('reconcile');

    // 1h and 24h windows plus four totals; no percentages before any outcome
    expect(collector.sink.getStats().pending).toBe(8);
  });
});
