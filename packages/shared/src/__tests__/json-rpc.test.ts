import { describe, it, expect, vi } from 'vitest';
import { JsonRpcClient } from '../json-rpc.js';
import { UpstreamError } from '../errors.js';
import { PeersResultSchema, ServerInfoResultSchema, stateValue, summarizePeers } from '../rippled.js';
import type { FetchFn } from '../http.js';

describe('JsonRpcClient', () => {
  it('posts the method with a single params object and validates the result', async () => {
    const bodies: unknown[] = [];
    const fetchMock = vi.fn<FetchFn>(async (_input, init) => {
      bodies.push(typeof init?.body === 'string' ? JSON.parse(init.body) : null);
      return Response.json({
        result: {
          status: 'success',
          info: { server_state: 'proposing', peers: 21, server_state_duration_us: '1500000' },
        },
      });
    });
    const client = new JsonRpcClient({ url: 'http://node:5005', fetch: fetchMock });

    const result = await client.request('server_info', {}, ServerInfoResultSchema);

    expect(bodies).toEqual([{ method: 'server_info', params: [{}] }]);
    expect(result.info.server_state).toBe('proposing');
    expect(result.info.peers).toBe(21);
    expect(result.info.server_state_duration_us).toBe(1_500_000);
  });

  it('retries once and then surfaces an UpstreamError', async () => {
    const waits: number[] = [];
    const fetchMock = vi.fn<FetchFn>(async () =>
      Response.json({ result: { status: 'error', error: 'noNetwork', error_message: 'Not synced to the network.' } })
    );
    const client = new JsonRpcClient({
      url: 'http://node:5005',
      fetch: fetchMock,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    const failure = client.request('server_info', {}, ServerInfoResultSchema);
    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toThrow('server_info failed: Not synced to the network.');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(waits).toEqual([200]);
  });

  it('reports non-2xx responses with their status code', async () => {
    const client = new JsonRpcClient({
      url: 'http://node:5005',
      fetch: vi.fn<FetchFn>(async () => new Response('busy', { status: 503 })),
      retry: { attempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
    });

    let caught: unknown;
    try {
      await client.request('peers', {}, PeersResultSchema);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UpstreamError);
    if (caught instanceof UpstreamError) {
      expect(caught.statusCode).toBe(503);
      expect(caught.method).toBe('peers');
    }
  });

  it('wraps a body that is not JSON as an UpstreamError', async () => {
    const client = new JsonRpcClient({
      url: 'http://node:5005',
      fetch: vi.fn<FetchFn>(async () => new Response('<html>502 Bad Gateway</html>', { status: 200 })),
      retry: { attempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
    });

    let caught: unknown;
    try {
      await client.request('server_info', {}, ServerInfoResultSchema);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UpstreamError);
    if (caught instanceof UpstreamError) {
      expect(caught.message).toBe('invalid JSON from server_info');
      expect(caught.statusCode).toBe(200);
      expect(caught.cause).toBeInstanceOf(SyntaxError);
    }
  });
});

describe('summarizePeers', () => {
  it('counts direction and sanity and picks the 90th percentile latency', () => {
    const peers = [
      { inbound: true, latency: 50, sanity: 'sane' },
      { latency: 10 },
      { inbound: true, latency: 40, sanity: 'insane' },
      { latency: 30, sanity: 'unknown' },
      { latency: 20 },
    ];
    // sorted latencies [10,20,30,40,50], index floor(5 * 0.9) = 4
    expect(summarizePeers(peers)).toEqual({ count: 5, inbound: 2, outbound: 3, insane: 2, latencyP90: 50 });
  });

  it('returns zeros for an empty peer list', () => {
    expect(summarizePeers([])).toEqual({ count: 0, inbound: 0, outbound: 0, insane: 0, latencyP90: 0 });
  });
});

describe('stateValue', () => {
  it('maps known states and falls back to down', () => {
    expect(stateValue('proposing')).toBe(7);
    expect(stateValue('full')).toBe(5);
    expect(stateValue('bogus')).toBe(0);
    expect(stateValue(undefined)).toBe(0);
  });
});
