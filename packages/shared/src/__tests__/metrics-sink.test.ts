import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MetricsSink, firstRangeValue, firstValue } from '../metrics-sink.js';
import { sample } from '../exposition.js';
import type { FetchFn } from '../http.js';

function requestUrl(input: Parameters<FetchFn>[0]): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.toString() : input.url;
}

describe('MetricsSink', () => {
  let calls: { url: string; init?: RequestInit }[];
  let statuses: number[];
  let fetchMock: FetchFn;

  beforeEach(() => {
    calls = [];
    statuses = [];
    fetchMock = vi.fn<FetchFn>(async (input, init) => {
      calls.push({ url: requestUrl(input), init });
      return new Response('', { status: statuses.shift() ?? 204 });
    });
  });

  it('batches writes until flushed, then posts the exposition text', async () => {
    const sink = new MetricsSink({ url: 'http://store:8428/', fetch: fetchMock });

    sink.write([sample('xrpl_ledger_sequence', 100, { instance: 'a' }, 1_700_000_000_000)]);
    sink.write([sample('up', 1)]);
    expect(calls).toHaveLength(0);
    expect(sink.getStats().pending).toBe(2);

    await sink.flush();

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('http://store:8428/api/v1/import/prometheus');
    expect(calls[0]?.init?.method).toBe('POST');
    expect(calls[0]?.init?.body).toBe('xrpl_ledger_sequence{instance="a"} 100 1700000000000\nup 1\n');
    expect(sink.getStats()).toEqual({ pending: 0, samplesWritten: 2, batchesDropped: 0 });
  });

  it('flushes on its own when the batch reaches the configured size', async () => {
    const sink = new MetricsSink({ url: 'http://store:8428', fetch: fetchMock, batchSize: 2 });

    sink.write([sample('a', 1)]);
    expect(calls).toHaveLength(0);
    sink.write([sample('b', 2)]);

    await vi.waitFor(() => expect(sink.getStats().samplesWritten).toBe(2));
    expect(calls).toHaveLength(1);
  });

  it('retries a failed write exactly once', async () => {
    statuses = [503, 204];
    const sink = new MetricsSink({ url: 'http://store:8428', fetch: fetchMock, retryDelayMs: 0 });

    sink.write([sample('a', 1)]);
    await sink.flush();

    expect(calls).toHaveLength(2);
    expect(sink.getStats()).toEqual({ pending: 0, samplesWritten: 1, batchesDropped: 0 });
  });

  it('drops the batch after the retry fails and keeps accepting writes', async () => {
    statuses = [500, 500];
    const sink = new MetricsSink({ url: 'http://store:8428', fetch: fetchMock, retryDelayMs: 0 });

    sink.write([sample('a', 1), sample('b', 2)]);
    await sink.flush();

    expect(calls).toHaveLength(2);
    expect(sink.getStats()).toEqual({ pending: 0, samplesWritten: 0, batchesDropped: 1 });

    sink.write([sample('c', 3)]);
    await sink.flush();
    expect(calls).toHaveLength(3);
    expect(calls[2]?.init?.body).toBe('c 3\n');
  });

  it('does not post an empty batch', async () => {
    const sink = new MetricsSink({ url: 'http://store:8428', fetch: fetchMock });
    await sink.flush();
    await sink.close();
    expect(calls).toHaveLength(0);
  });

  it('reads instant and range queries', async () => {
    const bodies = [
      { status: 'success', data: { resultType: 'vector', result: [{ metric: {}, value: [1_700_000_000, '42'] }] } },
      {
        status: 'success',
        data: {
          resultType: 'matrix',
          result: [{ metric: {}, values: [[1_699_999_700, '3600'], [1_699_999_760, '3660']] }],
        },
      },
    ];
    const jsonFetch = vi.fn<FetchFn>(async (input) => {
      calls.push({ url: requestUrl(input) });
      return Response.json(bodies.shift());
    });
    const sink = new MetricsSink({ url: 'http://store:8428', fetch: jsonFetch });

    const instant = await sink.query('max_over_time(xrpl_validations_total[24h])');
    const range = await sink.queryRange('xrpl_validator_uptime_seconds', 1_699_999_700, 1_700_000_000, 60);

    expect(firstValue(instant)).toBe(42);
    expect(firstRangeValue(range)).toBe(3600);
    expect(calls[0]?.url).toBe(
      'http://store:8428/api/v1/query?query=max_over_time%28xrpl_validations_total%5B24h%5D%29'
    );
    expect(calls[1]?.url).toBe(
      'http://store:8428/api/v1/query_range?query=xrpl_validator_uptime_seconds&start=1699999700&end=1700000000&step=60s'
    );
  });

  it('returns null for failed or empty queries', async () => {
    const sink = new MetricsSink({
      url: 'http://store:8428',
      fetch: vi.fn<FetchFn>(async () => Response.json({ status: 'error', error: 'bad query' }, { status: 400 })),
    });
    expect(await sink.query('up')).toBeNull();
    expect(firstValue(null)).toBeNull();
  });

  it('reports store health from the health endpoint', async () => {
    statuses = [200];
    const sink = new MetricsSink({ url: 'http://store:8428', fetch: fetchMock });
    expect(await sink.healthCheck()).toBe(true);
    expect(calls[0]?.url).toBe('http://store:8428/health');

    const down = new MetricsSink({
      url: 'http://store:8428',
      fetch: vi.fn<FetchFn>(async () => {
        throw new TypeError('fetch failed');
      }),
    });
    expect(await down.healthCheck()).toBe(false);
  });
});
