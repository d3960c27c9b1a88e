/**
 * Batching writer for the remote time-series store.
 *
 * Writes are best effort: a failed POST is retried once, then the batch is
 * dropped. Nothing is queued beyond the current batch.
 */

import { z } from 'zod';
import { formatSamples, type Sample } from './exposition.js';
import { StoreError, errorMessage } from './errors.js';
import { fetchWithTimeout, type FetchFn } from './http.js';
import { createLogger, type Logger } from './logger.js';
import { withRetry } from './retry.js';
import type { Sleep } from './sleep.js';

export interface MetricsWriter {
  write(samples: Sample[]): void;
}

const PointSchema = z.tuple([z.number(), z.string()]);

export const QueryResponseSchema = z.object({
  status: z.string(),
  data: z
    .object({
      resultType: z.string(),
      result: z.array(
        z.object({
          metric: z.record(z.string()),
          value: PointSchema.optional(),
          values: z.array(PointSchema).optional(),
        })
      ),
    })
    .optional(),
  error: z.string().optional(),
});

export type QueryResponse = z.infer<typeof QueryResponseSchema>;

export interface MetricsReader {
  query(promql: string): Promise<QueryResponse | null>;
  queryRange(promql: string, startSec: number, endSec: number, stepSec: number): Promise<QueryResponse | null>;
}

export interface MetricsSinkOptions {
  url: string;
  batchSize?: number;
  flushIntervalMs?: number;
  timeoutMs?: number;
  /** Pause before the single retry of a failed write */
  retryDelayMs?: number;
  fetch?: FetchFn;
  sleep?: Sleep;
  logger?: Logger;
}

/** First value of an instant-query vector, or null when absent or not numeric. */
export function firstValue(response: QueryResponse | null): number | null {
  const raw = response?.data?.result[0]?.value?.[1];
  if (raw === undefined) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/** Earliest point of the first range-query series. */
export function firstRangeValue(response: QueryResponse | null): number | null {
  const raw = response?.data?.result[0]?.values?.[0]?.[1];
  if (raw === undefined) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export class MetricsSink implements MetricsWriter, MetricsReader {
  private readonly url: string;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep?: Sleep;
  private readonly logger: Logger;

  private batch: Sample[] = [];
  private intervalId: NodeJS.Timeout | null = null;
  private samplesWritten = 0;
  private batchesDropped = 0;

  constructor(options: MetricsSinkOptions) {
    this.url = options.url.replace(/\/+$/, '');
    this.batchSize = options.batchSize ?? 100;
    this.flushIntervalMs = options.flushIntervalMs ?? 5000;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep;
    this.logger = options.logger ?? createLogger('metrics-sink');
  }

  write(samples: Sample[]): void {
    if (samples.length === 0) return;
    this.batch.push(...samples);
    if (this.batch.length >= this.batchSize) {
      this.flush().catch((err) => this.logger.error(`Flush failed: ${errorMessage(err)}`));
    }
  }

  /**
   * Send the current batch. Resolves once the batch is stored or dropped.
   */
  async flush(): Promise<void> {
    if (this.batch.length === 0) return;
    const batch = this.batch;
    this.batch = [];
    const body = `${formatSamples(batch)}\n`;

    try {
      await withRetry(() => this.post(body), { attempts: 2, baseDelayMs: this.retryDelayMs, maxDelayMs: this.retryDelayMs }, {
        sleep: this.sleep,
        onRetry: (_attempt, err) => this.logger.warn(`Metrics write failed, retrying once: ${errorMessage(err)}`),
      });
      this.samplesWritten += batch.length;
    } catch (err) {
      this.batchesDropped++;
      this.logger.error(`Dropped batch of ${batch.length} samples: ${errorMessage(err)}`);
    }
  }

  start(): void {
    if (this.intervalId) return;
    this.intervalId = setInterval(() => {
      this.flush().catch((err) => this.logger.error(`Periodic flush failed: ${errorMessage(err)}`));
    }, this.flushIntervalMs);
  }

  /** Stop the flush timer and send whatever is still batched. */
  async close(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    await this.flush();
  }

  async query(promql: string): Promise<QueryResponse | null> {
    const params = new URLSearchParams({ query: promql });
    return this.get(`/api/v1/query?${params.toString()}`, promql);
  }

  async queryRange(promql: string, startSec: number, endSec: number, stepSec: number): Promise<QueryResponse | null> {
    const params = new URLSearchParams({
      query: promql,
      start: String(startSec),
      end: String(endSec),
      step: `${stepSec}s`,
    });
    return this.get(`/api/v1/query_range?${params.toString()}`, promql);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetchWithTimeout(this.fetchFn, `${this.url}/health`, { method: 'GET' }, this.timeoutMs);
      return res.ok;
    } catch (err) {
      this.logger.debug(`Store health check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  getStats() {
    return {
      pending: this.batch.length,
      samplesWritten: this.samplesWritten,
      batchesDropped: this.batchesDropped,
    };
  }

  private async post(body: string): Promise<void> {
    const res = await fetchWithTimeout(
      this.fetchFn,
      `${this.url}/api/v1/import/prometheus`,
      { method: 'POST', headers: { 'Content-Type': 'text/plain' }, body },
      this.timeoutMs
    );
    if (!res.ok) {
      throw new StoreError(`HTTP ${res.status}`, res.status);
    }
  }

  private async get(path: string, promql: string): Promise<QueryResponse | null> {
    try {
      const res = await fetchWithTimeout(this.fetchFn, `${this.url}${path}`, { method: 'GET' }, this.timeoutMs);
      if (!res.ok) throw new StoreError(`HTTP ${res.status}`, res.status);

      const parsed = QueryResponseSchema.safeParse(await res.json());
      if (!parsed.success) throw new StoreError('Unexpected query response shape');
      if (parsed.data.status !== 'success') throw new StoreError(parsed.data.error ?? 'Query failed');
      return parsed.data;
    } catch (err) {
      this.logger.warn(`Query "${promql}" failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
