/**
 * JSON-RPC over HTTP against the validator node: POST `{ method, params: [{...}] }`,
 * answered with `{ result: { status: "success", ... } }`.
 */

import { z } from 'zod';
import { UpstreamError, errorMessage } from './errors.js';
import { fetchWithTimeout, type FetchFn } from './http.js';
import { createLogger, type Logger } from './logger.js';
import { withRetry, type RetryPolicy } from './retry.js';
import type { Sleep } from './sleep.js';

/** Two attempts, 200ms apart */
export const DEFAULT_RPC_RETRY: RetryPolicy = { attempts: 2, baseDelayMs: 200, maxDelayMs: 200 };

const EnvelopeSchema = z.object({
  result: z
    .object({
      status: z.string().optional(),
      error: z.string().optional(),
      error_message: z.string().optional(),
    })
    .passthrough(),
});

export type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface JsonRpcClientOptions {
  url: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  fetch?: FetchFn;
  sleep?: Sleep;
  logger?: Logger;
}

export class JsonRpcClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchFn: FetchFn;
  private readonly sleep?: Sleep;
  private readonly logger: Logger;

  constructor(options: JsonRpcClientOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.retry = options.retry ?? DEFAULT_RPC_RETRY;
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep;
    this.logger = options.logger ?? createLogger('json-rpc');
  }

  /**
   * One request/response call, retried per the client's policy. The result
   * object is validated against `schema`; anything else is an UpstreamError.
   */
  async request<T>(method: string, params: Record<string, unknown>, schema: ResultSchema<T>): Promise<T> {
    return withRetry(() => this.once(method, params, schema), this.retry, {
      sleep: this.sleep,
      onRetry: (attempt, err) => this.logger.debug(`${method} attempt ${attempt} failed: ${errorMessage(err)}`),
    });
  }

  private async once<T>(method: string, params: Record<string, unknown>, schema: ResultSchema<T>): Promise<T> {
    let res: Response;
    try {
      res = await fetchWithTimeout(
        this.fetchFn,
        this.url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ method, params: [params] }),
        },
        this.timeoutMs
      );
    } catch (err) {
      throw new UpstreamError(`${method} request failed: ${errorMessage(err)}`, method);
    }

    if (!res.ok) {
      throw new UpstreamError(`${method} returned HTTP ${res.status}`, method, res.status);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new UpstreamError(`invalid JSON from ${method}`, method, res.status, undefined, { cause: err });
    }
    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new UpstreamError(`${method} returned an unexpected payload`, method, res.status, body);
    }

    const { result } = envelope.data;
    if (result.status !== 'success') {
      const reason = result.error_message ?? result.error ?? 'unknown error';
      throw new UpstreamError(`${method} failed: ${reason}`, method, res.status, body);
    }

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new UpstreamError(`${method} result did not match: ${parsed.error.issues[0]?.message ?? 'invalid'}`, method, res.status, body);
    }
    return parsed.data;
  }
}
