/**
 * Client for the validator node: one long-lived WebSocket for streams and
 * liveness pings, plus JSON-RPC over HTTP for request/response calls.
 *
 * Connection problems surface as `false` from `connect`/`subscribe`/`ping`;
 * nothing on the stream side throws past this class.
 */

import { WebSocket, type RawData } from 'ws';
import {
  JsonRpcClient,
  PeersResultSchema,
  ServerInfoResultSchema,
  ServerStateResultSchema,
  UpstreamError,
  createLogger,
  errorMessage,
  type FetchFn,
  type Logger,
  type ResultSchema,
  type RetryPolicy,
  type Sleep,
} from '@validator-watch/shared';

/** The subset of a `ws` WebSocket this client uses */
export interface StreamSocket {
  send(data: string): void;
  terminate(): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SocketFactory = (url: string) => StreamSocket;

export interface UpstreamClientOptions {
  wsUrl: string;
  httpUrl: string;
  socketFactory?: SocketFactory;
  fetch?: FetchFn;
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
  httpRetry?: RetryPolicy;
  sleep?: Sleep;
  logger?: Logger;
}

interface PendingCommand {
  command: string;
  resolve: (result: unknown) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

function decode(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class UpstreamClient {
  private readonly wsUrl: string;
  private readonly socketFactory: SocketFactory;
  private readonly connectTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly rpc: JsonRpcClient;
  private readonly logger: Logger;

  private socket: StreamSocket | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, PendingCommand>();
  private queue: unknown[] = [];
  private waiters: (() => void)[] = [];
  private subscribed: string[] = [];

  constructor(options: UpstreamClientOptions) {
    this.wsUrl = options.wsUrl;
    this.socketFactory = options.socketFactory ?? ((url) => new WebSocket(url));
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.logger = options.logger ?? createLogger('rpc-client');
    this.rpc = new JsonRpcClient({
      url: options.httpUrl,
      timeoutMs: this.requestTimeoutMs,
      retry: options.httpRetry,
      fetch: options.fetch,
      sleep: options.sleep,
      logger: this.logger,
    });
  }

  get isOpen(): boolean {
    return this.socket !== null;
  }

  get streams(): readonly string[] {
    return this.subscribed;
  }

  /**
   * Open a fresh stream connection, dropping any previous one.
   */
  connect(): Promise<boolean> {
    this.close();
    this.queue = [];

    return new Promise<boolean>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      const settle = (ok: boolean): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(ok);
      };

      let socket: StreamSocket;
      try {
        socket = this.socketFactory(this.wsUrl);
      } catch (err) {
        this.logger.error(`Could not open ${this.wsUrl}: ${errorMessage(err)}`);
        settle(false);
        return;
      }

      timer = setTimeout(() => {
        this.logger.warn(`Connection to ${this.wsUrl} timed out after ${this.connectTimeoutMs}ms`);
        socket.terminate();
        settle(false);
      }, this.connectTimeoutMs);

      socket.on('open', () => {
        if (settled) return;
        this.socket = socket;
        this.logger.info(`✅ Connected to ${this.wsUrl}`);
        settle(true);
      });
      socket.on('message', (data) => this.onMessage(socket, data));
      socket.on('error', (err) => {
        this.logger.warn(`Stream socket error: ${err.message}`);
        settle(false);
      });
      socket.on('close', (code) => {
        this.onClose(socket, code);
        settle(false);
      });
    });
  }

  async subscribe(streams: readonly string[]): Promise<boolean> {
    try {
      await this.command('subscribe', { streams: [...streams] });
      this.subscribed = [...streams];
      this.logger.info(`Subscribed to ${streams.join(', ')}`);
      return true;
    } catch (err) {
      this.logger.error(`Subscribe failed: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Single round trip over the stream socket, matched by request id.
   */
  command(command: string, params: Record<string, unknown> = {}, timeoutMs = this.requestTimeoutMs): Promise<unknown> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new UpstreamError('Stream is not connected', command));
    }

    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new UpstreamError(`${command} timed out after ${timeoutMs}ms`, command));
      }, timeoutMs);
      this.pending.set(id, { command, resolve, reject, timer });

      try {
        socket.send(JSON.stringify({ id, command, ...params }));
      } catch (err) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(new UpstreamError(`${command} could not be sent: ${errorMessage(err)}`, command));
      }
    });
  }

  /** Liveness ping. False on timeout, error or a closed socket. */
  async ping(timeoutMs: number): Promise<boolean> {
    try {
      await this.command('ping', {}, timeoutMs);
      return true;
    } catch (err) {
      this.logger.debug(`Ping failed: ${errorMessage(err)}`);
      return false;
    }
  }

  request<T>(method: string, params: Record<string, unknown>, schema: ResultSchema<T>): Promise<T> {
    return this.rpc.request(method, params, schema);
  }

  async serverInfo() {
    return (await this.request('server_info', {}, ServerInfoResultSchema)).info;
  }

  async peers() {
    return (await this.request('peers', {}, PeersResultSchema)).peers ?? [];
  }

  async serverState() {
    return (await this.request('server_state', {}, ServerStateResultSchema)).state;
  }

  /**
   * Inbound stream messages in delivery order. Completes when the socket
   * closes, including a forced close.
   */
  async *messages(): AsyncGenerator<unknown, void, undefined> {
    while (true) {
      if (this.queue.length > 0) {
        yield this.queue.shift();
        continue;
      }
      if (!this.socket) return;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  /** Tear down the stream socket immediately. */
  close(): void {
    const socket = this.socket;
    if (!socket) return;
    this.onClose(socket, 1000);
    socket.terminate();
  }

  private onMessage(socket: StreamSocket, data: RawData): void {
    if (socket !== this.socket) return;

    let msg: unknown;
    try {
      msg = JSON.parse(decode(data));
    } catch (err) {
      this.logger.warn(`Dropping unparseable stream message: ${errorMessage(err)}`);
      return;
    }

    if (isRecord(msg) && typeof msg.id === 'number' && this.pending.has(msg.id)) {
      this.settleCommand(msg.id, msg);
      return;
    }
    if (isRecord(msg) && msg.type === 'response') return;

    this.queue.push(msg);
    this.wake();
  }

  private settleCommand(id: number, msg: Record<string, unknown>): void {
    const pending = this.pending.get(id);
    if (!pending) return;
    this.pending.delete(id);
    clearTimeout(pending.timer);

    if (msg.status === 'success') {
      pending.resolve(msg.result);
      return;
    }
    const reason =
      typeof msg.error_message === 'string' ? msg.error_message : typeof msg.error === 'string' ? msg.error : 'error';
    pending.reject(new UpstreamError(`${pending.command} failed: ${reason}`, pending.command, undefined, msg));
  }

  private onClose(socket: StreamSocket, code: number): void {
    if (socket !== this.socket) return;
    this.socket = null;
    this.logger.warn(`Stream connection closed (code ${code})`);

    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(new UpstreamError(`${pending.command} aborted: connection closed`, pending.command));
      this.pending.delete(id);
    }
    this.wake();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
