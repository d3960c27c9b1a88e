import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UpstreamClient } from '../rpc-client.js';
import type { FetchFn } from '@validator-watch/shared';
import { FakeSocket } from './helpers.js';

describe('UpstreamClient', () => {
  let sockets: FakeSocket[];
  let client: UpstreamClient;

  function latest(): FakeSocket {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('no socket opened');
    return socket;
  }

  async function open(): Promise<FakeSocket> {
    const connecting = client.connect();
    latest().emit('open');
    expect(await connecting).toBe(true);
    return latest();
  }

  beforeEach(() => {
    sockets = [];
    client = new UpstreamClient({
      wsUrl: 'ws://node:6006',
      httpUrl: 'http://node:5005',
      socketFactory: () => {
        const socket = new FakeSocket();
        sockets.push(socket);
        return socket;
      },
    });
  });

  describe('connect', () => {
    it('resolves true once the socket opens', async () => {
      await open();
      expect(client.isOpen).toBe(true);
    });

    it('resolves false when the socket errors instead of opening', async () => {
      const connecting = client.connect();
      latest().emit('error', new Error('ECONNREFUSED'));
      latest().emit('close', 1006);
      expect(await connecting).toBe(false);
      expect(client.isOpen).toBe(false);
    });

    it('ignores a socket that opens after the connect timeout', async () => {
      vi.useFakeTimers();
      try {
        const connecting = client.connect();
        await vi.advanceTimersByTimeAsync(10_000);
        expect(await connecting).toBe(false);

        latest().emit('open');
        expect(client.isOpen).toBe(false);
        expect(latest().terminated).toBe(true);
      } finally {
        vi.useRealTimers();
      }
    });

    it('resolves false when the socket factory throws', async () => {
      const broken = new UpstreamClient({
        wsUrl: 'ws://node:6006',
        httpUrl: 'http://node:5005',
        socketFactory: () => {
          throw new Error('bad url');
        },
      });
      expect(await broken.connect()).toBe(false);
    });

    it('replaces a previous connection', async () => {
      const first = await open();
      await open();
      expect(first.terminated).toBe(true);
      expect(sockets).toHaveLength(2);
    });
  });

  describe('commands', () => {
    it('subscribes and resolves on a successful response', async () => {
      const socket = await open();
      const subscribing = client.subscribe(['ledger', 'server', 'validations']);

      expect(socket.sent[0]).toEqual({ id: 1, command: 'subscribe', streams: ['ledger', 'server', 'validations'] });
      socket.deliver({ id: 1, status: 'success', type: 'response', result: {} });

      expect(await subscribing).toBe(true);
      expect(client.streams).toEqual(['ledger', 'server', 'validations']);
    });

    it('reports a refused subscription as false', async () => {
      const socket = await open();
      const subscribing = client.subscribe(['bogus']);
      socket.deliver({ id: socket.lastId(), status: 'error', type: 'response', error: 'malformedStream' });
      expect(await subscribing).toBe(false);
    });

    it('answers a ping and fails pending pings when the socket closes', async () => {
      const socket = await open();

      const first = client.ping(5000);
      socket.deliver({ id: socket.lastId(), status: 'success', type: 'response', result: {} });
      expect(await first).toBe(true);

      const second = client.ping(5000);
      socket.terminate();
      expect(await second).toBe(false);
    });

    it('fails a ping that gets no answer in time', async () => {
      vi.useFakeTimers();
      try {
        await open();
        const pinging = client.ping(10_000);
        await vi.advanceTimersByTimeAsync(10_000);
        expect(await pinging).toBe(false);
      } finally {
        vi.useRealTimers();
      }
    });

    it('fails a ping without a connection', async () => {
      expect(await client.ping(1000)).toBe(false);
    });
  });

  describe('messages', () => {
    it('yields stream messages in order, skips responses and ends on close', async () => {
      const socket = await open();
      socket.deliver({ type: 'ledgerClosed', ledger_index: 1 });
      socket.deliver({ id: 99, type: 'response', status: 'success', result: {} });
      socket.emit('message', Buffer.from('not json'));
      socket.deliver({ type: 'serverStatus', server_status: 'full' });
      socket.terminate();

      const received: unknown[] = [];
      for await (const message of client.messages()) received.push(message);

      expect(received).toEqual([
        { type: 'ledgerClosed', ledger_index: 1 },
        { type: 'serverStatus', server_status: 'full' },
      ]);
    });

    it('delivers messages that arrive while the consumer waits', async () => {
      const socket = await open();
      const iterator = client.messages()[Symbol.asyncIterator]();

      const next = iterator.next();
      socket.deliver({ type: 'validationReceived', ledger_index: '5' });
      expect(await next).toEqual({ value: { type: 'validationReceived', ledger_index: '5' }, done: false });

      const end = iterator.next();
      client.close();
      expect(await end).toEqual({ value: undefined, done: true });
    });
  });

  describe('HTTP requests', () => {
    it('fetches server_info through JSON-RPC', async () => {
      const fetchMock = vi.fn<FetchFn>(async () =>
        Response.json({ result: { status: 'success', info: { pubkey_validator: 'nHtestkey', uptime: 120 } } })
      );
      const http = new UpstreamClient({ wsUrl: 'ws://node:6006', httpUrl: 'http://node:5005', fetch: fetchMock });

      const info = await http.serverInfo();
      expect(info.pubkey_validator).toBe('nHtestkey');
      expect(info.uptime).toBe(120);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://node:5005');
    });

    it('returns an empty peer list when the node reports none', async () => {
      const http = new UpstreamClient({
        wsUrl: 'ws://node:6006',
        httpUrl: 'http://node:5005',
        fetch: vi.fn<FetchFn>(async () => Response.json({ result: { status: 'success', peers: null } })),
      });
      expect(await http.peers()).toEqual([]);
    });
  });
});
