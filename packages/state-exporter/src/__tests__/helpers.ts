import type { ResultSchema } from '@validator-watch/shared';
import type { NodeRpc } from '../poller.js';

/**
 * In-process node: answers each method with a canned result, validated by
 * the caller's schema the way the real client does. Missing methods fail.
 */
export class FakeNode implements NodeRpc {
  calls: string[] = [];

  constructor(public results: Record<string, unknown>) {}

  async request<T>(method: string, _params: Record<string, unknown>, schema: ResultSchema<T>): Promise<T> {
    this.calls.push(method);
    if (!(method in this.results)) throw new Error(`${method} request failed: connection refused`);
    return schema.parse(this.results[method]);
  }
}

export const NOW = Date.UTC(2026, 2, 1, 0, 0, 0);

export const PROPOSING_INFO = {
  info: {
    server_state: 'proposing',
    build_version: '2.3.0',
    pubkey_validator: 'n9test',
    load_factor: 1,
    validation_quorum: 28,
    amendment_blocked: false,
    last_close: { proposers: 35, converge_time_s: 2 },
    validated_ledger: { seq: 93000000, age: 2, base_fee_xrp: 0.00001, reserve_base_xrp: 1, reserve_inc_xrp: 0.2 },
    validator_list: { expiration: '2026-Mar-11 15:55:38.000000000 UTC', status: 'active' },
  },
};

export const PEERS = {
  peers: [
    { address: '10.0.0.1:51235', inbound: true, latency: 40, sanity: 'sane' },
    { address: '10.0.0.2:51235', latency: 120 },
    { address: '10.0.0.3:51235', latency: 80, sanity: 'insane' },
  ],
};
