/**
 * Request/response reads of the node for the realtime snapshot.
 */

import {
  PeersResultSchema,
  ServerInfoResultSchema,
  createLogger,
  errorMessage,
  stateValue,
  summarizePeers,
  type JsonRpcClient,
  type Logger,
  type ServerInfo,
} from '@validator-watch/shared';
import { downState, type NodeMode, type PeerReading, type StateReading } from './snapshot.js';

export type NodeRpc = Pick<JsonRpcClient, 'request'>;

const DAY_MS = 24 * 60 * 60 * 1000;
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const EXPIRATION_PATTERN = /^(\d{4})-([A-Za-z]{3})-(\d{1,2}) (\d{2}):(\d{2}):(\d{2})/;

const defaultLogger = createLogger('state-poller');

/** `2026-Mar-11 15:55:38.000000000 UTC` to epoch ms; fractional seconds are ignored */
export function parseExpiration(expiration: string): number | null {
  const match = EXPIRATION_PATTERN.exec(expiration.trim());
  if (!match) return null;
  const [, year, mon, day, hh, mm, ss] = match;
  const month = MONTHS.indexOf(mon.toLowerCase());
  if (month < 0) return null;
  return Date.UTC(Number(year), month, Number(day), Number(hh), Number(mm), Number(ss));
}

/** Days until the validator list expires, one decimal, never negative */
export function unlExpiryDays(expiration: string | undefined, now: number): number {
  if (!expiration) return 0;
  const expiresAt = parseExpiration(expiration);
  if (expiresAt === null) return 0;
  return Math.max(0, Math.round(((expiresAt - now) / DAY_MS) * 10) / 10);
}

export function nodeMode(pubkeyValidator: string | undefined): NodeMode {
  if (!pubkeyValidator || pubkeyValidator.toLowerCase() === 'none') return 'stock_node';
  return 'validator';
}

export function stateReading(info: ServerInfo, now: number): StateReading {
  const name = info.server_state?.toLowerCase();
  if (!name || name === 'null') return downState(now);

  const ledger = info.validated_ledger;
  return {
    name,
    value: stateValue(name),
    buildVersion: info.build_version ?? '',
    pubkey: info.pubkey_validator ?? '',
    nodeMode: nodeMode(info.pubkey_validator),
    ledgerSequence: ledger?.seq ?? 0,
    ledgerAge: ledger?.age ?? 0,
    baseFeeXrp: ledger?.base_fee_xrp ?? 0,
    reserveBaseXrp: ledger?.reserve_base_xrp ?? 0,
    reserveIncXrp: ledger?.reserve_inc_xrp ?? 0,
    loadFactor: info.load_factor ?? 0,
    validationQuorum: info.validation_quorum ?? 0,
    proposers: info.last_close?.proposers ?? 0,
    unlExpiryDays: unlExpiryDays(info.validator_list?.expiration, now),
    amendmentBlocked: info.amendment_blocked === true,
    polledAt: now,
  };
}

/** Never throws: an unreachable node or an unexpected reply reads as `down`. */
export async function fetchState(rpc: NodeRpc, now: () => number, logger: Logger = defaultLogger): Promise<StateReading> {
  try {
    const { info } = await rpc.request('server_info', {}, ServerInfoResultSchema);
    return stateReading(info, now());
  } catch (err) {
    logger.debug(`server_info unavailable, reporting down: ${errorMessage(err)}`);
    return downState(now());
  }
}

/** Null on failure, so the previous peer reading stays in place. */
export async function fetchPeers(rpc: NodeRpc, now: () => number, logger: Logger = defaultLogger): Promise<PeerReading | null> {
  try {
    const { peers } = await rpc.request('peers', {}, PeersResultSchema);
    return { ...summarizePeers(peers ?? []), polledAt: now() };
  } catch (err) {
    logger.debug(`peers unavailable, keeping last reading: ${errorMessage(err)}`);
    return null;
  }
}
