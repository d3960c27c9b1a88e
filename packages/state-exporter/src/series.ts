/**
 * The exporter's series: Prometheus text for scrapes, and a minimal
 * instant-query API for dashboards that read the exporter directly.
 */

import { STATE_NAMES, errorMessage, formatSample, formatValue, type Labels } from '@validator-watch/shared';
import { NODE_MODES, type RealtimeStateSnapshot } from './snapshot.js';

export interface Series {
  name: string;
  help: string;
  labels: Labels;
  value: number;
  /** Epoch ms of the poll behind the value */
  timestamp: number;
}

export interface VectorEntry {
  metric: Labels;
  value: [number, string];
}

export type QueryResponse =
  | { status: 'success'; data: { resultType: 'vector'; result: VectorEntry[] } }
  | { status: 'error'; errorType: 'bad_data'; error: string };

export function collectSeries(snapshot: RealtimeStateSnapshot, instance: string): Series[] {
  const { state, peers } = snapshot;
  const series: Series[] = [];
  const add = (name: string, help: string, value: number, extra: Labels = {}, timestamp = state.polledAt): void => {
    series.push({ name, help, labels: { instance, ...extra }, value, timestamp });
  };

  add('xrpl_state_realtime_value', 'Validator state as a number (0=down ... 7=proposing)', state.value);
  for (const name of STATE_NAMES) {
    add('xrpl_state_realtime', 'Validator state (1=current state, 0=other states)', name === state.name ? 1 : 0, {
      state: name,
    });
  }
  for (const mode of NODE_MODES) {
    add('xrpl_node_mode_realtime', 'Node mode (1=current mode)', mode === state.nodeMode ? 1 : 0, { mode });
  }
  if (state.buildVersion) {
    add('xrpl_build_version_realtime', 'Node build version (1=current)', 1, { version: state.buildVersion });
  }
  if (state.pubkey) {
    add('xrpl_pubkey_realtime', 'Validator public key (1=current)', 1, { pubkey: state.pubkey });
  }

  add('xrpl_ledger_sequence_realtime', 'Validated ledger sequence', state.ledgerSequence);
  add('xrpl_ledger_age_realtime', 'Validated ledger age in seconds', state.ledgerAge);
  add('xrpl_base_fee_xrp_realtime', 'Base transaction fee in XRP', state.baseFeeXrp);
  add('xrpl_reserve_base_xrp_realtime', 'Base reserve in XRP', state.reserveBaseXrp);
  add('xrpl_reserve_inc_xrp_realtime', 'Owner reserve increment in XRP', state.reserveIncXrp);
  add('xrpl_load_factor_realtime', 'Server load factor', state.loadFactor);
  add('xrpl_validation_quorum_realtime', 'Validation quorum', state.validationQuorum);
  add('xrpl_proposers_realtime', 'Proposers in the last consensus round', state.proposers);
  add('xrpl_unl_expiry_days_realtime', 'Days until the validator list expires', state.unlExpiryDays);
  add('xrpl_amendment_blocked_realtime', 'Amendment blocked (1=blocked, 0=ok)', state.amendmentBlocked ? 1 : 0);

  add('xrpl_peer_count_realtime', 'Total peer count', peers.count, {}, peers.polledAt);
  add('xrpl_peers_inbound_realtime', 'Inbound peer count', peers.inbound, {}, peers.polledAt);
  add('xrpl_peers_outbound_realtime', 'Outbound peer count', peers.outbound, {}, peers.polledAt);
  add('xrpl_peers_insane_realtime', 'Peers not reporting sane', peers.insane, {}, peers.polledAt);
  add('xrpl_peer_latency_p90_realtime', 'P90 peer latency in milliseconds', peers.latencyP90, {}, peers.polledAt);

  return series;
}

/** Text exposition; scrapers stamp their own time, so lines carry none. */
export function renderExposition(series: Series[]): string {
  const lines: string[] = [];
  let current: string | null = null;
  for (const s of series) {
    if (s.name !== current) {
      lines.push(`# HELP ${s.name} ${s.help}`, `# TYPE ${s.name} gauge`);
      current = s.name;
    }
    lines.push(formatSample({ name: s.name, value: s.value, labels: s.labels }));
  }
  return `${lines.join('\n')}\n`;
}

type Matcher = { label: string; op: '=' | '!=' | '=~'; value: string };

const IDENTIFIER = /[a-zA-Z_:][a-zA-Z0-9_:]*/g;
const MATCHER = /([a-zA-Z_][a-zA-Z0-9_]*)\s*(=~|!=|=)\s*"([^"]*)"/g;

function selectorMatchers(query: string, name: string): Matcher[] {
  const selector = new RegExp(`${name}\\s*\\{([^}]*)\\}`).exec(query);
  if (!selector) return [];
  const matchers: Matcher[] = [];
  for (const [, label, op, value] of selector[1].matchAll(MATCHER)) {
    if (op === '=' || op === '!=' || op === '=~') matchers.push({ label, op, value });
  }
  return matchers;
}

function matches(labels: Labels, matcher: Matcher): boolean {
  const actual = labels[matcher.label] ?? '';
  switch (matcher.op) {
    case '=':
      return actual === matcher.value;
    case '!=':
      return actual !== matcher.value;
    case '=~':
      return new RegExp(`^(?:${matcher.value})$`).test(actual);
  }
}

/**
 * Answers a query naming one of the exporter's series, optionally narrowed
 * by label matchers. Anything else yields an empty vector.
 */
export function instantQuery(series: Series[], query: string): QueryResponse {
  const known = new Set(series.map((s) => s.name));
  const name = query.match(IDENTIFIER)?.find((token) => known.has(token));
  if (!name) return { status: 'success', data: { resultType: 'vector', result: [] } };

  const matchers = selectorMatchers(query, name);
  let selected: Series[];
  try {
    selected = series.filter((s) => s.name === name && matchers.every((m) => matches(s.labels, m)));
  } catch (err) {
    return { status: 'error', errorType: 'bad_data', error: errorMessage(err) };
  }

  return {
    status: 'success',
    data: {
      resultType: 'vector',
      result: selected.map((s) => ({
        metric: { __name__: s.name, ...s.labels },
        value: [s.timestamp / 1000, formatValue(s.value)],
      })),
    },
  };
}
