/**
 * Response-to-sample conversion for the request/response polls.
 */

import {
  info,
  sample,
  stateValue,
  summarizePeers,
  type Peer,
  type Sample,
  type ServerInfo,
  type ServerState,
} from '@validator-watch/shared';

/** `1d:2h:3m`; hours appear once there is a day, days only when non-zero */
export function formatUptime(seconds: number): string {
  if (seconds < 0) return '0m';
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0 || days > 0) parts.push(`${hours}h`);
  parts.push(`${minutes}m`);
  return parts.join(':');
}

/** Fast cadence: live server metrics */
export function serverInfoSamples(serverInfo: ServerInfo, now: number): Sample[] {
  const samples: Sample[] = [];
  const gauge = (name: string, value: number | undefined): void => {
    if (value !== undefined) samples.push(sample(name, value, undefined, now));
  };

  gauge('xrpl_peer_count', serverInfo.peers);
  gauge('xrpl_load_factor', serverInfo.load_factor);
  gauge('xrpl_io_latency_ms', serverInfo.io_latency_ms);
  gauge('xrpl_consensus_converge_time_seconds', serverInfo.last_close?.converge_time_s);
  gauge('xrpl_proposers', serverInfo.last_close?.proposers);
  gauge('xrpl_validation_quorum', serverInfo.validation_quorum);
  gauge('xrpl_jq_trans_overflow_total', serverInfo.jq_trans_overflow);
  gauge('xrpl_peer_disconnects_total', serverInfo.peer_disconnects);
  gauge('xrpl_peer_disconnects_resources_total', serverInfo.peer_disconnects_resources);

  if (serverInfo.server_state !== undefined) {
    gauge('xrpl_validator_state_value', stateValue(serverInfo.server_state));
  }
  if (serverInfo.server_state_duration_us !== undefined) {
    gauge('xrpl_server_state_duration_seconds', serverInfo.server_state_duration_us / 1_000_000);
  }
  if (serverInfo.uptime !== undefined) {
    // Minute resolution keeps the series flat between restarts
    gauge('xrpl_validator_uptime_seconds', Math.floor(serverInfo.uptime / 60) * 60);
    samples.push(info('xrpl_validator_uptime_info', { pretty: formatUptime(serverInfo.uptime) }, now));
  }
  return samples;
}

/** Medium cadence: peer topology */
export function peerSamples(peers: Peer[], now: number): Sample[] {
  const summary = summarizePeers(peers);
  return [
    sample('xrpl_peers_inbound', summary.inbound, undefined, now),
    sample('xrpl_peers_outbound', summary.outbound, undefined, now),
    sample('xrpl_peers_insane', summary.insane, undefined, now),
    sample('xrpl_peer_latency_p90_ms', summary.latencyP90, undefined, now),
  ];
}

/** Slow cadence: time spent in, and transitions into, each server state */
export function serverStateSamples(state: ServerState, now: number): Sample[] {
  const samples: Sample[] = [];
  for (const [name, entry] of Object.entries(state.state_accounting ?? {})) {
    samples.push(sample('xrpl_state_accounting_duration_seconds', entry.duration_us / 1_000_000, { state: name }, now));
    samples.push(sample('xrpl_state_accounting_transitions', entry.transitions, { state: name }, now));
  }
  if (state.initial_sync_duration_us !== undefined) {
    samples.push(sample('xrpl_initial_sync_duration_seconds', state.initial_sync_duration_us / 1_000_000, undefined, now));
  }
  return samples;
}

/** Startup only: static node properties as an info series */
export function serverInfoLabels(state: ServerState, now: number): Sample {
  return info(
    'xrpl_server_info',
    {
      build_version: state.build_version ?? 'unknown',
      node_size: state.node_size ?? 'unknown',
      complete_ledgers: state.complete_ledgers ?? 'empty',
    },
    now
  );
}
