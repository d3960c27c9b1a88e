import {
  DROPS_PER_XRP,
  RIPPLE_EPOCH_OFFSET,
  sample,
  type MetricsWriter,
  type Sample,
} from '@validator-watch/shared';
import type { LedgerClosedEvent } from '../events.js';
import type { ValidationReconciler } from '../reconciliation.js';

/**
 * Ledger-close events: ledger gauges, plus the consensus hash for
 * reconciliation.
 */
export class LedgerHandler {
  private closedTotal = 0;
  private lastCloseUnix: number | null = null;

  constructor(
    private readonly sink: MetricsWriter,
    private readonly engine: Pick<ValidationReconciler, 'onConsensusHash'>,
    private readonly now: () => number = Date.now
  ) {}

  handle(event: LedgerClosedEvent): void {
    const nowMs = this.now();
    const closeUnix = event.ledgerTime + RIPPLE_EPOCH_OFFSET;
    this.closedTotal++;

    const samples: Sample[] = [
      sample('xrpl_ledgers_closed_total', this.closedTotal, undefined, nowMs),
      sample('xrpl_ledger_sequence', event.sequence, undefined, nowMs),
      sample('xrpl_ledger_age_seconds', Math.max(0, nowMs / 1000 - closeUnix), undefined, nowMs),
    ];
    if (event.feeBase !== undefined) {
      samples.push(sample('xrpl_base_fee_xrp', event.feeBase / DROPS_PER_XRP, undefined, nowMs));
    }
    if (event.reserveBase !== undefined) {
      samples.push(sample('xrpl_reserve_base_xrp', event.reserveBase / DROPS_PER_XRP, undefined, nowMs));
    }
    if (event.reserveInc !== undefined) {
      samples.push(sample('xrpl_reserve_inc_xrp', event.reserveInc / DROPS_PER_XRP, undefined, nowMs));
    }

    if (event.txnCount !== undefined && this.lastCloseUnix !== null && closeUnix > this.lastCloseUnix) {
      samples.push(sample('xrpl_transaction_rate', event.txnCount / (closeUnix - this.lastCloseUnix), undefined, nowMs));
    }
    this.lastCloseUnix = closeUnix;

    if (event.hash) this.engine.onConsensusHash(event.sequence, event.hash);
    this.sink.write(samples);
  }
}
