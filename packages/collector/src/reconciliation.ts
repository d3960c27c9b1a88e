/**
 * Validation reconciliation.
 *
 * For every ledger sequence, decide once whether our validator's hash
 * matched the network's consensus hash (agreement), differed from it
 * (disagreement) or never arrived (unsent). Consensus and validation events
 * may arrive in either order; a record is created by whichever comes first
 * and filled in by the other.
 *
 * All record and counter state is private to this class and only changes
 * inside its ingestion, tick and cleanup methods.
 */

import { createLogger, sample, type Logger, type Sample } from '@validator-watch/shared';
import { WindowedOutcomeLog, type Outcome, type WindowCounts } from './windowed-log.js';

export type { Outcome, WindowCounts } from './windowed-log.js';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export interface PendingLedgerRecord {
  sequence: number;
  consensusHash: string | null;
  localHash: string | null;
  closedAt: number | null;
  validatedAt: number | null;
  createdAt: number;
  finalized: boolean;
  outcome: Outcome | null;
  finalizedAt: number | null;
  repaired: boolean;
  anomalyLogged: boolean;
}

export interface ReconcilerOptions {
  gracePeriodMs?: number;
  repairWindowMs?: number;
  retentionMs?: number;
  /** Grace periods a record may wait for its consensus hash before a warning */
  anomalyAfterGraces?: number;
  now?: () => number;
  logger?: Logger;
}

export interface ReconciliationTotals {
  agreements: number;
  missed: number;
  /** Validations signed by our validator */
  validationsSent: number;
  /** Validations seen on the stream from any validator */
  validationsChecked: number;
}

export interface RecoveredCounters {
  agreementsTotal: number | null;
  missedTotal: number | null;
  validationsChecked: number | null;
  validationsSent: number | null;
  window1h: WindowCounts | null;
  window24h: WindowCounts | null;
}

export interface ReconciliationSnapshot {
  tracked: number;
  pending: number;
  totals: ReconciliationTotals;
  window1h: WindowCounts;
  window24h: WindowCounts;
  lastTickAt: number | null;
}

function agreementPct(counts: WindowCounts): number | null {
  const total = counts.agreements + counts.missed;
  if (total === 0) return null;
  return Math.round((counts.agreements / total) * 10_000) / 100;
}

export class ValidationReconciler {
  private readonly gracePeriodMs: number;
  private readonly repairWindowMs: number;
  private readonly retentionMs: number;
  private readonly anomalyAfterMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly records = new Map<number, PendingLedgerRecord>();
  /** Sequence -> time it was cleaned up; stragglers for these are dropped */
  private readonly pruned = new Map<number, number>();
  private readonly hourly = new WindowedOutcomeLog(HOUR_MS);
  private readonly daily = new WindowedOutcomeLog(DAY_MS);
  private totals: ReconciliationTotals = { agreements: 0, missed: 0, validationsSent: 0, validationsChecked: 0 };
  private events: Sample[] = [];
  private lastTickAt: number | null = null;

  constructor(options: ReconcilerOptions = {}) {
    this.gracePeriodMs = options.gracePeriodMs ?? 8000;
    this.repairWindowMs = options.repairWindowMs ?? 5 * 60 * 1000;
    this.retentionMs = options.retentionMs ?? 10 * 60 * 1000;
    this.anomalyAfterMs = this.gracePeriodMs * (options.anomalyAfterGraces ?? 3);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('reconciliation');
  }

  // ---------------------------------------------------------------------------
  // Ingestion
  // ---------------------------------------------------------------------------

  onConsensusHash(sequence: number, hash: string): void {
    if (this.wasPruned(sequence)) return;
    const record = this.getOrCreate(sequence);
    if (record.consensusHash === null) {
      record.consensusHash = hash;
      record.closedAt = this.now();
    }
  }

  /**
   * Counts one sent validation per ledger: repeats, and late ones that
   * change nothing, are not counted again.
   */
  onLocalValidation(sequence: number, hash: string): void {
    if (this.wasPruned(sequence)) return;
    const record = this.getOrCreate(sequence);

    if (record.finalized) {
      if (this.repair(record, hash)) this.totals.validationsSent++;
      return;
    }
    if (record.localHash === null) {
      record.localHash = hash;
      record.validatedAt = this.now();
      this.totals.validationsSent++;
    }
  }

  recordValidationChecked(): void {
    this.totals.validationsChecked++;
  }

  // ---------------------------------------------------------------------------
  // Periodic work
  // ---------------------------------------------------------------------------

  /**
   * Finalize every record whose grace period has elapsed since ledger close.
   * Returns the sequences finalized by this tick, ascending.
   */
  tick(): number[] {
    const now = this.now();
    const finalized: number[] = [];

    for (const record of this.records.values()) {
      if (record.finalized) continue;

      if (record.consensusHash === null || record.closedAt === null) {
        if (!record.anomalyLogged && now - record.createdAt >= this.anomalyAfterMs) {
          record.anomalyLogged = true;
          this.logger.warn(
            `⚠️ Ledger ${record.sequence}: no consensus hash ${Math.round((now - record.createdAt) / 1000)}s after first sighting`
          );
        }
        continue;
      }

      if (now - record.closedAt < this.gracePeriodMs) continue;

      const outcome: Outcome =
        record.localHash === null ? 'unsent' : record.localHash === record.consensusHash ? 'agreement' : 'disagreement';
      this.finalize(record, outcome, now);
      finalized.push(record.sequence);
    }

    this.lastTickAt = now;
    return finalized.sort((a, b) => a - b);
  }

  /**
   * Drop records past the retention horizon: finalized ones measured from
   * finalization, never-finalized ones from creation. Returns how many went.
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [sequence, record] of this.records) {
      const age = record.finalizedAt !== null ? now - record.finalizedAt : now - record.createdAt;
      if (age > this.retentionMs) {
        this.records.delete(sequence);
        this.pruned.set(sequence, now);
        removed++;
      }
    }
    for (const [sequence, prunedAt] of this.pruned) {
      if (now - prunedAt > this.retentionMs) this.pruned.delete(sequence);
    }
    if (removed > 0) this.logger.debug(`Cleaned up ${removed} ledger record(s), ${this.records.size} tracked`);
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Recovery and reporting
  // ---------------------------------------------------------------------------

  restore(recovered: RecoveredCounters): void {
    const now = this.now();
    this.totals = {
      agreements: recovered.agreementsTotal ?? this.totals.agreements,
      missed: recovered.missedTotal ?? this.totals.missed,
      validationsChecked: recovered.validationsChecked ?? this.totals.validationsChecked,
      validationsSent: recovered.validationsSent ?? this.totals.validationsSent,
    };
    if (recovered.window1h) this.hourly.seed(recovered.window1h, now);
    if (recovered.window24h) this.daily.seed(recovered.window24h, now);
  }

  record(sequence: number): Readonly<PendingLedgerRecord> | undefined {
    const record = this.records.get(sequence);
    return record ? { ...record } : undefined;
  }

  snapshot(): ReconciliationSnapshot {
    const now = this.now();
    let pending = 0;
    for (const record of this.records.values()) {
      if (!record.finalized) pending++;
    }
    return {
      tracked: this.records.size,
      pending,
      totals: { ...this.totals },
      window1h: this.hourly.counts(now),
      window24h: this.daily.counts(now),
      lastTickAt: this.lastTickAt,
    };
  }

  /**
   * Current gauges and counters, plus one event sample per outcome decided
   * since the previous call.
   */
  toSamples(now: number = this.now()): Sample[] {
    const samples: Sample[] = [];
    for (const [suffix, counts] of [
      ['1h', this.hourly.counts(now)],
      ['24h', this.daily.counts(now)],
    ] as const) {
      samples.push(sample(`xrpl_validation_agreements_${suffix}`, counts.agreements, undefined, now));
      samples.push(sample(`xrpl_validation_missed_${suffix}`, counts.missed, undefined, now));
      const pct = agreementPct(counts);
      if (pct !== null) samples.push(sample(`xrpl_validation_agreement_pct_${suffix}`, pct, undefined, now));
    }

    samples.push(
      sample('xrpl_validation_agreements_total', this.totals.agreements, undefined, now),
      sample('xrpl_validation_missed_total', this.totals.missed, undefined, now),
      sample('xrpl_validations_total', this.totals.validationsSent, undefined, now),
      sample('xrpl_validations_checked_total', this.totals.validationsChecked, undefined, now)
    );

    samples.push(...this.events);
    this.events = [];
    return samples;
  }

  private wasPruned(sequence: number): boolean {
    if (!this.pruned.has(sequence)) return false;
    this.logger.debug(`Ignoring event for ledger ${sequence}, already cleaned up`);
    return true;
  }

  private getOrCreate(sequence: number): PendingLedgerRecord {
    let record = this.records.get(sequence);
    if (!record) {
      record = {
        sequence,
        consensusHash: null,
        localHash: null,
        closedAt: null,
        validatedAt: null,
        createdAt: this.now(),
        finalized: false,
        outcome: null,
        finalizedAt: null,
        repaired: false,
        anomalyLogged: false,
      };
      this.records.set(sequence, record);
    }
    return record;
  }

  private finalize(record: PendingLedgerRecord, outcome: Outcome, now: number): void {
    record.finalized = true;
    record.outcome = outcome;
    record.finalizedAt = now;

    this.count(outcome, 1);
    this.hourly.append(now, record.sequence, outcome);
    this.daily.append(now, record.sequence, outcome);
    this.pushEvent(record.sequence, outcome, now);

    if (outcome === 'agreement') {
      this.logger.debug(`Ledger ${record.sequence}: agreement`);
    } else {
      this.logger.info(`Ledger ${record.sequence}: ${outcome}`);
    }
  }

  /**
   * A validation for an already-finalized ledger. Only an unsent outcome,
   * still inside the repair window and never repaired before, may change.
   */
  private repair(record: PendingLedgerRecord, hash: string): boolean {
    const now = this.now();
    if (
      record.outcome !== 'unsent' ||
      record.repaired ||
      record.finalizedAt === null ||
      now - record.finalizedAt > this.repairWindowMs
    ) {
      this.logger.debug(`Ignoring late validation for ledger ${record.sequence}`);
      return false;
    }

    const outcome: Outcome = hash === record.consensusHash ? 'agreement' : 'disagreement';
    record.localHash = hash;
    record.validatedAt = now;
    record.outcome = outcome;
    record.repaired = true;

    this.count('unsent', -1);
    this.count(outcome, 1);
    this.hourly.amend(record.sequence, 'unsent', outcome);
    this.daily.amend(record.sequence, 'unsent', outcome);
    this.pushEvent(record.sequence, outcome, now);

    this.logger.info(
      `🔄 Ledger ${record.sequence}: late validation after ${Math.round((now - record.finalizedAt) / 1000)}s, unsent -> ${outcome}`
    );
    return true;
  }

  private count(outcome: Outcome, delta: number): void {
    if (outcome === 'agreement') this.totals.agreements += delta;
    else this.totals.missed += delta;
  }

  private pushEvent(sequence: number, outcome: Outcome, now: number): void {
    this.events.push(
      sample('xrpl_validation_event', sequence, { agreed: outcome === 'agreement' ? 'true' : 'false', outcome }, now)
    );
  }
}
