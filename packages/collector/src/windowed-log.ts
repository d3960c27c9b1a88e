export type Outcome = 'agreement' | 'disagreement' | 'unsent';

export interface WindowCounts {
  agreements: number;
  missed: number;
}

interface OutcomeEntry {
  at: number;
  sequence: number;
  outcome: Outcome;
}

interface Baseline extends WindowCounts {
  at: number;
}

function isMissed(outcome: Outcome): boolean {
  return outcome !== 'agreement';
}

/**
 * Finalized outcomes within a sliding window, kept as a time-ordered log
 * with running tallies. Entries older than the window are pruned on every
 * append and read.
 *
 * A baseline restored after a restart stands in for the outcomes that were
 * not replayed; it decays linearly to zero over one window so it never
 * outlives the outcomes it represents.
 */
export class WindowedOutcomeLog {
  private entries: OutcomeEntry[] = [];
  private tally: WindowCounts = { agreements: 0, missed: 0 };
  private baseline: Baseline | null = null;

  constructor(readonly windowMs: number) {}

  get size(): number {
    return this.entries.length;
  }

  append(at: number, sequence: number, outcome: Outcome): void {
    this.prune(at);
    this.entries.push({ at, sequence, outcome });
    this.adjust(outcome, 1);
  }

  /**
   * Rewrite the outcome of an entry still inside the window. Returns false
   * when the entry has already aged out.
   */
  amend(sequence: number, from: Outcome, to: Outcome): boolean {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (!entry || entry.sequence !== sequence || entry.outcome !== from) continue;
      this.adjust(from, -1);
      entry.outcome = to;
      this.adjust(to, 1);
      return true;
    }
    return false;
  }

  seed(counts: WindowCounts, at: number): void {
    this.baseline = { ...counts, at };
  }

  counts(now: number): WindowCounts {
    this.prune(now);
    const factor = this.baselineFactor(now);
    return {
      agreements: this.tally.agreements + Math.round((this.baseline?.agreements ?? 0) * factor),
      missed: this.tally.missed + Math.round((this.baseline?.missed ?? 0) * factor),
    };
  }

  private baselineFactor(now: number): number {
    if (!this.baseline) return 0;
    const factor = 1 - (now - this.baseline.at) / this.windowMs;
    if (factor <= 0) {
      this.baseline = null;
      return 0;
    }
    return Math.min(1, factor);
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.entries.length) {
      const entry = this.entries[drop];
      if (!entry || entry.at >= cutoff) break;
      this.adjust(entry.outcome, -1);
      drop++;
    }
    if (drop > 0) this.entries.splice(0, drop);
  }

  private adjust(outcome: Outcome, delta: number): void {
    if (isMissed(outcome)) this.tally.missed += delta;
    else this.tally.agreements += delta;
  }
}
