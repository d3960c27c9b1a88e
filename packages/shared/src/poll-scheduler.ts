/**
 * Independent timer loops against the validator node.
 *
 * Each loop owns its cadence and retry policy. Retries happen inside the
 * tick; a tick that exhausts them is logged and abandoned, and no other loop
 * observes the failure.
 */

import { errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { withRetry, type RetryPolicy } from './retry.js';
import { sleep as defaultSleep, type Sleep } from './sleep.js';

export const DEFAULT_POLL_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 1000, maxDelayMs: 4000 };

/** Single attempt per tick, for loops whose task handles its own failures */
export const NO_RETRY: RetryPolicy = { attempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

export interface PollLoop {
  name: string;
  intervalMs: number;
  retry?: RetryPolicy;
  task: (signal: AbortSignal) => Promise<void>;
}

export interface LoopStats {
  ticks: number;
  failures: number;
  consecutiveFailures: number;
  lastSuccessAt: number | null;
  lastError: string | null;
}

interface LoopEntry {
  loop: PollLoop;
  stats: LoopStats;
}

export interface PollSchedulerOptions {
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}

export class PollScheduler {
  private readonly entries = new Map<string, LoopEntry>();
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private controller: AbortController | null = null;
  private running: Promise<void>[] = [];

  constructor(options: PollSchedulerOptions = {}) {
    this.logger = options.logger ?? createLogger('poll-scheduler');
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  add(loop: PollLoop): this {
    if (this.entries.has(loop.name)) {
      throw new Error(`Poll loop "${loop.name}" already registered`);
    }
    this.entries.set(loop.name, {
      loop,
      stats: { ticks: 0, failures: 0, consecutiveFailures: 0, lastSuccessAt: null, lastError: null },
    });
    return this;
  }

  /**
   * Start every registered loop. Each runs its first tick immediately. The
   * loops stop when `signal` aborts or `stop()` is called.
   */
  start(signal?: AbortSignal): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;

    if (signal) {
      if (signal.aborted) controller.abort();
      else signal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    this.running = [...this.entries.values()].map((entry) => this.runLoop(entry, controller.signal));
    const summary = [...this.entries.values()].map(({ loop }) => `${loop.name}/${loop.intervalMs}ms`).join(', ');
    this.logger.info(`🔄 Started poll loops: ${summary}`);
  }

  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    await Promise.all(this.running);
    this.running = [];
    this.controller = null;
    this.logger.info('🛑 Poll loops stopped');
  }

  /**
   * Run one tick of a loop, retries included. Resolves true on success.
   */
  async runTick(name: string, signal: AbortSignal = new AbortController().signal): Promise<boolean> {
    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Unknown poll loop "${name}"`);
    const { loop, stats } = entry;
    const policy = loop.retry ?? DEFAULT_POLL_RETRY;

    try {
      await withRetry(() => loop.task(signal), policy, {
        signal,
        sleep: this.sleep,
        onRetry: (attempt, err, delayMs) =>
          this.logger.debug(`${name}: attempt ${attempt} failed (${errorMessage(err)}), retrying in ${delayMs}ms`),
      });
      stats.ticks++;
      stats.consecutiveFailures = 0;
      stats.lastSuccessAt = this.now();
      return true;
    } catch (err) {
      stats.failures++;
      stats.consecutiveFailures++;
      stats.lastError = errorMessage(err);
      if (!signal.aborted) {
        this.logger.warn(`⚠️ ${name} poll failed after ${policy.attempts} attempt(s): ${stats.lastError}`);
      }
      return false;
    }
  }

  stats(): Record<string, LoopStats> {
    const out: Record<string, LoopStats> = {};
    for (const [name, { stats }] of this.entries) {
      out[name] = { ...stats };
    }
    return out;
  }

  // Ticks are spaced start to start; a tick that overruns its interval is
  // followed immediately by the next one.
  private async runLoop(entry: LoopEntry, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const startedAt = this.now();
      await this.runTick(entry.loop.name, signal);
      if (signal.aborted) break;
      const remaining = entry.loop.intervalMs - (this.now() - startedAt);
      if (remaining > 0) await this.sleep(remaining, signal);
    }
  }
}
