/**
 * Per-source request pacing with exponential backoff.
 *
 * One lane per source: grants for the same source are handed out one at a
 * time, spaced by minIntervalMs × backoffMultiplier. Different sources never
 * wait on each other. Process-scoped; pass the instance to every adapter.
 */

import { SOURCE_IDS, type SourceId } from './enrichment.types';

export type RateBudget = {
  /** Epoch ms of the last granted request, null before the first */
  lastGrantedAt: number | null;
  minIntervalMs: number;
  backoffMultiplier: number;
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RateLimiterOptions = {
  minIntervalMs: Record<SourceId, number>;
  /** Ceiling for the doubling multiplier */
  maxBackoffMultiplier: number;
  now?: () => number;
  sleep?: SleepFn;
};

/** setTimeout-based sleep that rejects with the signal's reason on abort */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class RateLimiter {
  private readonly budgets = new Map<SourceId, RateBudget>();
  private readonly lanes = new Map<SourceId, Promise<void>>();
  private readonly maxBackoffMultiplier: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  constructor(options: RateLimiterOptions) {
    this.maxBackoffMultiplier = Math.max(1, options.maxBackoffMultiplier);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    for (const source of SOURCE_IDS) {
      this.budgets.set(source, {
        lastGrantedAt: null,
        minIntervalMs: Math.max(0, options.minIntervalMs[source]),
        backoffMultiplier: 1,
      });
    }
  }

  /**
   * Resolve once this source may send its next request. Rejects with the
   * signal's reason when aborted while queued; the lane keeps going.
   */
  acquire(source: SourceId, signal?: AbortSignal): Promise<void> {
    const previous = this.lanes.get(source) ?? Promise.resolve();
    const turn = previous.then(() => this.grant(source, signal));
    this.lanes.set(
      source,
      turn.catch(() => undefined),
    );
    return turn;
  }

  reportFailure(source: SourceId): void {
    const budget = this.budgetFor(source);
    budget.backoffMultiplier = Math.min(
      budget.backoffMultiplier * 2,
      this.maxBackoffMultiplier,
    );
  }

  reportSuccess(source: SourceId): void {
    this.budgetFor(source).backoffMultiplier = 1;
  }

  /** Copy of the current budget (diagnostics and tests) */
  budget(source: SourceId): RateBudget {
    return { ...this.budgetFor(source) };
  }

  /** Interval the next grant for this source will respect */
  currentIntervalMs(source: SourceId): number {
    const budget = this.budgetFor(source);
    return budget.minIntervalMs * budget.backoffMultiplier;
  }

  private async grant(source: SourceId, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const budget = this.budgetFor(source);
    if (budget.lastGrantedAt != null) {
      const wait =
        budget.lastGrantedAt + this.currentIntervalMs(source) - this.now();
      if (wait > 0) await this.sleep(wait, signal);
    }
    budget.lastGrantedAt = this.now();
  }

  private budgetFor(source: SourceId): RateBudget {
    let budget = this.budgets.get(source);
    if (!budget) {
      budget = { lastGrantedAt: null, minIntervalMs: 0, backoffMultiplier: 1 };
      this.budgets.set(source, budget);
    }
    return budget;
  }
}
