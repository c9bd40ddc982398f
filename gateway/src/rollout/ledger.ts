// Statistics ledger: per-group throttle counters and the trailing outcome
// window the safe-mode breaker reads. Period and bucket boundaries are
// aligned to the Unix epoch so every instance of a group shares them.

import type { RolloutPolicy } from "../catalog/types.js";

/** Size of the ring of outcome buckets that makes up one failure window. */
export const OUTCOME_BUCKETS = 12;

export type ThrottlePolicy = Pick<RolloutPolicy, "maxUpdatesPerPeriod" | "periodIntervalMs">;
export type WindowPolicy = Pick<RolloutPolicy, "failureWindowMs">;

export interface LedgerSnapshot {
  groupId: string;
  periodStart: Date;
  updatesGranted: number;
  successes: number;
  failures: number;
}

export interface OutcomeCounts {
  successes: number;
  failures: number;
}

export interface StatisticsLedger {
  /**
   * Atomically increments the current period's grant counter if it is below
   * `maxUpdatesPerPeriod`. Linearizable across callers for the same group.
   */
  tryReserveGrant(groupId: string, policy: ThrottlePolicy, now: Date): Promise<boolean>;
  recordOutcome(groupId: string, success: boolean, policy: WindowPolicy, now: Date): Promise<void>;
  snapshot(groupId: string, policy: ThrottlePolicy & WindowPolicy, now: Date): Promise<LedgerSnapshot>;
}

export function periodStartFor(now: Date, periodIntervalMs: number): Date {
  const ms = now.getTime();
  return new Date(ms - (ms % periodIntervalMs));
}

export function outcomeBucketMs(failureWindowMs: number): number {
  return Math.max(1, Math.ceil(failureWindowMs / OUTCOME_BUCKETS));
}

export function outcomeBucketStart(now: Date, bucketMs: number): number {
  const ms = now.getTime();
  return ms - (ms % bucketMs);
}

/** Earliest bucket start still inside the trailing window ending at `now`. */
export function outcomeWindowStart(now: Date, failureWindowMs: number): number {
  const bucketMs = outcomeBucketMs(failureWindowMs);
  return outcomeBucketStart(now, bucketMs) - (OUTCOME_BUCKETS - 1) * bucketMs;
}

export function failureRatio(counts: OutcomeCounts): number {
  const total = counts.successes + counts.failures;
  if (total <= 0) return 0;
  return counts.failures / total;
}

export type BreakerPolicy = Pick<RolloutPolicy, "safeMode" | "failureThreshold" | "failureMinSamples">;

/**
 * Safe-mode circuit breaker. Recomputed from the window on every read, so it
 * clears by itself once enough successes dilute the failures.
 */
export function isBreakerTripped(policy: BreakerPolicy, counts: OutcomeCounts): boolean {
  if (!policy.safeMode) return false;
  if (counts.successes + counts.failures < policy.failureMinSamples) return false;
  return failureRatio(counts) > policy.failureThreshold;
}

// ─── Fixed-size outcome ring (used by the in-memory store) ───

interface RingSlot {
  start: number;
  successes: number;
  failures: number;
}

export class OutcomeRing {
  private readonly slots: RingSlot[];
  private bucketMs: number;

  constructor(failureWindowMs: number) {
    this.bucketMs = outcomeBucketMs(failureWindowMs);
    this.slots = Array.from({ length: OUTCOME_BUCKETS }, () => ({ start: -1, successes: 0, failures: 0 }));
  }

  private realign(failureWindowMs: number): void {
    const bucketMs = outcomeBucketMs(failureWindowMs);
    if (bucketMs === this.bucketMs) return;
    // Window length changed under us; old buckets no longer line up.
    this.bucketMs = bucketMs;
    for (const slot of this.slots) {
      slot.start = -1;
      slot.successes = 0;
      slot.failures = 0;
    }
  }

  record(success: boolean, failureWindowMs: number, now: Date): void {
    this.realign(failureWindowMs);
    const start = outcomeBucketStart(now, this.bucketMs);
    const slot = this.slots[Math.floor(start / this.bucketMs) % OUTCOME_BUCKETS];
    if (slot.start !== start) {
      slot.start = start;
      slot.successes = 0;
      slot.failures = 0;
    }
    if (success) slot.successes++;
    else slot.failures++;
  }

  /** Reverses one `record` call, provided its bucket has not been recycled. */
  unrecord(success: boolean, now: Date): void {
    const start = outcomeBucketStart(now, this.bucketMs);
    const slot = this.slots[Math.floor(start / this.bucketMs) % OUTCOME_BUCKETS];
    if (slot.start !== start) return;
    if (success) slot.successes = Math.max(0, slot.successes - 1);
    else slot.failures = Math.max(0, slot.failures - 1);
  }

  /** Clears buckets that started before `before`; returns how many were cleared. */
  prune(before: Date): number {
    let cleared = 0;
    for (const slot of this.slots) {
      if (slot.start < 0 || slot.start >= before.getTime()) continue;
      slot.start = -1;
      slot.successes = 0;
      slot.failures = 0;
      cleared++;
    }
    return cleared;
  }

  counts(failureWindowMs: number, now: Date): OutcomeCounts {
    this.realign(failureWindowMs);
    const from = outcomeWindowStart(now, failureWindowMs);
    const to = now.getTime();
    let successes = 0;
    let failures = 0;
    for (const slot of this.slots) {
      if (slot.start < from || slot.start > to) continue;
      successes += slot.successes;
      failures += slot.failures;
    }
    return { successes, failures };
  }
}
