import type { Queryable } from "../../db/client.js";
import {
  outcomeBucketMs,
  outcomeBucketStart,
  outcomeWindowStart,
  periodStartFor,
  type StatisticsLedger,
} from "../../rollout/ledger.js";
import type { PruneOptions, PruneReport } from "../types.js";

export function createPgLedger(db: Queryable): StatisticsLedger {
  return {
    async tryReserveGrant(groupId, policy, now) {
      if (policy.maxUpdatesPerPeriod <= 0) return false;
      const periodStart = periodStartFor(now, policy.periodIntervalMs);

      // Increment-if-below-limit in one statement. The row lock taken by
      // ON CONFLICT serializes concurrent reservers; a loser re-checks the
      // WHERE against the committed count and gets no row back.
      const result = await db.query<{ updates_granted: number }>(
        `INSERT INTO group_period_stats (group_id, period_start, updates_granted)
         VALUES ($1, $2, 1)
         ON CONFLICT (group_id, period_start) DO UPDATE
           SET updates_granted = group_period_stats.updates_granted + 1
           WHERE group_period_stats.updates_granted < $3
         RETURNING updates_granted`,
        [groupId, periodStart, policy.maxUpdatesPerPeriod],
      );
      return result.rows.length > 0;
    },

    async recordOutcome(groupId, success, policy, now) {
      const bucketStart = new Date(outcomeBucketStart(now, outcomeBucketMs(policy.failureWindowMs)));
      await db.query(
        `INSERT INTO group_outcome_buckets (group_id, bucket_start, successes, failures)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (group_id, bucket_start) DO UPDATE SET
           successes = group_outcome_buckets.successes + EXCLUDED.successes,
           failures = group_outcome_buckets.failures + EXCLUDED.failures`,
        [groupId, bucketStart, success ? 1 : 0, success ? 0 : 1],
      );
    },

    async snapshot(groupId, policy, now) {
      const periodStart = periodStartFor(now, policy.periodIntervalMs);
      const period = await db.query<{ updates_granted: number }>(
        `SELECT updates_granted FROM group_period_stats WHERE group_id = $1 AND period_start = $2`,
        [groupId, periodStart],
      );
      const outcomes = await db.query<{ successes: number; failures: number }>(
        `SELECT COALESCE(SUM(successes), 0)::int AS successes,
                COALESCE(SUM(failures), 0)::int AS failures
         FROM group_outcome_buckets
         WHERE group_id = $1 AND bucket_start >= $2 AND bucket_start <= $3`,
        [groupId, new Date(outcomeWindowStart(now, policy.failureWindowMs)), now],
      );
      const counts = outcomes.rows[0];
      const periodRow = period.rows[0];
      return {
        groupId,
        periodStart,
        updatesGranted: periodRow ? periodRow.updates_granted : 0,
        successes: counts ? counts.successes : 0,
        failures: counts ? counts.failures : 0,
      };
    },
  };
}

export async function prunePgLedger(db: Queryable, options: PruneOptions): Promise<PruneReport> {
  const periods = await db.query(`DELETE FROM group_period_stats WHERE period_start < $1`, [options.periodsBefore]);
  const buckets = await db.query(`DELETE FROM group_outcome_buckets WHERE bucket_start < $1`, [options.outcomesBefore]);
  return { periods: periods.rowCount ?? 0, outcomeBuckets: buckets.rowCount ?? 0 };
}
