import type { Queryable } from "../../db/client.js";
import type { RolloutStateStore } from "../types.js";

export function createPgRolloutState(db: Queryable): RolloutStateStore {
  return {
    async isHalted(groupId) {
      const result = await db.query<{ halted: boolean }>(
        `SELECT halted FROM group_rollout_state WHERE group_id = $1`,
        [groupId],
      );
      const row = result.rows[0];
      return row ? row.halted : false;
    },

    async lockHalted(groupId) {
      // FOR UPDATE needs a row to hold, so make sure the group has one.
      await db.query(
        `INSERT INTO group_rollout_state (group_id) VALUES ($1) ON CONFLICT (group_id) DO NOTHING`,
        [groupId],
      );
      const result = await db.query<{ halted: boolean }>(
        `SELECT halted FROM group_rollout_state WHERE group_id = $1 FOR UPDATE`,
        [groupId],
      );
      const row = result.rows[0];
      return row ? row.halted : false;
    },

    async setHalted(groupId, halted, now) {
      // A missing row reads as "not halted", so resuming only ever updates.
      const result = halted
        ? await db.query(
          `INSERT INTO group_rollout_state (group_id, halted, changed_at)
           VALUES ($1, TRUE, $2)
           ON CONFLICT (group_id) DO UPDATE SET halted = TRUE, changed_at = EXCLUDED.changed_at
             WHERE group_rollout_state.halted = FALSE
           RETURNING group_id`,
          [groupId, now],
        )
        : await db.query(
          `UPDATE group_rollout_state SET halted = FALSE, changed_at = $2
           WHERE group_id = $1 AND halted = TRUE
           RETURNING group_id`,
          [groupId, now],
        );
      return result.rows.length > 0;
    },
  };
}
