import type { ActivityEntry, ActivitySeverity, ActivityType } from "../../activity/types.js";
import { ACTIVITY_SEVERITY } from "../../activity/types.js";
import type { Queryable } from "../../db/client.js";
import type { ActivityLog } from "../types.js";
import { toIso, toNumber } from "./rows.js";

interface ActivityRow {
  id: number | string;
  type: string;
  severity: string;
  application_id: string;
  group_id: string | null;
  channel_id: string | null;
  instance_id: string | null;
  version: string;
  created_at: Date | string;
}

const SEVERITIES: readonly ActivitySeverity[] = ["success", "info", "warning", "error"];

function isActivityType(value: string): value is ActivityType {
  return Object.hasOwn(ACTIVITY_SEVERITY, value);
}

function mapActivity(row: ActivityRow): ActivityEntry {
  if (!isActivityType(row.type)) throw new Error(`Unexpected activity type in database: ${row.type}`);
  const severity = SEVERITIES.find((s) => s === row.severity) ?? ACTIVITY_SEVERITY[row.type];
  return {
    id: toNumber(row.id),
    type: row.type,
    severity,
    applicationId: row.application_id,
    groupId: row.group_id,
    channelId: row.channel_id,
    instanceId: row.instance_id,
    version: row.version,
    createdAt: toIso(row.created_at),
  };
}

export function createPgActivity(db: Queryable): ActivityLog {
  return {
    async append(entry) {
      const result = await db.query<ActivityRow>(
        `INSERT INTO activity (type, severity, application_id, group_id, channel_id, instance_id, version, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING *`,
        [
          entry.type,
          entry.severity,
          entry.applicationId,
          entry.groupId ?? null,
          entry.channelId ?? null,
          entry.instanceId ?? null,
          entry.version,
          entry.createdAt,
        ],
      );
      return mapActivity(result.rows[0]);
    },

    async list({ page, perPage }) {
      const offset = Math.max(0, page - 1) * perPage;
      const result = await db.query<ActivityRow>(
        `SELECT * FROM activity ORDER BY created_at DESC, id DESC LIMIT $1 OFFSET $2`,
        [perPage, offset],
      );
      return result.rows.map(mapActivity);
    },
  };
}
