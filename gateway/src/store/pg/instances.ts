import type { Queryable } from "../../db/client.js";
import {
  INSTANCE_STATUSES,
  emptyStatusCounts,
  type InstanceRecord,
  type InstanceStatus,
} from "../../instances/lifecycle.js";
import { StaleWriteError } from "../errors.js";
import type { InstanceRegistry } from "../types.js";
import { isUuid, toIso, toIsoOrNull } from "./rows.js";

interface InstanceRow {
  id: string;
  application_id: string;
  group_id: string | null;
  ip: string;
  version: string;
  status: string;
  granted_version: string | null;
  granted_package_id: string | null;
  last_check_in_at: Date | string;
  last_update_at: Date | string | null;
  row_version: number;
  created_at: Date | string;
}

function toStatus(value: string): InstanceStatus {
  const status = INSTANCE_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unexpected instance status in database: ${value}`);
  return status;
}

function mapInstance(row: InstanceRow): InstanceRecord {
  return {
    id: row.id,
    applicationId: row.application_id,
    groupId: row.group_id,
    ip: row.ip,
    version: row.version,
    status: toStatus(row.status),
    grantedVersion: row.granted_version,
    grantedPackageId: row.granted_package_id,
    lastCheckInAt: toIso(row.last_check_in_at),
    lastUpdateAt: toIsoOrNull(row.last_update_at),
    rowVersion: row.row_version,
    createdAt: toIso(row.created_at),
  };
}

export function createPgInstances(db: Queryable): InstanceRegistry {
  return {
    async get(instanceId, applicationId) {
      if (!isUuid(applicationId)) return null;
      const result = await db.query<InstanceRow>(
        `SELECT * FROM instances WHERE id = $1 AND application_id = $2`,
        [instanceId, applicationId],
      );
      const row = result.rows[0];
      return row ? mapInstance(row) : null;
    },

    async save(next, expectedRowVersion) {
      const params = [
        next.id,
        next.applicationId,
        next.groupId,
        next.ip,
        next.version,
        next.status,
        next.grantedVersion,
        next.grantedPackageId,
        next.lastCheckInAt,
        next.lastUpdateAt,
      ];

      // First sight of an instance: a concurrent first check-in wins the
      // insert and this one reports stale.
      const result = expectedRowVersion === null
        ? await db.query<InstanceRow>(
          `INSERT INTO instances (
             id, application_id, group_id, ip, version, status,
             granted_version, granted_package_id, last_check_in_at, last_update_at, row_version
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, 1)
           ON CONFLICT (id, application_id) DO NOTHING
           RETURNING *`,
          params,
        )
        : await db.query<InstanceRow>(
          `UPDATE instances SET
             group_id = $3, ip = $4, version = $5, status = $6,
             granted_version = $7, granted_package_id = $8,
             last_check_in_at = $9, last_update_at = $10,
             row_version = row_version + 1
           WHERE id = $1 AND application_id = $2 AND row_version = $11
           RETURNING *`,
          [...params, expectedRowVersion],
        );

      const row = result.rows[0];
      if (!row) throw new StaleWriteError(next.id);
      return mapInstance(row);
    },

    async countByStatus(groupId) {
      const counts = emptyStatusCounts();
      if (!isUuid(groupId)) return counts;
      const result = await db.query<{ status: string; count: number }>(
        `SELECT status, COUNT(*)::int AS count FROM instances WHERE group_id = $1 GROUP BY status`,
        [groupId],
      );
      for (const row of result.rows) {
        counts[toStatus(row.status)] = row.count;
      }
      return counts;
    },
  };
}
