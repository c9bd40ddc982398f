import type { Application, Channel, Group, Package, RolloutPolicy } from "../../catalog/types.js";
import type { Queryable } from "../../db/client.js";
import type { CatalogRepository } from "../types.js";
import { isUuid, toArch, toIso, toNumber } from "./rows.js";

interface ApplicationRow {
  id: string;
  name: string;
  description: string;
  created_at: Date | string;
}

interface PackageRow {
  id: string;
  application_id: string;
  arch: string;
  version: string;
  url: string;
  filename: string;
  hash: string;
  size: number | string;
  channels_blacklist: string[];
  created_at: Date | string;
}

interface ChannelRow {
  id: string;
  application_id: string;
  name: string;
  color: string;
  arch: string;
  package_id: string | null;
  created_at: Date | string;
}

interface GroupRow {
  id: string;
  application_id: string;
  channel_id: string;
  name: string;
  policy_updates_enabled: boolean;
  policy_max_updates_per_period: number;
  policy_period_interval_ms: number | string;
  policy_update_timeout_ms: number | string;
  policy_safe_mode: boolean;
  policy_failure_threshold: number;
  policy_failure_min_samples: number;
  policy_failure_window_ms: number | string;
  policy_office_hours: boolean;
  policy_timezone: string;
  created_at: Date | string;
}

function mapApplication(row: ApplicationRow): Application {
  return { id: row.id, name: row.name, description: row.description, createdAt: toIso(row.created_at) };
}

function mapPackage(row: PackageRow): Package {
  return {
    id: row.id,
    applicationId: row.application_id,
    arch: toArch(row.arch),
    version: row.version,
    url: row.url,
    filename: row.filename,
    hash: row.hash,
    size: toNumber(row.size),
    channelsBlacklist: row.channels_blacklist,
    createdAt: toIso(row.created_at),
  };
}

function mapChannel(row: ChannelRow, pkg: Package | null): Channel {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    applicationId: row.application_id,
    arch: toArch(row.arch),
    packageId: row.package_id,
    package: pkg,
    createdAt: toIso(row.created_at),
  };
}

function mapPolicy(row: GroupRow): RolloutPolicy {
  return {
    updatesEnabled: row.policy_updates_enabled,
    maxUpdatesPerPeriod: row.policy_max_updates_per_period,
    periodIntervalMs: toNumber(row.policy_period_interval_ms),
    updateTimeoutMs: toNumber(row.policy_update_timeout_ms),
    safeMode: row.policy_safe_mode,
    failureThreshold: row.policy_failure_threshold,
    failureMinSamples: row.policy_failure_min_samples,
    failureWindowMs: toNumber(row.policy_failure_window_ms),
    officeHours: row.policy_office_hours,
    timezone: row.policy_timezone,
  };
}

function policyParams(policy: RolloutPolicy): unknown[] {
  return [
    policy.updatesEnabled,
    policy.maxUpdatesPerPeriod,
    policy.periodIntervalMs,
    policy.updateTimeoutMs,
    policy.safeMode,
    policy.failureThreshold,
    policy.failureMinSamples,
    policy.failureWindowMs,
    policy.officeHours,
    policy.timezone,
  ];
}

export function createPgCatalog(db: Queryable): CatalogRepository {
  async function getPackage(id: string): Promise<Package | null> {
    if (!isUuid(id)) return null;
    const result = await db.query<PackageRow>(`SELECT * FROM packages WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? mapPackage(row) : null;
  }

  async function getChannel(id: string): Promise<Channel | null> {
    if (!isUuid(id)) return null;
    const result = await db.query<ChannelRow>(`SELECT * FROM channels WHERE id = $1`, [id]);
    const row = result.rows[0];
    if (!row) return null;
    const pkg = row.package_id ? await getPackage(row.package_id) : null;
    return mapChannel(row, pkg);
  }

  return {
    async getApplication(id) {
      if (!isUuid(id)) return null;
      const result = await db.query<ApplicationRow>(`SELECT * FROM applications WHERE id = $1`, [id]);
      const row = result.rows[0];
      return row ? mapApplication(row) : null;
    },

    getPackage,
    getChannel,

    async getGroup(id) {
      if (!isUuid(id)) return null;
      const result = await db.query<GroupRow>(`SELECT * FROM groups WHERE id = $1`, [id]);
      const row = result.rows[0];
      if (!row) return null;
      const group: Group = {
        id: row.id,
        name: row.name,
        applicationId: row.application_id,
        channelId: row.channel_id,
        channel: await getChannel(row.channel_id),
        policy: mapPolicy(row),
        createdAt: toIso(row.created_at),
      };
      return group;
    },

    async insertApplication(input) {
      const result = await db.query<ApplicationRow>(
        `INSERT INTO applications (name, description) VALUES ($1, $2) RETURNING *`,
        [input.name, input.description],
      );
      return mapApplication(result.rows[0]);
    },

    async insertPackage(input) {
      const result = await db.query<PackageRow>(
        `INSERT INTO packages (application_id, arch, version, url, filename, hash, size, channels_blacklist)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING *`,
        [
          input.applicationId,
          input.arch,
          input.version,
          input.url,
          input.filename,
          input.hash,
          input.size,
          input.channelsBlacklist,
        ],
      );
      return mapPackage(result.rows[0]);
    },

    async insertChannel(input) {
      const result = await db.query<ChannelRow>(
        `INSERT INTO channels (application_id, name, color, arch, package_id)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING *`,
        [input.applicationId, input.name, input.color, input.arch, input.packageId],
      );
      const row = result.rows[0];
      const pkg = row.package_id ? await getPackage(row.package_id) : null;
      return mapChannel(row, pkg);
    },

    async updateChannelPackage(channelId, packageId) {
      if (!isUuid(channelId)) return false;
      const result = await db.query(`UPDATE channels SET package_id = $2 WHERE id = $1`, [channelId, packageId]);
      return (result.rowCount ?? 0) > 0;
    },

    async insertGroup(input) {
      const result = await db.query<GroupRow>(
        `INSERT INTO groups (
           application_id, channel_id, name,
           policy_updates_enabled, policy_max_updates_per_period, policy_period_interval_ms,
           policy_update_timeout_ms, policy_safe_mode, policy_failure_threshold,
           policy_failure_min_samples, policy_failure_window_ms, policy_office_hours, policy_timezone
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
         RETURNING *`,
        [input.applicationId, input.channelId, input.name, ...policyParams(input.policy)],
      );
      const row = result.rows[0];
      return {
        id: row.id,
        name: row.name,
        applicationId: row.application_id,
        channelId: row.channel_id,
        channel: null,
        policy: mapPolicy(row),
        createdAt: toIso(row.created_at),
      };
    },

    async updateGroupPolicy(groupId, policy) {
      if (!isUuid(groupId)) return false;
      const result = await db.query(
        `UPDATE groups SET
           policy_updates_enabled = $2,
           policy_max_updates_per_period = $3,
           policy_period_interval_ms = $4,
           policy_update_timeout_ms = $5,
           policy_safe_mode = $6,
           policy_failure_threshold = $7,
           policy_failure_min_samples = $8,
           policy_failure_window_ms = $9,
           policy_office_hours = $10,
           policy_timezone = $11
         WHERE id = $1`,
        [groupId, ...policyParams(policy)],
      );
      return (result.rowCount ?? 0) > 0;
    },
  };
}
