// In-memory store: the same contracts as store/pg, backed by Maps. Used by
// tests and by `FLEETCAST_STORE=memory` for local runs. Transactions keep an
// undo journal; a throwing callback replays it in reverse.

import { randomUUID } from "node:crypto";
import type { Application, Channel, Group, Package } from "../catalog/types.js";
import { emptyStatusCounts, type InstanceRecord, type InstanceWrite } from "../instances/lifecycle.js";
import { OutcomeRing, periodStartFor, type StatisticsLedger } from "../rollout/ledger.js";
import type { ActivityEntry } from "../activity/types.js";
import { StaleWriteError } from "./errors.js";
import type {
  ActivityLog,
  CatalogRepository,
  FleetStore,
  InstanceRegistry,
  InstanceStatusCounts,
  PruneReport,
  RolloutStateStore,
  StoreScope,
} from "./types.js";

type ChannelRow = Omit<Channel, "package">;
type GroupRow = Omit<Group, "channel">;

interface PeriodRow {
  groupId: string;
  periodStart: number;
  updatesGranted: number;
}

interface MemoryState {
  applications: Map<string, Application>;
  packages: Map<string, Package>;
  channels: Map<string, ChannelRow>;
  groups: Map<string, GroupRow>;
  instances: Map<string, InstanceRecord>;
  periods: Map<string, PeriodRow>;
  outcomes: Map<string, OutcomeRing>;
  halted: Map<string, boolean>;
  activity: ActivityEntry[];
  nextActivityId: number;
}

type Undo = () => void;

/** Journal of compensating actions; null outside a transaction. */
type Journal = Undo[] | null;

function instanceKey(instanceId: string, applicationId: string): string {
  return `${applicationId}\u0000${instanceId}`;
}

function periodKey(groupId: string, periodStart: number): string {
  return `${groupId}\u0000${periodStart}`;
}

function copyPackage(pkg: Package): Package {
  return { ...pkg, channelsBlacklist: [...pkg.channelsBlacklist] };
}

function createCatalog(state: MemoryState, journal: Journal): CatalogRepository {
  const resolveChannel = (row: ChannelRow): Channel => {
    const pkg = row.packageId ? state.packages.get(row.packageId) : undefined;
    return { ...row, package: pkg ? copyPackage(pkg) : null };
  };

  return {
    async getApplication(id) {
      const app = state.applications.get(id);
      return app ? { ...app } : null;
    },

    async getPackage(id) {
      const pkg = state.packages.get(id);
      return pkg ? copyPackage(pkg) : null;
    },

    async getChannel(id) {
      const row = state.channels.get(id);
      return row ? resolveChannel(row) : null;
    },

    async getGroup(id) {
      const row = state.groups.get(id);
      if (!row) return null;
      const channel = state.channels.get(row.channelId);
      return { ...row, policy: { ...row.policy }, channel: channel ? resolveChannel(channel) : null };
    },

    async insertApplication(input) {
      const app: Application = { id: randomUUID(), ...input, createdAt: new Date().toISOString() };
      state.applications.set(app.id, app);
      journal?.push(() => state.applications.delete(app.id));
      return { ...app };
    },

    async insertPackage(input) {
      const pkg: Package = { id: randomUUID(), ...input, createdAt: new Date().toISOString() };
      state.packages.set(pkg.id, copyPackage(pkg));
      journal?.push(() => state.packages.delete(pkg.id));
      return pkg;
    },

    async insertChannel(input) {
      const row: ChannelRow = { id: randomUUID(), ...input, createdAt: new Date().toISOString() };
      state.channels.set(row.id, row);
      journal?.push(() => state.channels.delete(row.id));
      return resolveChannel(row);
    },

    async updateChannelPackage(channelId, packageId) {
      const row = state.channels.get(channelId);
      if (!row) return false;
      const previous = row.packageId;
      row.packageId = packageId;
      journal?.push(() => {
        row.packageId = previous;
      });
      return true;
    },

    async insertGroup(input) {
      const row: GroupRow = { id: randomUUID(), ...input, policy: { ...input.policy }, createdAt: new Date().toISOString() };
      state.groups.set(row.id, row);
      journal?.push(() => state.groups.delete(row.id));
      return { ...row, channel: null };
    },

    async updateGroupPolicy(groupId, policy) {
      const row = state.groups.get(groupId);
      if (!row) return false;
      const previous = row.policy;
      row.policy = { ...policy };
      journal?.push(() => {
        row.policy = previous;
      });
      return true;
    },
  };
}

function createInstances(state: MemoryState, journal: Journal): InstanceRegistry {
  return {
    async get(instanceId, applicationId) {
      const row = state.instances.get(instanceKey(instanceId, applicationId));
      return row ? { ...row } : null;
    },

    async save(next: InstanceWrite, expectedRowVersion) {
      const key = instanceKey(next.id, next.applicationId);
      const current = state.instances.get(key);
      const currentVersion = current ? current.rowVersion : null;
      if (currentVersion !== expectedRowVersion) {
        throw new StaleWriteError(next.id);
      }

      const written: InstanceRecord = {
        ...next,
        rowVersion: (currentVersion ?? 0) + 1,
        createdAt: current ? current.createdAt : new Date().toISOString(),
      };
      state.instances.set(key, written);
      journal?.push(() => {
        // Only undo if nobody has written over us since.
        if (state.instances.get(key) !== written) return;
        if (current) state.instances.set(key, current);
        else state.instances.delete(key);
      });
      return { ...written };
    },

    async countByStatus(groupId) {
      const counts: InstanceStatusCounts = emptyStatusCounts();
      for (const row of state.instances.values()) {
        if (row.groupId === groupId) counts[row.status]++;
      }
      return counts;
    },
  };
}

function createLedger(state: MemoryState, journal: Journal): StatisticsLedger {
  const ringFor = (groupId: string, failureWindowMs: number): OutcomeRing => {
    let ring = state.outcomes.get(groupId);
    if (!ring) {
      ring = new OutcomeRing(failureWindowMs);
      state.outcomes.set(groupId, ring);
    }
    return ring;
  };

  return {
    async tryReserveGrant(groupId, policy, now) {
      // Check and increment happen in one synchronous step: no await between
      // them, so concurrent callers cannot both see the last free slot.
      const periodStart = periodStartFor(now, policy.periodIntervalMs).getTime();
      const key = periodKey(groupId, periodStart);
      const row = state.periods.get(key) ?? { groupId, periodStart, updatesGranted: 0 };
      if (row.updatesGranted >= policy.maxUpdatesPerPeriod) return false;
      row.updatesGranted++;
      state.periods.set(key, row);
      journal?.push(() => {
        row.updatesGranted = Math.max(0, row.updatesGranted - 1);
      });
      return true;
    },

    async recordOutcome(groupId, success, policy, now) {
      const ring = ringFor(groupId, policy.failureWindowMs);
      ring.record(success, policy.failureWindowMs, now);
      journal?.push(() => ring.unrecord(success, now));
    },

    async snapshot(groupId, policy, now) {
      const periodStart = periodStartFor(now, policy.periodIntervalMs);
      const row = state.periods.get(periodKey(groupId, periodStart.getTime()));
      const ring = state.outcomes.get(groupId);
      const counts = ring ? ring.counts(policy.failureWindowMs, now) : { successes: 0, failures: 0 };
      return {
        groupId,
        periodStart,
        updatesGranted: row ? row.updatesGranted : 0,
        successes: counts.successes,
        failures: counts.failures,
      };
    },
  };
}

function createRolloutState(state: MemoryState, journal: Journal): RolloutStateStore {
  return {
    async isHalted(groupId) {
      return state.halted.get(groupId) ?? false;
    },

    // Nothing to lock; setHalted's compare-and-set settles interleaved writers.
    async lockHalted(groupId) {
      return state.halted.get(groupId) ?? false;
    },

    async setHalted(groupId, halted) {
      const previous = state.halted.get(groupId) ?? false;
      if (previous === halted) return false;
      state.halted.set(groupId, halted);
      journal?.push(() => state.halted.set(groupId, previous));
      return true;
    },
  };
}

function createActivity(state: MemoryState, journal: Journal): ActivityLog {
  return {
    async append(entry) {
      const written: ActivityEntry = {
        id: state.nextActivityId++,
        type: entry.type,
        severity: entry.severity,
        applicationId: entry.applicationId,
        groupId: entry.groupId ?? null,
        channelId: entry.channelId ?? null,
        instanceId: entry.instanceId ?? null,
        version: entry.version,
        createdAt: entry.createdAt.toISOString(),
      };
      state.activity.push(written);
      journal?.push(() => {
        const index = state.activity.indexOf(written);
        if (index >= 0) state.activity.splice(index, 1);
      });
      return { ...written };
    },

    async list({ page, perPage }) {
      const newestFirst = [...state.activity].reverse();
      const offset = Math.max(0, page - 1) * perPage;
      return newestFirst.slice(offset, offset + perPage).map((entry) => ({ ...entry }));
    },
  };
}

function createScope(state: MemoryState, journal: Journal): StoreScope {
  return {
    catalog: createCatalog(state, journal),
    instances: createInstances(state, journal),
    ledger: createLedger(state, journal),
    rolloutState: createRolloutState(state, journal),
    activity: createActivity(state, journal),
  };
}

export function createMemoryStore(): FleetStore {
  const state: MemoryState = {
    applications: new Map(),
    packages: new Map(),
    channels: new Map(),
    groups: new Map(),
    instances: new Map(),
    periods: new Map(),
    outcomes: new Map(),
    halted: new Map(),
    activity: [],
    nextActivityId: 1,
  };

  return {
    driver: "memory",
    ...createScope(state, null),

    async transaction(fn) {
      const journal: Undo[] = [];
      try {
        return await fn(createScope(state, journal));
      } catch (err) {
        for (let i = journal.length - 1; i >= 0; i--) journal[i]();
        throw err;
      }
    },

    async ping() {},

    async prune({ periodsBefore, outcomesBefore }): Promise<PruneReport> {
      let periods = 0;
      for (const [key, row] of state.periods) {
        if (row.periodStart < periodsBefore.getTime()) {
          state.periods.delete(key);
          periods++;
        }
      }
      let outcomeBuckets = 0;
      for (const ring of state.outcomes.values()) {
        outcomeBuckets += ring.prune(outcomesBefore);
      }
      return { periods, outcomeBuckets };
    },
  };
}
