// Store contracts shared by the Postgres and in-memory implementations.
// The engine owns instances, the ledger and rollout state; the catalog is
// read-mostly and written only through catalog/admin.ts.

import type {
  Application,
  Arch,
  Channel,
  Group,
  Package,
  RolloutPolicy,
} from "../catalog/types.js";
import type { InstanceRecord, InstanceStatus, InstanceWrite } from "../instances/lifecycle.js";
import type { StatisticsLedger } from "../rollout/ledger.js";
import type { ActivityEntry, NewActivity } from "../activity/types.js";

export interface CatalogRepository {
  getApplication(id: string): Promise<Application | null>;
  getPackage(id: string): Promise<Package | null>;
  getChannel(id: string): Promise<Channel | null>;
  getGroup(id: string): Promise<Group | null>;

  insertApplication(input: { name: string; description: string }): Promise<Application>;
  insertPackage(input: Omit<Package, "id" | "createdAt">): Promise<Package>;
  insertChannel(input: {
    applicationId: string;
    name: string;
    color: string;
    arch: Arch;
    packageId: string | null;
  }): Promise<Channel>;
  /** Returns false when no channel row was touched. */
  updateChannelPackage(channelId: string, packageId: string | null): Promise<boolean>;
  insertGroup(input: {
    applicationId: string;
    channelId: string;
    name: string;
    policy: RolloutPolicy;
  }): Promise<Group>;
  updateGroupPolicy(groupId: string, policy: RolloutPolicy): Promise<boolean>;
}

export type InstanceStatusCounts = Record<InstanceStatus, number>;

export interface InstanceRegistry {
  get(instanceId: string, applicationId: string): Promise<InstanceRecord | null>;
  /**
   * Writes the row if its stored rowVersion still equals `expectedRowVersion`
   * (null: the row must not exist yet). Throws StaleWriteError otherwise.
   */
  save(next: InstanceWrite, expectedRowVersion: number | null): Promise<InstanceRecord>;
  countByStatus(groupId: string): Promise<InstanceStatusCounts>;
}

export interface RolloutStateStore {
  isHalted(groupId: string): Promise<boolean>;
  /**
   * Reads the halted flag and, inside a transaction, locks it until commit so
   * that concurrent breaker decisions for the group run one at a time.
   */
  lockHalted(groupId: string): Promise<boolean>;
  /** Compare-and-set; true only for the caller that flipped the state. */
  setHalted(groupId: string, halted: boolean, now: Date): Promise<boolean>;
}

export interface ActivityLog {
  append(entry: NewActivity): Promise<ActivityEntry>;
  list(options: { page: number; perPage: number }): Promise<ActivityEntry[]>;
}

export interface StoreScope {
  catalog: CatalogRepository;
  instances: InstanceRegistry;
  ledger: StatisticsLedger;
  rolloutState: RolloutStateStore;
  activity: ActivityLog;
}

export interface PruneOptions {
  periodsBefore: Date;
  outcomesBefore: Date;
}

export interface PruneReport {
  periods: number;
  outcomeBuckets: number;
}

export interface FleetStore extends StoreScope {
  readonly driver: "postgres" | "memory";
  /** Runs `fn` atomically: every write made through `scope` commits or none does. */
  transaction<T>(fn: (scope: StoreScope) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  prune(options: PruneOptions): Promise<PruneReport>;
}
