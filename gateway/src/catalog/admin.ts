// Administrative writes for the catalog. Every package assignment passes
// through validatePackagePlacement before the engine can observe it.

import type { RolloutDefaults } from "../config/schema.js";
import { publishActivity, recordActivity, type ActivityBroadcast } from "../activity/emitter.js";
import type { ActivityEntry } from "../activity/types.js";
import { log } from "../logging.js";
import type { FleetStore } from "../store/types.js";
import { CatalogError } from "./errors.js";
import { validatePackagePlacement } from "./placement.js";
import { defaultPolicy, mergePolicy } from "./policy.js";
import {
  isArch,
  type Application,
  type Channel,
  type Group,
  type NewApplication,
  type NewChannel,
  type NewGroup,
  type NewPackage,
  type Package,
  type RolloutPolicy,
} from "./types.js";

export interface CatalogAdminDeps {
  store: FleetStore;
  defaults: RolloutDefaults;
  broadcast?: ActivityBroadcast | null;
  clock?: () => Date;
}

export interface CatalogAdmin {
  addApplication(input: NewApplication): Promise<Application>;
  addPackage(input: NewPackage): Promise<Package>;
  addChannel(input: NewChannel): Promise<Channel>;
  setChannelPackage(channelId: string, packageId: string | null): Promise<Channel>;
  addGroup(input: NewGroup): Promise<Group>;
  updateGroupPolicy(groupId: string, patch: Partial<RolloutPolicy>): Promise<Group>;
}

async function requireApplication(store: FleetStore, id: string): Promise<Application> {
  const app = await store.catalog.getApplication(id);
  if (!app) throw new CatalogError("NotFound", `application ${id} not found`);
  return app;
}

export function createCatalogAdmin(deps: CatalogAdminDeps): CatalogAdmin {
  const { store } = deps;
  const clock = deps.clock ?? (() => new Date());
  const broadcast = deps.broadcast ?? null;

  return {
    async addApplication(input) {
      const name = input.name.trim();
      if (!name) throw new CatalogError("InvalidInput", "application name is required");
      const app = await store.catalog.insertApplication({ name, description: input.description ?? "" });
      log("catalog", `Application created: ${app.name}`, { applicationId: app.id });
      return app;
    },

    async addPackage(input) {
      if (!isArch(input.arch)) throw new CatalogError("InvalidArch", `unknown arch ${input.arch}`);
      await requireApplication(store, input.applicationId);
      const pkg = await store.catalog.insertPackage({
        applicationId: input.applicationId,
        arch: input.arch,
        version: input.version,
        url: input.url,
        filename: input.filename ?? "",
        hash: input.hash ?? "",
        size: input.size ?? 0,
        channelsBlacklist: [...new Set(input.channelsBlacklist ?? [])],
      });
      log("catalog", `Package ${pkg.version} (${pkg.arch}) published`, { applicationId: pkg.applicationId, packageId: pkg.id });
      return pkg;
    },

    async addChannel(input) {
      if (!isArch(input.arch)) throw new CatalogError("InvalidArch", `unknown arch ${input.arch}`);
      await requireApplication(store, input.applicationId);
      const arch = input.arch;
      const packageId = input.packageId ?? null;

      return store.transaction(async (scope) => {
        const channel = await scope.catalog.insertChannel({
          applicationId: input.applicationId,
          name: input.name,
          color: input.color ?? "",
          arch,
          packageId: null,
        });
        if (!packageId) return channel;

        // The channel id only exists now, so the blacklist check runs after insert;
        // a failure rolls the insert back.
        const pkg = await validatePackagePlacement(scope.catalog, packageId, channel.id, input.applicationId, arch);
        await scope.catalog.updateChannelPackage(channel.id, pkg.id);
        return { ...channel, packageId: pkg.id, package: pkg };
      });
    },

    async setChannelPackage(channelId, packageId) {
      const now = clock();
      const activity: ActivityEntry[] = [];

      const updated = await store.transaction(async (scope) => {
        const before = await scope.catalog.getChannel(channelId);
        if (!before) throw new CatalogError("NotFound", `channel ${channelId} not found`);

        const pkg = packageId
          ? await validatePackagePlacement(scope.catalog, packageId, before.id, before.applicationId, before.arch)
          : null;

        const touched = await scope.catalog.updateChannelPackage(channelId, pkg?.id ?? null);
        if (!touched) throw new CatalogError("NoRowsAffected");

        if (pkg && before.packageId !== pkg.id) {
          activity.push(await recordActivity(scope.activity, "channel.package_updated", {
            applicationId: pkg.applicationId,
            channelId,
            version: pkg.version,
          }, now));
        }
        return { ...before, packageId: pkg?.id ?? null, package: pkg };
      });

      publishActivity(broadcast, activity);
      log("catalog", `Channel ${updated.name} now points at ${updated.package?.version ?? "no package"}`, {
        channelId,
        packageId: updated.packageId,
      });
      return updated;
    },

    async addGroup(input) {
      await requireApplication(store, input.applicationId);
      const channel = await store.catalog.getChannel(input.channelId);
      if (!channel) throw new CatalogError("NotFound", `channel ${input.channelId} not found`);
      if (channel.applicationId !== input.applicationId) throw new CatalogError("InvalidChannel");

      const policy = mergePolicy(defaultPolicy(deps.defaults), input.policy ?? {});
      const group = await store.catalog.insertGroup({
        applicationId: input.applicationId,
        channelId: channel.id,
        name: input.name,
        policy,
      });
      log("catalog", `Group created: ${group.name}`, { groupId: group.id, channelId: channel.id });
      return group;
    },

    async updateGroupPolicy(groupId, patch) {
      const group = await store.catalog.getGroup(groupId);
      if (!group) throw new CatalogError("NotFound", `group ${groupId} not found`);

      const policy = mergePolicy(group.policy, patch);
      const touched = await store.catalog.updateGroupPolicy(groupId, policy);
      if (!touched) throw new CatalogError("NoRowsAffected");
      log("catalog", `Group ${group.name} policy updated`, { groupId, patch });
      return { ...group, policy };
    },
  };
}
