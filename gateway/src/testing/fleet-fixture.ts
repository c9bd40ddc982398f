// Seeds a memory store with one application, one channel carrying a
// package, and one group tracking that channel.

import { createCatalogAdmin, type CatalogAdmin } from "../catalog/admin.js";
import type { Channel, Group, Package, RolloutPolicy } from "../catalog/types.js";
import { RolloutDefaultsSchema } from "../config/schema.js";
import type { ActivityBroadcast } from "../activity/emitter.js";
import { createMemoryStore } from "../store/memory.js";
import type { FleetStore } from "../store/types.js";

export interface FleetFixture {
  store: FleetStore;
  admin: CatalogAdmin;
  appId: string;
  channel: Channel;
  group: Group;
  pkg: Package;
}

export async function seedFleet(options: {
  policy?: Partial<RolloutPolicy>;
  arch?: "all" | "amd64" | "aarch64" | "x86";
  version?: string;
  broadcast?: ActivityBroadcast;
  clock?: () => Date;
} = {}): Promise<FleetFixture> {
  const store = createMemoryStore();
  const admin = createCatalogAdmin({
    store,
    defaults: RolloutDefaultsSchema.parse({}),
    broadcast: options.broadcast ?? null,
    clock: options.clock,
  });
  const arch = options.arch ?? "all";

  const app = await admin.addApplication({ name: "edge-agent" });
  const pkg = await admin.addPackage({
    applicationId: app.id,
    arch,
    version: options.version ?? "2.0.0",
    url: "https://updates.example.test/edge-agent/",
    filename: "edge-agent-2.0.0.tar.gz",
    hash: "c2hhMjU2LXRlc3Q=",
    size: 4096,
  });
  const channel = await admin.addChannel({ applicationId: app.id, name: "stable", arch, packageId: pkg.id });
  const group = await admin.addGroup({
    applicationId: app.id,
    channelId: channel.id,
    name: "canary",
    policy: options.policy,
  });

  return { store, admin, appId: app.id, channel, group, pkg };
}

export function checkInBody(fixture: FleetFixture, instanceId: string, version = "1.0.0"): Record<string, unknown> {
  return { instanceId, appId: fixture.appId, groupId: fixture.group.id, version };
}

export function eventBody(
  fixture: FleetFixture,
  instanceId: string,
  eventType: number,
  eventResult: number,
  version = fixture.pkg.version,
): Record<string, unknown> {
  return { instanceId, appId: fixture.appId, version, eventType, eventResult };
}
