// Administrative surface under /api. Every package assignment goes through
// CatalogAdmin, so placement validation cannot be bypassed from here.

import { z } from "zod";
import type { CatalogAdmin } from "../catalog/admin.js";
import { CatalogError } from "../catalog/errors.js";
import { PartialRolloutPolicySchema } from "../catalog/policy.js";
import { ARCHES, type Group } from "../catalog/types.js";
import { getRecentLogs, LOG_LEVELS, LOG_SOURCES, queryLogs } from "../logging.js";
import { decideCheckIn } from "../omaha/handler.js";
import { toCheckInResponse } from "../omaha/protocol.js";
import { failureRatio, isBreakerTripped } from "../rollout/ledger.js";
import type { FleetStore } from "../store/types.js";
import { guarded } from "./errors.js";
import type { RouteDefinition } from "./routes.js";

export interface AdminRouteDeps {
  store: FleetStore;
  admin: CatalogAdmin;
  clock?: () => Date;
  /** Read /api/logs from service_logs instead of the in-memory buffer. */
  persistedLogs?: boolean;
}

const ApplicationBody = z.object({
  name: z.string(),
  description: z.string().optional(),
});

const PackageBody = z.object({
  arch: z.string(),
  version: z.string().min(1),
  url: z.string().min(1),
  filename: z.string().optional(),
  hash: z.string().optional(),
  size: z.number().int().min(0).optional(),
  channelsBlacklist: z.array(z.string()).optional(),
});

const ChannelBody = z.object({
  name: z.string().min(1),
  color: z.string().optional(),
  arch: z.string(),
  packageId: z.string().nullable().optional(),
});

const ChannelPackageBody = z.object({
  packageId: z.string().nullable(),
});

const GroupBody = z.object({
  channelId: z.string().min(1),
  name: z.string().min(1),
  policy: PartialRolloutPolicySchema.optional(),
});

const PreviewQuery = z.object({
  instanceId: z.string().min(1),
  version: z.string().min(1),
  arch: z.enum(ARCHES).default("all"),
});

const ActivityQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  perPage: z.coerce.number().int().min(1).max(100).default(20),
});

const LogsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  level: z.enum(LOG_LEVELS).optional(),
  source: z.enum(LOG_SOURCES).optional(),
  search: z.string().optional(),
});

function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    throw new CatalogError("InvalidInput", detail);
  }
  return result.data;
}

export function createAdminRoutes(deps: AdminRouteDeps): RouteDefinition[] {
  const { store, admin } = deps;
  const clock = deps.clock ?? (() => new Date());

  async function requireGroup(groupId: string): Promise<Group> {
    const group = await store.catalog.getGroup(groupId);
    if (!group) throw new CatalogError("NotFound", `group ${groupId} not found`);
    return group;
  }

  return [
    {
      method: "post",
      path: "/api/apps",
      handler: guarded("create application", async (req, res) => {
        const body = parseInput(ApplicationBody, req.body);
        res.status(201).json(await admin.addApplication(body));
      }),
    },
    {
      method: "post",
      path: "/api/apps/:appId/packages",
      handler: guarded("create package", async (req, res) => {
        const body = parseInput(PackageBody, req.body);
        res.status(201).json(await admin.addPackage({ ...body, applicationId: req.params.appId }));
      }),
    },
    {
      method: "post",
      path: "/api/apps/:appId/channels",
      handler: guarded("create channel", async (req, res) => {
        const body = parseInput(ChannelBody, req.body);
        res.status(201).json(await admin.addChannel({ ...body, applicationId: req.params.appId }));
      }),
    },
    {
      method: "put",
      path: "/api/channels/:channelId/package",
      handler: guarded("set channel package", async (req, res) => {
        const { packageId } = parseInput(ChannelPackageBody, req.body);
        res.json(await admin.setChannelPackage(req.params.channelId, packageId));
      }),
    },
    {
      method: "post",
      path: "/api/apps/:appId/groups",
      handler: guarded("create group", async (req, res) => {
        const body = parseInput(GroupBody, req.body);
        res.status(201).json(await admin.addGroup({ ...body, applicationId: req.params.appId }));
      }),
    },
    {
      method: "patch",
      path: "/api/groups/:groupId/policy",
      handler: guarded("update group policy", async (req, res) => {
        const patch = parseInput(PartialRolloutPolicySchema, req.body);
        res.json(await admin.updateGroupPolicy(req.params.groupId, patch));
      }),
    },
    {
      method: "get",
      path: "/api/groups/:groupId/status",
      handler: guarded("group status", async (req, res) => {
        const group = await requireGroup(req.params.groupId);
        const now = clock();
        const [snapshot, halted, instances] = await Promise.all([
          store.ledger.snapshot(group.id, group.policy, now),
          store.rolloutState.isHalted(group.id),
          store.instances.countByStatus(group.id),
        ]);
        res.json({
          group,
          ledger: {
            periodStart: snapshot.periodStart.toISOString(),
            updatesGranted: snapshot.updatesGranted,
            successes: snapshot.successes,
            failures: snapshot.failures,
            failureRatio: failureRatio(snapshot),
          },
          breaker: { tripped: isBreakerTripped(group.policy, snapshot), halted },
          instances,
        });
      }),
    },
    {
      method: "get",
      path: "/api/groups/:groupId/preview",
      handler: guarded("preview decision", async (req, res) => {
        const query = parseInput(PreviewQuery, req.query);
        const group = await requireGroup(req.params.groupId);
        const now = clock();
        const [instance, snapshot] = await Promise.all([
          store.instances.get(query.instanceId, group.applicationId),
          store.ledger.snapshot(group.id, group.policy, now),
        ]);
        const decision = decideCheckIn({ group, arch: query.arch, version: query.version, instance, snapshot, now });
        res.json({ decision, response: toCheckInResponse(decision) });
      }),
    },
    {
      method: "get",
      path: "/api/activity",
      handler: guarded("list activity", async (req, res) => {
        const { page, perPage } = parseInput(ActivityQuery, req.query);
        res.json({ page, perPage, entries: await store.activity.list({ page, perPage }) });
      }),
    },
    {
      method: "get",
      path: "/api/logs",
      handler: guarded("list logs", async (req, res) => {
        const options = parseInput(LogsQuery, req.query);
        if (deps.persistedLogs) {
          res.json({ logs: await queryLogs(options) });
        } else {
          res.json({ logs: getRecentLogs(options) });
        }
      }),
    },
  ];
}
