// Protocol handler: terminates device check-ins and event reports. Decisions
// are computed from a snapshot outside the transaction; the transaction then
// reserves the throttle slot and writes the instance row, and a lost race on
// either fails closed. Breaker state is only ever synced from a ledger read
// inside the transaction.

import { publishActivity, recordActivity, type ActivityBroadcast } from "../activity/emitter.js";
import type { ActivityEntry } from "../activity/types.js";
import type { Arch, Group } from "../catalog/types.js";
import {
  applyCheckIn,
  applyUpdateEvent,
  type CheckInOutcome,
  type InstanceRecord,
} from "../instances/lifecycle.js";
import { log, logDebug, logWarn } from "../logging.js";
import { evaluateRollout, type RolloutDecision } from "../rollout/evaluator.js";
import { isBreakerTripped, type LedgerSnapshot } from "../rollout/ledger.js";
import { StaleWriteError } from "../store/errors.js";
import type { FleetStore, StoreScope } from "../store/types.js";
import {
  ProtocolError,
  parseCheckInRequest,
  parseEventRequest,
  toCheckInResponse,
  type CheckInRequest,
  type CheckInResponse,
  type EventAck,
} from "./protocol.js";

export interface ProtocolHandlerDeps {
  store: FleetStore;
  broadcast?: ActivityBroadcast | null;
  clock?: () => Date;
}

export interface RequestMeta {
  ip?: string;
}

export interface ProtocolHandler {
  handleCheckIn(body: unknown, meta?: RequestMeta): Promise<CheckInResponse>;
  handleEvent(body: unknown): Promise<EventAck>;
}

/** Runs `attempt`, and once more if it lost an optimistic write. */
async function retryOnStaleWrite<T>(label: string, attempt: () => Promise<T>): Promise<T> {
  try {
    return await attempt();
  } catch (err) {
    if (!(err instanceof StaleWriteError)) throw err;
    logDebug("omaha", `${label}: stale write on ${err.instanceId}, recomputing`);
  }

  try {
    return await attempt();
  } catch (err) {
    if (err instanceof StaleWriteError) {
      throw new ProtocolError("TransientConflict", `${label}: instance ${err.instanceId} is being updated concurrently`);
    }
    throw err;
  }
}

/**
 * Stores the breaker state the group's current ledger implies. The halted
 * flag is locked before the ledger is read, so the outcome counts and the
 * write agree. Only the caller whose compare-and-set flips it records the
 * halt/resume activity.
 */
async function syncBreaker(scope: StoreScope, group: Group, now: Date): Promise<ActivityEntry | null> {
  const halted = await scope.rolloutState.lockHalted(group.id);
  const snapshot = await scope.ledger.snapshot(group.id, group.policy, now);
  const tripped = isBreakerTripped(group.policy, snapshot);
  if (halted === tripped) return null;
  const flipped = await scope.rolloutState.setHalted(group.id, tripped, now);
  if (!flipped) return null;

  const version = group.channel?.package?.version ?? "";
  if (tripped) {
    logWarn("rollout", `Rollout halted for group ${group.name}`, {
      groupId: group.id,
      successes: snapshot.successes,
      failures: snapshot.failures,
    });
  } else {
    log("rollout", `Rollout resumed for group ${group.name}`, { groupId: group.id });
  }
  return recordActivity(scope.activity, tripped ? "rollout.halted" : "rollout.resumed", {
    applicationId: group.applicationId,
    groupId: group.id,
    channelId: group.channelId,
    version,
  }, now);
}

function archMismatch(group: Group, arch: Arch): boolean {
  const channelArch = group.channel?.arch ?? "all";
  return channelArch !== "all" && arch !== "all" && channelArch !== arch;
}

/** Decision for one check-in against a ledger snapshot. Writes nothing. */
export function decideCheckIn(input: {
  group: Group;
  arch: Arch;
  version: string;
  instance: InstanceRecord | null;
  snapshot: LedgerSnapshot;
  now: Date;
}): RolloutDecision {
  const { group } = input;
  if (archMismatch(group, input.arch)) return { kind: "no-update", reason: "arch-mismatch" };
  return evaluateRollout({
    policy: group.policy,
    package: group.channel?.package ?? null,
    ledger: input.snapshot,
    instance: input.instance,
    reportedVersion: input.version,
    now: input.now,
  });
}

function toOutcome(decision: RolloutDecision): CheckInOutcome {
  if (decision.kind === "granted") {
    return {
      grant: { packageId: decision.package.id, version: decision.package.version, slot: decision.slot },
      upToDate: false,
    };
  }
  const upToDate = decision.kind === "no-update"
    && (decision.reason === "up-to-date" || decision.reason === "newer-version");
  return { grant: null, upToDate };
}

export function createProtocolHandler(deps: ProtocolHandlerDeps): ProtocolHandler {
  const { store } = deps;
  const clock = deps.clock ?? (() => new Date());
  const broadcast = deps.broadcast ?? null;

  async function loadGroup(request: CheckInRequest): Promise<Group> {
    const group = await store.catalog.getGroup(request.groupId);
    if (!group || group.applicationId !== request.appId) {
      throw new ProtocolError("MalformedRequest", `unknown group ${request.groupId} for application ${request.appId}`);
    }
    return group;
  }

  async function checkInOnce(
    request: CheckInRequest,
    group: Group,
    ip: string,
    now: Date,
  ): Promise<{ decision: RolloutDecision; instance: InstanceRecord; activity: ActivityEntry[] }> {
    const prior = await store.instances.get(request.instanceId, request.appId);
    const snapshot = await store.ledger.snapshot(group.id, group.policy, now);

    const evaluated = decideCheckIn({
      group,
      arch: request.arch,
      version: request.version,
      instance: prior,
      snapshot,
      now,
    });

    return store.transaction(async (scope) => {
      let decision = evaluated;
      if (decision.kind === "granted" && decision.slot === "new") {
        const reserved = await scope.ledger.tryReserveGrant(group.id, group.policy, now);
        if (!reserved) decision = { kind: "denied", reason: "Throttled" };
      }

      const next = applyCheckIn(prior, {
        instanceId: request.instanceId,
        applicationId: request.appId,
        groupId: group.id,
        version: request.version,
        ip,
      }, toOutcome(decision), now);
      const instance = await scope.instances.save(next, prior ? prior.rowVersion : null);

      const activity: ActivityEntry[] = [];
      const breaker = await syncBreaker(scope, group, now);
      if (breaker) activity.push(breaker);
      return { decision, instance, activity };
    });
  }

  return {
    async handleCheckIn(body, meta) {
      const request = parseCheckInRequest(body);
      const group = await loadGroup(request);
      const now = clock();

      const { decision, instance, activity } = await retryOnStaleWrite(
        "check-in",
        () => checkInOnce(request, group, meta?.ip ?? "", now),
      );
      publishActivity(broadcast, activity);

      if (decision.kind === "granted") {
        log("omaha", `Granted ${decision.package.version} to ${request.instanceId}`, {
          groupId: group.id,
          slot: decision.slot,
        });
      } else {
        logDebug("omaha", `Check-in from ${request.instanceId}: ${decision.kind} (${decision.reason})`, {
          groupId: group.id,
          status: instance.status,
        });
      }
      return toCheckInResponse(decision);
    },

    async handleEvent(body) {
      const event = parseEventRequest(body);
      const now = clock();

      const result = await retryOnStaleWrite("event", () => store.transaction(async (scope) => {
        const activity: ActivityEntry[] = [];
        const instance = await scope.instances.get(event.instanceId, event.appId);
        if (!instance) {
          throw new ProtocolError("UnexpectedEvent", `instance ${event.instanceId} has never checked in`);
        }

        const transition = applyUpdateEvent(instance, { kind: event.kind, version: event.version }, now);
        if (!transition.ok) {
          throw new ProtocolError("UnexpectedEvent", transition.reason);
        }

        const saved = await scope.instances.save(transition.next, instance.rowVersion);
        const group = instance.groupId ? await scope.catalog.getGroup(instance.groupId) : null;

        if (transition.outcome && group) {
          await scope.ledger.recordOutcome(group.id, transition.outcome === "success", group.policy, now);
          const breaker = await syncBreaker(scope, group, now);
          if (breaker) activity.push(breaker);
        }

        if (transition.outcome === "failure") {
          activity.push(await recordActivity(scope.activity, "instance.update_failed", {
            applicationId: instance.applicationId,
            groupId: instance.groupId,
            channelId: group?.channelId ?? null,
            instanceId: instance.id,
            version: event.version,
          }, now));
        }
        return { saved, activity };
      }));

      publishActivity(broadcast, result.activity);
      logDebug("omaha", `Event ${event.kind} from ${event.instanceId} -> ${result.saved.status}`);
      return { ok: true, status: result.saved.status };
    },
  };
}
