// Rollout Policy Evaluator: pure decision function. It never touches the
// store; the protocol handler commits whatever it returns, and the admin
// preview route calls it as a dry run.

import type { Package, RolloutPolicy } from "../catalog/types.js";
import { holdsGrantFor, type InstanceRecord } from "../instances/lifecycle.js";
import { isBreakerTripped, type LedgerSnapshot } from "./ledger.js";
import { compareVersions } from "./versions.js";

export type DenyReason = "RolloutDisabled" | "RolloutHalted" | "OutsideOfficeHours" | "Throttled";
export type NoUpdateReason = "no-package" | "up-to-date" | "newer-version" | "arch-mismatch";

export type RolloutDecision =
  | { kind: "no-update"; reason: NoUpdateReason }
  | { kind: "denied"; reason: DenyReason }
  | {
    kind: "granted";
    package: Package;
    /** "new" must be backed by a ledger reservation; "held" reuses the instance's slot. */
    slot: "new" | "held";
  };

export interface EvaluationInput {
  policy: RolloutPolicy;
  /** The group's effective package: its channel's current package. */
  package: Package | null;
  ledger: LedgerSnapshot;
  instance: InstanceRecord | null;
  /** Version the device reports on this check-in. */
  reportedVersion: string;
  now: Date;
}

export const OFFICE_HOURS = { startHour: 9, endHour: 17 } as const;

/** Hour of day (0-23) at `now` in the given IANA timezone; falls back to UTC. */
export function localHour(now: Date, timezone: string): number {
  try {
    const formatted = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hour: "numeric",
      hourCycle: "h23",
    }).format(now);
    const hour = Number.parseInt(formatted, 10);
    if (Number.isFinite(hour)) return hour % 24;
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
  }
  return now.getUTCHours();
}

export function isWithinOfficeHours(now: Date, timezone: string): boolean {
  const hour = localHour(now, timezone);
  return hour >= OFFICE_HOURS.startHour && hour < OFFICE_HOURS.endHour;
}

function isAlreadyCurrent(instance: InstanceRecord | null, reportedVersion: string, pkg: Package): NoUpdateReason | null {
  const cmp = compareVersions(reportedVersion, pkg.version);
  if (cmp !== null && cmp > 0) return "newer-version";
  // An errored install is retried even though the device reports the target.
  if (instance?.status === "Errored") return null;
  if (pkg.version === reportedVersion) return "up-to-date";
  return null;
}

export function evaluateRollout(input: EvaluationInput): RolloutDecision {
  const { policy, ledger, instance, now } = input;

  if (!policy.updatesEnabled) {
    return { kind: "denied", reason: "RolloutDisabled" };
  }

  const pkg = input.package;
  if (!pkg) {
    return { kind: "no-update", reason: "no-package" };
  }

  // Devices already on the target never see the breaker or the cap.
  const current = isAlreadyCurrent(instance, input.reportedVersion, pkg);
  if (current) {
    return { kind: "no-update", reason: current };
  }

  if (isBreakerTripped(policy, ledger)) {
    return { kind: "denied", reason: "RolloutHalted" };
  }

  if (policy.officeHours && !isWithinOfficeHours(now, policy.timezone)) {
    return { kind: "denied", reason: "OutsideOfficeHours" };
  }

  // Retries and repeated check-ins for an outstanding grant reuse the slot
  // taken the first time this (instance, version) pair was granted.
  if (holdsGrantFor(instance, pkg.version, policy.updateTimeoutMs, now)) {
    return { kind: "granted", package: pkg, slot: "held" };
  }

  if (ledger.updatesGranted >= policy.maxUpdatesPerPeriod) {
    return { kind: "denied", reason: "Throttled" };
  }

  return { kind: "granted", package: pkg, slot: "new" };
}
