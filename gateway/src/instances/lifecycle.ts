// Instance lifecycle: per-(instance, application) update state machine.
// Transitions are driven only by event reports; check-ins move an instance
// into UpdateGranted, or between UpToDate and Unknown depending on whether it
// runs the channel's package, but never through the event states.

export type InstanceStatus =
  | "Unknown"
  | "UpToDate"
  | "UpdateGranted"
  | "Downloading"
  | "Installing"
  | "Complete"
  | "Errored";

export const INSTANCE_STATUSES: readonly InstanceStatus[] = [
  "Unknown",
  "UpToDate",
  "UpdateGranted",
  "Downloading",
  "Installing",
  "Complete",
  "Errored",
];

export function emptyStatusCounts(): Record<InstanceStatus, number> {
  return { Unknown: 0, UpToDate: 0, UpdateGranted: 0, Downloading: 0, Installing: 0, Complete: 0, Errored: 0 };
}

export interface InstanceRecord {
  id: string;
  applicationId: string;
  groupId: string | null;
  ip: string;
  /** Last version the device reported as installed. */
  version: string;
  status: InstanceStatus;
  grantedVersion: string | null;
  grantedPackageId: string | null;
  lastCheckInAt: string;
  /** Time of the last grant or event report; drives grant expiry. */
  lastUpdateAt: string | null;
  rowVersion: number;
  createdAt: string;
}

export type InstanceWrite = Omit<InstanceRecord, "rowVersion" | "createdAt">;

export type UpdateEventKind =
  | "download-started"
  | "download-finished"
  | "installed"
  | "install-complete"
  | "install-error";

/** States in which a grant is outstanding and the device is expected to report. */
const IN_FLIGHT: ReadonlySet<InstanceStatus> = new Set(["UpdateGranted", "Downloading", "Installing"]);

const TRANSITIONS: Record<UpdateEventKind, { from: ReadonlySet<InstanceStatus>; to: InstanceStatus }> = {
  "download-started": { from: new Set(["UpdateGranted"]), to: "Downloading" },
  "download-finished": { from: new Set(["UpdateGranted", "Downloading"]), to: "Installing" },
  installed: { from: IN_FLIGHT, to: "Installing" },
  "install-complete": { from: IN_FLIGHT, to: "Complete" },
  "install-error": { from: IN_FLIGHT, to: "Errored" },
};

export type TransitionResult =
  | { ok: true; next: InstanceWrite; outcome: "success" | "failure" | null }
  | { ok: false; reason: string };

export function isInFlight(status: InstanceStatus): boolean {
  return IN_FLIGHT.has(status);
}

/**
 * A grant that has seen no grant/event activity for `updateTimeoutMs` is
 * abandoned. Errored grants never expire: the device did report back.
 */
export function isGrantExpired(instance: InstanceRecord, updateTimeoutMs: number, now: Date): boolean {
  if (!isInFlight(instance.status) || !instance.lastUpdateAt) return false;
  return Date.parse(instance.lastUpdateAt) + updateTimeoutMs <= now.getTime();
}

/**
 * True when the instance still owns a throttle slot for `version`: it was
 * granted that version and the grant is neither finished nor abandoned.
 */
export function holdsGrantFor(
  instance: InstanceRecord | null,
  version: string,
  updateTimeoutMs: number,
  now: Date,
): boolean {
  if (!instance || instance.grantedVersion !== version) return false;
  if (instance.status === "Errored") return true;
  return isInFlight(instance.status) && !isGrantExpired(instance, updateTimeoutMs, now);
}

export function applyUpdateEvent(
  instance: InstanceRecord | null,
  event: { kind: UpdateEventKind; version: string },
  now: Date,
): TransitionResult {
  if (!instance) {
    return { ok: false, reason: "instance has never checked in" };
  }
  if (!instance.grantedVersion || instance.grantedVersion !== event.version) {
    return {
      ok: false,
      reason: `event for version ${event.version} but granted version is ${instance.grantedVersion ?? "none"}`,
    };
  }

  const rule = TRANSITIONS[event.kind];
  if (!rule.from.has(instance.status)) {
    return { ok: false, reason: `${event.kind} not accepted in state ${instance.status}` };
  }

  const next: InstanceWrite = {
    id: instance.id,
    applicationId: instance.applicationId,
    groupId: instance.groupId,
    ip: instance.ip,
    version: rule.to === "Complete" ? event.version : instance.version,
    status: rule.to,
    grantedVersion: instance.grantedVersion,
    grantedPackageId: instance.grantedPackageId,
    lastCheckInAt: instance.lastCheckInAt,
    lastUpdateAt: now.toISOString(),
  };

  const outcome = rule.to === "Complete" ? "success" : rule.to === "Errored" ? "failure" : null;
  return { ok: true, next, outcome };
}

export interface CheckInOutcome {
  /** Package handed out on this check-in, if any. */
  grant: { packageId: string; version: string; slot: "new" | "held" } | null;
  /** Device runs the channel's package (or something newer). */
  upToDate: boolean;
}

/** Instance row to persist after a check-in has been decided. */
export function applyCheckIn(
  prior: InstanceRecord | null,
  request: { instanceId: string; applicationId: string; groupId: string; version: string; ip: string },
  outcome: CheckInOutcome,
  now: Date,
): InstanceWrite {
  const at = now.toISOString();
  const base: InstanceWrite = {
    id: request.instanceId,
    applicationId: request.applicationId,
    groupId: request.groupId,
    ip: request.ip,
    version: request.version,
    status: prior?.status ?? "Unknown",
    grantedVersion: prior?.grantedVersion ?? null,
    grantedPackageId: prior?.grantedPackageId ?? null,
    lastCheckInAt: at,
    lastUpdateAt: prior?.lastUpdateAt ?? null,
  };

  if (outcome.grant) {
    // A repeated check-in mid-download keeps its progress; anything else
    // (first grant, retry after an error, re-grant after expiry) restarts
    // at UpdateGranted.
    if (outcome.grant.slot === "held" && prior !== null && isInFlight(prior.status)) return base;
    return {
      ...base,
      status: "UpdateGranted",
      grantedVersion: outcome.grant.version,
      grantedPackageId: outcome.grant.packageId,
      lastUpdateAt: at,
    };
  }

  if (outcome.upToDate) return { ...base, status: "UpToDate" };
  // Settled but behind the channel (throttled, held, or the channel moved on).
  if (base.status === "UpToDate" || base.status === "Complete") return { ...base, status: "Unknown" };
  return base;
}
