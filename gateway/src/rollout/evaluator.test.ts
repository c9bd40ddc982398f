import { describe, expect, it } from "vitest";
import type { Package, RolloutPolicy } from "../catalog/types.js";
import type { InstanceRecord } from "../instances/lifecycle.js";
import { evaluateRollout, isWithinOfficeHours, localHour, type EvaluationInput } from "./evaluator.js";

const NOW = new Date("2026-03-02T10:00:00Z");

const policy: RolloutPolicy = {
  updatesEnabled: true,
  maxUpdatesPerPeriod: 3,
  periodIntervalMs: 3_600_000,
  updateTimeoutMs: 600_000,
  safeMode: true,
  failureThreshold: 0.5,
  failureMinSamples: 2,
  failureWindowMs: 3_600_000,
  officeHours: false,
  timezone: "UTC",
};

const pkg: Package = {
  id: "pkg-2",
  applicationId: "app-1",
  arch: "all",
  version: "2.0.0",
  url: "https://updates.example.test/",
  filename: "agent.tar.gz",
  hash: "aGFzaA==",
  size: 10,
  channelsBlacklist: [],
  createdAt: NOW.toISOString(),
};

function instance(overrides: Partial<InstanceRecord> = {}): InstanceRecord {
  return {
    id: "node-1",
    applicationId: "app-1",
    groupId: "group-1",
    ip: "",
    version: "1.0.0",
    status: "UpToDate",
    grantedVersion: null,
    grantedPackageId: null,
    lastCheckInAt: NOW.toISOString(),
    lastUpdateAt: null,
    rowVersion: 1,
    createdAt: NOW.toISOString(),
    ...overrides,
  };
}

function input(overrides: Partial<EvaluationInput> = {}): EvaluationInput {
  return {
    policy,
    package: pkg,
    ledger: { groupId: "group-1", periodStart: NOW, updatesGranted: 0, successes: 0, failures: 0 },
    instance: null,
    reportedVersion: "1.0.0",
    now: NOW,
    ...overrides,
  };
}

describe("evaluateRollout", () => {
  it("grants a new slot to an eligible instance", () => {
    expect(evaluateRollout(input())).toEqual({ kind: "granted", package: pkg, slot: "new" });
  });

  it("denies when updates are disabled, ahead of every other check", () => {
    const decision = evaluateRollout(input({
      policy: { ...policy, updatesEnabled: false },
      package: null,
      ledger: { groupId: "group-1", periodStart: NOW, updatesGranted: 99, successes: 0, failures: 9 },
    }));
    expect(decision).toEqual({ kind: "denied", reason: "RolloutDisabled" });
  });

  it("halts when the failure ratio exceeds the threshold in safe mode", () => {
    const ledger = { groupId: "group-1", periodStart: NOW, updatesGranted: 0, successes: 1, failures: 2 };
    expect(evaluateRollout(input({ ledger }))).toEqual({ kind: "denied", reason: "RolloutHalted" });
    expect(evaluateRollout(input({ ledger, policy: { ...policy, safeMode: false } })).kind).toBe("granted");
  });

  it("does not halt below the minimum sample count", () => {
    const ledger = { groupId: "group-1", periodStart: NOW, updatesGranted: 0, successes: 0, failures: 1 };
    expect(evaluateRollout(input({ ledger })).kind).toBe("granted");
  });

  it("does not halt at exactly the threshold", () => {
    const ledger = { groupId: "group-1", periodStart: NOW, updatesGranted: 0, successes: 2, failures: 2 };
    expect(evaluateRollout(input({ ledger })).kind).toBe("granted");
  });

  it("reports no-package when the channel points nowhere", () => {
    expect(evaluateRollout(input({ package: null }))).toEqual({ kind: "no-update", reason: "no-package" });
  });

  it("reports up-to-date for the package version unless the last attempt errored", () => {
    expect(evaluateRollout(input({ reportedVersion: "2.0.0" }))).toEqual({ kind: "no-update", reason: "up-to-date" });

    const errored = instance({ status: "Errored", grantedVersion: "2.0.0", lastUpdateAt: NOW.toISOString() });
    expect(evaluateRollout(input({ reportedVersion: "2.0.0", instance: errored }))).toEqual({
      kind: "granted",
      package: pkg,
      slot: "held",
    });
  });

  it("never offers a downgrade", () => {
    expect(evaluateRollout(input({ reportedVersion: "2.0.1" }))).toEqual({ kind: "no-update", reason: "newer-version" });
  });

  it("never offers a downgrade to an instance whose last attempt errored", () => {
    const errored = instance({ status: "Errored", grantedVersion: "2.0.0", lastUpdateAt: NOW.toISOString() });
    expect(evaluateRollout(input({ reportedVersion: "2.1.0", instance: errored }))).toEqual({
      kind: "no-update",
      reason: "newer-version",
    });
  });

  it("answers up-to-date ahead of a tripped breaker or a spent cap", () => {
    const tripped = { groupId: "group-1", periodStart: NOW, updatesGranted: 0, successes: 0, failures: 3 };
    const spent = { groupId: "group-1", periodStart: NOW, updatesGranted: 3, successes: 0, failures: 0 };

    expect(evaluateRollout(input({ reportedVersion: "2.0.0", ledger: tripped }))).toEqual({
      kind: "no-update",
      reason: "up-to-date",
    });
    expect(evaluateRollout(input({ reportedVersion: "2.0.0", ledger: spent }))).toEqual({
      kind: "no-update",
      reason: "up-to-date",
    });
    expect(evaluateRollout(input({ reportedVersion: "3.0.0", ledger: tripped }))).toEqual({
      kind: "no-update",
      reason: "newer-version",
    });
  });

  it("throttles new grants at the period cap", () => {
    const ledger = { groupId: "group-1", periodStart: NOW, updatesGranted: 3, successes: 0, failures: 0 };
    expect(evaluateRollout(input({ ledger }))).toEqual({ kind: "denied", reason: "Throttled" });
  });

  it("keeps serving an in-flight grant past the cap", () => {
    const ledger = { groupId: "group-1", periodStart: NOW, updatesGranted: 3, successes: 0, failures: 0 };
    const downloading = instance({
      status: "Downloading",
      grantedVersion: "2.0.0",
      lastUpdateAt: new Date(NOW.getTime() - 60_000).toISOString(),
    });
    expect(evaluateRollout(input({ ledger, instance: downloading }))).toEqual({
      kind: "granted",
      package: pkg,
      slot: "held",
    });
  });

  it("treats a grant older than the update timeout as abandoned", () => {
    const stale = instance({
      status: "UpdateGranted",
      grantedVersion: "2.0.0",
      lastUpdateAt: new Date(NOW.getTime() - 600_000).toISOString(),
    });
    expect(evaluateRollout(input({ instance: stale }))).toEqual({ kind: "granted", package: pkg, slot: "new" });
  });

  it("does not reuse a grant for a different version", () => {
    const oldGrant = instance({ status: "Errored", grantedVersion: "1.5.0", lastUpdateAt: NOW.toISOString() });
    expect(evaluateRollout(input({ instance: oldGrant }))).toEqual({ kind: "granted", package: pkg, slot: "new" });
  });

  it("denies outside office hours in the group's timezone", () => {
    const officePolicy = { ...policy, officeHours: true, timezone: "America/New_York" };
    // 10:00 UTC is 05:00 in New York (EST).
    expect(evaluateRollout(input({ policy: officePolicy }))).toEqual({
      kind: "denied",
      reason: "OutsideOfficeHours",
    });
    const afternoon = new Date("2026-03-02T15:00:00Z");
    expect(evaluateRollout(input({ policy: officePolicy, now: afternoon })).kind).toBe("granted");
  });
});

describe("office hours", () => {
  it("reads the local hour of an IANA timezone", () => {
    expect(localHour(new Date("2026-07-01T23:30:00Z"), "Europe/Vienna")).toBe(1);
    expect(localHour(new Date("2026-07-01T00:30:00Z"), "UTC")).toBe(0);
  });

  it("falls back to UTC for an unknown timezone", () => {
    expect(localHour(new Date("2026-07-01T13:00:00Z"), "Mars/Olympus_Mons")).toBe(13);
  });

  it("includes 09:00 and excludes 17:00", () => {
    expect(isWithinOfficeHours(new Date("2026-03-02T09:00:00Z"), "UTC")).toBe(true);
    expect(isWithinOfficeHours(new Date("2026-03-02T16:59:59Z"), "UTC")).toBe(true);
    expect(isWithinOfficeHours(new Date("2026-03-02T17:00:00Z"), "UTC")).toBe(false);
  });
});
