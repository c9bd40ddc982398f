import { describe, expect, it } from "vitest";
import {
  applyCheckIn,
  applyUpdateEvent,
  holdsGrantFor,
  isGrantExpired,
  type InstanceRecord,
  type InstanceStatus,
  type UpdateEventKind,
} from "./lifecycle.js";

const NOW = new Date("2026-03-02T10:00:00Z");

function instance(status: InstanceStatus, overrides: Partial<InstanceRecord> = {}): InstanceRecord {
  return {
    id: "node-1",
    applicationId: "app-1",
    groupId: "group-1",
    ip: "10.0.0.9",
    version: "1.0.0",
    status,
    grantedVersion: "2.0.0",
    grantedPackageId: "pkg-2",
    lastCheckInAt: "2026-03-02T09:00:00.000Z",
    lastUpdateAt: "2026-03-02T09:58:00.000Z",
    rowVersion: 4,
    createdAt: "2026-03-01T00:00:00.000Z",
    ...overrides,
  };
}

function nextStatus(status: InstanceStatus, kind: UpdateEventKind): InstanceStatus | "rejected" {
  const result = applyUpdateEvent(instance(status), { kind, version: "2.0.0" }, NOW);
  return result.ok ? result.next.status : "rejected";
}

describe("applyUpdateEvent", () => {
  it("follows the download and install path", () => {
    expect(nextStatus("UpdateGranted", "download-started")).toBe("Downloading");
    expect(nextStatus("Downloading", "download-finished")).toBe("Installing");
    expect(nextStatus("UpdateGranted", "download-finished")).toBe("Installing");
    expect(nextStatus("Installing", "installed")).toBe("Installing");
    expect(nextStatus("Installing", "install-complete")).toBe("Complete");
    expect(nextStatus("Downloading", "install-error")).toBe("Errored");
  });

  it("rejects events from states that do not accept them", () => {
    expect(nextStatus("Installing", "download-started")).toBe("rejected");
    expect(nextStatus("UpToDate", "install-complete")).toBe("rejected");
    expect(nextStatus("Complete", "install-error")).toBe("rejected");
    expect(nextStatus("Errored", "install-error")).toBe("rejected");
  });

  it("rejects events for a version that was not granted", () => {
    const result = applyUpdateEvent(instance("Downloading"), { kind: "download-finished", version: "2.0.1" }, NOW);
    expect(result).toEqual({ ok: false, reason: "event for version 2.0.1 but granted version is 2.0.0" });
  });

  it("rejects events for an instance that never checked in", () => {
    expect(applyUpdateEvent(null, { kind: "install-error", version: "2.0.0" }, NOW).ok).toBe(false);
  });

  it("reports the outcome and adopts the version on completion", () => {
    const result = applyUpdateEvent(instance("Installing"), { kind: "install-complete", version: "2.0.0" }, NOW);
    expect(result).toMatchObject({
      ok: true,
      outcome: "success",
      next: { status: "Complete", version: "2.0.0", lastUpdateAt: NOW.toISOString() },
    });

    const failed = applyUpdateEvent(instance("Installing"), { kind: "install-error", version: "2.0.0" }, NOW);
    expect(failed).toMatchObject({ ok: true, outcome: "failure", next: { status: "Errored", version: "1.0.0" } });
  });
});

describe("grant expiry", () => {
  it("expires in-flight grants after the timeout", () => {
    expect(isGrantExpired(instance("Downloading"), 120_000, NOW)).toBe(true);
    expect(isGrantExpired(instance("Downloading"), 180_000, NOW)).toBe(false);
  });

  it("never expires an errored grant", () => {
    expect(isGrantExpired(instance("Errored"), 1, NOW)).toBe(false);
    expect(holdsGrantFor(instance("Errored"), "2.0.0", 1, NOW)).toBe(true);
  });

  it("holds only for the granted version", () => {
    expect(holdsGrantFor(instance("UpdateGranted"), "2.0.0", 600_000, NOW)).toBe(true);
    expect(holdsGrantFor(instance("UpdateGranted"), "3.0.0", 600_000, NOW)).toBe(false);
    expect(holdsGrantFor(instance("Complete"), "2.0.0", 600_000, NOW)).toBe(false);
    expect(holdsGrantFor(null, "2.0.0", 600_000, NOW)).toBe(false);
  });
});

describe("applyCheckIn", () => {
  const request = { instanceId: "node-1", applicationId: "app-1", groupId: "group-1", version: "1.0.0", ip: "10.0.0.10" };

  it("keeps a first-seen instance Unknown while it is behind and nothing is granted", () => {
    const next = applyCheckIn(null, request, { grant: null, upToDate: false }, NOW);
    expect(next).toMatchObject({ status: "Unknown", grantedVersion: null, lastCheckInAt: NOW.toISOString() });
  });

  it("creates a first-seen instance as UpToDate when it runs the channel's package", () => {
    const next = applyCheckIn(null, { ...request, version: "2.0.0" }, { grant: null, upToDate: true }, NOW);
    expect(next.status).toBe("UpToDate");
  });

  it("drops a settled instance back to Unknown once the channel moves past it", () => {
    const settled = instance("UpToDate", { grantedVersion: null, grantedPackageId: null });
    expect(applyCheckIn(settled, request, { grant: null, upToDate: false }, NOW).status).toBe("Unknown");
    expect(applyCheckIn(instance("Complete"), request, { grant: null, upToDate: false }, NOW).status).toBe("Unknown");
  });

  it("records a fresh grant", () => {
    const next = applyCheckIn(
      instance("UpToDate", { grantedVersion: null, grantedPackageId: null }),
      request,
      { grant: { packageId: "pkg-2", version: "2.0.0", slot: "new" }, upToDate: false },
      NOW,
    );
    expect(next).toMatchObject({
      status: "UpdateGranted",
      grantedVersion: "2.0.0",
      grantedPackageId: "pkg-2",
      lastUpdateAt: NOW.toISOString(),
    });
  });

  it("keeps download progress on a repeated check-in", () => {
    const next = applyCheckIn(
      instance("Downloading"),
      request,
      { grant: { packageId: "pkg-2", version: "2.0.0", slot: "held" }, upToDate: false },
      NOW,
    );
    expect(next.status).toBe("Downloading");
    expect(next.lastUpdateAt).toBe("2026-03-02T09:58:00.000Z");
    expect(next.ip).toBe("10.0.0.10");
  });

  it("restarts an errored attempt at UpdateGranted", () => {
    const next = applyCheckIn(
      instance("Errored"),
      request,
      { grant: { packageId: "pkg-2", version: "2.0.0", slot: "held" }, upToDate: false },
      NOW,
    );
    expect(next.status).toBe("UpdateGranted");
    expect(next.lastUpdateAt).toBe(NOW.toISOString());
  });

  it("settles a completed instance back to UpToDate", () => {
    const next = applyCheckIn(instance("Complete"), { ...request, version: "2.0.0" }, { grant: null, upToDate: true }, NOW);
    expect(next.status).toBe("UpToDate");
    expect(next.version).toBe("2.0.0");
  });

  it("leaves an errored instance errored when it is denied", () => {
    const next = applyCheckIn(instance("Errored"), request, { grant: null, upToDate: false }, NOW);
    expect(next.status).toBe("Errored");
  });
});
