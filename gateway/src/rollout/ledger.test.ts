import { describe, expect, it } from "vitest";
import {
  OutcomeRing,
  failureRatio,
  isBreakerTripped,
  outcomeBucketMs,
  outcomeWindowStart,
  periodStartFor,
} from "./ledger.js";

const HOUR = 3_600_000;

describe("period alignment", () => {
  it("aligns periods to the epoch", () => {
    expect(periodStartFor(new Date("2026-03-02T10:42:13Z"), HOUR).toISOString()).toBe("2026-03-02T10:00:00.000Z");
    expect(periodStartFor(new Date("2026-03-02T10:42:13Z"), 15 * 60_000).toISOString())
      .toBe("2026-03-02T10:30:00.000Z");
  });

  it("puts the boundary instant in the new period", () => {
    expect(periodStartFor(new Date("2026-03-02T11:00:00Z"), HOUR).toISOString()).toBe("2026-03-02T11:00:00.000Z");
  });
});

describe("outcome window", () => {
  it("splits the window into twelve buckets", () => {
    expect(outcomeBucketMs(HOUR)).toBe(300_000);
    expect(outcomeWindowStart(new Date("2026-03-02T10:42:30Z"), HOUR))
      .toBe(new Date("2026-03-02T09:45:00Z").getTime());
  });

  it("computes the failure ratio", () => {
    expect(failureRatio({ successes: 0, failures: 0 })).toBe(0);
    expect(failureRatio({ successes: 3, failures: 1 })).toBe(0.25);
  });

  it("trips only in safe mode, above the threshold, with enough samples", () => {
    const policy = { safeMode: true, failureThreshold: 0.25, failureMinSamples: 4 };
    expect(isBreakerTripped(policy, { successes: 2, failures: 2 })).toBe(true);
    expect(isBreakerTripped(policy, { successes: 3, failures: 1 })).toBe(false);
    expect(isBreakerTripped(policy, { successes: 0, failures: 3 })).toBe(false);
    expect(isBreakerTripped({ ...policy, safeMode: false }, { successes: 0, failures: 9 })).toBe(false);
  });
});

describe("OutcomeRing", () => {
  it("counts outcomes inside the trailing window only", () => {
    const ring = new OutcomeRing(HOUR);
    ring.record(false, HOUR, new Date("2026-03-02T09:00:00Z"));
    ring.record(true, HOUR, new Date("2026-03-02T10:10:00Z"));
    ring.record(false, HOUR, new Date("2026-03-02T10:40:00Z"));

    expect(ring.counts(HOUR, new Date("2026-03-02T10:42:00Z"))).toEqual({ successes: 1, failures: 1 });
  });

  it("recycles a slot once its bucket falls out of the window", () => {
    const ring = new OutcomeRing(HOUR);
    ring.record(false, HOUR, new Date("2026-03-02T09:02:00Z"));
    // One window later the same slot index comes round again.
    ring.record(true, HOUR, new Date("2026-03-02T10:02:00Z"));

    expect(ring.counts(HOUR, new Date("2026-03-02T10:03:00Z"))).toEqual({ successes: 1, failures: 0 });
  });

  it("reverses a record", () => {
    const ring = new OutcomeRing(HOUR);
    const at = new Date("2026-03-02T10:00:00Z");
    ring.record(false, HOUR, at);
    ring.unrecord(false, at);
    expect(ring.counts(HOUR, at)).toEqual({ successes: 0, failures: 0 });
  });

  it("starts over when the window length changes", () => {
    const ring = new OutcomeRing(HOUR);
    const at = new Date("2026-03-02T10:00:00Z");
    ring.record(false, HOUR, at);
    expect(ring.counts(2 * HOUR, at)).toEqual({ successes: 0, failures: 0 });
  });
});
