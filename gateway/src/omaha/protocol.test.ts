import { describe, expect, it } from "vitest";
import { ProtocolError, parseCheckInRequest, parseEventRequest, toCheckInResponse, toEventKind } from "./protocol.js";

describe("toEventKind", () => {
  it("maps Omaha event types with a success result", () => {
    expect(toEventKind(13, 1)).toBe("download-started");
    expect(toEventKind(14, 1)).toBe("download-finished");
    expect(toEventKind(800, 1)).toBe("installed");
    expect(toEventKind(3, 1)).toBe("install-complete");
    expect(toEventKind(3, 2)).toBe("install-complete");
  });

  it("treats result 0 as an install error for any type", () => {
    expect(toEventKind(13, 0)).toBe("install-error");
    expect(toEventKind(3, 0)).toBe("install-error");
  });

  it("rejects unknown pairs", () => {
    expect(toEventKind(13, 2)).toBeNull();
    expect(toEventKind(54, 1)).toBeNull();
  });

  it("passes named kinds through", () => {
    expect(toEventKind("install-error", 1)).toBe("install-error");
  });
});

describe("request parsing", () => {
  it("defaults the architecture to all and trims identifiers", () => {
    expect(parseCheckInRequest({ instanceId: " node-1 ", appId: "a", groupId: "g", version: "1.0.0" })).toEqual({
      instanceId: "node-1",
      appId: "a",
      groupId: "g",
      version: "1.0.0",
      arch: "all",
    });
  });

  it("reports every invalid field of a check-in", () => {
    try {
      parseCheckInRequest({ appId: "a", groupId: "g" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ProtocolError);
      expect(err).toMatchObject({ code: "MalformedRequest" });
      expect(String(err)).toContain("instanceId");
      expect(String(err)).toContain("version");
    }
  });

  it("parses an event and attaches its kind", () => {
    const event = parseEventRequest({ instanceId: "n", appId: "a", version: "2.0.0", eventType: 3, eventResult: 0, errorCode: 17 });
    expect(event.kind).toBe("install-error");
    expect(event.errorCode).toBe(17);
  });

  it("assumes success when no result is sent", () => {
    expect(parseEventRequest({ instanceId: "n", appId: "a", version: "2.0.0", eventType: 14 }).kind)
      .toBe("download-finished");
  });

  it("rejects an event with no version", () => {
    expect(() => parseEventRequest({ instanceId: "n", appId: "a", eventType: 13 })).toThrow(ProtocolError);
  });
});

describe("toCheckInResponse", () => {
  it("maps denials to wire reason codes", () => {
    expect(toCheckInResponse({ kind: "denied", reason: "Throttled" })).toEqual({ updateAvailable: false, reason: "throttled" });
    expect(toCheckInResponse({ kind: "denied", reason: "RolloutHalted" })).toEqual({ updateAvailable: false, reason: "halted" });
    expect(toCheckInResponse({ kind: "denied", reason: "RolloutDisabled" })).toEqual({ updateAvailable: false, reason: "disabled" });
    expect(toCheckInResponse({ kind: "no-update", reason: "arch-mismatch" })).toEqual({ updateAvailable: false, reason: "no-update" });
  });
});
