// Wire shapes for the device protocol: check-in and event-report requests,
// the Omaha event/result code mapping, and check-in responses.

import { z } from "zod";
import { ARCHES } from "../catalog/types.js";
import type { InstanceStatus, UpdateEventKind } from "../instances/lifecycle.js";
import type { DenyReason, RolloutDecision } from "../rollout/evaluator.js";

export type ProtocolErrorCode = "MalformedRequest" | "UnexpectedEvent" | "TransientConflict";

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

export const CheckInRequestSchema = z.object({
  instanceId: z.string().trim().min(1).max(256),
  appId: z.string().trim().min(1),
  groupId: z.string().trim().min(1),
  version: z.string().trim().min(1).max(64),
  arch: z.enum(ARCHES).default("all"),
});

export type CheckInRequest = z.infer<typeof CheckInRequestSchema>;

// Omaha event types and results as devices send them.
export const OMAHA_EVENT = {
  INSTALL_COMPLETE: 3,
  DOWNLOAD_STARTED: 13,
  DOWNLOAD_FINISHED: 14,
  INSTALLED: 800,
} as const;

export const OMAHA_RESULT = {
  ERROR: 0,
  SUCCESS: 1,
  SUCCESS_REBOOT: 2,
} as const;

const EVENT_KINDS = [
  "download-started",
  "download-finished",
  "installed",
  "install-complete",
  "install-error",
] as const satisfies readonly UpdateEventKind[];

export const EventRequestSchema = z.object({
  instanceId: z.string().trim().min(1).max(256),
  appId: z.string().trim().min(1),
  version: z.string().trim().min(1).max(64),
  eventType: z.union([z.number().int(), z.enum(EVENT_KINDS)]),
  eventResult: z.number().int().default(OMAHA_RESULT.SUCCESS),
  errorCode: z.number().int().optional(),
});

export type EventRequest = z.infer<typeof EventRequestSchema>;

/**
 * Maps an Omaha (type, result) pair to an event kind. A result of 0 is an
 * error whatever the type; named kinds are taken as-is.
 */
export function toEventKind(eventType: number | UpdateEventKind, eventResult: number): UpdateEventKind | null {
  if (typeof eventType === "string") return eventType;
  if (eventResult === OMAHA_RESULT.ERROR) return "install-error";

  switch (eventType) {
    case OMAHA_EVENT.DOWNLOAD_STARTED:
      return eventResult === OMAHA_RESULT.SUCCESS ? "download-started" : null;
    case OMAHA_EVENT.DOWNLOAD_FINISHED:
      return eventResult === OMAHA_RESULT.SUCCESS ? "download-finished" : null;
    case OMAHA_EVENT.INSTALLED:
      return eventResult === OMAHA_RESULT.SUCCESS ? "installed" : null;
    case OMAHA_EVENT.INSTALL_COMPLETE:
      return eventResult === OMAHA_RESULT.SUCCESS || eventResult === OMAHA_RESULT.SUCCESS_REBOOT
        ? "install-complete"
        : null;
    default:
      return null;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

export function parseCheckInRequest(body: unknown): CheckInRequest {
  const result = CheckInRequestSchema.safeParse(body);
  if (!result.success) throw new ProtocolError("MalformedRequest", describeIssues(result.error));
  return result.data;
}

export function parseEventRequest(body: unknown): EventRequest & { kind: UpdateEventKind } {
  const result = EventRequestSchema.safeParse(body);
  if (!result.success) throw new ProtocolError("MalformedRequest", describeIssues(result.error));
  const kind = toEventKind(result.data.eventType, result.data.eventResult);
  if (!kind) {
    throw new ProtocolError(
      "UnexpectedEvent",
      `unsupported event type ${result.data.eventType} with result ${result.data.eventResult}`,
    );
  }
  return { ...result.data, kind };
}

// ─── Responses ───

export type NoUpdateReasonCode = "no-update" | "throttled" | "halted" | "disabled" | "office-hours";

export type CheckInResponse =
  | {
    updateAvailable: true;
    version: string;
    url: string;
    filename: string;
    hash: string;
    size: number;
  }
  | { updateAvailable: false; reason: NoUpdateReasonCode };

export interface EventAck {
  ok: true;
  status: InstanceStatus;
}

const DENY_REASON_CODES: Record<DenyReason, NoUpdateReasonCode> = {
  Throttled: "throttled",
  RolloutHalted: "halted",
  RolloutDisabled: "disabled",
  OutsideOfficeHours: "office-hours",
};

export function toCheckInResponse(decision: RolloutDecision): CheckInResponse {
  switch (decision.kind) {
    case "granted": {
      const pkg = decision.package;
      return {
        updateAvailable: true,
        version: pkg.version,
        url: pkg.url,
        filename: pkg.filename,
        hash: pkg.hash,
        size: pkg.size,
      };
    }
    case "no-update":
      return { updateAvailable: false, reason: "no-update" };
    case "denied":
      return { updateAvailable: false, reason: DENY_REASON_CODES[decision.reason] };
  }
}
