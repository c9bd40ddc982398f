// Activity emission: records are written through the caller's store scope
// (so they commit or roll back with the change they describe) and pushed to
// live dashboard clients only after that commit.

import type { ActivityLog } from "../store/types.js";
import { ACTIVITY_SEVERITY, type ActivityEntry, type ActivityType } from "./types.js";

export type ActivityBroadcast = (type: "activity.created", data: ActivityEntry) => void;

export interface ActivitySubject {
  applicationId: string;
  version: string;
  groupId?: string | null;
  channelId?: string | null;
  instanceId?: string | null;
}

export async function recordActivity(
  log: ActivityLog,
  type: ActivityType,
  subject: ActivitySubject,
  now: Date,
): Promise<ActivityEntry> {
  return log.append({
    type,
    severity: ACTIVITY_SEVERITY[type],
    applicationId: subject.applicationId,
    groupId: subject.groupId ?? null,
    channelId: subject.channelId ?? null,
    instanceId: subject.instanceId ?? null,
    version: subject.version,
    createdAt: now,
  });
}

export function publishActivity(broadcast: ActivityBroadcast | null, entries: ActivityEntry[]): void {
  if (!broadcast) return;
  for (const entry of entries) {
    broadcast("activity.created", entry);
  }
}
