export type ActivityType =
  | "channel.package_updated"
  | "rollout.halted"
  | "rollout.resumed"
  | "instance.update_failed";

export type ActivitySeverity = "success" | "info" | "warning" | "error";

export interface NewActivity {
  type: ActivityType;
  severity: ActivitySeverity;
  applicationId: string;
  groupId?: string | null;
  channelId?: string | null;
  instanceId?: string | null;
  version: string;
  createdAt: Date;
}

export interface ActivityEntry {
  id: number;
  type: ActivityType;
  severity: ActivitySeverity;
  applicationId: string;
  groupId: string | null;
  channelId: string | null;
  instanceId: string | null;
  version: string;
  createdAt: string;
}

export const ACTIVITY_SEVERITY: Record<ActivityType, ActivitySeverity> = {
  "channel.package_updated": "info",
  "rollout.halted": "error",
  "rollout.resumed": "info",
  "instance.update_failed": "warning",
};
