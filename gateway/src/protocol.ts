// Dashboard WebSocket protocol: JSON frames on /ws.

import { z } from "zod";

export const FRAME_TYPES = [
  "activity.created", // Gateway → Client: activity entry recorded
  "log.entry",        // Gateway → Client: real-time log entry
  "system.status",    // Gateway → Client: sent once on connect
  "system.ping",      // Client → Gateway: keepalive
  "system.pong",      // Gateway → Client: keepalive response
] as const;

export type FrameType = (typeof FRAME_TYPES)[number];

const FrameSchema = z.object({
  type: z.enum(FRAME_TYPES),
  id: z.string().optional(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

export type Frame = z.infer<typeof FrameSchema>;

export interface SystemStatusData {
  driver: "postgres" | "memory";
  version: string;
  clients: number;
}

export function frame(type: FrameType, data?: unknown, id?: string): string {
  const f: Frame = { type };
  if (data !== undefined) f.data = data;
  if (id !== undefined) f.id = id;
  return JSON.stringify(f);
}

export function parseFrame(raw: string): Frame | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = FrameSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
