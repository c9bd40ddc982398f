// Structured Logger: writes to console + in-memory ring buffer, optionally
// persisted to the service_logs table and streamed to dashboard clients.

import { query } from "./db/client.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export const LOG_SOURCES = ["gateway", "omaha", "rollout", "ledger", "catalog", "access", "maintenance"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogSource = (typeof LOG_SOURCES)[number];

export interface LogEntry {
  level: LogLevel;
  source: LogSource;
  message: string;
  metadata?: Record<string, unknown>;
}

export type BufferedLogEntry = LogEntry & { id: number; created_at: string };

// In-memory ring buffer for fast reads (keeps last 500 entries)
const LOG_BUFFER_SIZE = 500;
const logBuffer: BufferedLogEntry[] = [];
let logId = 0;

// Broadcast callback for real-time WebSocket log streaming
let broadcastFn: ((type: "log.entry", data: BufferedLogEntry) => void) | null = null;
let persistFn: ((entry: LogEntry) => Promise<void>) | null = null;
let consoleEnabled = true;

export function setLogBroadcast(fn: ((type: "log.entry", data: BufferedLogEntry) => void) | null): void {
  broadcastFn = fn;
}

export function setLogPersistence(fn: ((entry: LogEntry) => Promise<void>) | null): void {
  persistFn = fn;
}

/** Tests silence console output; the ring buffer still fills. */
export function setConsoleLogging(enabled: boolean): void {
  consoleEnabled = enabled;
}

function writeLog(entry: LogEntry): void {
  const now = new Date().toISOString();
  const buffered = { ...entry, id: ++logId, created_at: now };

  logBuffer.push(buffered);
  if (logBuffer.length > LOG_BUFFER_SIZE) logBuffer.shift();

  if (consoleEnabled) {
    const prefix = `[${entry.source}]`;
    switch (entry.level) {
      case "debug": console.debug(prefix, entry.message); break;
      case "info":  console.log(prefix, entry.message); break;
      case "warn":  console.warn(prefix, entry.message); break;
      case "error": console.error(prefix, entry.message); break;
    }
  }

  broadcastFn?.("log.entry", buffered);

  // Persist without blocking the request path; a failed write is reported
  // to the console only, never back into the logger.
  persistFn?.(entry).catch((err: unknown) => {
    console.warn("[logging] persist failed:", err instanceof Error ? err.message : String(err));
  });
}

export function log(source: LogSource, message: string, metadata?: Record<string, unknown>): void {
  writeLog({ level: "info", source, message, metadata });
}

export function logWarn(source: LogSource, message: string, metadata?: Record<string, unknown>): void {
  writeLog({ level: "warn", source, message, metadata });
}

export function logError(source: LogSource, message: string, metadata?: Record<string, unknown>): void {
  writeLog({ level: "error", source, message, metadata });
}

export function logDebug(source: LogSource, message: string, metadata?: Record<string, unknown>): void {
  writeLog({ level: "debug", source, message, metadata });
}

// Get recent logs from memory buffer (fast)
export function getRecentLogs(options?: {
  limit?: number;
  level?: LogLevel;
  source?: LogSource;
}): BufferedLogEntry[] {
  let filtered = logBuffer;
  if (options?.level) filtered = filtered.filter((l) => l.level === options.level);
  if (options?.source) filtered = filtered.filter((l) => l.source === options.source);
  const limit = options?.limit || 100;
  return filtered.slice(-limit);
}

// ─── Postgres persistence ───

export async function persistLogToDb(entry: LogEntry): Promise<void> {
  await query(
    `INSERT INTO service_logs (level, source, message, metadata) VALUES ($1, $2, $3, $4)`,
    [entry.level, entry.source, entry.message, JSON.stringify(entry.metadata || {})],
  );
}

export interface StoredLogRow {
  id: number;
  level: string;
  source: string;
  message: string;
  metadata: unknown;
  created_at: string;
}

// Get logs from DB (slower but complete history)
export async function queryLogs(options?: {
  limit?: number;
  level?: LogLevel;
  source?: LogSource;
  since?: string;
  search?: string;
}): Promise<StoredLogRow[]> {
  const conditions: string[] = [];
  const params: unknown[] = [];
  let paramIdx = 1;

  if (options?.level) {
    conditions.push(`level = $${paramIdx++}`);
    params.push(options.level);
  }
  if (options?.source) {
    conditions.push(`source = $${paramIdx++}`);
    params.push(options.source);
  }
  if (options?.since) {
    conditions.push(`created_at >= $${paramIdx++}`);
    params.push(options.since);
  }
  if (options?.search) {
    conditions.push(`message ILIKE $${paramIdx++}`);
    params.push(`%${options.search}%`);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  const limit = options?.limit || 200;

  const result = await query<StoredLogRow>(
    `SELECT id, level, source, message, metadata, created_at
     FROM service_logs ${where}
     ORDER BY created_at DESC
     LIMIT $${paramIdx}`,
    [...params, limit],
  );
  return result.rows;
}

// Prune old logs (called from the maintenance job)
export async function pruneLogs(olderThanDays = 7): Promise<number> {
  const result = await query(
    `DELETE FROM service_logs WHERE created_at < NOW() - INTERVAL '1 day' * $1`,
    [olderThanDays],
  );
  return result.rowCount ?? 0;
}
