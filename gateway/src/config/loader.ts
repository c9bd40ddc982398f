import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { FleetConfigSchema, type FleetConfig } from "./schema.js";

const CONFIG_FILE = path.join(process.env.HOME || "/root", ".fleetcast", "config.json");

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configFile?: string;
  skipDotenv?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (isRecord(value)) return value;
  const created: Record<string, unknown> = {};
  raw[key] = created;
  return created;
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function readFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized !== "0" && normalized !== "false" && normalized !== "";
}

function readConfigFile(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    if (isRecord(parsed)) return parsed;
    console.warn(`Ignoring ${file}: top-level value is not an object`);
  } catch (err) {
    console.warn(`Failed to parse ${file}:`, err);
  }
  return {};
}

export function loadConfig(options: LoadConfigOptions = {}): FleetConfig {
  if (!options.skipDotenv) {
    // Load .env from repo root (stable regardless of process cwd)
    const envPath = path.resolve(
      path.dirname(fileURLToPath(import.meta.url)),
      "../../../.env",
    );
    dotenv.config({ path: envPath });
  }
  const env = options.env ?? process.env;
  const raw = readConfigFile(options.configFile ?? CONFIG_FILE);

  // Merge env vars into gateway config
  const gw = section(raw, "gateway");
  const port = readNumber(env.FLEETCAST_PORT);
  if (port !== undefined) gw.port = port;
  if (env.FLEETCAST_HOST) gw.host = env.FLEETCAST_HOST;
  if (env.FLEETCAST_SECRET) gw.secret = env.FLEETCAST_SECRET;
  if (env.FLEETCAST_CORS_ORIGINS) {
    gw.corsOrigins = env.FLEETCAST_CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean);
  }
  const trustProxy = readFlag(env.FLEETCAST_TRUST_PROXY);
  if (trustProxy !== undefined) gw.trustProxy = trustProxy;

  // Merge env vars into store config (DATABASE_URL is read by the pg client directly)
  const store = section(raw, "store");
  if (env.FLEETCAST_STORE) store.driver = env.FLEETCAST_STORE;
  const persistLogs = readFlag(env.FLEETCAST_PERSIST_LOGS);
  if (persistLogs !== undefined) store.persistLogs = persistLogs;

  const rollout = section(raw, "rollout");
  const failureWindow = readNumber(env.FLEETCAST_FAILURE_WINDOW_MS);
  if (failureWindow !== undefined) rollout.failureWindowMs = failureWindow;
  const failureThreshold = readNumber(env.FLEETCAST_FAILURE_THRESHOLD);
  if (failureThreshold !== undefined) rollout.failureThreshold = failureThreshold;

  const maintenance = section(raw, "maintenance");
  if (env.FLEETCAST_MAINTENANCE_CRON) maintenance.cron = env.FLEETCAST_MAINTENANCE_CRON;
  const maintenanceEnabled = readFlag(env.FLEETCAST_MAINTENANCE_ENABLED);
  if (maintenanceEnabled !== undefined) maintenance.enabled = maintenanceEnabled;

  const result = FleetConfigSchema.safeParse(raw);
  if (!result.success) {
    console.error("Config validation errors:", result.error.format());
    throw new Error("Invalid fleetcast config");
  }

  return result.data;
}
