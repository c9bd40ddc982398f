import { z } from "zod";

export const GatewayConfigSchema = z.object({
  port: z.number().default(3000),
  host: z.string().default("0.0.0.0"),
  secret: z.string().optional(), // Bearer token for /api/*; unset = open (dev mode)
  corsOrigins: z.array(z.string()).default(["http://localhost:5173"]),
  trustProxy: z.boolean().default(false),
});

export const StoreConfigSchema = z.object({
  driver: z.enum(["postgres", "memory"]).default("postgres"),
  persistLogs: z.boolean().default(true),
});

// Defaults applied to groups created without an explicit policy.
export const RolloutDefaultsSchema = z.object({
  maxUpdatesPerPeriod: z.number().int().min(0).default(100),
  periodIntervalMs: z.number().int().positive().default(60 * 60 * 1000),
  updateTimeoutMs: z.number().int().positive().default(60 * 60 * 1000),
  failureThreshold: z.number().gt(0).max(1).default(0.2),
  failureMinSamples: z.number().int().min(1).default(1),
  failureWindowMs: z.number().int().positive().default(60 * 60 * 1000),
  timezone: z.string().default("UTC"),
}).default({});

export const MaintenanceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  cron: z.string().default("15 * * * *"),
  outcomeRetentionDays: z.number().int().min(1).default(7),
  periodRetentionDays: z.number().int().min(1).default(30),
  logRetentionDays: z.number().int().min(1).default(7),
}).default({});

export const FleetConfigSchema = z.object({
  gateway: GatewayConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  rollout: RolloutDefaultsSchema,
  maintenance: MaintenanceConfigSchema,
});

export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type RolloutDefaults = z.infer<typeof RolloutDefaultsSchema>;
export type MaintenanceConfig = z.infer<typeof MaintenanceConfigSchema>;
