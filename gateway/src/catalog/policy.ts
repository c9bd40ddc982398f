import { z } from "zod";
import type { RolloutDefaults } from "../config/schema.js";
import { CatalogError } from "./errors.js";
import type { RolloutPolicy } from "./types.js";

export const RolloutPolicySchema = z.object({
  updatesEnabled: z.boolean(),
  maxUpdatesPerPeriod: z.number().int().min(0),
  periodIntervalMs: z.number().int().positive(),
  updateTimeoutMs: z.number().int().positive(),
  safeMode: z.boolean(),
  failureThreshold: z.number().gt(0).max(1),
  failureMinSamples: z.number().int().min(1),
  failureWindowMs: z.number().int().positive(),
  officeHours: z.boolean(),
  timezone: z.string().min(1),
});

export const PartialRolloutPolicySchema = RolloutPolicySchema.partial().strict();

export function defaultPolicy(defaults: RolloutDefaults): RolloutPolicy {
  return {
    updatesEnabled: true,
    maxUpdatesPerPeriod: defaults.maxUpdatesPerPeriod,
    periodIntervalMs: defaults.periodIntervalMs,
    updateTimeoutMs: defaults.updateTimeoutMs,
    safeMode: false,
    failureThreshold: defaults.failureThreshold,
    failureMinSamples: defaults.failureMinSamples,
    failureWindowMs: defaults.failureWindowMs,
    officeHours: false,
    timezone: defaults.timezone,
  };
}

function isKnownTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/** Overlays `patch` on `base` and validates the result as a whole. */
export function mergePolicy(base: RolloutPolicy, patch: Partial<RolloutPolicy>): RolloutPolicy {
  const result = RolloutPolicySchema.safeParse({ ...base, ...patch });
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new CatalogError("InvalidPolicy", `invalid rollout policy: ${detail}`);
  }
  if (!isKnownTimezone(result.data.timezone)) {
    throw new CatalogError("InvalidPolicy", `invalid rollout policy: unknown timezone ${result.data.timezone}`);
  }
  return result.data;
}
