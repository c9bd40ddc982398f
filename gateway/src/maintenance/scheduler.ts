// Retention job: drops closed ledger periods, expired outcome buckets and old
// service logs on a cron schedule.

import { Cron } from "croner";
import type { MaintenanceConfig } from "../config/schema.js";
import { log, logError } from "../logging.js";
import type { FleetStore } from "../store/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceDeps {
  store: FleetStore;
  config: MaintenanceConfig;
  /** Set when logs are persisted; receives the retention in days. */
  pruneLogs?: (olderThanDays: number) => Promise<number>;
  clock?: () => Date;
}

export interface MaintenanceReport {
  periods: number;
  outcomeBuckets: number;
  logs: number;
}

export interface MaintenanceHandle {
  nextRun(): Date | null;
  stop(): void;
}

export async function runMaintenance(deps: MaintenanceDeps): Promise<MaintenanceReport> {
  const { store, config } = deps;
  const now = (deps.clock ?? (() => new Date()))().getTime();

  const pruned = await store.prune({
    periodsBefore: new Date(now - config.periodRetentionDays * DAY_MS),
    outcomesBefore: new Date(now - config.outcomeRetentionDays * DAY_MS),
  });
  const logs = deps.pruneLogs ? await deps.pruneLogs(config.logRetentionDays) : 0;

  const report = { ...pruned, logs };
  log("maintenance", `Pruned ${report.periods} period(s), ${report.outcomeBuckets} outcome bucket(s), ${report.logs} log(s)`, {
    ...report,
  });
  return report;
}

export function startMaintenance(deps: MaintenanceDeps): MaintenanceHandle | null {
  if (!deps.config.enabled) {
    log("maintenance", "Maintenance disabled");
    return null;
  }

  const job = new Cron(deps.config.cron, { protect: true }, async () => {
    try {
      await runMaintenance(deps);
    } catch (err) {
      logError("maintenance", `Maintenance run failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  });

  log("maintenance", `Maintenance scheduled (${deps.config.cron})`, { nextRun: job.nextRun()?.toISOString() ?? null });
  return {
    nextRun: () => job.nextRun(),
    stop: () => job.stop(),
  };
}
