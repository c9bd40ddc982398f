// Postgres-backed FleetStore. Repositories are built over any Queryable, so
// the same code runs against the pool or a transaction's checked-out client.

import type pg from "pg";
import {
  isConnectionError,
  query,
  recordFailure,
  recordSuccess,
  transaction,
  type Queryable,
} from "../../db/client.js";
import { StoreUnavailableError } from "../errors.js";
import type { FleetStore, StoreScope } from "../types.js";
import { createPgActivity } from "./activity.js";
import { createPgCatalog } from "./catalog.js";
import { createPgInstances } from "./instances.js";
import { createPgLedger, prunePgLedger } from "./ledger.js";
import { createPgRolloutState } from "./rollout-state.js";

async function translateError(err: unknown): Promise<unknown> {
  if (!isConnectionError(err)) return err;
  await recordFailure();
  return new StoreUnavailableError(err);
}

/** Counts successes/failures toward the pool reset and maps lost connections to StoreUnavailableError. */
export function guard(db: Queryable): Queryable {
  return {
    async query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) {
      try {
        const result = await db.query<T>(text, params);
        recordSuccess();
        return result;
      } catch (err) {
        throw await translateError(err);
      }
    },
  };
}

export function createPgScope(db: Queryable): StoreScope {
  return {
    catalog: createPgCatalog(db),
    instances: createPgInstances(db),
    ledger: createPgLedger(db),
    rolloutState: createPgRolloutState(db),
    activity: createPgActivity(db),
  };
}

export function createPgStore(): FleetStore {
  const pool = guard({ query });

  return {
    driver: "postgres",
    ...createPgScope(pool),

    async transaction(fn) {
      try {
        return await transaction((client) => fn(createPgScope(guard(client))));
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        throw await translateError(err);
      }
    },

    async ping() {
      await pool.query("SELECT 1");
    },

    async prune(options) {
      return prunePgLedger(pool, options);
    },
  };
}
