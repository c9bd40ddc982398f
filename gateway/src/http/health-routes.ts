import type { FleetStore } from "../store/types.js";
import type { RouteDefinition } from "./routes.js";

const PING_TIMEOUT_MS = 5000;

export function createHealthRoutes(store: FleetStore, timeoutMs = PING_TIMEOUT_MS): RouteDefinition[] {
  return [
    {
      method: "get",
      path: "/health",
      handler: async (_req, res) => {
        res.json({ status: "ok", driver: store.driver, timestamp: new Date().toISOString() });
      },
    },
    {
      method: "get",
      path: "/health/db",
      handler: async (_req, res) => {
        let timer: NodeJS.Timeout | undefined;
        try {
          await Promise.race([
            store.ping(),
            new Promise<never>((_, reject) => {
              timer = setTimeout(() => reject(new Error(`store did not answer within ${timeoutMs}ms`)), timeoutMs);
            }),
          ]);
          res.json({ status: "ok", driver: store.driver });
        } catch (err) {
          res.status(503).json({
            status: "error",
            driver: store.driver,
            error: err instanceof Error ? err.message : String(err),
          });
        } finally {
          clearTimeout(timer);
        }
      },
    },
  ];
}
