import { describe, expect, it } from "vitest";
import { createMemoryStore } from "../store/memory.js";
import type { FleetStore } from "../store/types.js";
import { createRouteHarness, invokeRoute } from "../testing/route-harness.js";
import { createHealthRoutes } from "./health-routes.js";

function withPing(store: FleetStore, ping: () => Promise<void>): FleetStore {
  return { ...store, ping };
}

describe("health routes", () => {
  it("reports liveness with the store driver", async () => {
    const harness = createRouteHarness(createHealthRoutes(createMemoryStore()));
    const res = await invokeRoute(harness.route("get", "/health"));

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ status: "ok", driver: "memory" });
  });

  it("answers ok when the store responds", async () => {
    const harness = createRouteHarness(createHealthRoutes(createMemoryStore()));
    const res = await invokeRoute(harness.route("get", "/health/db"));

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ status: "ok", driver: "memory" });
  });

  it("answers 503 when the store fails", async () => {
    const store = withPing(createMemoryStore(), async () => {
      throw new Error("connection refused");
    });
    const res = await invokeRoute(createRouteHarness(createHealthRoutes(store)).route("get", "/health/db"));

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({ status: "error", driver: "memory", error: "connection refused" });
  });

  it("answers 503 when the store does not answer in time", async () => {
    const store = withPing(createMemoryStore(), () => new Promise<void>(() => undefined));
    const res = await invokeRoute(createRouteHarness(createHealthRoutes(store, 10)).route("get", "/health/db"));

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({ status: "error", driver: "memory", error: "store did not answer within 10ms" });
  });
});
