import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "./loader.js";

describe("config loader", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "fleetcast-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("applies defaults when no file or env is present", () => {
    const config = loadConfig({ env: {}, configFile: path.join(dir, "missing.json"), skipDotenv: true });

    expect(config.gateway.port).toBe(3000);
    expect(config.store.driver).toBe("postgres");
    expect(config.rollout.periodIntervalMs).toBe(3_600_000);
    expect(config.rollout.failureThreshold).toBe(0.2);
    expect(config.maintenance.cron).toBe("15 * * * *");
  });

  it("merges env vars over the config file", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ gateway: { port: 4000, host: "127.0.0.1" }, store: { driver: "postgres" } }));

    const config = loadConfig({
      env: {
        FLEETCAST_PORT: "5050",
        FLEETCAST_STORE: "memory",
        FLEETCAST_SECRET: "test-secret",
        FLEETCAST_CORS_ORIGINS: "http://a.test, http://b.test",
        FLEETCAST_FAILURE_WINDOW_MS: "600000",
        FLEETCAST_MAINTENANCE_ENABLED: "false",
      },
      configFile: file,
      skipDotenv: true,
    });

    expect(config.gateway.port).toBe(5050);
    expect(config.gateway.host).toBe("127.0.0.1");
    expect(config.gateway.secret).toBe("test-secret");
    expect(config.gateway.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(config.store.driver).toBe("memory");
    expect(config.rollout.failureWindowMs).toBe(600_000);
    expect(config.maintenance.enabled).toBe(false);
  });

  it("rejects invalid values", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    expect(() =>
      loadConfig({ env: { FLEETCAST_STORE: "sqlite" }, configFile: path.join(dir, "none.json"), skipDotenv: true }),
    ).toThrow("Invalid fleetcast config");
  });

  it("ignores an unparsable config file", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, "{ not json");

    const config = loadConfig({ env: {}, configFile: file, skipDotenv: true });
    expect(config.gateway.port).toBe(3000);
  });
});
