import { describe, expect, it, vi } from "vitest";

vi.mock("./client.js", () => ({
  query: vi.fn(),
  transaction: vi.fn(),
  close: vi.fn(),
}));

import { listMigrationFiles } from "./migrate.js";

describe("db/migrate", () => {
  it("lists numbered migrations in apply order", () => {
    expect(listMigrationFiles()).toEqual([
      "001_catalog.sql",
      "002_rollout_state.sql",
      "003_activity_logs.sql",
    ]);
  });
});
