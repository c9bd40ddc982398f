import { beforeEach, describe, expect, it, vi } from "vitest";
import { createPgRolloutState } from "./rollout-state.js";

const queryMock = vi.fn();
const db = { query: queryMock };

const GROUP = "6f1c1d2e-0000-4000-8000-000000000001";
const NOW = new Date("2026-03-01T10:00:00Z");

describe("pg rollout state", () => {
  beforeEach(() => {
    queryMock.mockReset();
  });

  it("reads a missing row as not halted", async () => {
    queryMock.mockResolvedValueOnce({ rows: [] });
    await expect(createPgRolloutState(db).isHalted(GROUP)).resolves.toBe(false);
  });

  it("creates the row before locking it for update", async () => {
    queryMock
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ halted: true }] });

    const halted = await createPgRolloutState(db).lockHalted(GROUP);

    expect(halted).toBe(true);
    expect(queryMock).toHaveBeenCalledTimes(2);
    const [insertSql, insertParams] = queryMock.mock.calls[0];
    expect(insertSql).toContain("ON CONFLICT (group_id) DO NOTHING");
    expect(insertParams).toEqual([GROUP]);
    const [lockSql, lockParams] = queryMock.mock.calls[1];
    expect(lockSql).toContain("FOR UPDATE");
    expect(lockParams).toEqual([GROUP]);
  });

  it("only reports a halt to the caller whose upsert flipped the flag", async () => {
    queryMock
      .mockResolvedValueOnce({ rows: [{ group_id: GROUP }] })
      .mockResolvedValueOnce({ rows: [] });
    const state = createPgRolloutState(db);

    await expect(state.setHalted(GROUP, true, NOW)).resolves.toBe(true);
    await expect(state.setHalted(GROUP, true, NOW)).resolves.toBe(false);
    expect(queryMock.mock.calls[0][0]).toContain("WHERE group_rollout_state.halted = FALSE");
  });

  it("resumes with a conditional update", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ group_id: GROUP }] });

    await expect(createPgRolloutState(db).setHalted(GROUP, false, NOW)).resolves.toBe(true);

    const [sql, params] = queryMock.mock.calls[0];
    expect(sql).toContain("WHERE group_id = $1 AND halted = TRUE");
    expect(params).toEqual([GROUP, NOW]);
  });
});
