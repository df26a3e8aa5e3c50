import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { DrizzleDb } from "../db/index.js";
import { createTestDb, seedUsageRecord, truncateAllTables } from "../test/db.js";
import { DrizzleUsageRecordRepository } from "./drizzle-usage-record-repository.js";

describe("DrizzleUsageRecordRepository", () => {
  let pool: PGlite;
  let db: DrizzleDb;
  let repo: DrizzleUsageRecordRepository;

  beforeAll(async () => {
    ({ db, pool } = await createTestDb());
  });

  afterAll(async () => {
    await pool.close();
  });

  beforeEach(async () => {
    await truncateAllTables(pool);
    repo = new DrizzleUsageRecordRepository(db);
  });

  describe("find", () => {
    it("returns null for an unknown user/period", async () => {
      expect(await repo.find("nobody", "2025-03")).toBeNull();
    });

    it("returns the stored row", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-03", secondsUsed: 120, topupBalanceSeconds: 40 });
      const record = await repo.find("u1", "2025-03");
      expect(record).toMatchObject({
        userKey: "u1",
        period: "2025-03",
        plan: "free",
        subscriptionLimitSeconds: 1800,
        secondsUsed: 120,
        topupBalanceSeconds: 40,
        version: 0,
      });
      expect(record?.updatedAt).toBeInstanceOf(Date);
    });

    it("does not return another period's row", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-02" });
      expect(await repo.find("u1", "2025-03")).toBeNull();
    });
  });

  describe("findLatest", () => {
    it("returns null for a new user", async () => {
      expect(await repo.findLatest("nobody")).toBeNull();
    });

    it("returns the user's highest period across a year boundary", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2024-11" });
      await seedUsageRecord(db, { userKey: "u1", period: "2025-01" });
      await seedUsageRecord(db, { userKey: "u1", period: "2024-12" });
      await seedUsageRecord(db, { userKey: "u2", period: "2025-06" });

      expect((await repo.findLatest("u1"))?.period).toBe("2025-01");
    });
  });

  describe("openPeriod", () => {
    const march = { userKey: "u1", period: "2025-03", plan: "standard", subscriptionLimitSeconds: 7200 };

    it("creates a record with zero usage and no top-up for a new user", async () => {
      const { record, created } = await repo.openPeriod(march, "2025-02");
      expect(created).toBe(true);
      expect(record).toMatchObject({
        plan: "standard",
        subscriptionLimitSeconds: 7200,
        secondsUsed: 0,
        topupBalanceSeconds: 0,
        version: 0,
        superseded: false,
      });
    });

    it("carries the previous period's top-up and supersedes that record", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-02", secondsUsed: 1800, topupBalanceSeconds: 300 });

      const { record } = await repo.openPeriod(march, "2025-02");

      expect(record).toMatchObject({ secondsUsed: 0, topupBalanceSeconds: 300 });
      expect(await repo.find("u1", "2025-02")).toMatchObject({
        topupBalanceSeconds: 300,
        superseded: true,
        version: 1,
      });
    });

    it("fails a compare-and-set prepared against the superseded record", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-02", topupBalanceSeconds: 300 });
      const stale = await repo.find("u1", "2025-02");
      if (!stale) throw new Error("seed missing");

      await repo.openPeriod(march, "2025-02");

      expect(await repo.compareAndSet(stale, { topupBalanceSeconds: 0 })).toBeNull();
      expect((await repo.find("u1", "2025-03"))?.topupBalanceSeconds).toBe(300);
    });

    it("returns the existing row untouched when one is already there", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-03", secondsUsed: 900, topupBalanceSeconds: 10 });
      await seedUsageRecord(db, { userKey: "u1", period: "2025-02", topupBalanceSeconds: 5000 });

      const { record, created } = await repo.openPeriod({ ...march, plan: "premium" }, "2025-02");

      expect(created).toBe(false);
      expect(record).toMatchObject({ plan: "free", secondsUsed: 900, topupBalanceSeconds: 10 });
      expect((await repo.find("u1", "2025-02"))?.superseded).toBe(false);
    });

    it("exactly one of several concurrent opens wins and the balance is carried once", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-02", topupBalanceSeconds: 300 });

      const results = await Promise.all(Array.from({ length: 5 }, () => repo.openPeriod(march, "2025-02")));

      expect(results.filter((r) => r.created)).toHaveLength(1);
      expect(results.every((r) => r.record.topupBalanceSeconds === 300)).toBe(true);

      const count = await pool.query<{ n: number }>(`SELECT COUNT(*)::int AS n FROM usage_records`);
      expect(count.rows[0]?.n).toBe(2);
      expect((await repo.find("u1", "2025-02"))?.version).toBe(1);
    });
  });

  describe("compareAndSet", () => {
    it("applies changes and bumps the version", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-03", topupBalanceSeconds: 500 });
      const current = await repo.find("u1", "2025-03");
      if (!current) throw new Error("seed missing");

      const updated = await repo.compareAndSet(current, { secondsUsed: 60, topupBalanceSeconds: 400 });
      expect(updated).toMatchObject({ secondsUsed: 60, topupBalanceSeconds: 400, version: 1, plan: "free" });
    });

    it("returns null and writes nothing when the version is stale", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-03" });
      const stale = await repo.find("u1", "2025-03");
      if (!stale) throw new Error("seed missing");

      await repo.compareAndSet(stale, { secondsUsed: 100 });
      const result = await repo.compareAndSet(stale, { secondsUsed: 999 });

      expect(result).toBeNull();
      expect((await repo.find("u1", "2025-03"))?.secondsUsed).toBe(100);
    });

    it("leaves fields not named in the changes alone", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-03", secondsUsed: 30, topupBalanceSeconds: 70 });
      const current = await repo.find("u1", "2025-03");
      if (!current) throw new Error("seed missing");

      const updated = await repo.compareAndSet(current, { plan: "premium", subscriptionLimitSeconds: 36000 });
      expect(updated).toMatchObject({ plan: "premium", subscriptionLimitSeconds: 36000, secondsUsed: 30, topupBalanceSeconds: 70 });
    });

    it("surfaces the CHECK constraint on a negative balance", async () => {
      await seedUsageRecord(db, { userKey: "u1", period: "2025-03" });
      const current = await repo.find("u1", "2025-03");
      if (!current) throw new Error("seed missing");

      await expect(repo.compareAndSet(current, { topupBalanceSeconds: -1 })).rejects.toThrow();
    });
  });
});
