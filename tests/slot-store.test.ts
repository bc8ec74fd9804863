import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openDatabase, type AppDatabase } from "@/lib/db";
import { slots } from "@/lib/schema";
import { DrizzleSlotStore } from "@/lib/slot-store";

describe("DrizzleSlotStore", () => {
  let db: AppDatabase;
  let close: () => void;
  let store: DrizzleSlotStore;

  beforeEach(() => {
    ({ db, close } = openDatabase(":memory:"));
    store = new DrizzleSlotStore(db);
  });

  afterEach(() => {
    close();
  });

  it("upserts on date and pass number", async () => {
    await store.saveAll([
      { date: "2025-06-02", passNo: 1, status: "busy" },
      { date: "2025-06-02", passNo: 0, status: "free" },
    ]);
    await store.saveAll([{ date: "2025-06-02", passNo: 1, status: "free" }]);

    expect(await store.findAll()).toEqual([
      { date: "2025-06-02", passNo: 0, status: "free" },
      { date: "2025-06-02", passNo: 1, status: "free" },
    ]);
  });

  it("is idempotent for the same batch", async () => {
    const batch = [{ date: "2025-06-03", passNo: 2, status: "own" as const }];
    await store.saveAll(batch);
    await store.saveAll(batch);

    expect(await store.findAll()).toHaveLength(1);
  });

  it("finds by key and by date range", async () => {
    await store.saveAll([
      { date: "2025-06-01", passNo: 1, status: "busy" },
      { date: "2025-06-02", passNo: 1, status: "free" },
      { date: "2025-06-09", passNo: 1, status: "own" },
    ]);

    expect(await store.findByKey("2025-06-02", 1)).toEqual({ date: "2025-06-02", passNo: 1, status: "free" });
    expect(await store.findByKey("2025-06-02", 5)).toBeNull();
    expect((await store.findBetween("2025-06-02", "2025-06-08")).map((s) => s.date)).toEqual(["2025-06-02"]);
  });

  it("updates the status of an existing row only", async () => {
    await store.save({ date: "2025-06-02", passNo: 3, status: "free" });

    expect(await store.updateStatus("2025-06-02", 3, "own")).toBe(true);
    expect(await store.updateStatus("2025-06-02", 4, "own")).toBe(false);
    expect(await store.findByKey("2025-06-02", 3)).toEqual({ date: "2025-06-02", passNo: 3, status: "own" });
    expect(await store.findAll()).toHaveLength(1);
  });

  it("discards rows with an unknown status on read", async () => {
    db.insert(slots).values({ date: "2025-06-02", passNo: 0, status: "closed" }).run();
    await store.save({ date: "2025-06-02", passNo: 1, status: "busy" });

    expect(await store.findAll()).toEqual([{ date: "2025-06-02", passNo: 1, status: "busy" }]);
  });

  it("ignores an empty batch", async () => {
    await store.saveAll([]);
    expect(await store.findAll()).toEqual([]);
  });
});
