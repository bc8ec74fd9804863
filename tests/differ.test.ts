import { describe, it, expect } from "vitest";
import { computeTransitions, freedSlots, indexByKey } from "@/lib/differ";
import type { Slot } from "@/lib/types";

const day = "2025-06-02";

describe("freedSlots", () => {
  it("reports a slot that went from own to free", () => {
    const previous = indexByKey([{ date: day, passNo: 3, status: "own" }]);

    expect(freedSlots(previous, [{ date: day, passNo: 3, status: "free" }])).toEqual([
      { key: { date: day, passNo: 3 }, oldStatus: "own", newStatus: "free" },
    ]);
  });

  it("reports busy to free", () => {
    const previous = indexByKey([{ date: day, passNo: 1, status: "busy" }]);
    expect(freedSlots(previous, [{ date: day, passNo: 1, status: "free" }])).toHaveLength(1);
  });

  it("ignores slots that were already free or never seen", () => {
    const previous = indexByKey([{ date: day, passNo: 1, status: "free" }]);
    const scraped: Slot[] = [
      { date: day, passNo: 1, status: "free" },
      { date: day, passNo: 2, status: "free" },
    ];
    expect(freedSlots(previous, scraped)).toEqual([]);
  });

  it("ignores slots that became busy or own", () => {
    const previous = indexByKey([
      { date: day, passNo: 1, status: "free" },
      { date: day, passNo: 2, status: "busy" },
    ]);
    const scraped: Slot[] = [
      { date: day, passNo: 1, status: "busy" },
      { date: day, passNo: 2, status: "own" },
    ];
    expect(freedSlots(previous, scraped)).toEqual([]);
  });
});

describe("computeTransitions", () => {
  it("marks never-seen keys as unknown", () => {
    expect(computeTransitions(new Map(), [{ date: day, passNo: 0, status: "busy" }])).toEqual([
      { key: { date: day, passNo: 0 }, oldStatus: "unknown", newStatus: "busy" },
    ]);
  });
});

describe("indexByKey", () => {
  it("keeps the first row for duplicate keys", () => {
    const index = indexByKey([
      { date: day, passNo: 0, status: "own" },
      { date: day, passNo: 0, status: "busy" },
    ]);
    expect(index.get(`${day}:0`)).toBe("own");
  });
});
