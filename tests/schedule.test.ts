import { describe, it, expect } from "vitest";
import { PassSchedule } from "@/lib/schedule";

describe("PassSchedule", () => {
  const schedule = new PassSchedule();

  it("maps end times to pass numbers", () => {
    expect(schedule.passNoForEndTime("10:00")).toBe(0);
    expect(schedule.passNoForEndTime("12:00")).toBe(1);
    expect(schedule.passNoForEndTime("22:00")).toBe(7);
    expect(schedule.passNoForEndTime("23:00")).toBeUndefined();
  });

  it("labels pass numbers", () => {
    expect(schedule.label(3)).toBe("14:00 - 16:00");
    expect(schedule.label(42)).toBe("Unknown");
  });

  it("parses a comma-separated schedule by position", () => {
    const custom = PassSchedule.parse("08:00-09:00, 09:00-10:30");
    expect(custom.entries()).toEqual([
      { passNo: 0, start: "08:00", end: "09:00" },
      { passNo: 1, start: "09:00", end: "10:30" },
    ]);
    expect(custom.passNoForEndTime("10:30")).toBe(1);
  });

  it("rejects malformed and duplicate intervals", () => {
    expect(() => PassSchedule.parse("8-9")).toThrow("Invalid pass interval");
    expect(() => PassSchedule.parse("08:00-09:00,07:00-09:00")).toThrow("Duplicate end time");
  });
});
