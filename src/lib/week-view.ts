import { PassSchedule } from "./schedule";
import type { Slot, SlotStatus } from "./types";
import { addDays, isoWeekNumber, mondayOnOrBefore, weekdayName } from "./utils/dates";

export interface WeekViewSlot {
  passNo: number;
  time: string;
  status: SlotStatus;
}

export interface WeekViewDay {
  date: string;
  weekday: string;
  slots: WeekViewSlot[];
}

export interface WeekView {
  weekNumber: number;
  startDate: string;
  endDate: string;
  previousWeek: string;
  nextWeek: string;
  days: WeekViewDay[];
}

/**
 * Arrange stored slots into the Monday-to-Sunday week containing startDate.
 * Slots outside that week are ignored.
 */
export function buildWeekView(
  slots: Slot[],
  schedule: PassSchedule,
  startDate: string,
  freeOnly = false
): WeekView {
  const monday = mondayOnOrBefore(startDate);
  const dates = Array.from({ length: 7 }, (_, i) => addDays(monday, i));

  const byDate = new Map<string, Slot[]>();
  for (const slot of slots) {
    if (freeOnly && slot.status !== "free") continue;
    const list = byDate.get(slot.date) ?? [];
    list.push(slot);
    byDate.set(slot.date, list);
  }

  // Unknown passNos sort after the scheduled ones
  const startOf = (passNo: number) => schedule.intervalFor(passNo)?.start ?? "99:99";

  const days = dates.map((date) => ({
    date,
    weekday: weekdayName(date),
    slots: (byDate.get(date) ?? [])
      .slice()
      .sort((a, b) => startOf(a.passNo).localeCompare(startOf(b.passNo)) || a.passNo - b.passNo)
      .map((slot) => ({ passNo: slot.passNo, time: schedule.label(slot.passNo), status: slot.status })),
  }));

  return {
    weekNumber: isoWeekNumber(monday),
    startDate: monday,
    endDate: dates[6],
    previousWeek: addDays(monday, -7),
    nextWeek: addDays(monday, 7),
    days,
  };
}
