import { DEFAULT_PASS_SCHEDULE, type PassInterval } from "./constants";

const TIME_PATTERN = /^\d{2}:\d{2}$/;

/**
 * Ordered passNo <-> clock-time mapping. The end time of an interval is what
 * identifies its passNo on the calendar page.
 */
export class PassSchedule {
  private readonly byPassNo: ReadonlyMap<number, PassInterval>;
  private readonly byEndTime: ReadonlyMap<string, number>;

  constructor(intervals: readonly PassInterval[] = DEFAULT_PASS_SCHEDULE) {
    const byPassNo = new Map<number, PassInterval>();
    const byEndTime = new Map<string, number>();

    for (const interval of intervals) {
      if (!TIME_PATTERN.test(interval.start) || !TIME_PATTERN.test(interval.end)) {
        throw new Error(`Invalid pass interval for passNo ${interval.passNo}: ${interval.start}-${interval.end}`);
      }
      if (byPassNo.has(interval.passNo)) {
        throw new Error(`Duplicate passNo in schedule: ${interval.passNo}`);
      }
      if (byEndTime.has(interval.end)) {
        throw new Error(`Duplicate end time in schedule: ${interval.end}`);
      }
      byPassNo.set(interval.passNo, { ...interval });
      byEndTime.set(interval.end, interval.passNo);
    }

    this.byPassNo = byPassNo;
    this.byEndTime = byEndTime;
  }

  /**
   * Parse "07:00-10:00,10:00-12:00,..." where the position is the passNo.
   */
  static parse(text: string): PassSchedule {
    const intervals = text
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean)
      .map((part, passNo) => {
        const [start, end] = part.split("-").map((t) => t.trim());
        return { passNo, start: start ?? "", end: end ?? "" };
      });
    return new PassSchedule(intervals);
  }

  passNoForEndTime(endTime: string): number | undefined {
    return this.byEndTime.get(endTime.trim());
  }

  intervalFor(passNo: number): PassInterval | undefined {
    return this.byPassNo.get(passNo);
  }

  label(passNo: number): string {
    const interval = this.byPassNo.get(passNo);
    return interval ? `${interval.start} - ${interval.end}` : "Unknown";
  }

  entries(): PassInterval[] {
    return [...this.byPassNo.values()].sort((a, b) => a.passNo - b.passNo);
  }
}
