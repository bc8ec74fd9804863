const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MS = 24 * 60 * 60 * 1000;

export function isIsoDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return toIsoDate(date) === value;
}

function parseIsoDate(value: string): Date {
  if (!isIsoDate(value)) {
    throw new Error(`Invalid date: ${value} (expected YYYY-MM-DD)`);
  }
  const [year, month, day] = value.split("-").map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

function toIsoDate(date: Date): string {
  return date.toISOString().split("T")[0];
}

// Calendar dates are plain YYYY-MM-DD strings; arithmetic happens in UTC
export function addDays(date: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(date).getTime() + days * DAY_MS));
}

/**
 * Local calendar date of an instant, as YYYY-MM-DD
 */
export function localIsoDate(now: Date): string {
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${now.getFullYear()}-${month}-${day}`;
}

export function mondayOnOrBefore(date: string): string {
  const weekday = parseIsoDate(date).getUTCDay(); // 0 = Sunday
  const offset = (weekday + 6) % 7;
  return addDays(date, -offset);
}

export function weekStarts(today: string, weeks: number): string[] {
  const monday = mondayOnOrBefore(today);
  return Array.from({ length: weeks }, (_, i) => addDays(monday, i * 7));
}

export function dayOfMonth(date: string): number {
  return parseIsoDate(date).getUTCDate();
}

export function weekdayName(date: string): string {
  return ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"][parseIsoDate(date).getUTCDay()];
}

export function isoWeekNumber(date: string): number {
  const d = parseIsoDate(date);
  const weekday = (d.getUTCDay() + 6) % 7;
  // Thursday of this week decides the year
  const thursday = new Date(d.getTime() + (3 - weekday) * DAY_MS);
  const firstThursday = new Date(Date.UTC(thursday.getUTCFullYear(), 0, 4));
  const firstWeekday = (firstThursday.getUTCDay() + 6) % 7;
  const week1Monday = firstThursday.getTime() - firstWeekday * DAY_MS;
  return 1 + Math.round((thursday.getTime() - 3 * DAY_MS - week1Monday) / (7 * DAY_MS));
}
