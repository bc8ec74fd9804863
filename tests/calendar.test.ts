import { describe, it, expect } from "vitest";
import { PortalError } from "@/lib/errors";
import { CalendarScraper, calendarUrl, parseCalendar } from "@/lib/portal/calendar";
import { isLoginPage, parseLoginForm, parseTimeRange } from "@/lib/portal/markup";
import { PortalSession } from "@/lib/portal/session";
import { PassSchedule } from "@/lib/schedule";
import { BASE, FakeTransport } from "./helpers/fake-transport";
import { calendarPage, homePage, loginPage } from "./helpers/html";

const schedule = new PassSchedule();
const WEEK = "2025-06-02";
const CALENDAR = `${BASE}/AptusPortal/CustomerBooking/BookingCalendar?bookingGroupId=2&passDate=${WEEK}`;

describe("parseCalendar", () => {
  it("maps day columns to consecutive dates and classes to statuses", () => {
    const html = calendarPage([
      {
        intervals: [
          { time: "10:00 - 12:00", classes: "bookable" },
          { time: "12:00 - 14:00" },
        ],
      },
      { intervals: [{ time: "14:00 - 16:00", classes: "own" }] },
    ]);

    expect(parseCalendar(html, WEEK, schedule)).toEqual([
      { date: "2025-06-02", passNo: 1, status: "free" },
      { date: "2025-06-02", passNo: 2, status: "busy" },
      { date: "2025-06-03", passNo: 3, status: "own" },
    ]);
  });

  it("skips intervals without a usable time and keeps the rest", () => {
    const html = calendarPage([
      {
        intervals: [
          { time: "no time here", classes: "bookable" },
          { time: "23:00 - 23:30", classes: "bookable" },
          { time: "21:00 - 22:00", classes: "bookable" },
        ],
      },
    ]);

    expect(parseCalendar(html, WEEK, schedule)).toEqual([{ date: "2025-06-02", passNo: 7, status: "free" }]);
  });

  it("returns nothing for a page without day columns", () => {
    expect(parseCalendar(homePage(), WEEK, schedule)).toEqual([]);
  });
});

describe("markup helpers", () => {
  it("reads the token and salt from the login form", () => {
    expect(parseLoginForm(loginPage("abc", "12"))).toEqual({ verificationToken: "abc", passwordSalt: "12" });
    expect(parseLoginForm(homePage())).toBeNull();
  });

  it("recognizes the login page", () => {
    expect(isLoginPage(loginPage())).toBe(true);
    expect(isLoginPage(homePage())).toBe(false);
  });

  it("parses time ranges", () => {
    expect(parseTimeRange("Bastu 07:00 - 10:00")).toEqual({ start: "07:00", end: "10:00" });
    expect(parseTimeRange("7-10")).toBeNull();
  });
});

describe("CalendarScraper.fetchSlots", () => {
  const scraper = new CalendarScraper({ schedule });

  it("builds the calendar URL from week and group", () => {
    const session = new PortalSession(BASE, new FakeTransport());
    expect(calendarUrl(session, WEEK, 2)).toBe(CALENDAR);
  });

  it("fetches and parses one week", async () => {
    const transport = new FakeTransport().on("GET", CALENDAR, {
      status: 200,
      body: calendarPage([{ intervals: [{ time: "10:00 - 12:00", classes: "bookable" }] }]),
    });

    const result = await scraper.fetchSlots(new PortalSession(BASE, transport), WEEK, 2);

    expect(result).toEqual({ kind: "slots", startDate: WEEK, slots: [{ date: WEEK, passNo: 1, status: "free" }] });
    expect(transport.requests[0].referer).toBe(`${BASE}/AptusPortal/CustomerBooking`);
  });

  it("follows redirects to the calendar", async () => {
    const transport = new FakeTransport()
      .on("GET", CALENDAR, { status: 302, location: "/AptusPortal/AptusPortal/CustomerBooking/Week" })
      .on("GET", `${BASE}/AptusPortal/CustomerBooking/Week`, { status: 200, body: calendarPage([]) });

    const result = await scraper.fetchSlots(new PortalSession(BASE, transport), WEEK, 2);
    expect(result).toEqual({ kind: "slots", startDate: WEEK, slots: [] });
  });

  it("reports auth-lost when the login page comes back", async () => {
    const transport = new FakeTransport().on("GET", CALENDAR, { status: 200, body: loginPage() });

    const result = await scraper.fetchSlots(new PortalSession(BASE, transport), WEEK, 2);
    expect(result).toEqual({ kind: "auth-lost", startDate: WEEK });
  });

  it("throws a PortalError for unexpected statuses", async () => {
    const transport = new FakeTransport().on("GET", CALENDAR, { status: 500 });

    const error = await scraper.fetchSlots(new PortalSession(BASE, transport), WEEK, 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PortalError);
    expect(error).toMatchObject({ kind: "unexpected-status", status: 500 });
  });

  it("gives up on redirect loops", async () => {
    const transport = new FakeTransport().on("GET", CALENDAR, { status: 302, location: CALENDAR });

    await expect(scraper.fetchSlots(new PortalSession(BASE, transport), WEEK, 2)).rejects.toMatchObject({
      kind: "redirect-loop",
    });
    expect(transport.requests).toHaveLength(1);
  });
});
