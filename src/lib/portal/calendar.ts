import * as cheerio from "cheerio";
import { DEFAULT_MAX_ACTION_REDIRECTS, PORTAL_PATHS } from "../constants";
import { PortalError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { PassSchedule } from "../schedule";
import type { ScrapeResult, Slot, SlotStatus } from "../types";
import { addDays } from "../utils/dates";
import { isLoginPage, parseTimeRange } from "./markup";
import { followRedirects } from "./redirects";
import type { PortalSession } from "./session";

export interface CalendarScraperOptions {
  schedule?: PassSchedule;
  maxRedirects?: number;
  logger?: Logger;
}

export interface SlotSource {
  fetchSlots(session: PortalSession, startDate: string, groupId: string | number): Promise<ScrapeResult>;
}

export function calendarUrl(session: PortalSession, startDate: string, groupId: string | number): string {
  const params = new URLSearchParams({ bookingGroupId: String(groupId), passDate: startDate });
  return `${session.url(PORTAL_PATHS.calendar)}?${params.toString()}`;
}

function statusFromClasses(classes: { hasClass: (name: string) => boolean }): SlotStatus {
  if (classes.hasClass("bookable")) return "free";
  if (classes.hasClass("own")) return "own";
  return "busy";
}

/**
 * Parse a week of calendar markup. Day columns run left to right from
 * startDate; an interval without a recognizable end time is skipped on its own.
 */
export function parseCalendar(
  html: string,
  startDate: string,
  schedule: PassSchedule,
  log: Logger = silentLogger
): Slot[] {
  const $ = cheerio.load(html);
  const slots: Slot[] = [];

  $("div.dayColumn").each((dayIndex, dayColumn) => {
    const date = addDays(startDate, dayIndex);

    $(dayColumn)
      .find("div.interval")
      .each((intervalIndex, interval) => {
        const $interval = $(interval);
        const label = $interval
          .find("div")
          .toArray()
          .map((el) => $(el).text().trim())
          .find((text) => parseTimeRange(text) !== null);

        const range = label ? parseTimeRange(label) : null;
        if (!range) {
          log.warn({ date, intervalIndex }, "Skipping interval without time");
          return;
        }

        const passNo = schedule.passNoForEndTime(range.end);
        if (passNo === undefined) {
          log.warn({ date, time: label, endTime: range.end }, "Unknown passNo for time");
          return;
        }

        slots.push({ date, passNo, status: statusFromClasses($interval) });
      });
  });

  return slots;
}

export class CalendarScraper implements SlotSource {
  private readonly schedule: PassSchedule;
  private readonly maxRedirects: number;
  private readonly log: Logger;

  constructor(options: CalendarScraperOptions = {}) {
    this.schedule = options.schedule ?? new PassSchedule();
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_ACTION_REDIRECTS;
    this.log = options.logger ?? silentLogger;
  }

  /**
   * Fetch one week of the booking calendar. Throws PortalError when the page
   * cannot be retrieved; a login page comes back as "auth-lost".
   */
  async fetchSlots(session: PortalSession, startDate: string, groupId: string | number): Promise<ScrapeResult> {
    const url = calendarUrl(session, startDate, groupId);
    this.log.debug({ url }, "Fetching calendar");

    const outcome = await followRedirects(session, url, {
      maxRedirects: this.maxRedirects,
      referer: session.url(PORTAL_PATHS.customerBooking),
      logger: this.log,
    });

    if (outcome.kind === "failed") {
      throw new PortalError(outcome.reason, `Failed to fetch calendar for ${startDate}: ${outcome.message}`, {
        status: outcome.status,
        url: outcome.url,
      });
    }

    const html = outcome.response.body;
    if (isLoginPage(html)) {
      this.log.error({ startDate }, "Received login page instead of booking calendar");
      return { kind: "auth-lost", startDate };
    }

    const slots = parseCalendar(html, startDate, this.schedule, this.log);
    this.log.info({ startDate, count: slots.length }, "Parsed calendar slots");
    return { kind: "slots", startDate, slots };
  }
}
