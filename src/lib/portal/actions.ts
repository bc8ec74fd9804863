import * as cheerio from "cheerio";
import {
  BOOKED_PHRASE,
  CANCELLED_PHRASE,
  DEFAULT_MAX_ACTION_REDIRECTS,
  FEEDBACK_MARKER,
  PORTAL_PATHS,
} from "../constants";
import { PortalError, errorMessage } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { PassSchedule } from "../schedule";
import type { SlotKey } from "../types";
import { dayOfMonth } from "../utils/dates";
import { calendarUrl } from "./calendar";
import { isLoginPage, parseTimeRange } from "./markup";
import { followRedirects, type RedirectFailureReason } from "./redirects";
import type { PortalSession } from "./session";

export type ActionFailureReason = RedirectFailureReason | "network-error" | "session-expired" | "not-confirmed";

export type ActionOutcome =
  | { success: true; confirmedBy: "feedback-dialog" | "own-interval" }
  | { success: false; reason: ActionFailureReason; detail: string };

export interface ActionClientOptions {
  schedule?: PassSchedule;
  maxRedirects?: number;
  logger?: Logger;
}

export interface BookingActions {
  book(session: PortalSession, slot: SlotKey, groupId: string | number): Promise<ActionOutcome>;
  cancel(session: PortalSession, bookingId: string | number): Promise<ActionOutcome>;
}

function hasFeedback(html: string, phrase: string): boolean {
  return html.includes(FEEDBACK_MARKER) && html.includes(phrase);
}

/**
 * True when the calendar in the response shows the slot's interval as "own"
 * on the day column whose day-of-month matches the slot date.
 */
export function showsOwnInterval(html: string, slot: SlotKey, schedule: PassSchedule): boolean {
  const interval = schedule.intervalFor(slot.passNo);
  if (!interval) return false;

  const $ = cheerio.load(html);
  const targetDay = dayOfMonth(slot.date);

  return $("div.dayColumn")
    .toArray()
    .some((day) => {
      const dayText = $(day).find("div.dayOfMonth").first().text().trim();
      if (Number.parseInt(dayText, 10) !== targetDay) return false;

      return $(day)
        .find("div.interval.own")
        .toArray()
        .some((own) => {
          const range = parseTimeRange($(own).text());
          return range !== null && range.start === interval.start && range.end === interval.end;
        });
    });
}

/**
 * Books and cancels through an authenticated session. Each call is a single
 * attempt; nothing here retries.
 */
export class ActionClient implements BookingActions {
  private readonly schedule: PassSchedule;
  private readonly maxRedirects: number;
  private readonly log: Logger;

  constructor(options: ActionClientOptions = {}) {
    this.schedule = options.schedule ?? new PassSchedule();
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_ACTION_REDIRECTS;
    this.log = options.logger ?? silentLogger;
  }

  async book(session: PortalSession, slot: SlotKey, groupId: string | number): Promise<ActionOutcome> {
    const params = new URLSearchParams({
      passNo: String(slot.passNo),
      passDate: slot.date,
      bookingGroupId: String(groupId),
    });
    const url = `${session.url(PORTAL_PATHS.book)}?${params.toString()}`;
    this.log.info({ ...slot, groupId }, "Attempting to book slot");

    const page = await this.fetchResult(session, url, calendarUrl(session, slot.date, groupId));
    if (!page.ok) return page.outcome;

    if (hasFeedback(page.html, BOOKED_PHRASE)) {
      this.log.info(slot, "Booking confirmed via feedback dialog");
      return { success: true, confirmedBy: "feedback-dialog" };
    }

    if (showsOwnInterval(page.html, slot, this.schedule)) {
      this.log.info(slot, "Booking confirmed via own interval");
      return { success: true, confirmedBy: "own-interval" };
    }

    this.log.warn(slot, "Booking not confirmed");
    return { success: false, reason: "not-confirmed", detail: "Booking was not confirmed by the portal" };
  }

  async cancel(session: PortalSession, bookingId: string | number): Promise<ActionOutcome> {
    const url = session.url(`${PORTAL_PATHS.unbook}/${encodeURIComponent(String(bookingId))}`);
    this.log.info({ bookingId }, "Attempting to cancel booking");

    const page = await this.fetchResult(session, url, session.url(PORTAL_PATHS.customerBooking));
    if (!page.ok) return page.outcome;

    if (hasFeedback(page.html, CANCELLED_PHRASE)) {
      this.log.info({ bookingId }, "Cancellation confirmed via feedback dialog");
      return { success: true, confirmedBy: "feedback-dialog" };
    }

    this.log.warn({ bookingId }, "Cancellation not confirmed");
    return { success: false, reason: "not-confirmed", detail: "Cancellation was not confirmed by the portal" };
  }

  private async fetchResult(
    session: PortalSession,
    url: string,
    referer: string
  ): Promise<{ ok: true; html: string } | { ok: false; outcome: ActionOutcome }> {
    try {
      const outcome = await followRedirects(session, url, {
        maxRedirects: this.maxRedirects,
        referer,
        logger: this.log,
      });

      if (outcome.kind === "failed") {
        this.log.error({ url: outcome.url, reason: outcome.reason, status: outcome.status }, outcome.message);
        return { ok: false, outcome: { success: false, reason: outcome.reason, detail: outcome.message } };
      }

      if (isLoginPage(outcome.response.body)) {
        this.log.error({ url }, "Received login page instead of action response");
        return {
          ok: false,
          outcome: { success: false, reason: "session-expired", detail: "Portal session has expired" },
        };
      }

      return { ok: true, html: outcome.response.body };
    } catch (error) {
      if (error instanceof PortalError) {
        this.log.error({ url, err: error }, "Action request failed");
        return { ok: false, outcome: { success: false, reason: "network-error", detail: errorMessage(error) } };
      }
      throw error;
    }
  }
}
