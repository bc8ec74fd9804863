import { silentLogger, type Logger } from "./logger";
import type { ActionOutcome, BookingActions } from "./portal/actions";
import type { Authenticator } from "./portal/auth-client";
import { PassSchedule } from "./schedule";
import type { SlotStore } from "./slot-store";
import { slotKeyId, type Credentials, type SlotKey } from "./types";
import { KeyedLock } from "./utils/keyed-lock";

export type BookingOutcome = "booked" | "cancelled" | "auth-failed" | "slot-unavailable" | "failed";

export interface BookingReply {
  outcome: BookingOutcome;
  message: string;
}

export interface BookingServiceOptions {
  auth: Authenticator;
  actions: BookingActions;
  store: SlotStore;
  credentials: Credentials;
  groupId: string | number;
  schedule?: PassSchedule;
  logger?: Logger;
}

export const MESSAGES = {
  authFailed: "Authentication failed. Please try again later.",
  slotUnavailable: "Slot is not available or booking failed.",
  cancelFailed: "Cancellation failed. The booking may already be cancelled.",
  cancelled: "Booking cancelled.",
} as const;

/**
 * Booking and cancellation on behalf of a UI or chat request. Every call logs
 * in with its own session; bookings for the same slot run one at a time.
 */
export class BookingService {
  private readonly options: BookingServiceOptions;
  private readonly schedule: PassSchedule;
  private readonly locks = new KeyedLock();
  private readonly log: Logger;

  constructor(options: BookingServiceOptions) {
    this.options = options;
    this.schedule = options.schedule ?? new PassSchedule();
    this.log = options.logger ?? silentLogger;
  }

  book(slot: SlotKey): Promise<BookingReply> {
    return this.locks.run(slotKeyId(slot), () => this.bookExclusive(slot));
  }

  async cancel(bookingId: string | number): Promise<BookingReply> {
    const { auth, actions, credentials } = this.options;

    const login = await auth.login(credentials.username, credentials.password);
    if (!login.ok) {
      this.log.error({ bookingId, reason: login.failure.reason }, "Login failed for cancellation");
      return { outcome: "auth-failed", message: MESSAGES.authFailed };
    }

    const result = await actions.cancel(login.session, bookingId);
    if (result.success) {
      return { outcome: "cancelled", message: MESSAGES.cancelled };
    }
    return this.failureReply(result, MESSAGES.cancelFailed, "failed");
  }

  private async bookExclusive(slot: SlotKey): Promise<BookingReply> {
    const { auth, actions, store, credentials, groupId } = this.options;

    // Busy may be stale; the portal's confirmation decides those
    const known = await store.findByKey(slot.date, slot.passNo);
    if (known?.status === "own") {
      this.log.warn(slot, "Slot already booked");
      return { outcome: "slot-unavailable", message: MESSAGES.slotUnavailable };
    }

    const login = await auth.login(credentials.username, credentials.password);
    if (!login.ok) {
      this.log.error({ ...slot, reason: login.failure.reason }, "Login failed for booking");
      return { outcome: "auth-failed", message: MESSAGES.authFailed };
    }

    const result = await actions.book(login.session, slot, groupId);
    if (!result.success) {
      return this.failureReply(result, MESSAGES.slotUnavailable, "slot-unavailable");
    }

    if (!(await store.updateStatus(slot.date, slot.passNo, "own"))) {
      await store.save({ ...slot, status: "own" });
    }
    this.log.info(slot, "Booking successful, status updated to own");

    return {
      outcome: "booked",
      message: `Slot booked!\nDate: ${slot.date}\nTime: ${this.schedule.label(slot.passNo)}`,
    };
  }

  private failureReply(
    result: Extract<ActionOutcome, { success: false }>,
    fallback: string,
    unconfirmed: BookingOutcome
  ): BookingReply {
    if (result.reason === "session-expired") {
      return { outcome: "auth-failed", message: MESSAGES.authFailed };
    }
    if (result.reason === "not-confirmed") {
      return { outcome: unconfirmed, message: fallback };
    }
    this.log.error({ reason: result.reason, detail: result.detail }, "Portal action failed");
    return { outcome: "failed", message: `${fallback} (${result.detail})` };
  }
}
