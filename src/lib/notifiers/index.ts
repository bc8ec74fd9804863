import type { BookingReply } from "../booking-service";
import { errorMessage } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { PassSchedule } from "../schedule";
import type { SlotKey } from "../types";
import { isIsoDate } from "../utils/dates";
import { escapeTelegramHtml } from "../utils/html-escape";
import type { BotTransport, BotUpdate } from "./telegram";
import type { SlotNotifier } from "./types";

export type { SlotNotifier } from "./types";

const BOOK_PREFIX = "book_";

export function bookCallbackData(date: string, passNo: number): string {
  return `${BOOK_PREFIX}${date}_${passNo}`;
}

// "book_2025-06-02_3" -> { date, passNo }; null for anything malformed or off-schedule
export function parseBookCommand(command: string, schedule: PassSchedule = new PassSchedule()): SlotKey | null {
  if (!command.startsWith(BOOK_PREFIX)) return null;
  const parts = command.slice(BOOK_PREFIX.length).split("_");
  if (parts.length !== 2) return null;

  const [date, passText] = parts;
  if (!isIsoDate(date) || !/^\d+$/.test(passText)) return null;
  const passNo = Number(passText);
  if (!schedule.intervalFor(passNo)) return null;
  return { date, passNo };
}

export function formatSlotFreed(date: string, humanTime: string): string {
  return `Slot freed up!\n📅  ${date}\n⏰  ${humanTime}`;
}

/**
 * Sends a "Book Now" message for every freed slot to each configured chat.
 */
export class TelegramSlotNotifier implements SlotNotifier {
  private readonly bot: BotTransport;
  private readonly chatIds: string[];
  private readonly log: Logger;

  constructor(bot: BotTransport, chatIds: string[], logger: Logger = silentLogger) {
    this.bot = bot;
    this.chatIds = chatIds;
    this.log = logger;
  }

  async notifySlotFreed(date: string, passNo: number, humanTime: string): Promise<void> {
    const text = formatSlotFreed(date, humanTime);
    const buttons = [[{ text: "Book Now", callbackData: bookCallbackData(date, passNo) }]];

    for (const chatId of this.chatIds) {
      try {
        await this.bot.sendMessage(chatId, text, { buttons });
        this.log.info({ chatId, date, passNo }, "Sent slot freed notification");
      } catch (error) {
        this.log.error({ chatId, date, passNo, err: error }, "Failed to send notification");
      }
    }
  }
}

// Used when no bot token is configured
export class LoggingNotifier implements SlotNotifier {
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  async notifySlotFreed(date: string, passNo: number, humanTime: string): Promise<void> {
    this.log.info({ date, passNo, time: humanTime }, "Slot freed up");
  }
}

export interface SlotBooker {
  book(slot: SlotKey): Promise<BookingReply>;
}

export const WELCOME_MESSAGE = "Welcome! Click a 'Book Now' button to book a slot.";
export const INVALID_COMMAND_MESSAGE = "❌ Invalid booking command format";

/**
 * Turns bot messages and button presses into bookings.
 */
export class BotCommandHandler {
  private readonly bot: BotTransport;
  private readonly booker: SlotBooker;
  private readonly log: Logger;
  private readonly schedule: PassSchedule;

  constructor(bot: BotTransport, booker: SlotBooker, logger: Logger = silentLogger, schedule = new PassSchedule()) {
    this.bot = bot;
    this.booker = booker;
    this.log = logger;
    this.schedule = schedule;
  }

  attach(): void {
    this.bot.onUpdate((update) => this.handle(update));
  }

  async handle(update: BotUpdate): Promise<void> {
    if (update.kind === "callback") {
      this.log.debug({ chatId: update.chatId, data: update.data }, "Received callback");
      if (update.data.startsWith(BOOK_PREFIX)) {
        await this.handleBook(update.data, update.chatId);
      }
      return;
    }

    const text = update.text.trim();
    if (text.startsWith(`/start ${BOOK_PREFIX}`)) {
      await this.handleBook(text.slice("/start ".length), update.chatId);
    } else if (text === "/start") {
      const greeting = update.firstName ? `👋 Hello ${escapeTelegramHtml(update.firstName)}!\n\n` : "";
      await this.bot.sendMessage(update.chatId, `${greeting}${WELCOME_MESSAGE}`, { html: true });
      this.log.info({ chatId: update.chatId }, "Handled /start command");
    } else {
      this.log.info({ chatId: update.chatId }, "Unhandled message");
    }
  }

  private async handleBook(command: string, chatId: string): Promise<void> {
    const slot = parseBookCommand(command, this.schedule);
    if (!slot) {
      this.log.warn({ chatId, command }, "Invalid booking command");
      await this.bot.sendMessage(chatId, INVALID_COMMAND_MESSAGE);
      return;
    }

    let reply: BookingReply;
    try {
      reply = await this.booker.book(slot);
    } catch (error) {
      this.log.error({ chatId, ...slot, err: error }, "Booking from chat threw");
      await this.bot.sendMessage(chatId, `❌ Error booking slot: ${errorMessage(error)}`);
      return;
    }
    if (reply.outcome === "booked") {
      await this.bot.sendMessage(chatId, `✅ ${reply.message}`);
      this.log.info({ chatId, ...slot }, "Booked slot from chat");
    } else {
      await this.bot.sendMessage(chatId, `❌ ${reply.message}`);
      this.log.warn({ chatId, ...slot, outcome: reply.outcome }, "Booking from chat failed");
    }
  }
}
