import { BookingService } from "./booking-service";
import type { AppConfig } from "./config";
import { openDatabase } from "./db";
import type { Logger } from "./logger";
import { BotCommandHandler, LoggingNotifier, TelegramSlotNotifier, type SlotNotifier } from "./notifiers";
import { TelegramClient } from "./notifiers/telegram";
import { ActionClient } from "./portal/actions";
import { PortalAuthClient } from "./portal/auth-client";
import { CalendarScraper } from "./portal/calendar";
import { createGotTransport } from "./portal/transport";
import { DrizzleSlotStore } from "./slot-store";
import { SyncEngine } from "./sync-engine";

export interface AppServices {
  config: AppConfig;
  store: DrizzleSlotStore;
  auth: PortalAuthClient;
  scraper: CalendarScraper;
  actions: ActionClient;
  booking: BookingService;
  notifier: SlotNotifier;
  engine: SyncEngine;
  telegram?: TelegramClient;
  close: () => void;
}

/**
 * Build every component from one config. Nothing starts running here.
 */
export function createServices(config: AppConfig, logger: Logger): AppServices {
  const { portal, sync, schedule } = config;
  const database = openDatabase(config.databasePath);
  const store = new DrizzleSlotStore(database.db, logger.child({ module: "store" }));

  const auth = new PortalAuthClient({
    baseUrl: portal.baseUrl,
    transportFactory: () => createGotTransport({ timeoutMs: portal.timeoutMs, proxyUrl: portal.proxyUrl }),
    maxRedirects: portal.maxLoginRedirects,
    logger: logger.child({ module: "auth" }),
  });
  const scraper = new CalendarScraper({
    schedule,
    maxRedirects: portal.maxActionRedirects,
    logger: logger.child({ module: "calendar" }),
  });
  const actions = new ActionClient({
    schedule,
    maxRedirects: portal.maxActionRedirects,
    logger: logger.child({ module: "actions" }),
  });

  const booking = new BookingService({
    auth,
    actions,
    store,
    credentials: portal.credentials,
    groupId: portal.groupId,
    schedule,
    logger: logger.child({ module: "booking" }),
  });

  let telegram: TelegramClient | undefined;
  let notifier: SlotNotifier;
  if (config.telegram) {
    telegram = new TelegramClient({ token: config.telegram.token, logger: logger.child({ module: "telegram" }) });
    notifier = new TelegramSlotNotifier(telegram, [...config.telegram.chatIds], logger.child({ module: "notifier" }));
    new BotCommandHandler(telegram, booking, logger.child({ module: "bot" }), schedule).attach();
  } else {
    logger.warn("TELEGRAM_BOT_TOKEN not set, freed slots will only be logged");
    notifier = new LoggingNotifier(logger.child({ module: "notifier" }));
  }

  const engine = new SyncEngine({
    auth,
    scraper,
    store,
    notifier,
    credentials: portal.credentials,
    groupId: portal.groupId,
    weeks: sync.weeks,
    schedule,
    loginRetries: sync.loginRetries,
    retryDelayMs: sync.loginRetryDelayMs,
    logger: logger.child({ module: "sync" }),
  });

  return { config, store, auth, scraper, actions, booking, notifier, engine, telegram, close: database.close };
}
