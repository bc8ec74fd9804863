import { freedSlots, indexByKey } from "./differ";
import { errorMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { SlotNotifier } from "./notifiers/types";
import type { AuthFailure, Authenticator, LoginResult } from "./portal/auth-client";
import type { SlotSource } from "./portal/calendar";
import type { PortalSession } from "./portal/session";
import { PassSchedule } from "./schedule";
import type { SlotStore } from "./slot-store";
import { slotKeyId, type Credentials, type Transition } from "./types";
import { localIsoDate, weekStarts } from "./utils/dates";

export type EngineState =
  | { phase: "idle" }
  | { phase: "logging-in"; attempt: number }
  | { phase: "scraping"; week: number; startDate: string }
  | { phase: "diffing"; week: number; startDate: string }
  | { phase: "persisting"; week: number; startDate: string };

export interface WeekReport {
  startDate: string;
  status: "ok" | "auth-lost" | "error";
  slots: number;
  freed: number;
  error?: string;
}

export interface CycleReport {
  status: "completed" | "login-failed" | "skipped";
  startedAt: string;
  durationMs: number;
  loginAttempts: number;
  loginFailure?: AuthFailure;
  weeks: WeekReport[];
  freed: Transition[];
}

export interface SyncEngineOptions {
  auth: Authenticator;
  scraper: SlotSource;
  store: SlotStore;
  notifier: SlotNotifier;
  credentials: Credentials;
  groupId: string | number;
  weeks: number;
  schedule?: PassSchedule;
  loginRetries?: number;
  retryDelayMs?: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Periodic login + scrape + diff + notify + persist. Cycles never overlap,
 * and a failing week is skipped without abandoning the others.
 */
export class SyncEngine {
  private readonly options: SyncEngineOptions;
  private readonly schedule: PassSchedule;
  private readonly loginRetries: number;
  private readonly retryDelayMs: number;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  private current: Promise<CycleReport> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private _state: EngineState = { phase: "idle" };

  constructor(options: SyncEngineOptions) {
    this.options = options;
    this.schedule = options.schedule ?? new PassSchedule();
    this.loginRetries = Math.max(1, options.loginRetries ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? silentLogger;
  }

  get state(): EngineState {
    return this._state;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one cycle now. Returns a "skipped" report if a cycle is in flight.
   */
  async runCycle(): Promise<CycleReport> {
    if (this.current) {
      this.log.warn("Sync cycle already in progress, skipping");
      return {
        status: "skipped",
        startedAt: this.clock().toISOString(),
        durationMs: 0,
        loginAttempts: 0,
        weeks: [],
        freed: [],
      };
    }

    this.current = this.cycle();
    try {
      return await this.current;
    } finally {
      this.current = null;
      this._state = { phase: "idle" };
    }
  }

  /**
   * Run a cycle immediately, then every intervalMs measured from the start of
   * the previous cycle. The next cycle is only scheduled once the previous
   * one has settled.
   */
  start(intervalMs: number): void {
    if (this.running) {
      this.log.warn("Sync engine already running");
      return;
    }
    this.running = true;
    this.log.info({ intervalMs, weeks: this.options.weeks }, "Sync engine started");
    void this.tick(intervalMs);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) {
      await this.current.catch(() => undefined);
    }
    this.log.info("Sync engine stopped");
  }

  private async tick(intervalMs: number): Promise<void> {
    const started = Date.now();
    try {
      const report = await this.runCycle();
      this.log.info(
        { status: report.status, weeks: report.weeks.length, freed: report.freed.length, durationMs: report.durationMs },
        "Sync cycle finished"
      );
    } catch (error) {
      this.log.error({ err: error }, "Sync cycle failed");
    }

    if (this.running) {
      const wait = Math.max(0, intervalMs - (Date.now() - started));
      this.timer = setTimeout(() => {
        void this.tick(intervalMs);
      }, wait);
    }
  }

  private async cycle(): Promise<CycleReport> {
    const startedAt = this.clock();
    const { credentials, weeks, store } = this.options;
    this.log.info({ weeks }, "Starting slot update");

    const login = await this.loginWithRetry(credentials);
    const session = login.session;
    if (!session) {
      this.log.error("Max login retries reached. Skipping slot update.");
      return {
        status: "login-failed",
        startedAt: startedAt.toISOString(),
        durationMs: this.clock().getTime() - startedAt.getTime(),
        loginAttempts: login.attempts,
        loginFailure: login.failure,
        weeks: [],
        freed: [],
      };
    }

    const previous = indexByKey(await store.findAll());
    const reports: WeekReport[] = [];
    const freed: Transition[] = [];

    const starts = weekStarts(localIsoDate(startedAt), weeks);
    for (let week = 0; week < starts.length; week++) {
      const report = await this.syncWeek(session, week, starts[week], previous, freed);
      reports.push(report);
    }

    this.log.info(
      {
        ok: reports.filter((r) => r.status === "ok").length,
        failed: reports.filter((r) => r.status !== "ok").length,
        freed: freed.length,
      },
      "Slot update completed"
    );

    return {
      status: "completed",
      startedAt: startedAt.toISOString(),
      durationMs: this.clock().getTime() - startedAt.getTime(),
      loginAttempts: login.attempts,
      weeks: reports,
      freed,
    };
  }

  private async loginWithRetry(
    credentials: Credentials
  ): Promise<{ session: PortalSession | null; attempts: number; failure?: AuthFailure }> {
    let failure: AuthFailure | undefined;

    for (let attempt = 1; attempt <= this.loginRetries; attempt++) {
      this._state = { phase: "logging-in", attempt };
      let result: LoginResult;
      try {
        result = await this.options.auth.login(credentials.username, credentials.password);
      } catch (error) {
        result = { ok: false, failure: { reason: "io-error", message: `Error: ${errorMessage(error)}` } };
      }

      if (result.ok) {
        this.log.info({ attempt }, "Login successful");
        return { session: result.session, attempts: attempt };
      }

      failure = result.failure;
      this.log.warn({ attempt, reason: failure.reason }, `Login failed: ${failure.message}`);
      if (attempt < this.loginRetries) {
        await this.sleep(this.retryDelayMs);
      }
    }

    return { session: null, attempts: this.loginRetries, failure };
  }

  private async syncWeek(
    session: PortalSession,
    week: number,
    startDate: string,
    previous: Map<string, Transition["oldStatus"]>,
    freed: Transition[]
  ): Promise<WeekReport> {
    this._state = { phase: "scraping", week, startDate };
    this.log.info({ startDate }, "Fetching slots for week");

    try {
      const result = await this.options.scraper.fetchSlots(session, startDate, this.options.groupId);
      if (result.kind === "auth-lost") {
        this.log.error({ startDate }, "Session lost while scraping week, skipping");
        return { startDate, status: "auth-lost", slots: 0, freed: 0 };
      }

      this._state = { phase: "diffing", week, startDate };
      const transitions = freedSlots(previous, result.slots);
      for (const transition of transitions) {
        await this.notify(transition);
      }
      freed.push(...transitions);

      this._state = { phase: "persisting", week, startDate };
      if (result.slots.length > 0) {
        await this.options.store.saveAll(result.slots);
      }
      for (const slot of result.slots) {
        previous.set(slotKeyId(slot), slot.status);
      }

      return { startDate, status: "ok", slots: result.slots.length, freed: transitions.length };
    } catch (error) {
      this.log.error({ startDate, err: error }, "Failed to fetch or process slots for week");
      return { startDate, status: "error", slots: 0, freed: 0, error: errorMessage(error) };
    }
  }

  private async notify(transition: Transition): Promise<void> {
    const { date, passNo } = transition.key;
    try {
      await this.options.notifier.notifySlotFreed(date, passNo, this.schedule.label(passNo));
      this.log.info({ date, passNo, from: transition.oldStatus }, "Slot freed notification sent");
    } catch (error) {
      this.log.error({ date, passNo, err: error }, "Failed to send slot freed notification");
    }
  }
}
