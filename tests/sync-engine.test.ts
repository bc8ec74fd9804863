import { describe, it, expect, vi, afterEach } from "vitest";
import type { SlotNotifier } from "@/lib/notifiers/types";
import type { Authenticator, LoginResult } from "@/lib/portal/auth-client";
import type { SlotSource } from "@/lib/portal/calendar";
import { PortalSession } from "@/lib/portal/session";
import { SyncEngine, type SyncEngineOptions } from "@/lib/sync-engine";
import type { ScrapeResult, Slot } from "@/lib/types";
import { BASE, FakeTransport } from "./helpers/fake-transport";
import { MemorySlotStore } from "./helpers/memory-store";

const WEEK1 = "2025-06-02";
const WEEK2 = "2025-06-09";
// Wednesday of the first tracked week, local time
const clock = () => new Date(2025, 5, 4, 12, 0);

function okLogin(): LoginResult {
  return { ok: true, session: new PortalSession(BASE, new FakeTransport()) };
}

function fakeAuth(...results: Array<LoginResult | Error>): Authenticator & { calls: number } {
  const auth = {
    calls: 0,
    async login(): Promise<LoginResult> {
      const result = results[Math.min(auth.calls, results.length - 1)] ?? okLogin();
      auth.calls++;
      if (result instanceof Error) throw result;
      return result;
    },
  };
  return auth;
}

function fakeScraper(weeks: Record<string, ScrapeResult | Error>): SlotSource & { started: string[] } {
  const started: string[] = [];
  const scraper = {
    started,
    async fetchSlots(_session: PortalSession, startDate: string): Promise<ScrapeResult> {
      scraper.started.push(startDate);
      const result = weeks[startDate] ?? slots(startDate, []);
      if (result instanceof Error) throw result;
      return result;
    },
  };
  return scraper;
}

function slots(startDate: string, list: Slot[]): ScrapeResult {
  return { kind: "slots", startDate, slots: list };
}

function engineWith(overrides: Partial<SyncEngineOptions>) {
  const notifier = { notifySlotFreed: vi.fn<SlotNotifier["notifySlotFreed"]>().mockResolvedValue(undefined) };
  const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  const store = new MemorySlotStore();
  const options: SyncEngineOptions = {
    auth: fakeAuth(okLogin()),
    scraper: fakeScraper({}),
    store,
    notifier,
    credentials: { username: "tester", password: "test-secret" },
    groupId: 2,
    weeks: 2,
    clock,
    sleep,
    ...overrides,
  };
  return { engine: new SyncEngine(options), notifier, sleep, store, options };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("SyncEngine.runCycle", () => {
  it("notifies a slot that went from own to free and persists it", async () => {
    const store = new MemorySlotStore([{ date: WEEK1, passNo: 3, status: "own" }]);
    const scraper = fakeScraper({ [WEEK1]: slots(WEEK1, [{ date: WEEK1, passNo: 3, status: "free" }]) });
    const { engine, notifier } = engineWith({ store, scraper });

    const report = await engine.runCycle();

    expect(report.status).toBe("completed");
    expect(scraper.started).toEqual([WEEK1, WEEK2]);
    expect(notifier.notifySlotFreed).toHaveBeenCalledTimes(1);
    expect(notifier.notifySlotFreed).toHaveBeenCalledWith(WEEK1, 3, "14:00 - 16:00");
    expect(report.freed).toEqual([{ key: { date: WEEK1, passNo: 3 }, oldStatus: "own", newStatus: "free" }]);
    expect(store.status(WEEK1, 3)).toBe("free");
    expect(engine.state).toEqual({ phase: "idle" });
  });

  it("does not notify the same freed slot twice", async () => {
    const store = new MemorySlotStore([{ date: WEEK1, passNo: 3, status: "busy" }]);
    const scraper = fakeScraper({ [WEEK1]: slots(WEEK1, [{ date: WEEK1, passNo: 3, status: "free" }]) });
    const { engine, notifier } = engineWith({ store, scraper });

    await engine.runCycle();
    const second = await engine.runCycle();

    expect(notifier.notifySlotFreed).toHaveBeenCalledTimes(1);
    expect(second.freed).toEqual([]);
  });

  it("stores never-seen slots without notifying", async () => {
    const scraper = fakeScraper({ [WEEK1]: slots(WEEK1, [{ date: WEEK1, passNo: 1, status: "free" }]) });
    const { engine, notifier, store } = engineWith({ scraper });

    await engine.runCycle();

    expect(notifier.notifySlotFreed).not.toHaveBeenCalled();
    expect(store.status(WEEK1, 1)).toBe("free");
  });

  it("skips a week whose session was lost and keeps going", async () => {
    const store = new MemorySlotStore([{ date: WEEK1, passNo: 2, status: "own" }]);
    const scraper = fakeScraper({
      [WEEK1]: { kind: "auth-lost", startDate: WEEK1 },
      [WEEK2]: slots(WEEK2, [{ date: WEEK2, passNo: 0, status: "busy" }]),
    });
    const { engine } = engineWith({ store, scraper });

    const report = await engine.runCycle();

    expect(report.weeks.map((w) => w.status)).toEqual(["auth-lost", "ok"]);
    expect(store.status(WEEK1, 2)).toBe("own");
    expect(store.status(WEEK2, 0)).toBe("busy");
  });

  it("isolates a failing week", async () => {
    const scraper = fakeScraper({
      [WEEK1]: new Error("calendar exploded"),
      [WEEK2]: slots(WEEK2, [{ date: WEEK2, passNo: 4, status: "free" }]),
    });
    const { engine, store } = engineWith({ scraper });

    const report = await engine.runCycle();

    expect(report.weeks[0]).toMatchObject({ status: "error", error: "calendar exploded" });
    expect(report.weeks[1]).toMatchObject({ status: "ok", slots: 1 });
    expect(store.status(WEEK2, 4)).toBe("free");
  });

  it("keeps going when a notification fails", async () => {
    const store = new MemorySlotStore([{ date: WEEK1, passNo: 3, status: "own" }]);
    const scraper = fakeScraper({ [WEEK1]: slots(WEEK1, [{ date: WEEK1, passNo: 3, status: "free" }]) });
    const { engine, notifier } = engineWith({ store, scraper });
    notifier.notifySlotFreed.mockRejectedValue(new Error("chat down"));

    const report = await engine.runCycle();

    expect(report.status).toBe("completed");
    expect(store.status(WEEK1, 3)).toBe("free");
  });

  it("retries login and gives up after the limit", async () => {
    const failure: LoginResult = { ok: false, failure: { reason: "login-rejected", message: "nope" } };
    const auth = fakeAuth(failure);
    const scraper = fakeScraper({});
    const { engine, sleep } = engineWith({ auth, scraper });

    const report = await engine.runCycle();

    expect(report.status).toBe("login-failed");
    expect(report.loginAttempts).toBe(3);
    expect(report.loginFailure).toEqual({ reason: "login-rejected", message: "nope" });
    expect(auth.calls).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(scraper.started).toEqual([]);
  });

  it("treats a throwing login as a failed attempt", async () => {
    const auth = fakeAuth(new Error("socket hang up"), okLogin());
    const { engine } = engineWith({ auth });

    const report = await engine.runCycle();

    expect(report.status).toBe("completed");
    expect(report.loginAttempts).toBe(2);
  });

  it("skips a cycle while another is running", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const scraper: SlotSource = {
      async fetchSlots(_session, startDate) {
        await gate;
        return { kind: "slots", startDate, slots: [] };
      },
    };
    const { engine } = engineWith({ scraper, weeks: 1 });

    const first = engine.runCycle();
    const second = await engine.runCycle();
    release();

    expect(second.status).toBe("skipped");
    expect((await first).status).toBe("completed");
  });
});

describe("SyncEngine.start", () => {
  it("runs immediately, then on the interval until stopped", async () => {
    vi.useFakeTimers();
    const auth = fakeAuth(okLogin());
    const { engine } = engineWith({ auth, weeks: 1 });

    engine.start(60_000);
    await vi.advanceTimersByTimeAsync(0);
    expect(auth.calls).toBe(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(auth.calls).toBe(2);

    await engine.stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(auth.calls).toBe(2);
    expect(engine.isRunning).toBe(false);
  });
});
