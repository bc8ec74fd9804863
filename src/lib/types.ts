export const SLOT_STATUSES = ["free", "own", "busy"] as const;

export type SlotStatus = (typeof SLOT_STATUSES)[number];

export function isSlotStatus(value: unknown): value is SlotStatus {
  return typeof value === "string" && (SLOT_STATUSES as readonly string[]).includes(value);
}

// Identifies a reservable interval: calendar date (YYYY-MM-DD) and pass number
export interface SlotKey {
  date: string;
  passNo: number;
}

export interface Slot extends SlotKey {
  status: SlotStatus;
}

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

/**
 * Outcome of scraping one calendar week. "auth-lost" means the portal served
 * its login page, which is not the same thing as a week with no slots.
 */
export type ScrapeResult =
  | { kind: "slots"; startDate: string; slots: Slot[] }
  | { kind: "auth-lost"; startDate: string };

export type PriorStatus = SlotStatus | "unknown";

export interface Transition {
  key: SlotKey;
  oldStatus: PriorStatus;
  newStatus: SlotStatus;
}

export function slotKeyId(key: SlotKey): string {
  return `${key.date}:${key.passNo}`;
}
